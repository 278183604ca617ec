import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

import fetch, { Response } from 'node-fetch';
import { NetworkError, ValidationError } from './errors';
import { manualJobSchema } from './schemas';
import {
  createManualJob,
  extractFromText,
  extractFromUrl,
  extractJobDescription,
  extractRequirements,
  extractSkills,
  parseJobPage,
} from './jobExtractor';

const fetchMock = vi.mocked(fetch);

const POSTING = [
  'Senior Backend Engineer',
  'Acme Analytics',
  'Location: Berlin, Germany',
  'We are looking for an engineer with strong Python and PostgreSQL skills.',
  'Experience with Docker and Kubernetes.',
].join('\n');

const JSON_LD_PAGE = `<html><head><title>Careers | Globex</title>
<script type="application/ld+json">{"@context":"https://schema.org","@type":"JobPosting","title":"Data Engineer","description":"<p>You need strong SQL skills.</p><p>Experience with Airflow and AWS.</p>","employmentType":["FULL_TIME","CONTRACTOR"],"datePosted":"2024-05-01","hiringOrganization":{"@type":"Organization","name":"Globex"},"jobLocation":{"@type":"Place","address":{"addressLocality":"Lisbon","addressCountry":"PT"}}}</script>
</head><body><h1>Ignored heading</h1></body></html>`;

const PLAIN_PAGE = `<html><head><title>Job page</title><meta property="og:site_name" content="Initech Careers"></head>
<body><nav>Home Jobs</nav><main><h1>Frontend Developer</h1><div class="company">Initech</div><p>Must have React and TypeScript.</p></main><footer>Initech footer</footer></body></html>`;

describe('extractFromText', () => {
  it('reads title, company and location from a pasted posting', () => {
    const job = extractFromText(POSTING);

    expect(job).toEqual({
      title: 'Senior Backend Engineer',
      company: 'Acme Analytics',
      description: POSTING,
      requirements: ['an engineer with strong Python and PostgreSQL skills', 'Docker and Kubernetes'],
      skills: ['Python', 'SQL', 'PostgreSQL', 'Docker', 'Kubernetes'],
      location: 'Berlin, Germany',
    });
  });

  it('falls back to unknown values when the first lines are prose', () => {
    const job = extractFromText('About the role\nWe are a small team.');

    expect(job.title).toBe('Unknown Position');
    expect(job.company).toBe('Unknown Company');
    expect(job.location).toBe('Unknown Location');
  });
});

describe('extractRequirements', () => {
  it('deduplicates case-insensitively', () => {
    expect(extractRequirements('Must have Terraform. must have terraform.')).toEqual(['Terraform']);
  });
});

describe('extractSkills', () => {
  it('matches known skills with or without dots', () => {
    expect(extractSkills('We use NodeJS and vuejs')).toEqual(['Vue.js', 'Node.js']);
  });
});

describe('parseJobPage', () => {
  it('prefers the schema.org JobPosting', () => {
    expect(parseJobPage(JSON_LD_PAGE, 'https://jobs.example.com/42')).toEqual({
      title: 'Data Engineer',
      company: 'Globex',
      description: 'You need strong SQL skills.Experience with Airflow and AWS.',
      requirements: ['strong SQL skills', 'Airflow and AWS'],
      skills: ['SQL', 'AWS'],
      location: 'Lisbon, PT',
      jobType: 'FULL_TIME, CONTRACTOR',
      postedDate: '2024-05-01',
      url: 'https://jobs.example.com/42',
    });
  });

  it('reads common page elements when there is no structured data', () => {
    const job = parseJobPage(PLAIN_PAGE, 'https://jobs.example.com/7');

    expect(job.title).toBe('Frontend Developer');
    expect(job.company).toBe('Initech');
    expect(job.description).toBe('Frontend DeveloperInitechMust have React and TypeScript.');
    expect(job.requirements).toEqual(['React and TypeScript']);
    expect(job.skills).toEqual(['TypeScript', 'React']);
    expect(job.location).toBeUndefined();
  });
});

describe('extractFromUrl', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('fetches with a browser user agent and parses the page', async () => {
    fetchMock.mockResolvedValueOnce(new Response(PLAIN_PAGE, { status: 200 }));

    const job = await extractFromUrl('https://jobs.example.com/7');

    expect(job.title).toBe('Frontend Developer');
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ 'User-Agent': expect.stringContaining('Mozilla/5.0') });
  });

  it('raises a NetworkError for an error status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('gone', { status: 404 }));

    const attempt = extractFromUrl('https://jobs.example.com/1');

    await expect(attempt).rejects.toBeInstanceOf(NetworkError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Could not fetch the job posting at https://jobs.example.com/1',
      details: 'HTTP 404',
    });
  });
});

describe('extractJobDescription', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('fetches URLs and parses everything else as text', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON_LD_PAGE, { status: 200 }));

    expect((await extractJobDescription('  https://jobs.example.com/42 ')).title).toBe('Data Engineer');
    expect((await extractJobDescription(POSTING)).title).toBe('Senior Backend Engineer');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects pasted text below the minimum length', async () => {
    const attempt = extractJobDescription('Engineer wanted', { minContentLength: 100, maxContentLength: 5000 });

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toThrow('Job description is too short');
  });

  it('cuts long descriptions at the maximum length', async () => {
    const job = await extractJobDescription(POSTING, { minContentLength: 10, maxContentLength: 40 });

    expect(job.description).toBe(POSTING.slice(0, 40));
    expect(job.skills).toEqual(['Python', 'SQL', 'PostgreSQL', 'Docker', 'Kubernetes']);
  });
});

describe('createManualJob', () => {
  it('keeps the listed skills and splits list fields on commas and newlines', () => {
    const fields = manualJobSchema.parse({
      title: ' Site Reliability Engineer ',
      company: 'Acme',
      description: 'Keep our Python services up.',
      requirements: 'On-call rotation\nIncident reviews, Postmortems',
      skills: 'Prometheus, Grafana',
      location: 'Remote',
    });

    expect(createManualJob(fields)).toEqual({
      title: 'Site Reliability Engineer',
      company: 'Acme',
      description: 'Keep our Python services up.',
      requirements: ['On-call rotation', 'Incident reviews', 'Postmortems'],
      skills: ['Prometheus', 'Grafana'],
      location: 'Remote',
    });
  });

  it('finds known skills in the description when none are listed', () => {
    const fields = manualJobSchema.parse({ title: 'Analyst', company: 'Globex', description: 'Reports in SQL and Tableau' });

    expect(createManualJob(fields)).toEqual({
      title: 'Analyst',
      company: 'Globex',
      description: 'Reports in SQL and Tableau',
      requirements: [],
      skills: ['SQL'],
      location: undefined,
    });
  });
});
