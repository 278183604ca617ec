import * as cheerio from 'cheerio';
import fetch from 'node-fetch';
import { z } from 'zod';
import skillKeywords from '../data/skills.json';
import { errorMessage, NetworkError, ValidationError } from './errors';
import { createLogger } from './logger';
import type { JobDescription, ManualJob } from './schemas';

const log = createLogger('JobExtractor');

const FETCH_TIMEOUT_MS = 15_000;
const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const UNKNOWN_TITLE = 'Unknown Position';
const UNKNOWN_COMPANY = 'Unknown Company';
const MAX_REQUIREMENTS = 10;
const MAX_SKILLS = 15;

const REQUIREMENT_PATTERNS = [
  /(?:require[sd]?|must have|need|looking for)[:\s-]*([^.!?]+)/gi,
  /(?:experience with|knowledge of|proficient in|familiar with)[:\s-]*([^.!?]+)/gi,
  /(?:skills?)[:\s-]*([^.!?]+)/gi,
  /(?:\d+\+?\s*years?)[^.]*?(?:experience|exp)[^.]*?(?:in|with)\s+([^.!?]+)/gi,
];

const COMPANY_PATTERNS = [
  /([A-Z][a-zA-Z\s&.,-]+?(?:\s+Inc\.?|\s+LLC|\s+Corp\.?|\s+Ltd\.?|\s+Co\.?))/m,
  /(?:at|@)\s+([A-Z][a-zA-Z\s&.,-]{2,40})(?:\s|$)/m,
  /Company:\s*([^\n]+)/m,
  /([A-Z][a-zA-Z\s&.,-]+)\s+is\s+(?:looking|seeking|hiring)/m,
  /Join\s+([A-Z][a-zA-Z\s&.,-]+?)(?:\s|$)/m,
];

const COMPANY_FALSE_POSITIVES = ['linkedin', 'apply', 'position', 'role', 'job', 'experience', 'years'];

const LOCATION_PATTERNS = [
  /Location:\s*([^\n]+)/i,
  /(?:Based in|Located in)\s+([^\n,]+)/i,
  /([A-Z][a-zA-Z\s]+,\s*[A-Z]{2,})/i,
  /(Remote|Hybrid|On-site)/i,
];

/** Pull short requirement phrases out of free text. Deduplicated, at most ten. */
export function extractRequirements(text: string): string[] {
  const requirements: string[] = [];

  for (const pattern of REQUIREMENT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const cleaned = (match[1] ?? '').replace(/[^\w\s,+#/-]/g, '').trim();
      if (cleaned.length > 3 && cleaned.length < 100) {
        requirements.push(...cleaned.split(/[,;]/).map((part) => part.trim()).filter(Boolean));
      }
    }
  }

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const requirement of requirements) {
    const key = requirement.toLowerCase();
    if (!seen.has(key) && requirement.length > 2) {
      seen.add(key);
      unique.push(requirement);
    }
  }
  return unique.slice(0, MAX_REQUIREMENTS);
}

export function extractSkills(text: string): string[] {
  const lower = text.toLowerCase();
  return skillKeywords.job
    .filter((skill) => {
      const key = skill.toLowerCase();
      return lower.includes(key) || lower.includes(key.replace(/\./g, '')) || lower.includes(key.replace(/-/g, ''));
    })
    .slice(0, MAX_SKILLS);
}

function guessCompany(text: string): string | undefined {
  for (const pattern of COMPANY_PATTERNS) {
    const candidate = text.match(pattern)?.[1]?.trim();
    if (!candidate) continue;
    const lower = candidate.toLowerCase();
    if (candidate.length < 50 && !COMPANY_FALSE_POSITIVES.some((skip) => lower.includes(skip))) {
      return candidate;
    }
  }
  return undefined;
}

function guessLocation(text: string): string | undefined {
  for (const pattern of LOCATION_PATTERNS) {
    const candidate = text.match(pattern)?.[1]?.trim();
    if (candidate && candidate.length < 50) return candidate;
  }
  return undefined;
}

/**
 * Parse a pasted job posting. The first line is usually the title and the second the company,
 * which is how postings copied from most job boards arrive.
 */
export function extractFromText(raw: string): JobDescription {
  const text = raw.trim();
  const lines = text.split('\n').map((line) => line.trim()).filter(Boolean);

  let title = UNKNOWN_TITLE;
  let company = UNKNOWN_COMPANY;

  const first = lines[0];
  if (first && first.length < 100 && !/^(about|we are|job)/i.test(first)) {
    title = first;
  }

  const second = lines[1];
  if (
    second &&
    second.length < 50 &&
    !/^(location|we are|job|about)/i.test(second) &&
    !/^[A-Z]{2,}$/.test(second)
  ) {
    company = second;
  }

  if (company === UNKNOWN_COMPANY) {
    company = guessCompany(text) ?? UNKNOWN_COMPANY;
  }

  const job: JobDescription = {
    title,
    company,
    description: text,
    requirements: extractRequirements(text),
    skills: extractSkills(text),
    location: guessLocation(text) ?? 'Unknown Location',
  };
  log.info({ title: job.title, company: job.company }, 'Extracted job from text');
  return job;
}

const jobPostingSchema = z
  .object({
    '@type': z.union([z.string(), z.array(z.string())]),
    title: z.string().optional(),
    description: z.string().optional(),
    employmentType: z.union([z.string(), z.array(z.string())]).optional(),
    datePosted: z.string().optional(),
    hiringOrganization: z.object({ name: z.string().optional() }).passthrough().optional(),
    jobLocation: z
      .union([z.array(z.unknown()), z.record(z.unknown())])
      .optional(),
  })
  .passthrough();

type JobPosting = z.infer<typeof jobPostingSchema>;

function isJobPosting(posting: JobPosting): boolean {
  const type = posting['@type'];
  return Array.isArray(type) ? type.includes('JobPosting') : type === 'JobPosting';
}

function findJobPosting($: cheerio.CheerioAPI): JobPosting | undefined {
  for (const element of $('script[type="application/ld+json"]').toArray()) {
    let data: unknown;
    try {
      data = JSON.parse($(element).html() ?? '');
    } catch (error) {
      log.debug({ err: errorMessage(error) }, 'Skipping malformed JSON-LD block');
      continue;
    }
    const candidates = Array.isArray(data) ? data : [data];
    for (const candidate of candidates) {
      const parsed = jobPostingSchema.safeParse(candidate);
      if (parsed.success && isJobPosting(parsed.data)) return parsed.data;
    }
  }
  return undefined;
}

function locationOf(posting: JobPosting): string | undefined {
  const places = Array.isArray(posting.jobLocation) ? posting.jobLocation : [posting.jobLocation];
  const addressSchema = z.object({
    address: z.object({ addressLocality: z.string().optional(), addressCountry: z.string().optional() }).passthrough(),
  });
  for (const place of places) {
    const parsed = addressSchema.safeParse(place);
    if (!parsed.success) continue;
    const parts = [parsed.data.address.addressLocality, parsed.data.address.addressCountry].filter(Boolean);
    if (parts.length > 0) return parts.join(', ');
  }
  return undefined;
}

function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  return $.root().text().replace(/\s+/g, ' ').trim();
}

/** Generic parse of a job page: schema.org JobPosting first, then common page elements. */
export function parseJobPage(html: string, url: string): JobDescription {
  const $ = cheerio.load(html);
  const posting = findJobPosting($);

  $('script, style, noscript, nav, header, footer').remove();

  const metaTitle = $('meta[property="og:title"]').attr('content')?.trim();
  const siteName = $('meta[property="og:site_name"]').attr('content')?.trim();
  const pageCompany = $('.company, .company-name, .employer, [data-testid="company-name"]').first().text().trim();
  const pageText = ($('main').length > 0 ? $('main') : $('body')).text().replace(/\s+/g, ' ').trim();

  const description = posting?.description ? htmlToText(posting.description) : pageText;
  const employment = posting?.employmentType;
  const employmentType = Array.isArray(employment) ? employment.join(', ') : employment;

  return {
    title: posting?.title?.trim() || $('h1').first().text().trim() || metaTitle || $('title').text().trim() || UNKNOWN_TITLE,
    company: posting?.hiringOrganization?.name?.trim() || pageCompany || siteName || UNKNOWN_COMPANY,
    description,
    requirements: extractRequirements(description),
    skills: extractSkills(description),
    location: posting ? locationOf(posting) : undefined,
    jobType: employmentType,
    postedDate: posting?.datePosted,
    url,
  };
}

export async function extractFromUrl(url: string): Promise<JobDescription> {
  let html: string;
  try {
    const res = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    html = await res.text();
  } catch (error) {
    log.error({ err: errorMessage(error), url }, 'Failed to fetch job posting');
    throw new NetworkError(`Could not fetch the job posting at ${url}`, errorMessage(error));
  }

  const job = parseJobPage(html, url);
  log.info({ title: job.title, company: job.company }, 'Extracted job from URL');
  return job;
}

export interface ContentLimits {
  minContentLength: number;
  maxContentLength: number;
}

/**
 * A URL is fetched and parsed, anything else is treated as pasted posting text.
 * With `limits`, pasted text shorter than the minimum is rejected and the description
 * passed on to the prompts is cut at the maximum.
 */
export async function extractJobDescription(source: string, limits?: ContentLimits): Promise<JobDescription> {
  const trimmed = source.trim();
  const isUrl = /^https?:\/\//i.test(trimmed);

  if (!isUrl && limits && trimmed.length < limits.minContentLength) {
    throw new ValidationError(
      'Job description is too short',
      `Paste at least ${limits.minContentLength} characters of the posting, or its URL.`,
    );
  }

  const job = isUrl ? await extractFromUrl(trimmed) : extractFromText(trimmed);
  if (limits && job.description.length > limits.maxContentLength) {
    return { ...job, description: job.description.slice(0, limits.maxContentLength) };
  }
  return job;
}

/** A job typed in by hand. Without listed skills, the description is scanned for known ones. */
export function createManualJob(fields: ManualJob): JobDescription {
  const skills = fields.skills.length > 0 ? fields.skills : extractSkills(fields.description);
  return { ...fields, skills };
}
