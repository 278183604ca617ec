import { describe, expect, it } from 'vitest';
import { dedent, fillTemplate, parseList } from './promptTemplate';

describe('fillTemplate', () => {
  it('substitutes known placeholders and keeps unknown ones', () => {
    expect(fillTemplate('Job: {title} at {company} ({missing})', { title: 'Engineer', company: 'Acme' })).toBe(
      'Job: Engineer at Acme ({missing})',
    );
  });

  it('formats numbers', () => {
    expect(fillTemplate('{level}/10', { level: 8 })).toBe('8/10');
  });
});

describe('dedent', () => {
  it('removes the shared indentation and blank edges', () => {
    expect(dedent('\n    first\n      nested\n\n    last\n  ')).toBe('first\n  nested\n\nlast');
  });
});

describe('parseList', () => {
  it('strips bullets and numbering', () => {
    const reply = '1. Review REST design\n2) Practice SQL joins\n- Docker basics\n• Kubernetes\n* Testing\n\n';

    expect(parseList(reply)).toEqual([
      'Review REST design',
      'Practice SQL joins',
      'Docker basics',
      'Kubernetes',
      'Testing',
    ]);
  });

  it('keeps only lines accepted by the filter', () => {
    const reply = 'Here are some questions:\n1. How does indexing work?\n2. Explain caching?';

    expect(parseList(reply, (line) => line.includes('?'))).toEqual(['How does indexing work?', 'Explain caching?']);
  });
});
