import { describe, expect, it } from 'vitest';
import { isBreakingNews, isLocalNews, isTrustedSource } from './classifier';

describe('isLocalNews', () => {
  it('flags region-scoped stories from title or description', () => {
    expect(isLocalNews('City council approves new budget')).toBe(true);
    expect(isLocalNews('Police investigate robbery', 'The county sheriff said on Monday')).toBe(true);
    expect(isLocalNews('Global markets rally on trade deal')).toBe(false);
  });

  it('is case-insensitive', () => {
    expect(isLocalNews('SCHOOL BOARD votes on uniforms')).toBe(true);
  });

  it('matches a band named after a city (known limitation)', () => {
    expect(isLocalNews('London Bridge announce reunion tour')).toBe(true);
  });
});

describe('isBreakingNews', () => {
  it('flags urgency and disaster vocabulary', () => {
    expect(isBreakingNews('Earthquake strikes off the coast')).toBe(true);
    expect(isBreakingNews('Minister resigns over leak')).toBe(true);
    expect(isBreakingNews('New smartphone goes on sale')).toBe(false);
  });

  it('matches substrings without word boundaries', () => {
    expect(isBreakingNews('Film wins top award')).toBe(true);
  });
});

describe('isTrustedSource', () => {
  it('matches known outlets by substring', () => {
    expect(isTrustedSource('BBC News')).toBe(true);
    expect(isTrustedSource('Reuters')).toBe(true);
    expect(isTrustedSource('Blogspot Weekly')).toBe(false);
    expect(isTrustedSource('')).toBe(false);
  });
});
