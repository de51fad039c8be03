import keywords from './keywords.json';

/*
 * Plain lowercase substring tests, no stemming or word boundaries. Known false
 * positives are accepted: "London Bridge" the band reads as local news, and
 * "war" also matches "award".
 */

export const LOCAL_KEYWORDS: readonly string[] = keywords.local;
export const BREAKING_KEYWORDS: readonly string[] = keywords.breaking;
export const TRUSTED_SOURCES: readonly string[] = keywords.trustedSources;

function containsAny(text: string, list: readonly string[]): boolean {
  return list.some((keyword) => text.includes(keyword));
}

export function articleText(title: string, description = ''): string {
  return `${title} ${description}`.toLowerCase();
}

/** Region-scoped stories (named cities, school boards, sheriffs, minor leagues). */
export function isLocalNews(title: string, description = ''): boolean {
  return containsAny(articleText(title, description), LOCAL_KEYWORDS);
}

/** Urgency, casualty, conflict, disaster, resignation/arrest or "historic" vocabulary. */
export function isBreakingNews(title: string, description = ''): boolean {
  return containsAny(articleText(title, description), BREAKING_KEYWORDS);
}

export function isTrustedSource(source: string): boolean {
  const lower = source.toLowerCase();
  return lower !== '' && containsAny(lower, TRUSTED_SOURCES);
}
