import keywords from './keywords.json';
import { articleText, isBreakingNews } from './classifier';
import type { Article } from './types';

export type TopicEntry = {
  key: string;
  related: string[];
};

export const TOPIC_KEYWORDS: readonly TopicEntry[] = keywords.topics;

/** Grouping threshold for breaking-news clustering */
export const SAME_TOPIC_THRESHOLD = 0.4;
/** Above this a candidate counts as a duplicate of an accepted story */
export const DUPLICATE_THRESHOLD = 0.5;

function tokenize(text: string): Set<string> {
  const normalized = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
  return new Set(normalized ? normalized.split(' ') : []);
}

/** Jaccard index of the two titles' word sets; 0 when either side has no words. */
export function titleSimilarity(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);
  if (left.size === 0 || right.size === 0) return 0;
  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) intersection += 1;
  }
  const union = left.size + right.size - intersection;
  return intersection / union;
}

export function isSimilarToAny(title: string, titles: readonly string[], threshold = DUPLICATE_THRESHOLD): boolean {
  return titles.some((existing) => titleSimilarity(title, existing) >= threshold);
}

/** Keys of every topic entry with at least one keyword in the text. */
export function matchTopics(text: string): string[] {
  const lower = text.toLowerCase();
  return TOPIC_KEYWORDS.filter((entry) =>
    [entry.key, ...entry.related].some((keyword) => lower.includes(keyword))
  ).map((entry) => entry.key);
}

type TopicArticle = Pick<Article, 'title' | 'description'>;

/**
 * Same event when the titles overlap enough, or when both articles are
 * breaking and hit the same topic entry ("Venezuela unrest" / "Maduro crisis").
 * The keyword path over-groups now and then; that is the price of catching
 * rephrased headlines.
 */
export function sameTopic(a: TopicArticle, b: TopicArticle, threshold = SAME_TOPIC_THRESHOLD): boolean {
  if (titleSimilarity(a.title, b.title) >= threshold) return true;
  if (!isBreakingNews(a.title, a.description) || !isBreakingNews(b.title, b.description)) return false;
  const topicsA = matchTopics(articleText(a.title, a.description));
  if (topicsA.length === 0) return false;
  const topicsB = new Set(matchTopics(articleText(b.title, b.description)));
  return topicsA.some((key) => topicsB.has(key));
}
