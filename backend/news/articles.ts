import { createHash } from 'crypto';
import { isTrustedSource } from './classifier';
import type { Article, Category } from './types';

export const MIN_TITLE_LENGTH = 20;
const MAX_DESCRIPTION_LENGTH = 500;

/** Case-folded, whitespace-collapsed title used for identity. */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function articleId(title: string): string {
  return createHash('md5').update(normalizeTitle(title)).digest('hex').slice(0, 16);
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' '
};

/** Drop markup from a feed summary and cap its length. */
export function stripHtml(input: string): string {
  return input
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(amp|lt|gt|quot|#39|apos|nbsp);/g, (m) => ENTITIES[m] ?? m)
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_DESCRIPTION_LENGTH);
}

/** Selection needs a real headline and something to narrate from. */
export function isEligible(article: Pick<Article, 'title' | 'description'>): boolean {
  return article.title.trim().length >= MIN_TITLE_LENGTH && article.description.trim() !== '';
}

export type RawArticle = {
  title: string;
  description?: string;
  source: string;
  category: Category;
  link?: string;
  publishedAt?: string;
};

export function toArticle(raw: RawArticle): Article {
  const title = raw.title.replace(/\s+/g, ' ').trim();
  const source = raw.source.trim();
  return {
    id: articleId(title),
    title,
    description: stripHtml(raw.description ?? ''),
    source,
    category: raw.category,
    link: (raw.link ?? '').trim(),
    publishedAt: raw.publishedAt,
    isTrusted: isTrustedSource(source)
  };
}
