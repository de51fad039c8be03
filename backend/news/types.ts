export const CATEGORIES = [
  'World',
  'Business',
  'Technology',
  'Science',
  'Health',
  'Sports',
  'Entertainment',
  'Environment'
] as const;

export type Category = (typeof CATEGORIES)[number];

export type ContentType = 'daily' | 'weekly' | 'breaking';

export type FeedMode = 'rss' | 'api';

export type Article = {
  /** md5 of the normalized title, first 16 hex chars */
  id: string;
  title: string;
  description: string;
  source: string;
  category: Category;
  link: string;
  publishedAt?: string;
  isTrusted: boolean;
};

/** One fetchable endpoint: an RSS feed, or one NewsData category query. */
export type FeedDescriptor = {
  name: string;
  category: Category;
  url: string;
};

export interface FeedSource {
  fetchFeed(feed: FeedDescriptor): Promise<Article[]>;
}

export type TopicGroup = {
  representative: Article;
  members: Article[];
  /** Source names in the order they were first seen */
  distinctSources: string[];
};

export type BreakingCandidate = TopicGroup & {
  detectedAt: string;
};
