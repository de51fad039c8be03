import axios from 'axios';
import pLimit from 'p-limit';
import { parseStringPromise } from 'xml2js';
import feedCatalog from './feeds.json';
import { toArticle } from './articles';
import { CATEGORIES } from './types';
import type { Article, Category, FeedDescriptor, FeedSource } from './types';
import { logger } from '../logger';

const REQUEST_TIMEOUT_MS = 30_000;
const USER_AGENT = 'Mozilla/5.0 (compatible; news-video-pipeline/1.0)';

function isCategory(value: string): value is Category {
  return CATEGORIES.some((c) => c === value);
}

/** Global English RSS feeds per category. */
export function rssFeeds(categories: readonly Category[] = CATEGORIES): FeedDescriptor[] {
  const out: FeedDescriptor[] = [];
  for (const [category, entries] of Object.entries(feedCatalog)) {
    if (!isCategory(category) || !categories.includes(category)) continue;
    for (const [name, url] of entries) {
      out.push({ name, category, url });
    }
  }
  return out;
}

/** NewsData category slugs (lowercase) for our display categories */
export function newsDataSlug(category: Category): string {
  return category.toLowerCase();
}

/**
 * One "feed" per category against the NewsData latest endpoint.
 * `timeframeHours` is 24 for daily runs and 168 for weekly.
 */
export function newsDataFeeds(baseUrl: string, timeframeHours: number, categories: readonly Category[] = CATEGORIES): FeedDescriptor[] {
  return categories.map((category) => {
    const url = new URL(baseUrl);
    url.searchParams.set('language', 'en');
    url.searchParams.set('category', newsDataSlug(category));
    url.searchParams.set('prioritydomain', 'top');
    url.searchParams.set('timeframe', String(timeframeHours));
    url.searchParams.set('size', '10');
    return { name: `NewsData ${category}`, category, url: url.toString() };
  });
}

// --- RSS parsing (xml2js with explicitArray: every child is an array) ---

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function first(value: unknown): unknown {
  return asArray(value)[0];
}

/** Text content of a node that may be a string or `{ _: text, $: attrs }`. */
function textOf(value: unknown): string {
  const node = first(value);
  if (typeof node === 'string') return node.trim();
  if (!isNode(node)) return '';
  const text = node._;
  return typeof text === 'string' ? text.trim() : '';
}

function linkOf(value: unknown): string {
  for (const node of asArray(value)) {
    if (typeof node === 'string' && node.trim()) return node.trim();
    if (!isNode(node)) continue;
    const attrs = node.$;
    if (isNode(attrs)) {
      const href = attrs.href;
      const rel = typeof attrs.rel === 'string' ? attrs.rel : 'alternate';
      if (typeof href === 'string' && rel === 'alternate') return href.trim();
    }
    const text = node._;
    if (typeof text === 'string' && text.trim()) return text.trim();
  }
  return '';
}

export type RawFeedItem = {
  title: string;
  description: string;
  link: string;
  publishedAt?: string;
};

function itemsOf(doc: XmlNode): unknown[] {
  const rss = first(doc.rss);
  if (isNode(rss)) {
    const channel = first(rss.channel);
    return isNode(channel) ? asArray(channel.item) : [];
  }
  const rdf = first(doc['rdf:RDF']);
  if (isNode(rdf)) return asArray(rdf.item);
  const atom = first(doc.feed);
  if (isNode(atom)) return asArray(atom.entry);
  return [];
}

/** RSS 2.0, RSS 1.0 (RDF) and Atom documents, in document order. */
export async function parseFeedXml(xml: string): Promise<RawFeedItem[]> {
  const doc: unknown = await parseStringPromise(xml, { explicitArray: true, trim: true });
  if (!isNode(doc)) return [];
  const items: RawFeedItem[] = [];
  for (const entry of itemsOf(doc)) {
    if (!isNode(entry)) continue;
    const title = textOf(entry.title);
    if (!title) continue;
    const description =
      textOf(entry.description) || textOf(entry.summary) || textOf(entry.content) || textOf(entry['content:encoded']);
    const publishedAt =
      textOf(entry.pubDate) || textOf(entry.published) || textOf(entry.updated) || textOf(entry['dc:date']);
    items.push({
      title,
      description,
      link: linkOf(entry.link),
      publishedAt: publishedAt || undefined
    });
  }
  return items;
}

export class RssFeedSource implements FeedSource {
  constructor(private readonly itemsPerFeed = 10) {}

  async fetchFeed(feed: FeedDescriptor): Promise<Article[]> {
    const res = await axios.get<string>(feed.url, {
      timeout: REQUEST_TIMEOUT_MS,
      responseType: 'text',
      headers: { 'User-Agent': USER_AGENT }
    });
    const items = await parseFeedXml(res.data);
    return items.slice(0, this.itemsPerFeed).map((item) =>
      toArticle({
        title: item.title,
        description: item.description,
        source: feed.name,
        category: feed.category,
        link: item.link,
        publishedAt: item.publishedAt
      })
    );
  }
}

type NewsDataResponse = {
  status?: string;
  results?: Array<{
    title?: string | null;
    description?: string | null;
    content?: string | null;
    source_name?: string | null;
    source_id?: string | null;
    link?: string | null;
    pubDate?: string | null;
  }>;
};

export class NewsDataFeedSource implements FeedSource {
  constructor(private readonly apiKey: string) {}

  async fetchFeed(feed: FeedDescriptor): Promise<Article[]> {
    if (!this.apiKey) {
      throw new Error('NEWSDATA_API_KEY is not set');
    }
    const res = await axios.get<NewsDataResponse>(feed.url, {
      timeout: REQUEST_TIMEOUT_MS,
      params: { apikey: this.apiKey }
    });
    if (res.data.status !== 'success') {
      throw new Error(`NewsData returned status ${res.data.status ?? 'unknown'}`);
    }
    return (res.data.results ?? [])
      .filter((r) => typeof r.title === 'string' && r.title.trim() !== '')
      .map((r) =>
        toArticle({
          title: r.title ?? '',
          description: r.description || r.content || '',
          source: r.source_name || r.source_id || feed.name,
          category: feed.category,
          link: r.link ?? '',
          publishedAt: r.pubDate ?? undefined
        })
      );
  }
}

export type FeedFetchResult = {
  feed: FeedDescriptor;
  articles: Article[];
  error?: string;
};

/**
 * Fetch feeds with bounded concurrency. Results come back in the order of
 * `feeds`; a failing feed yields an empty list and a logged warning.
 */
export async function fetchFeeds(
  source: FeedSource,
  feeds: readonly FeedDescriptor[],
  concurrency = 6
): Promise<FeedFetchResult[]> {
  const limit = pLimit(Math.max(1, concurrency));
  return Promise.all(
    feeds.map((feed) =>
      limit(async (): Promise<FeedFetchResult> => {
        try {
          const articles = await source.fetchFeed(feed);
          return { feed, articles };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.warn(`Failed to fetch ${feed.name}`, { category: feed.category, error: message });
          return { feed, articles: [], error: message };
        }
      })
    )
  );
}
