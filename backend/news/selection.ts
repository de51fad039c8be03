import { isEligible } from './articles';
import { isLocalNews } from './classifier';
import { fetchFeeds } from './feeds';
import { isSimilarToAny } from './similarity';
import type { UsedArticleStore } from './usedStore';
import type { Article, Category, FeedDescriptor, FeedSource } from './types';
import { InsufficientArticlesError } from '../errors';
import { logger } from '../logger';

export type RandomFn = () => number;

/** Fisher-Yates over a copy. */
export function shuffle<T>(items: readonly T[], random: RandomFn = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Category order and feed order within each category are randomized so
 * successive runs do not always lead with the same outlets.
 */
export function planFeeds(feeds: readonly FeedDescriptor[], random: RandomFn = Math.random): FeedDescriptor[] {
  const byCategory = new Map<Category, FeedDescriptor[]>();
  for (const feed of feeds) {
    const list = byCategory.get(feed.category) ?? [];
    list.push(feed);
    byCategory.set(feed.category, list);
  }
  const categories = shuffle([...byCategory.keys()], random);
  return categories.flatMap((category) => shuffle(byCategory.get(category) ?? [], random));
}

export type FilterStats = {
  ineligible: number;
  used: number;
  duplicate: number;
  local: number;
};

/**
 * Everything except the similarity check, which depends on what has been
 * accepted so far and runs while picking.
 */
export function filterCandidates(
  articles: readonly Article[],
  used: ReadonlySet<string>
): { candidates: Article[]; stats: FilterStats } {
  const stats: FilterStats = { ineligible: 0, used: 0, duplicate: 0, local: 0 };
  const seen = new Set<string>();
  const candidates: Article[] = [];
  for (const article of articles) {
    if (!isEligible(article)) {
      stats.ineligible += 1;
    } else if (used.has(article.id)) {
      stats.used += 1;
    } else if (seen.has(article.id)) {
      stats.duplicate += 1;
    } else if (isLocalNews(article.title, article.description)) {
      stats.local += 1;
    } else {
      seen.add(article.id);
      candidates.push(article);
    }
  }
  return { candidates, stats };
}

/** Running selection: accepted ids and titles for the similarity check. */
class Picker {
  readonly accepted: Article[] = [];
  private readonly ids = new Set<string>();
  private readonly titles: string[] = [];

  /** Accept unless already taken or too close to an accepted title. */
  offer(article: Article): boolean {
    if (this.ids.has(article.id)) return false;
    if (isSimilarToAny(article.title, this.titles)) return false;
    this.ids.add(article.id);
    this.titles.push(article.title);
    this.accepted.push(article);
    return true;
  }
}

function groupByCategory(candidates: readonly Article[]): Map<Category, Article[]> {
  const groups = new Map<Category, Article[]>();
  for (const article of candidates) {
    const list = groups.get(article.category) ?? [];
    list.push(article);
    groups.set(article.category, list);
  }
  return groups;
}

/**
 * Round-robin over categories, one acceptance per category per round, for at
 * most `maxPerCategory` rounds. Stops as soon as `count` is reached.
 */
export function diversify(candidates: readonly Article[], count: number, maxPerCategory = 2): Article[] {
  const picker = new Picker();
  const queues = groupByCategory(candidates);
  for (let round = 0; round < maxPerCategory && picker.accepted.length < count; round++) {
    for (const queue of queues.values()) {
      if (picker.accepted.length >= count) break;
      while (queue.length > 0) {
        const next = queue.shift();
        if (next && picker.offer(next)) break;
      }
    }
  }
  return picker.accepted;
}

/** Fill up from the flat pool in collection order, similarity check still applied. */
export function backfill(accepted: readonly Article[], candidates: readonly Article[], count: number): Article[] {
  const picker = new Picker();
  for (const article of accepted) picker.offer(article);
  for (const article of candidates) {
    if (picker.accepted.length >= count) break;
    picker.offer(article);
  }
  return picker.accepted;
}

/**
 * Weekly: `ceil(count / categories)` per category first, then fill from
 * whatever categories still have candidates.
 */
export function pickByCategory(candidates: readonly Article[], count: number): Article[] {
  const groups = groupByCategory(candidates);
  const perCategory = Math.ceil(count / Math.max(1, groups.size));
  const picker = new Picker();
  for (const list of groups.values()) {
    let taken = 0;
    for (const article of list) {
      if (taken >= perCategory || picker.accepted.length >= count) break;
      if (picker.offer(article)) taken += 1;
    }
  }
  return backfill(picker.accepted, candidates, count);
}

function pickReserves(selected: readonly Article[], candidates: readonly Article[], reserveCount: number): Article[] {
  if (reserveCount <= 0) return [];
  const all = backfill(selected, candidates, selected.length + reserveCount);
  return all.slice(selected.length);
}

export type SelectionOptions = {
  count: number;
  source: FeedSource;
  feeds: readonly FeedDescriptor[];
  usedStore: UsedArticleStore;
  random?: RandomFn;
  /** Daily round-robin cap per category before backfill */
  maxPerCategory?: number;
  /** Extra accepted candidates kept back to replace dropped stories; not persisted */
  reserveCount?: number;
  concurrency?: number;
  /** false = dry run, the used set is left untouched */
  persist?: boolean;
};

export type SelectionResult = {
  articles: Article[];
  reserves: Article[];
  fetched: number;
  candidates: number;
};

async function collect(opts: SelectionOptions, random: RandomFn): Promise<Article[]> {
  const planned = planFeeds(opts.feeds, random);
  const results = await fetchFeeds(opts.source, planned, opts.concurrency);
  const failed = results.filter((r) => r.error !== undefined).length;
  const articles = results.flatMap((r) => r.articles);
  logger.info('Collected articles', { feeds: planned.length, failed, articles: articles.length });
  return articles;
}

async function finalize(
  opts: SelectionOptions,
  selected: Article[],
  candidates: readonly Article[],
  random: RandomFn,
  fetched: number
): Promise<SelectionResult> {
  const articles = shuffle(selected, random);
  const reserves = pickReserves(selected, candidates, opts.reserveCount ?? 0);
  if (opts.persist !== false) {
    await opts.usedStore.commit(articles.map((a) => a.id));
  }
  for (const [i, a] of articles.entries()) {
    logger.info(`${i + 1}. [${a.category}] ${a.title}`, { source: a.source, trusted: a.isTrusted });
  }
  return { articles, reserves, fetched, candidates: candidates.length };
}

async function prepare(opts: SelectionOptions, random: RandomFn) {
  const used = opts.usedStore.load();
  const fetched = await collect(opts, random);
  const { candidates, stats } = filterCandidates(fetched, used);
  logger.info('Filtered candidates', { candidates: candidates.length, ...stats });
  return { fetched: fetched.length, candidates };
}

/**
 * Strict daily selection. Fewer than `count` stories after backfill is fatal
 * and nothing is persisted.
 */
export async function selectDailyArticles(opts: SelectionOptions): Promise<SelectionResult> {
  const random = opts.random ?? Math.random;
  const { fetched, candidates } = await prepare(opts, random);

  const diverse = diversify(candidates, opts.count, opts.maxPerCategory ?? 2);
  const selected = diverse.length < opts.count ? backfill(diverse, candidates, opts.count) : diverse;
  if (selected.length > diverse.length) {
    logger.info('Backfilled beyond the category cap', { added: selected.length - diverse.length });
  }

  if (selected.length < opts.count) {
    throw new InsufficientArticlesError(opts.count, selected.length, 'Check feed connectivity or lower --count');
  }
  return finalize(opts, selected, candidates, random, fetched);
}

/** Soft weekly selection: a shortfall is a warning and the partial set is returned. */
export async function selectWeeklyArticles(opts: SelectionOptions): Promise<SelectionResult> {
  const random = opts.random ?? Math.random;
  const { fetched, candidates } = await prepare(opts, random);

  const selected = pickByCategory(candidates, opts.count);
  if (selected.length < opts.count) {
    logger.warn('Weekly selection is short', { requested: opts.count, found: selected.length });
  }
  return finalize(opts, selected, candidates, random, fetched);
}
