import path from 'path';
import { isBreakingNews, isLocalNews } from './classifier';
import { fetchFeeds } from './feeds';
import { sameTopic } from './similarity';
import type { BreakingQuotaStore } from './breakingState';
import type { UsedArticleStore } from './usedStore';
import type { Article, BreakingCandidate, FeedDescriptor, FeedSource, TopicGroup } from './types';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { withLock } from '../storage';

/** Resolves true when the grouped headlines describe one real, significant event. */
export type BreakingVerifier = (group: TopicGroup) => Promise<boolean>;

/**
 * Each article joins the first group whose representative is on the same
 * topic, otherwise it opens a new group. Groups keep discovery order.
 */
export function groupByTopic(articles: readonly Article[]): TopicGroup[] {
  const groups: TopicGroup[] = [];
  for (const article of articles) {
    const group = groups.find((g) => sameTopic(g.representative, article));
    if (!group) {
      groups.push({ representative: article, members: [article], distinctSources: [article.source] });
      continue;
    }
    group.members.push(article);
    if (!group.distinctSources.includes(article.source)) {
      group.distinctSources.push(article.source);
    }
  }
  return groups;
}

export type BreakingScanOptions = {
  minSources: number;
  maxPerDay: number;
  source: FeedSource;
  feeds: readonly FeedDescriptor[];
  usedStore: UsedArticleStore;
  quotaStore: BreakingQuotaStore;
  now?: Date;
  verify?: BreakingVerifier;
  concurrency?: number;
  /** false = dry run: detect only, leave the used set and quota alone */
  persist?: boolean;
};

async function isConfirmed(group: TopicGroup, verify?: BreakingVerifier): Promise<boolean> {
  if (!verify) return true;
  try {
    return await verify(group);
  } catch (err) {
    logger.warn('Breaking verification failed, treating as unconfirmed', {
      title: group.representative.title,
      error: errorMessage(err)
    });
    return false;
  }
}

type ClaimResult = 'claimed' | 'taken' | 'exhausted';

/**
 * Quota and used-set are re-read under one lock, so two scans confirming the
 * same story in parallel commit it once and never overrun the quota.
 */
function claim(opts: BreakingScanOptions, id: string, now: Date): Promise<ClaimResult> {
  const lockPath = path.join(path.dirname(opts.quotaStore.filePath), 'breaking_claim.lock');
  return withLock(lockPath, async (): Promise<ClaimResult> => {
    if (opts.quotaStore.isExhausted(opts.maxPerDay, now)) return 'exhausted';
    if (opts.usedStore.has(id)) return 'taken';
    await opts.usedStore.commit([id]);
    const count = await opts.quotaStore.increment(now);
    logger.info('Breaking news confirmed', { today: count, max: opts.maxPerDay });
    return 'claimed';
  });
}

/**
 * One scan cycle. `null` means no breaking news this cycle (quota spent or
 * nothing corroborated), which is the routine outcome.
 */
export async function scanForBreakingNews(opts: BreakingScanOptions): Promise<BreakingCandidate | null> {
  const now = opts.now ?? new Date();
  if (opts.quotaStore.isExhausted(opts.maxPerDay, now)) {
    logger.info('Breaking quota reached for today', { count: opts.quotaStore.countFor(now), max: opts.maxPerDay });
    return null;
  }

  const results = await fetchFeeds(opts.source, opts.feeds, opts.concurrency);
  const used = opts.usedStore.load();
  const pool = results
    .flatMap((r) => r.articles)
    .filter(
      (a) => isBreakingNews(a.title, a.description) && !used.has(a.id) && !isLocalNews(a.title, a.description)
    );

  const groups = groupByTopic(pool);
  logger.info('Scanned for breaking news', {
    feeds: opts.feeds.length,
    breakingArticles: pool.length,
    groups: groups.length
  });

  for (const group of groups) {
    if (group.distinctSources.length < opts.minSources) continue;
    if (!(await isConfirmed(group, opts.verify))) {
      logger.info('Candidate not confirmed', { title: group.representative.title });
      continue;
    }

    if (opts.persist !== false) {
      const result = await claim(opts, group.representative.id, now);
      if (result === 'exhausted') {
        logger.info('Breaking quota reached while confirming', { max: opts.maxPerDay });
        return null;
      }
      if (result === 'taken') {
        logger.info('Candidate already claimed by another scan', { title: group.representative.title });
        continue;
      }
    }
    logger.info(`BREAKING: ${group.representative.title}`, { sources: group.distinctSources });
    return { ...group, detectedAt: now.toISOString() };
  }

  logger.info('No breaking news this cycle', { minSources: opts.minSources });
  return null;
}
