import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  backfill,
  diversify,
  filterCandidates,
  pickByCategory,
  planFeeds,
  selectDailyArticles,
  selectWeeklyArticles,
  shuffle
} from './selection';
import { UsedArticleStore } from './usedStore';
import { InsufficientArticlesError } from '../errors';
import { FakeFeedSource, newsArticle } from '../testing/fakes';

const W1 = newsArticle('Leaders gather in Geneva for climate summit', 'World');
const W2 = newsArticle('United Nations names new refugee envoy today', 'World');
const W3 = newsArticle('Diplomats resume talks on shipping corridor', 'World');
const B1 = newsArticle('Central bank holds interest rates steady again', 'Business');
const B2 = newsArticle('Retail sales climb faster than analysts expected', 'Business');
const T1 = newsArticle('Chipmaker unveils faster processor for laptops', 'Technology');

const ids = (list: { id: string }[]) => list.map((a) => a.id).sort();

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'selection-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('shuffle', () => {
  it('is driven by the injected random source', () => {
    expect(shuffle([1, 2, 3], () => 0)).toEqual([2, 3, 1]);
    expect(shuffle([1, 2, 3], () => 0.99)).toEqual([1, 2, 3]);
  });
});

describe('planFeeds', () => {
  it('keeps the feeds of a category together', () => {
    const source = new FakeFeedSource();
    const feeds = [
      source.addFeed('w1', 'World', []),
      source.addFeed('b1', 'Business', []),
      source.addFeed('w2', 'World', [])
    ];
    // categories [World, Business] -> [Business, World]; World feeds [w1, w2] -> [w2, w1]
    expect(planFeeds(feeds, () => 0).map((f) => f.name)).toEqual(['b1', 'w2', 'w1']);
  });
});

describe('filterCandidates', () => {
  it('drops ineligible, used, repeated and local articles', () => {
    const short = newsArticle('Too short', 'World');
    const noBody = newsArticle('A headline without any body text', 'World', 'Wire', '');
    const local = newsArticle('City council approves new parking rules', 'World');
    const { candidates, stats } = filterCandidates([W1, short, noBody, B1, W1, local, T1], new Set([B1.id]));
    expect(candidates).toEqual([W1, T1]);
    expect(stats).toEqual({ ineligible: 2, used: 1, duplicate: 1, local: 1 });
  });
});

describe('diversify', () => {
  it('takes one per category while the count allows', () => {
    expect(diversify([W1, W2, B1, B2, T1], 3)).toEqual([W1, B1, T1]);
  });

  it('cycles a second round only when more are needed', () => {
    expect(diversify([W1, W2, B1, B2, T1], 4)).toEqual([W1, B1, T1, W2]);
    expect(diversify([W1, W2, W3, B1], 5, 2)).toEqual([W1, B1, W2]);
  });

  it('skips a candidate too close to an accepted title', () => {
    const near = newsArticle('Leaders gather in Geneva for climate talks', 'Business');
    expect(diversify([W1, near, B1], 2)).toEqual([W1, B1]);
  });
});

describe('backfill', () => {
  it('ignores the category cap but keeps the similarity check', () => {
    const near = newsArticle('Leaders gather in Geneva for climate talks', 'World');
    expect(backfill([W1, B1], [W1, W2, near, W3, B1], 4)).toEqual([W1, B1, W2, W3]);
  });
});

describe('pickByCategory', () => {
  it('takes ceil(count / categories) per category, then fills', () => {
    // 4 across 2 categories: two World, the only Business, then W3
    expect(pickByCategory([W1, W2, W3, B1], 4)).toEqual([W1, W2, B1, W3]);
  });
});

describe('selectDailyArticles', () => {
  function setup() {
    const source = new FakeFeedSource();
    const local = newsArticle('City council approves new parking rules', 'World');
    const feeds = [
      source.addFeed('World Wire', 'World', [W1, local, W2]),
      source.addFeed('Business Desk', 'Business', [B1, B2]),
      source.addFeed('Tech Feed', 'Technology', [T1]),
      source.addFailingFeed('Offline', 'Science')
    ];
    return { source, feeds };
  }

  it('selects one per category, skips used ids and commits the selection', async () => {
    const { source, feeds } = setup();
    const usedStore = new UsedArticleStore(dir, 'daily');
    await usedStore.commit([B1.id]);

    const result = await selectDailyArticles({
      count: 3,
      source,
      feeds,
      usedStore,
      random: () => 0,
      reserveCount: 1
    });

    expect(ids(result.articles)).toEqual(ids([W1, B2, T1]));
    expect(result.reserves).toEqual([W2]);
    expect(result.fetched).toBe(6);
    expect(result.candidates).toBe(4);
    expect([...usedStore.load()].sort()).toEqual(ids([B1, W1, B2, T1]));
  });

  it('never returns duplicates or pre-run used ids', async () => {
    const { source, feeds } = setup();
    const usedStore = new UsedArticleStore(dir, 'daily');
    await usedStore.commit([W1.id]);
    const before = usedStore.load();

    const result = await selectDailyArticles({ count: 4, source, feeds, usedStore, random: () => 0.5 });
    const selected = result.articles.map((a) => a.id);
    expect(new Set(selected).size).toBe(selected.length);
    expect(selected.some((id) => before.has(id))).toBe(false);
    expect(ids(result.articles)).toEqual(ids([W2, B1, B2, T1]));
  });

  it('fails without persisting when the strict count cannot be met', async () => {
    const { source, feeds } = setup();
    const usedStore = new UsedArticleStore(dir, 'daily');

    const run = selectDailyArticles({ count: 6, source, feeds, usedStore, random: () => 0 });
    await expect(run).rejects.toBeInstanceOf(InsufficientArticlesError);
    await expect(run).rejects.toThrow('Not enough news fetched: 5 (need 6)');
    expect(usedStore.load().size).toBe(0);
  });

  it('leaves the used set alone on a dry run', async () => {
    const { source, feeds } = setup();
    const usedStore = new UsedArticleStore(dir, 'daily');
    const result = await selectDailyArticles({ count: 2, source, feeds, usedStore, persist: false });
    expect(result.articles).toHaveLength(2);
    expect(fs.existsSync(usedStore.filePath)).toBe(false);
  });
});

describe('selectWeeklyArticles', () => {
  it('returns a short set with a warning instead of failing', async () => {
    const source = new FakeFeedSource();
    const feeds = [source.addFeed('World Wire', 'World', [W1, W2, W3]), source.addFeed('Business Desk', 'Business', [B1])];
    const usedStore = new UsedArticleStore(dir, 'weekly');

    const result = await selectWeeklyArticles({ count: 10, source, feeds, usedStore, random: () => 0 });
    expect(ids(result.articles)).toEqual(ids([W1, W2, W3, B1]));
    expect(usedStore.load().size).toBe(4);
  });

  it('spreads the count across categories', async () => {
    const source = new FakeFeedSource();
    const feeds = [
      source.addFeed('World Wire', 'World', [W1, W2, W3]),
      source.addFeed('Business Desk', 'Business', [B1, B2])
    ];
    const usedStore = new UsedArticleStore(dir, 'weekly');
    const result = await selectWeeklyArticles({ count: 2, source, feeds, usedStore, random: () => 0 });
    expect(ids(result.articles)).toEqual(ids([W1, B1]));
  });
});
