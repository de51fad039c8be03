import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UsedArticleStore } from './usedStore';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'used-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('UsedArticleStore', () => {
  it('starts empty and persists one file per content type', async () => {
    const daily = new UsedArticleStore(dir, 'daily');
    const weekly = new UsedArticleStore(dir, 'weekly');
    expect(daily.load().size).toBe(0);

    await daily.commit(['a1', 'b2']);
    expect(daily.has('a1')).toBe(true);
    expect(weekly.has('a1')).toBe(false);
    expect(JSON.parse(fs.readFileSync(path.join(dir, 'used_news_daily.json'), 'utf-8'))).toEqual({
      used: ['a1', 'b2']
    });
  });

  it('drops the oldest ids beyond the cap and skips repeats', async () => {
    const store = new UsedArticleStore(dir, 'daily', 3);
    await store.commit(['a', 'b']);
    await store.commit(['b', 'c', 'd']);
    expect([...store.load()]).toEqual(['b', 'c', 'd']);
  });

  it('keeps ids committed by another store instance', async () => {
    const first = new UsedArticleStore(dir, 'breaking');
    const second = new UsedArticleStore(dir, 'breaking');
    await Promise.all([first.commit(['x']), second.commit(['y'])]);
    expect([...first.load()].sort()).toEqual(['x', 'y']);
  });

  it('does not touch the file for an empty commit', async () => {
    const store = new UsedArticleStore(dir, 'weekly');
    await store.commit([]);
    expect(fs.existsSync(store.filePath)).toBe(false);
  });
});
