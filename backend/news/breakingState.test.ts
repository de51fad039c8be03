import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BreakingQuotaStore, calendarDate, pruneDailyCounts } from './breakingState';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'breaking-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('calendarDate', () => {
  it('uses the configured time zone', () => {
    const now = new Date('2026-10-19T23:30:00Z');
    expect(calendarDate(now, 'UTC')).toBe('2026-10-19');
    expect(calendarDate(now, 'Asia/Seoul')).toBe('2026-10-20');
  });
});

describe('pruneDailyCounts', () => {
  it('keeps the last seven days, today included', () => {
    const counts = { '2026-10-20': 1, '2026-10-19': 1, '2026-10-13': 2, '2026-10-12': 3, garbage: 9 };
    expect(pruneDailyCounts(counts, '2026-10-19')).toEqual({ '2026-10-19': 1, '2026-10-13': 2 });
  });
});

describe('BreakingQuotaStore', () => {
  const now = new Date('2026-10-19T12:00:00Z');

  it('counts confirmations per day and reports exhaustion', async () => {
    const store = new BreakingQuotaStore(dir, 'UTC');
    expect(store.countFor(now)).toBe(0);
    expect(await store.increment(now)).toBe(1);
    expect(await store.increment(now)).toBe(2);
    expect(store.isExhausted(2, now)).toBe(true);
    expect(store.isExhausted(3, now)).toBe(false);
    expect(store.countFor(new Date('2026-10-20T12:00:00Z'))).toBe(0);
  });

  it('prunes old days on write', async () => {
    fs.writeFileSync(
      path.join(dir, 'breaking_state.json'),
      JSON.stringify({ daily_counts: { '2026-10-01': 3, '2026-10-18': 1 } })
    );
    const store = new BreakingQuotaStore(dir, 'UTC');
    await store.increment(now);
    expect(JSON.parse(fs.readFileSync(store.filePath, 'utf-8'))).toEqual({
      daily_counts: { '2026-10-18': 1, '2026-10-19': 1 }
    });
  });
});
