import path from 'path';
import { readJsonFile, withLock, writeJsonAtomic } from '../storage';

const KEEP_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Calendar date (YYYY-MM-DD) of `now` in the given IANA time zone. */
export function calendarDate(now: Date, timeZone = 'UTC'): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).format(now);
}

function dayNumber(date: string): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / DAY_MS);
}

/** Keep only the last seven calendar days, today included. */
export function pruneDailyCounts(counts: Record<string, number>, today: string): Record<string, number> {
  const todayNum = dayNumber(today);
  const out: Record<string, number> = {};
  for (const [date, count] of Object.entries(counts)) {
    const num = dayNumber(date);
    if (Number.isNaN(num)) continue;
    if (todayNum - num < KEEP_DAYS && num <= todayNum) out[date] = count;
  }
  return out;
}

/**
 * Confirmed breaking stories per calendar day:
 * `{"daily_counts": {"YYYY-MM-DD": n}}`.
 */
export class BreakingQuotaStore {
  readonly filePath: string;
  private readonly timeZone: string;

  constructor(dataDir: string, timeZone = 'UTC') {
    this.filePath = path.join(dataDir, 'breaking_state.json');
    this.timeZone = timeZone;
  }

  private readCounts(): Record<string, number> {
    const data = readJsonFile(this.filePath);
    if (!data || typeof data !== 'object' || !('daily_counts' in data)) return {};
    const raw = data.daily_counts;
    if (!raw || typeof raw !== 'object') return {};
    const counts: Record<string, number> = {};
    for (const [date, value] of Object.entries(raw)) {
      if (typeof value === 'number' && Number.isFinite(value)) counts[date] = value;
    }
    return counts;
  }

  today(now: Date = new Date()): string {
    return calendarDate(now, this.timeZone);
  }

  countFor(now: Date = new Date()): number {
    return this.readCounts()[this.today(now)] ?? 0;
  }

  isExhausted(maxPerDay: number, now: Date = new Date()): boolean {
    return this.countFor(now) >= maxPerDay;
  }

  /** Returns today's count after the increment. */
  async increment(now: Date = new Date()): Promise<number> {
    const today = this.today(now);
    return withLock(`${this.filePath}.lock`, () => {
      const counts = this.readCounts();
      counts[today] = (counts[today] ?? 0) + 1;
      writeJsonAtomic(this.filePath, { daily_counts: pruneDailyCounts(counts, today) });
      return counts[today];
    });
  }
}
