import fs from 'fs';
import path from 'path';
import type { Article, BreakingCandidate, ContentType } from './news/types';

export type VideoFormat = 'shorts' | 'video' | 'breaking';

const MAX_TITLE_LENGTH = 100;

const BASE_TAGS = ['news', 'AI', 'globalNews', 'worldnews', 'breakingnews'];

type DateParts = { year: string; month: string; day: string; hour: string; minute: string; second: string; monthShort: string };

function dateParts(now: Date, timeZone: string): DateParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(now);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '00';
  const monthShort = new Intl.DateTimeFormat('en-US', { timeZone, month: 'short' }).format(now);
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second'),
    monthShort
  };
}

/** `YYYYMMDD_HHMMSS` in the configured zone; prefixes every artifact of a run. */
export function runTimestamp(now: Date, timeZone = 'UTC'): string {
  const p = dateParts(now, timeZone);
  return `${p.year}${p.month}${p.day}_${p.hour}${p.minute}${p.second}`;
}

function capTitle(title: string): string {
  if (title.length <= MAX_TITLE_LENGTH) return title;
  return `${title.slice(0, MAX_TITLE_LENGTH - 3).trimEnd()}...`;
}

export function uploadTitle(format: VideoFormat, now: Date, timeZone = 'UTC', lead?: Pick<Article, 'title'>): string {
  const p = dateParts(now, timeZone);
  switch (format) {
    case 'shorts':
      return `Today's Top News - ${p.monthShort} ${p.day} #shorts`;
    case 'video':
      return `Global News Today ${p.year}${p.month}${p.day} | AI News Roundup`;
    case 'breaking': {
      const suffix = ' #shorts';
      const head = `BREAKING: ${lead?.title ?? 'Developing story'}`;
      return `${capTitle(head).slice(0, MAX_TITLE_LENGTH - suffix.length).trimEnd()}${suffix}`;
    }
  }
}

function storyList(articles: readonly Pick<Article, 'title' | 'link'>[]): string {
  return articles.map((a, i) => (a.link ? `${i + 1}. ${a.title}\n${a.link}` : `${i + 1}. ${a.title}`)).join('\n\n');
}

export function buildTags(articles: readonly Pick<Article, 'category'>[], format: VideoFormat): string[] {
  const tags = [...BASE_TAGS];
  if (format !== 'video') tags.push('shorts');
  for (const a of articles) {
    const tag = a.category.toLowerCase();
    if (!tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

export function buildDescription(articles: readonly Article[], format: VideoFormat, candidate?: BreakingCandidate): string {
  const hashtags = buildTags(articles, format)
    .map((t) => `#${t}`)
    .join(' ');
  if (format === 'breaking' && candidate) {
    return [
      'BREAKING NEWS | AI Generated',
      '',
      candidate.representative.title,
      '',
      `Reported by: ${candidate.distinctSources.join(', ')}`,
      '',
      'Coverage:',
      '',
      storyList(candidate.members),
      '',
      '---',
      'Generated with AI (GPT Image + TTS)',
      '',
      hashtags,
      ''
    ].join('\n');
  }
  return [
    'Global News Today | AI Generated',
    '',
    "Today's Stories:",
    '',
    storyList(articles),
    '',
    '---',
    'Generated with AI (GPT Image + TTS)',
    '',
    hashtags,
    ''
  ].join('\n');
}

export type FormatOutput = {
  format: VideoFormat;
  video: string;
  /** `<ts>_<label>_thumbnail.png`; absent when it could not be made */
  thumbnail?: string;
  subtitles: Record<string, string>;
  title: string;
  description: string;
  tags: string[];
  stories: string[];
  /** Segments that had no image and were left out of the picture */
  skippedSegments: number;
};

export type RunSummary = {
  runId: string;
  timestamp: string;
  contentType: ContentType;
  newsCount: number;
  news: Article[];
  outputs: FormatOutput[];
  breaking?: {
    title: string;
    sources: string[];
    detectedAt: string;
  };
};

export function writeSummary(outputDir: string, summary: RunSummary): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, `${summary.timestamp}_summary.json`);
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2), 'utf-8');
  return filePath;
}
