import fs from 'fs';
import path from 'path';
import type { NarrationSegment } from './editScript';
import { errorMessage } from '../errors';
import { logger } from '../logger';

export const SUBTITLE_LANGUAGES = {
  en: 'English',
  ko: 'Korean',
  ja: 'Japanese',
  zh: 'Chinese (Simplified)',
  es: 'Spanish'
} as const;

export type SubtitleLanguage = keyof typeof SUBTITLE_LANGUAGES;

export const ALL_SUBTITLE_LANGUAGES: readonly SubtitleLanguage[] = ['en', 'ko', 'ja', 'zh', 'es'];

export type SubtitleCue = {
  startSeconds: number;
  endSeconds: number;
  text: string;
};

/** Translates cue texts line for line; may return fewer or more lines. */
export type CueTranslator = (texts: string[], languageName: string) => Promise<string[]>;

export function formatSrtTime(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const ms = totalMs % 1000;
  const totalSec = Math.floor(totalMs / 1000);
  const h = Math.floor(totalSec / 3600);
  const m = Math.floor((totalSec % 3600) / 60);
  const s = totalSec % 60;
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(ms, 3)}`;
}

export function splitSentences(text: string): string[] {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (!clean) return [];
  return clean
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * One cue per sentence. Each segment's spoken time is shared among its
 * sentences by character count; segments follow each other back to back,
 * shifted by `offsetSeconds` when an opening plays before the narration.
 */
export function buildCues(segments: readonly NarrationSegment[], offsetSeconds = 0): SubtitleCue[] {
  const cues: SubtitleCue[] = [];
  let cursor = offsetSeconds;
  for (const segment of segments) {
    const sentences = splitSentences(segment.text);
    const totalChars = sentences.reduce((sum, s) => sum + s.length, 0);
    let start = cursor;
    sentences.forEach((sentence, i) => {
      const isLast = i === sentences.length - 1;
      const end = isLast
        ? cursor + segment.spokenDurationSeconds
        : start + (sentence.length / totalChars) * segment.spokenDurationSeconds;
      cues.push({ startSeconds: start, endSeconds: end, text: sentence });
      start = end;
    });
    cursor += segment.spokenDurationSeconds;
  }
  return cues;
}

export function renderSrt(cues: readonly SubtitleCue[], texts: readonly string[] = cues.map((c) => c.text)): string {
  return cues
    .map(
      (cue, i) =>
        `${i + 1}\n${formatSrtTime(cue.startSeconds)} --> ${formatSrtTime(cue.endSeconds)}\n${texts[i] ?? cue.text}\n`
    )
    .join('\n');
}

/**
 * Strip `1. ` style numbering from a translation reply and align it to the
 * original lines: missing lines fall back to the original, extras are cut.
 */
export function alignTranslation(reply: string, originals: readonly string[]): string[] {
  const lines: string[] = [];
  for (const raw of reply.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    const match = /^\d+\.\s*(.+)$/.exec(line);
    lines.push(match ? match[1] : line);
  }
  return originals.map((original, i) => lines[i] ?? original);
}

export type SubtitleTrackOptions = {
  outputDir: string;
  /** File name prefix, usually the run timestamp plus format */
  prefix: string;
  languages?: readonly SubtitleLanguage[];
  translate?: CueTranslator;
};

/**
 * Write one .srt per language. A failed translation logs a warning and
 * falls back to the English text for that language.
 */
export async function writeSubtitleTracks(
  cues: readonly SubtitleCue[],
  opts: SubtitleTrackOptions
): Promise<Partial<Record<SubtitleLanguage, string>>> {
  const languages = opts.languages ?? ALL_SUBTITLE_LANGUAGES;
  const originals = cues.map((c) => c.text);
  const files: Partial<Record<SubtitleLanguage, string>> = {};
  fs.mkdirSync(opts.outputDir, { recursive: true });

  for (const lang of languages) {
    let texts = originals;
    if (lang !== 'en' && opts.translate && originals.length > 0) {
      try {
        const translated = await opts.translate(originals, SUBTITLE_LANGUAGES[lang]);
        texts = originals.map((original, i) => translated[i] ?? original);
      } catch (err) {
        logger.warn(`Subtitle translation to ${lang} failed, using English`, { error: errorMessage(err) });
      }
    }
    const filePath = path.join(opts.outputDir, `${opts.prefix}_subtitles_${lang}.srt`);
    fs.writeFileSync(filePath, renderSrt(cues, texts), 'utf-8');
    files[lang] = filePath;
  }

  logger.info('Subtitles written', { languages: Object.keys(files) });
  return files;
}
