import fs from 'fs';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import { FRAME_SIZES, escapeFilterPath } from './ffmpeg';
import type { FrameSize, Orientation } from './ffmpeg';
import type { ContentType } from '../news/types';
import { RenderError } from '../errors';
import { logger } from '../logger';

/** One line of text drawn over the thumbnail; x and y are drawtext expressions. */
export type ThumbnailCaption = {
  text: string;
  fontSize: number;
  color: string;
  x: string;
  y: string;
};

export type ThumbnailOverlayOptions = {
  outputPath: string;
  orientation: Orientation;
  /** Caption text files are written here */
  workDir: string;
  fontFile?: string;
};

export type ThumbnailOverlay = (
  backgroundPath: string,
  captions: readonly ThumbnailCaption[],
  opts: ThumbnailOverlayOptions
) => Promise<string>;

const RED = '0xFF3333';
const GOLD = '0xFFD700';
const WHITE = 'white';

const HEADLINES: Record<ContentType, string> = {
  daily: "TODAY'S",
  weekly: 'WEEKLY',
  breaking: 'BREAKING'
};

const CENTRED = '(w-text_w)/2';
const RIGHT = 'w-text_w-50';

function calendarLabel(now: Date, timeZone: string): { date: string; year: string } {
  const parts = new Intl.DateTimeFormat('en-US', { timeZone, year: 'numeric', month: 'short', day: '2-digit' }).formatToParts(now);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return { date: `${get('month').toUpperCase()} ${get('day')}`, year: get('year') };
}

/**
 * Vertical thumbnails stack the headline at the top and the date in the
 * middle; horizontal ones put the headline top-left and the date bottom-right.
 */
export function thumbnailCaptions(
  contentType: ContentType,
  orientation: Orientation,
  now: Date,
  timeZone = 'UTC'
): ThumbnailCaption[] {
  const { date, year } = calendarLabel(now, timeZone);
  const headline = HEADLINES[contentType];
  if (orientation === 'vertical') {
    return [
      { text: headline, fontSize: 72, color: RED, x: CENTRED, y: '80' },
      { text: 'NEWS', fontSize: 72, color: WHITE, x: CENTRED, y: '160' },
      { text: date, fontSize: 96, color: WHITE, x: CENTRED, y: 'h/2-50' },
      { text: year, fontSize: 48, color: GOLD, x: CENTRED, y: 'h/2+50' }
    ];
  }
  return [
    { text: headline, fontSize: 72, color: RED, x: '50', y: '50' },
    { text: 'NEWS', fontSize: 72, color: WHITE, x: '50', y: '130' },
    { text: date, fontSize: 72, color: WHITE, x: RIGHT, y: 'h-180' },
    { text: year, fontSize: 48, color: GOLD, x: RIGHT, y: 'h-100' }
  ];
}

/**
 * Captions are read from `textFiles` (same order) so apostrophes and colons
 * never reach the filter parser.
 */
export function thumbnailFilter(
  size: FrameSize,
  captions: readonly ThumbnailCaption[],
  textFiles: readonly string[],
  fontFile?: string
): string {
  const filters = [`scale=${size.width}:${size.height}`, 'setsar=1:1'];
  captions.forEach((caption, i) => {
    const options = [
      ...(fontFile ? [`fontfile=${escapeFilterPath(fontFile)}`] : []),
      `textfile=${escapeFilterPath(textFiles[i] ?? '')}`,
      `fontsize=${caption.fontSize}`,
      `fontcolor=${caption.color}`,
      `x=${caption.x}`,
      `y=${caption.y}`,
      'shadowcolor=black',
      'shadowx=3',
      'shadowy=3'
    ];
    filters.push(`drawtext=${options.join(':')}`);
  });
  return filters.join(',');
}

/** Draws the captions over the background and writes a single PNG frame. */
export const overlayThumbnail: ThumbnailOverlay = async (backgroundPath, captions, opts) => {
  const base = path.basename(opts.outputPath, path.extname(opts.outputPath));
  fs.mkdirSync(opts.workDir, { recursive: true });
  fs.mkdirSync(path.dirname(opts.outputPath), { recursive: true });
  const textFiles = captions.map((caption, i) => {
    const file = path.join(opts.workDir, `${base}_caption${i}.txt`);
    fs.writeFileSync(file, caption.text, 'utf-8');
    return file;
  });

  await new Promise<void>((resolve, reject) => {
    ffmpeg()
      .input(backgroundPath)
      .outputOptions(['-vf', thumbnailFilter(FRAME_SIZES[opts.orientation], captions, textFiles, opts.fontFile), '-frames:v 1'])
      .save(opts.outputPath)
      .on('end', () => resolve())
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        reject(new RenderError(opts.outputPath, stderr ? `${err.message}\n${stderr.slice(-400)}` : err.message));
      });
  });

  logger.info('Thumbnail written', { output: opts.outputPath });
  return opts.outputPath;
};
