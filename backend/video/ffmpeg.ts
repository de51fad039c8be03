import fs from 'fs';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import type { EditScript } from './editScript';
import { toConcatList } from './editScript';
import { RenderError } from '../errors';
import { logger } from '../logger';

export type Orientation = 'vertical' | 'horizontal';

export type FrameSize = { width: number; height: number };

export const FRAME_SIZES: Record<Orientation, FrameSize> = {
  vertical: { width: 1080, height: 1920 },
  horizontal: { width: 1920, height: 1080 }
};

const FRAME_RATE = 30;

export function probeDurationSeconds(mediaPath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(mediaPath, (err, data) => {
      if (err) return reject(err);
      const dur = data?.format?.duration;
      resolve(typeof dur === 'number' && dur > 0 ? dur : 0);
    });
  });
}

/** Lossless join of same-codec audio files through the concat demuxer. */
export async function concatAudio(audioFiles: readonly string[], outputPath: string): Promise<void> {
  if (audioFiles.length === 0) throw new Error('No audio segments to merge');
  const listPath = `${outputPath}.txt`;
  const listContent = audioFiles.map((p) => `file '${path.resolve(p).replace(/\\/g, '/')}'`).join('\n');
  fs.writeFileSync(listPath, `${listContent}\n`);
  await new Promise<void>((resolve, reject) => {
    ffmpeg()
      .input(listPath)
      .inputOptions(['-f concat', '-safe 0'])
      .outputOptions(['-c copy'])
      .save(outputPath)
      .on('end', () => resolve())
      .on('error', (err: Error) => reject(err));
  });
}

/** Path quoted for the `subtitles=` filter argument. */
export function escapeFilterPath(filePath: string): string {
  const escaped = filePath.replace(/\\/g, '/').replace(/:/g, '\\:').replace(/'/g, "\\'");
  return `'${escaped}'`;
}

export function videoFilter(size: FrameSize, subtitlePath?: string): string {
  const filters = [`scale=${size.width}:${size.height}`, 'setsar=1:1'];
  if (subtitlePath) filters.push(`subtitles=${escapeFilterPath(subtitlePath)}`);
  return filters.join(',');
}

export function renderOutputOptions(script: EditScript, size: FrameSize, subtitlePath?: string): string[] {
  return [
    '-vf', videoFilter(size, subtitlePath),
    '-map 0:v:0',
    '-map 1:a:0',
    '-c:v libx264',
    '-preset medium',
    '-c:a aac',
    '-b:a 192k',
    '-pix_fmt yuv420p',
    `-r ${FRAME_RATE}`,
    `-t ${script.totalDurationSeconds.toFixed(3)}`
  ];
}

export type RenderOptions = {
  outputPath: string;
  orientation: Orientation;
  /** Concat list is written here */
  workDir: string;
  /** Burned into the picture when set */
  subtitlePath?: string;
};

/**
 * Encode the stills and the narration into one MP4, hard-trimmed to the
 * script's total. A non-zero exit becomes a `RenderError`.
 */
export async function renderEditScript(script: EditScript, opts: RenderOptions): Promise<string> {
  if (script.entries.length === 0) {
    throw new RenderError(opts.outputPath, 'edit script has no entries');
  }
  const size = FRAME_SIZES[opts.orientation];
  const listPath = path.join(opts.workDir, `${path.basename(opts.outputPath, path.extname(opts.outputPath))}_images.txt`);
  fs.mkdirSync(opts.workDir, { recursive: true });
  fs.mkdirSync(path.dirname(opts.outputPath), { recursive: true });
  fs.writeFileSync(listPath, toConcatList(script));

  const audioInputOptions = script.audioOffsetSeconds > 0 ? [`-itsoffset ${script.audioOffsetSeconds.toFixed(3)}`] : [];

  logger.info('Rendering video', {
    output: opts.outputPath,
    entries: script.entries.length,
    seconds: Number(script.totalDurationSeconds.toFixed(2)),
    subtitles: opts.subtitlePath ? path.basename(opts.subtitlePath) : null
  });

  await new Promise<void>((resolve, reject) => {
    ffmpeg()
      .input(listPath)
      .inputOptions(['-f concat', '-safe 0'])
      .input(script.audioPath)
      .inputOptions(audioInputOptions)
      .outputOptions(renderOutputOptions(script, size, opts.subtitlePath))
      .save(opts.outputPath)
      .on('end', () => resolve())
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        reject(new RenderError(opts.outputPath, stderr ? `${err.message}\n${stderr.slice(-400)}` : err.message));
      });
  });

  logger.info('Render finished', { output: opts.outputPath });
  return opts.outputPath;
}
