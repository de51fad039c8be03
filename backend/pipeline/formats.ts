import fs from 'fs';
import path from 'path';
import type { NarrationStyle } from '../ai/narration';
import type { VideoFormat } from '../metadata';
import type { ContentType } from '../news/types';
import { ENDING_SECONDS } from '../video/editScript';
import type { PaddingAsset } from '../video/editScript';
import type { Orientation } from '../video/ffmpeg';

export type FormatSpec = {
  format: VideoFormat;
  orientation: Orientation;
  imagesPerStory: number;
  style: NarrationStyle;
  endingSeconds: number;
  /** Looked up in the assets dir; the ending is left out when missing */
  endingImage: string;
  openingImage: string;
  /** Output file suffix, `<ts>_<label>.mp4` */
  label: string;
};

export const OPENING_SECONDS = 1;

export const FORMATS: Record<VideoFormat, FormatSpec> = {
  shorts: {
    format: 'shorts',
    orientation: 'vertical',
    imagesPerStory: 2,
    style: 'short',
    endingSeconds: ENDING_SECONDS.vertical,
    endingImage: 'ending_shorts.png',
    openingImage: 'opening_shorts.png',
    label: 'Shorts'
  },
  video: {
    format: 'video',
    orientation: 'horizontal',
    imagesPerStory: 3,
    style: 'long',
    endingSeconds: ENDING_SECONDS.horizontal,
    endingImage: 'ending_video.png',
    openingImage: 'opening_video.png',
    label: 'Video'
  },
  breaking: {
    format: 'breaking',
    orientation: 'vertical',
    imagesPerStory: 5,
    style: 'breaking',
    endingSeconds: ENDING_SECONDS.vertical,
    endingImage: 'ending_shorts.png',
    openingImage: 'opening_breaking.png',
    label: 'Breaking'
  }
};

export type FormatSelection = 'shorts' | 'video' | 'both';

export function formatsFor(contentType: ContentType, selection?: FormatSelection): VideoFormat[] {
  if (contentType === 'breaking') return ['breaking'];
  const choice = selection ?? (contentType === 'weekly' ? 'video' : 'shorts');
  return choice === 'both' ? ['shorts', 'video'] : [choice];
}

export function paddingAsset(assetsDir: string, fileName: string, durationSeconds: number): PaddingAsset | undefined {
  const imagePath = path.join(assetsDir, fileName);
  return fs.existsSync(imagePath) ? { imagePath, durationSeconds } : undefined;
}
