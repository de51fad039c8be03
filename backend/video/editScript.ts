export type SegmentType = 'intro' | 'story' | 'outro';

export type NarrationSegment = {
  text: string;
  type: SegmentType;
  /** -1 for intro and outro */
  storyIndex: number;
  /** Filled in after speech synthesis */
  spokenDurationSeconds: number;
};

/** storyIndex -> image paths in display order */
export type ImagePool = ReadonlyMap<number, readonly string[]>;

export type EditEntry = {
  imagePath: string;
  durationSeconds: number;
  label: string;
};

export type SkippedSegment = {
  type: SegmentType;
  storyIndex: number;
  durationSeconds: number;
  reason: string;
};

export type EditScript = {
  entries: EditEntry[];
  audioPath: string;
  /** Spoken audio + opening + ending. The renderer trims output to this. */
  totalDurationSeconds: number;
  /** Seconds the narration is delayed behind the opening entry */
  audioOffsetSeconds: number;
  skipped: SkippedSegment[];
};

/** A fixed still shown before or after the narration. */
export type PaddingAsset = {
  imagePath: string;
  durationSeconds: number;
};

export type EditScriptOptions = {
  audioPath: string;
  opening?: PaddingAsset;
  ending?: PaddingAsset;
};

/** Seconds the closing card stays on screen, by orientation. */
export const ENDING_SECONDS = { vertical: 2, horizontal: 3 } as const;

function highestStoryWithImages(pool: ImagePool): readonly string[] | undefined {
  let best: number | undefined;
  for (const [index, images] of pool) {
    if (images.length === 0) continue;
    if (best === undefined || index > best) best = index;
  }
  return best === undefined ? undefined : pool.get(best);
}

/**
 * Map narration segments onto stills.
 *
 * A story's spoken time is split evenly over its images. The intro shows the
 * first image of story 0 and the outro the last image of the highest story
 * that has any. A segment with no image is skipped and its time is not
 * redistributed, so every later still starts that much earlier than its
 * narration and the final still holds until the `-t` cut at the full length.
 */
export function buildEditScript(
  segments: readonly NarrationSegment[],
  imagePool: ImagePool,
  opts: EditScriptOptions
): EditScript {
  const entries: EditEntry[] = [];
  const skipped: SkippedSegment[] = [];
  let spoken = 0;

  const skip = (segment: NarrationSegment, reason: string) => {
    skipped.push({
      type: segment.type,
      storyIndex: segment.storyIndex,
      durationSeconds: segment.spokenDurationSeconds,
      reason
    });
  };

  if (opts.opening) {
    entries.push({ imagePath: opts.opening.imagePath, durationSeconds: opts.opening.durationSeconds, label: 'opening' });
  }

  for (const segment of segments) {
    const duration = segment.spokenDurationSeconds;
    spoken += duration;

    if (segment.type === 'intro') {
      const image = imagePool.get(0)?.[0];
      if (image) entries.push({ imagePath: image, durationSeconds: duration, label: 'intro' });
      else skip(segment, 'story 0 has no images');
      continue;
    }

    if (segment.type === 'outro') {
      const images = highestStoryWithImages(imagePool);
      const image = images?.[images.length - 1];
      if (image) entries.push({ imagePath: image, durationSeconds: duration, label: 'outro' });
      else skip(segment, 'no story has images');
      continue;
    }

    const images = imagePool.get(segment.storyIndex) ?? [];
    if (images.length === 0) {
      skip(segment, `story ${segment.storyIndex} has no images`);
      continue;
    }
    const perImage = duration / images.length;
    images.forEach((imagePath, i) => {
      entries.push({ imagePath, durationSeconds: perImage, label: `story${segment.storyIndex}_img${i}` });
    });
  }

  if (opts.ending) {
    entries.push({ imagePath: opts.ending.imagePath, durationSeconds: opts.ending.durationSeconds, label: 'ending' });
  }

  const openingSeconds = opts.opening?.durationSeconds ?? 0;
  const endingSeconds = opts.ending?.durationSeconds ?? 0;
  return {
    entries,
    audioPath: opts.audioPath,
    totalDurationSeconds: spoken + openingSeconds + endingSeconds,
    audioOffsetSeconds: openingSeconds,
    skipped
  };
}

export function sumEntryDurations(script: Pick<EditScript, 'entries'>): number {
  return script.entries.reduce((sum, e) => sum + e.durationSeconds, 0);
}

function concatPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/'/g, "'\\''");
}

/**
 * ffmpeg concat-demuxer script. The last file is listed again without a
 * duration, otherwise the demuxer drops its display time.
 */
export function toConcatList(script: Pick<EditScript, 'entries'>): string {
  const lines: string[] = [];
  for (const entry of script.entries) {
    lines.push(`file '${concatPath(entry.imagePath)}'`);
    lines.push(`duration ${entry.durationSeconds.toFixed(3)}`);
  }
  const last = script.entries[script.entries.length - 1];
  if (last) lines.push(`file '${concatPath(last.imagePath)}'`);
  return `${lines.join('\n')}\n`;
}
