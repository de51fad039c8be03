import fs from 'fs';
import path from 'path';
import { fallbackPrompt, generateImage, safePrompt, writeImagePrompts } from '../ai/images';
import type { ImageGenerator, PromptWriter } from '../ai/images';
import type { Article } from '../news/types';
import type { Orientation } from '../video/ffmpeg';
import { ContentPolicyError, errorMessage } from '../errors';
import { logger } from '../logger';

export type StoryboardOptions = {
  stories: readonly Article[];
  /** Drawn in order when a story cannot be illustrated */
  reserves?: readonly Article[];
  targetCount: number;
  imagesPerStory: number;
  orientation: Orientation;
  workDir: string;
  prefix: string;
  writePrompts?: PromptWriter;
  generate?: ImageGenerator;
};

export type DroppedStory = {
  article: Article;
  reason: string;
};

export type Storyboard = {
  stories: Article[];
  /** Keys line up with `stories` indices */
  imagePool: Map<number, string[]>;
  dropped: DroppedStory[];
  /** Reserves that made it in; the caller still has to mark them used */
  usedReserves: Article[];
};

async function generateWithFallback(
  generate: ImageGenerator,
  prompt: string,
  article: Article,
  outputPath: string,
  orientation: Orientation
): Promise<void> {
  try {
    await generate(prompt, outputPath, orientation);
  } catch (err) {
    if (!(err instanceof ContentPolicyError)) throw err;
    logger.warn('Image prompt refused, trying a safe prompt', { title: article.title });
    await generate(safePrompt(article, orientation), outputPath, orientation);
  }
}

async function illustrateStory(
  article: Article,
  storyIndex: number,
  opts: StoryboardOptions,
  writePrompts: PromptWriter,
  generate: ImageGenerator
): Promise<string[]> {
  const prompts = await writePrompts(article, opts.imagesPerStory, opts.orientation);
  const created: string[] = [];
  try {
    for (let k = 0; k < opts.imagesPerStory; k++) {
      const outputPath = path.join(opts.workDir, `${opts.prefix}_story${storyIndex}_img${k}.png`);
      created.push(outputPath);
      const prompt = prompts[k] ?? fallbackPrompt(article, opts.orientation);
      await generateWithFallback(generate, prompt, article, outputPath, opts.orientation);
    }
    return created;
  } catch (err) {
    // never keep a partial set
    for (const file of created) fs.rmSync(file, { force: true });
    throw err;
  }
}

/**
 * Illustrate stories in order until `targetCount` have a complete image set,
 * replacing failed ones from the reserves.
 */
export async function illustrateStories(opts: StoryboardOptions): Promise<Storyboard> {
  const writePrompts = opts.writePrompts ?? writeImagePrompts;
  const generate = opts.generate ?? generateImage;
  const primaries = new Set(opts.stories.map((s) => s.id));
  const queue = [...opts.stories, ...(opts.reserves ?? [])];
  fs.mkdirSync(opts.workDir, { recursive: true });

  const board: Storyboard = { stories: [], imagePool: new Map(), dropped: [], usedReserves: [] };
  for (const article of queue) {
    if (board.stories.length >= opts.targetCount) break;
    const index = board.stories.length;
    try {
      const images = await illustrateStory(article, index, opts, writePrompts, generate);
      board.stories.push(article);
      board.imagePool.set(index, images);
      if (!primaries.has(article.id)) board.usedReserves.push(article);
      logger.info(`Illustrated story ${index + 1}/${opts.targetCount}`, { title: article.title, images: images.length });
    } catch (err) {
      const reason = err instanceof ContentPolicyError ? 'content policy' : errorMessage(err);
      logger.warn('Dropping story without images', { title: article.title, reason });
      board.dropped.push({ article, reason });
    }
  }

  if (board.stories.length < opts.targetCount) {
    logger.warn('Fewer illustrated stories than requested', {
      requested: opts.targetCount,
      illustrated: board.stories.length
    });
  }
  return board;
}
