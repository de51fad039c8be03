import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { illustrateStories } from './storyboard';
import { fallbackPrompt } from '../ai/images';
import type { ImageGenerator, PromptWriter } from '../ai/images';
import { ContentPolicyError } from '../errors';
import { newsArticle } from '../testing/fakes';

const a = newsArticle('Leaders gather in Geneva for climate summit');
const b = newsArticle('Central bank holds interest rates steady again', 'Business');
const reserve = newsArticle('Chipmaker unveils faster processor for laptops', 'Technology');

const prompts: PromptWriter = async (article, count) =>
  Array.from({ length: count }, (_, i) => `${article.title} #${i}`);

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'board-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const writeFile: ImageGenerator = async (_prompt, outputPath) => {
  fs.writeFileSync(outputPath, 'png');
};

describe('illustrateStories', () => {
  it('builds a pool aligned with the story order', async () => {
    const board = await illustrateStories({
      stories: [a, b],
      targetCount: 2,
      imagesPerStory: 2,
      orientation: 'vertical',
      workDir: dir,
      prefix: 'shorts',
      writePrompts: prompts,
      generate: writeFile
    });
    expect(board.stories).toEqual([a, b]);
    expect(board.imagePool.get(1)).toEqual([
      path.join(dir, 'shorts_story1_img0.png'),
      path.join(dir, 'shorts_story1_img1.png')
    ]);
    expect(board.usedReserves).toEqual([]);
  });

  it('falls back to a generic prompt when the writer returns too few', async () => {
    const seen: string[] = [];
    const generate: ImageGenerator = async (prompt, outputPath) => {
      seen.push(prompt);
      fs.writeFileSync(outputPath, 'png');
    };
    const board = await illustrateStories({
      stories: [a],
      targetCount: 1,
      imagesPerStory: 2,
      orientation: 'vertical',
      workDir: dir,
      prefix: 'shorts',
      writePrompts: async () => [],
      generate
    });
    expect(seen).toEqual([fallbackPrompt(a, 'vertical'), fallbackPrompt(a, 'vertical')]);
    expect(board.imagePool.get(0)).toHaveLength(2);
  });

  it('retries a refused prompt once with a safe prompt', async () => {
    const seen: string[] = [];
    const generate: ImageGenerator = async (prompt, outputPath) => {
      seen.push(prompt);
      if (prompt === `${a.title} #1`) throw new ContentPolicyError(prompt);
      fs.writeFileSync(outputPath, 'png');
    };
    const board = await illustrateStories({
      stories: [a],
      targetCount: 1,
      imagesPerStory: 2,
      orientation: 'horizontal',
      workDir: dir,
      prefix: 'video',
      writePrompts: prompts,
      generate
    });
    expect(board.stories).toEqual([a]);
    expect(seen).toHaveLength(3);
    expect(seen[2]).toContain('no people, no text');
  });

  it('drops a story whose fallback is refused too and draws a reserve', async () => {
    const generate: ImageGenerator = async (prompt, outputPath) => {
      if (prompt === `${b.title} #1` || prompt.includes('business news')) throw new ContentPolicyError(prompt);
      fs.writeFileSync(outputPath, 'png');
    };
    const board = await illustrateStories({
      stories: [a, b],
      reserves: [reserve],
      targetCount: 2,
      imagesPerStory: 2,
      orientation: 'vertical',
      workDir: dir,
      prefix: 'shorts',
      writePrompts: prompts,
      generate
    });

    expect(board.stories).toEqual([a, reserve]);
    expect(board.usedReserves).toEqual([reserve]);
    expect(board.dropped).toEqual([{ article: b, reason: 'content policy' }]);
    // b's first image was written before the refusal and must be gone; the reserve reused index 1
    expect(board.imagePool.get(1)).toEqual([
      path.join(dir, 'shorts_story1_img0.png'),
      path.join(dir, 'shorts_story1_img1.png')
    ]);
    expect(fs.readdirSync(dir).sort()).toEqual([
      'shorts_story0_img0.png',
      'shorts_story0_img1.png',
      'shorts_story1_img0.png',
      'shorts_story1_img1.png'
    ]);
  });

  it('drops a story on other errors and reports the shortfall', async () => {
    const generate: ImageGenerator = async (prompt, outputPath) => {
      if (prompt.startsWith(a.title)) throw new Error('502 Bad Gateway');
      fs.writeFileSync(outputPath, 'png');
    };
    const board = await illustrateStories({
      stories: [a, b],
      targetCount: 2,
      imagesPerStory: 1,
      orientation: 'vertical',
      workDir: dir,
      prefix: 'shorts',
      writePrompts: prompts,
      generate
    });
    expect(board.stories).toEqual([b]);
    expect(board.imagePool).toEqual(new Map([[0, [path.join(dir, 'shorts_story0_img0.png')]]]));
    expect(board.dropped).toEqual([{ article: a, reason: '502 Bad Gateway' }]);
  });
});
