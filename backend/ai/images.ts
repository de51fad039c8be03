import fs from 'fs';
import axios from 'axios';
import OpenAI from 'openai';
import { chatText, getOpenAI } from './clients';
import type { Article } from '../news/types';
import type { Orientation } from '../video/ffmpeg';
import { config } from '../config';
import { ContentPolicyError, errorMessage } from '../errors';
import { logger } from '../logger';

/** Image prompts for one story; always `count` long. */
export type PromptWriter = (article: Article, count: number, orientation: Orientation) => Promise<string[]>;

/** One background prompt covering the whole run. */
export type ThumbnailPromptWriter = (articles: readonly Article[], orientation: Orientation) => Promise<string>;

/** Writes one image for `prompt` to `outputPath`; policy refusals throw `ContentPolicyError`. */
export type ImageGenerator = (prompt: string, outputPath: string, orientation: Orientation) => Promise<void>;

const IMAGE_SIZES = {
  vertical: '1024x1536',
  horizontal: '1536x1024'
} as const;

const POLICY_CODES = new Set(['content_policy_violation', 'moderation_blocked']);

function orientationLabel(orientation: Orientation): string {
  return orientation === 'vertical' ? 'vertical portrait 9:16' : 'horizontal landscape 16:9';
}

export function fallbackPrompt(article: Pick<Article, 'title'>, orientation: Orientation): string {
  return `Professional news photograph, ${orientationLabel(orientation)}, photojournalism style: ${article.title.slice(0, 50)}`;
}

/** Last resort after a policy refusal: no people, no specifics, only the setting. */
export function safePrompt(article: Pick<Article, 'category'>, orientation: Orientation): string {
  return `Professional news photograph, ${orientationLabel(orientation)}: calm editorial scene representing ${article.category.toLowerCase()} news, empty newsroom desk with a world map, natural light, no people, no text`;
}

const PROMPT_SYSTEM = (count: number, orientation: Orientation) => `Create ${count} image prompts for a news photo.
Format: ${orientationLabel(orientation)}

MANDATORY STYLE:
- Professional news photography, shot with DSLR camera
- Real-world scene, NOT illustration, NOT digital art, NOT 3D render
- Natural lighting, shallow depth of field, photojournalism style

RULES:
- No human faces or identifiable people
- No text, logos, or watermarks
- Under 80 words each
- Start each prompt with "Professional news photograph of..."

Output one prompt per line, no numbering.`;

export const writeImagePrompts: PromptWriter = async (article, count, orientation) => {
  let prompts: string[] = [];
  try {
    const reply = await chatText(
      PROMPT_SYSTEM(count, orientation),
      `News: ${article.title}\n${article.description.slice(0, 200)}`
    );
    prompts = reply
      .split('\n')
      .map((p) => p.trim())
      .filter(Boolean)
      .slice(0, count);
  } catch (err) {
    logger.warn('Image prompt generation failed, using the title', { title: article.title, error: errorMessage(err) });
  }
  while (prompts.length < count) prompts.push(fallbackPrompt(article, orientation));
  return prompts;
};

export function thumbnailFallbackPrompt(orientation: Orientation): string {
  return `Dramatic cinematic ${orientationLabel(orientation)} scene, world news theme, professional photography, high contrast lighting, no text`;
}

const THUMBNAIL_SYSTEM = (orientation: Orientation) => `Write one image prompt for a news video thumbnail background.
Format: ${orientationLabel(orientation)}

- One dramatic, cinematic scene that hints at all the headlines together
- High contrast lighting, eye-catching
- No text, no letters, no human faces
- Under 60 words

Output only the prompt.`;

export const writeThumbnailPrompt: ThumbnailPromptWriter = async (articles, orientation) => {
  try {
    return await chatText(
      THUMBNAIL_SYSTEM(orientation),
      articles
        .slice(0, 5)
        .map((a) => `- ${a.title}`)
        .join('\n')
    );
  } catch (err) {
    logger.warn('Thumbnail prompt generation failed, using a generic scene', { error: errorMessage(err) });
    return thumbnailFallbackPrompt(orientation);
  }
};

export function isPolicyViolation(err: unknown): boolean {
  return err instanceof OpenAI.APIError && typeof err.code === 'string' && POLICY_CODES.has(err.code);
}

async function requestImage(prompt: string, orientation: Orientation) {
  try {
    return await getOpenAI().images.generate({
      model: config.openai.imageModel,
      prompt,
      n: 1,
      size: IMAGE_SIZES[orientation],
      quality: 'medium'
    });
  } catch (err) {
    if (isPolicyViolation(err)) throw new ContentPolicyError(prompt);
    throw err;
  }
}

export const generateImage: ImageGenerator = async (prompt, outputPath, orientation) => {
  const res = await requestImage(prompt, orientation);
  const image = res.data?.[0];
  if (image?.b64_json) {
    fs.writeFileSync(outputPath, Buffer.from(image.b64_json, 'base64'));
    return;
  }
  if (image?.url) {
    const download = await axios.get<ArrayBuffer>(image.url, { responseType: 'arraybuffer', timeout: 60_000 });
    fs.writeFileSync(outputPath, Buffer.from(download.data));
    return;
  }
  throw new Error('Image response had neither b64_json nor url');
};
