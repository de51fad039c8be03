import { chatText } from './clients';
import type { Article } from '../news/types';
import type { NarrationSegment } from '../video/editScript';
import { errorMessage } from '../errors';
import { logger } from '../logger';

export type NarrationStyle = 'short' | 'long' | 'breaking';

/** Writes the spoken text for one story. */
export type StoryWriter = (article: Article, style: NarrationStyle, related: readonly Article[]) => Promise<string>;

const INTROS: Record<NarrationStyle, string> = {
  short: "Here's today's top news.",
  long: "Welcome to this week's global news roundup. Here are the top stories from around the world.",
  breaking: 'Breaking news.'
};

const STORY_PROMPTS: Record<NarrationStyle, { system: string; maxTokens: number }> = {
  short: {
    system: 'Write 1 sentence narration for this news.\n- Just the key point\n- Under 20 words\nOutput ONLY the narration.',
    maxTokens: 100
  },
  long: {
    system:
      'Write 2-3 sentences narration for this single news story.\n- Include brief context\n- Professional news anchor tone\n- Under 50 words\nOutput ONLY the narration, no intro or outro.',
    maxTokens: 100
  },
  breaking: {
    system:
      'Write a 4-5 sentence breaking news narration.\n- Lead with what happened and where\n- Add what other outlets report, without naming them\n- Calm, factual anchor tone, no speculation\n- Under 90 words\nOutput ONLY the narration.',
    maxTokens: 250
  }
};

export function introFor(style: NarrationStyle): string {
  return INTROS[style];
}

export function outroFor(style: NarrationStyle, isSaturday: boolean): string {
  if (style === 'breaking') return 'Stay tuned for further updates.';
  if (style === 'long' && isSaturday) return 'See you Monday.';
  return 'Stay informed. See you next time.';
}

export function isSaturday(now: Date, timeZone: string): boolean {
  return new Intl.DateTimeFormat('en-US', { weekday: 'short', timeZone }).format(now) === 'Sat';
}

export const writeStoryNarration: StoryWriter = async (article, style, related) => {
  const prompt = STORY_PROMPTS[style];
  const lines = [`${article.title}: ${article.description.slice(0, 150)}`];
  if (related.length > 0) {
    lines.push('', 'Other coverage:', ...related.slice(0, 6).map((r) => `- ${r.title}`));
  }
  return chatText(prompt.system, lines.join('\n'), { maxTokens: prompt.maxTokens });
};

export type NarrationOptions = {
  style: NarrationStyle;
  now?: Date;
  timeZone?: string;
  writeStory?: StoryWriter;
  /** Related coverage per story index (breaking deep dives) */
  related?: ReadonlyMap<number, readonly Article[]>;
};

/**
 * Intro, one segment per story in order, outro. A story whose narration
 * cannot be written is read out as its title.
 */
export async function buildNarration(articles: readonly Article[], opts: NarrationOptions): Promise<NarrationSegment[]> {
  const writeStory = opts.writeStory ?? writeStoryNarration;
  const saturday = isSaturday(opts.now ?? new Date(), opts.timeZone ?? 'UTC');

  const segments: NarrationSegment[] = [
    { text: introFor(opts.style), type: 'intro', storyIndex: -1, spokenDurationSeconds: 0 }
  ];
  for (const [i, article] of articles.entries()) {
    let text: string;
    try {
      text = (await writeStory(article, opts.style, opts.related?.get(i) ?? [])).trim() || article.title;
    } catch (err) {
      logger.warn('Narration failed, reading the title instead', { story: i, error: errorMessage(err) });
      text = article.title;
    }
    segments.push({ text, type: 'story', storyIndex: i, spokenDurationSeconds: 0 });
  }
  segments.push({ text: outroFor(opts.style, saturday), type: 'outro', storyIndex: -1, spokenDurationSeconds: 0 });
  return segments;
}
