import { describe, expect, it, vi } from 'vitest';
import { buildNarration, isSaturday, outroFor } from './narration';
import { newsArticle } from '../testing/fakes';

const first = newsArticle('Leaders gather in Geneva for climate summit');
const second = newsArticle('Central bank holds interest rates steady again', 'Business');

describe('buildNarration', () => {
  it('wraps one segment per story in a fixed intro and outro', async () => {
    const writeStory = vi.fn(async (article: { title: string }) => `Narration for ${article.title}.`);
    const segments = await buildNarration([first, second], {
      style: 'short',
      now: new Date('2026-10-19T12:00:00Z'),
      writeStory
    });

    expect(segments).toEqual([
      { text: "Here's today's top news.", type: 'intro', storyIndex: -1, spokenDurationSeconds: 0 },
      { text: `Narration for ${first.title}.`, type: 'story', storyIndex: 0, spokenDurationSeconds: 0 },
      { text: `Narration for ${second.title}.`, type: 'story', storyIndex: 1, spokenDurationSeconds: 0 },
      { text: 'Stay informed. See you next time.', type: 'outro', storyIndex: -1, spokenDurationSeconds: 0 }
    ]);
    expect(writeStory).toHaveBeenCalledTimes(2);
  });

  it('falls back to the title when a story cannot be written', async () => {
    const segments = await buildNarration([first], {
      style: 'long',
      now: new Date('2026-10-17T12:00:00Z'),
      writeStory: async () => {
        throw new Error('timeout');
      }
    });
    expect(segments[1].text).toBe(first.title);
    expect(segments[2].text).toBe('See you Monday.');
  });

  it('passes related coverage through for deep dives', async () => {
    const related = [newsArticle('Second outlet confirms the summit agenda')];
    const writeStory = vi.fn(async () => 'Deep dive.');
    await buildNarration([first], { style: 'breaking', writeStory, related: new Map([[0, related]]) });
    expect(writeStory).toHaveBeenCalledWith(first, 'breaking', related);
  });
});

describe('outroFor / isSaturday', () => {
  it('says see you Monday only for the long Saturday edition', () => {
    // 2026-10-17 is a Saturday
    expect(isSaturday(new Date('2026-10-17T12:00:00Z'), 'UTC')).toBe(true);
    expect(isSaturday(new Date('2026-10-17T20:00:00Z'), 'Asia/Seoul')).toBe(false);
    expect(outroFor('long', true)).toBe('See you Monday.');
    expect(outroFor('short', true)).toBe('Stay informed. See you next time.');
    expect(outroFor('breaking', false)).toBe('Stay tuned for further updates.');
  });
});
