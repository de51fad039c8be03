import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { alignTranslation, buildCues, formatSrtTime, renderSrt, splitSentences, writeSubtitleTracks } from './subtitles';
import type { NarrationSegment } from './editScript';

const segments: NarrationSegment[] = [
  { text: 'Hello there. How are you?', type: 'intro', storyIndex: -1, spokenDurationSeconds: 4 },
  { text: 'Bye.', type: 'outro', storyIndex: -1, spokenDurationSeconds: 2 }
];

describe('formatSrtTime', () => {
  it('formats HH:MM:SS,mmm', () => {
    expect(formatSrtTime(0)).toBe('00:00:00,000');
    expect(formatSrtTime(3661.5)).toBe('01:01:01,500');
    expect(formatSrtTime(59.9996)).toBe('00:01:00,000');
  });
});

describe('splitSentences', () => {
  it('splits after sentence punctuation', () => {
    expect(splitSentences(' One.  Two!\nThree? four')).toEqual(['One.', 'Two!', 'Three?', 'four']);
    expect(splitSentences('   ')).toEqual([]);
  });
});

describe('buildCues', () => {
  it('shares segment time among sentences and applies the opening offset', () => {
    expect(buildCues(segments, 1)).toEqual([
      { startSeconds: 1, endSeconds: 3, text: 'Hello there.' },
      { startSeconds: 3, endSeconds: 5, text: 'How are you?' },
      { startSeconds: 5, endSeconds: 7, text: 'Bye.' }
    ]);
  });

  it('advances the clock over silent segments', () => {
    const cues = buildCues([
      { text: '', type: 'intro', storyIndex: -1, spokenDurationSeconds: 3 },
      { text: 'Next.', type: 'story', storyIndex: 0, spokenDurationSeconds: 1 }
    ]);
    expect(cues).toEqual([{ startSeconds: 3, endSeconds: 4, text: 'Next.' }]);
  });
});

describe('renderSrt', () => {
  it('numbers cues from 1', () => {
    expect(renderSrt(buildCues(segments))).toBe(
      '1\n00:00:00,000 --> 00:00:02,000\nHello there.\n\n' +
        '2\n00:00:02,000 --> 00:00:04,000\nHow are you?\n\n' +
        '3\n00:00:04,000 --> 00:00:06,000\nBye.\n'
    );
  });
});

describe('alignTranslation', () => {
  it('strips numbering and fits the reply to the cue count', () => {
    expect(alignTranslation('1. Hola\n\n2.  Adiós\nextra\n4. más', ['a', 'b'])).toEqual(['Hola', 'Adiós']);
    expect(alignTranslation('1. Hola', ['a', 'b'])).toEqual(['Hola', 'b']);
  });
});

describe('writeSubtitleTracks', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'srt-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes one file per language and falls back to English on failure', async () => {
    const cues = buildCues([{ text: 'Bye.', type: 'outro', storyIndex: -1, spokenDurationSeconds: 2 }]);
    const files = await writeSubtitleTracks(cues, {
      outputDir: dir,
      prefix: 'run',
      languages: ['en', 'es', 'ko'],
      translate: async (texts, languageName) => {
        if (languageName === 'Korean') throw new Error('rate limited');
        return texts.map((t) => `[${languageName}] ${t}`);
      }
    });

    expect(files).toEqual({
      en: path.join(dir, 'run_subtitles_en.srt'),
      es: path.join(dir, 'run_subtitles_es.srt'),
      ko: path.join(dir, 'run_subtitles_ko.srt')
    });
    expect(fs.readFileSync(path.join(dir, 'run_subtitles_es.srt'), 'utf-8')).toBe(
      '1\n00:00:00,000 --> 00:00:02,000\n[Spanish] Bye.\n'
    );
    expect(fs.readFileSync(path.join(dir, 'run_subtitles_ko.srt'), 'utf-8')).toBe(
      '1\n00:00:00,000 --> 00:00:02,000\nBye.\n'
    );
  });
});
