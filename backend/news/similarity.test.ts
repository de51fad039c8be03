import { describe, expect, it } from 'vitest';
import { isSimilarToAny, matchTopics, sameTopic, titleSimilarity } from './similarity';

describe('titleSimilarity', () => {
  it('is 1 for identical titles', () => {
    expect(titleSimilarity('Markets rally after rate cut', 'Markets rally after rate cut')).toBe(1);
  });

  it('is 0 when either side has no words', () => {
    expect(titleSimilarity('', 'Markets rally')).toBe(0);
    expect(titleSimilarity('Markets rally', '')).toBe(0);
    expect(titleSimilarity('!!!', '...')).toBe(0);
  });

  it('ignores case and punctuation', () => {
    expect(titleSimilarity('Stocks fall, again!', 'stocks fall again')).toBe(1);
  });

  it('is the Jaccard index of the word sets', () => {
    // {apple, unveils, new} shared out of five distinct words
    expect(titleSimilarity('Apple unveils new iPhone', 'Apple unveils new iPad')).toBeCloseTo(0.6, 10);
    expect(titleSimilarity('Apple unveils new iPhone', 'Rain expected tomorrow')).toBe(0);
  });
});

describe('isSimilarToAny', () => {
  it('uses 0.5 as the default threshold', () => {
    expect(isSimilarToAny('Apple unveils new iPad', ['Rain expected tomorrow', 'Apple unveils new iPhone'])).toBe(true);
    expect(isSimilarToAny('Apple unveils new iPad', ['Apple unveils new iPhone'], 0.7)).toBe(false);
    expect(isSimilarToAny('Apple unveils new iPad', [])).toBe(false);
  });
});

describe('matchTopics', () => {
  it('matches primary and related keywords', () => {
    expect(matchTopics('Strong quake shakes Japan')).toEqual(['earthquake']);
    expect(matchTopics('Maduro faces pressure in Caracas')).toEqual(['venezuela']);
    expect(matchTopics('Quiet day on the bond desk')).toEqual([]);
  });
});

describe('sameTopic', () => {
  const unrest = { title: 'Venezuela unrest: troops deployed after attack', description: '' };
  const crisis = { title: 'Maduro crisis deepens as war fears grow', description: '' };

  it('groups rephrased breaking headlines through the topic table', () => {
    expect(titleSimilarity(unrest.title, crisis.title)).toBe(0);
    expect(sameTopic(unrest, crisis)).toBe(true);
    expect(sameTopic(crisis, unrest)).toBe(true);
  });

  it('needs breaking vocabulary on both sides for the keyword path', () => {
    const summit = { title: 'Venezuela hosts trade summit in Caracas', description: '' };
    const meeting = { title: 'Maduro meets investors', description: '' };
    expect(sameTopic(summit, meeting)).toBe(false);
    expect(sameTopic(meeting, summit)).toBe(false);
    expect(sameTopic(unrest, meeting)).toBe(false);
  });

  it('groups on title overlap alone', () => {
    const a = { title: 'Apple unveils new iPhone', description: '' };
    const b = { title: 'Apple unveils new iPad', description: '' };
    expect(sameTopic(a, b)).toBe(true);
    expect(sameTopic(a, b, 0.7)).toBe(false);
  });

  it('never treats empty articles as the same topic', () => {
    const empty = { title: '', description: '' };
    expect(sameTopic(empty, empty)).toBe(false);
  });
});
