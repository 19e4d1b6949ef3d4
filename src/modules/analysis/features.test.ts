import { describe, expect, it } from 'vitest';
import { extractFeatures } from './features.js';

describe('extractFeatures', () => {
  it('returns all-zero features for empty text', () => {
    expect(extractFeatures('')).toEqual({
      wordCount: 0,
      characterCount: 0,
      sentenceCount: 0,
      emojiCount: 0,
      hashtagCount: 0,
      mentionCount: 0,
      urlCount: 0,
      questionMarks: 0,
      exclamationMarks: 0,
      ctaPresent: false,
      questionPresent: false,
    });
  });

  it('counts tags, mentions, urls and punctuation', () => {
    const f = extractFeatures('Buy now!!! share this #sale #deal @brand https://x.co');

    expect(f.hashtagCount).toBe(2);
    expect(f.mentionCount).toBe(1);
    expect(f.urlCount).toBe(1);
    expect(f.exclamationMarks).toBe(3);
    expect(f.ctaPresent).toBe(true);
    expect(f.wordCount).toBe(8);
    expect(f.characterCount).toBe(53);
  });

  it('counts tags and mentions written in any script', () => {
    const f = extractFeatures('Tokyo trip #日本 #café #ñandú @josé');

    expect(f.hashtagCount).toBe(3);
    expect(f.mentionCount).toBe(1);
  });

  it('counts terminator runs rather than sentences', () => {
    const f = extractFeatures('Wow!!! Really?');
    expect(f.sentenceCount).toBe(2);
    expect(f.questionMarks).toBe(1);
    expect(f.questionPresent).toBe(true);
  });

  it('counts emojis from the standard blocks once each', () => {
    const f = extractFeatures('Love it 😍🔥');
    expect(f.emojiCount).toBe(2);
    expect(f.characterCount).toBe(10);
  });

  it('ignores symbols outside the emoji blocks', () => {
    expect(extractFeatures('Sparkle ✨').emojiCount).toBe(0);
  });

  it('matches CTA phrases as substrings', () => {
    expect(extractFeatures('Check the link in bio').ctaPresent).toBe(true);
    expect(extractFeatures('Ask the admin').ctaPresent).toBe(true);
    expect(extractFeatures('Nothing to do here').ctaPresent).toBe(false);
  });
});
