import { describe, expect, it } from 'vitest';
import { extractKeyPoints, scoreSentence } from './key-points.js';

describe('scoreSentence', () => {
  it('adds two points per indicator word found as a substring', () => {
    expect(scoreSentence('These tips are key', 5, 10)).toBe(4);
  });

  it('rewards the opening and closing fifth of the text', () => {
    expect(scoreSentence('plain words', 0, 10)).toBe(1);
    expect(scoreSentence('plain words', 9, 10)).toBe(1);
    expect(scoreSentence('plain words', 5, 10)).toBe(0);
  });

  it('rewards mid-length sentences and numbers', () => {
    expect(scoreSentence('one two three four five six seven eight nine ten in 2024', 5, 10)).toBe(2);
  });
});

describe('extractKeyPoints', () => {
  it('returns nothing for empty text', () => {
    expect(extractKeyPoints('')).toEqual([]);
  });

  it('drops fragments of 20 characters or fewer', () => {
    expect(extractKeyPoints('Too short. This one is long enough to keep around.')).toEqual([
      'This one is long enough to keep around',
    ]);
  });

  it('orders by score and keeps earlier sentences on ties', () => {
    const text = [
      'The weather was mild on that particular afternoon.',
      'This crucial strategy doubled revenue in 2023 for every team!',
      'We went home after the long day at the office?',
    ].join(' ');

    expect(extractKeyPoints(text, 2)).toEqual([
      'This crucial strategy doubled revenue in 2023 for every team',
      'The weather was mild on that particular afternoon',
    ]);
  });

  it('never returns more than maxPoints', () => {
    const text = Array.from({ length: 12 }, (_, i) => `Sentence number ${i} carries enough words.`).join(' ');
    expect(extractKeyPoints(text, 5)).toHaveLength(5);
    expect(extractKeyPoints(text, 0)).toEqual([]);
  });
});
