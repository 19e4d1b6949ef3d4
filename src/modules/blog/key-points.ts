import { charCount, wordCount } from '../../utils/format.js';

/**
 * Pick the sentences of a long-form text most likely to carry its key points.
 */

const KEY_INDICATORS = [
  'important', 'key', 'essential', 'crucial', 'significant', 'main', 'primary',
  'first', 'second', 'third', 'finally', 'conclusion', 'result', 'benefit',
  'advantage', 'solution', 'tip', 'strategy', 'method', 'approach',
];

const MIN_SENTENCE_CHARS = 20;

export function scoreSentence(sentence: string, index: number, total: number): number {
  let score = 0;
  const lower = sentence.toLowerCase();

  // Substring match: "tips" scores for "tip", "keyboard" for "key"
  for (const indicator of KEY_INDICATORS) {
    if (lower.includes(indicator)) score += 2;
  }

  const words = wordCount(sentence);
  if (words >= 10 && words <= 25) score += 1;

  if (index < total * 0.2) {
    score += 1;
  } else if (index > total * 0.8) {
    score += 1;
  }

  if (/\d/.test(sentence)) score += 1;

  return score;
}

export function extractKeyPoints(text: string, maxPoints = 5): string[] {
  const sentences = text
    .split(/[.!?]+/)
    .map((s) => s.trim())
    .filter((s) => charCount(s) > MIN_SENTENCE_CHARS);

  const scored = sentences.map((sentence, i) => ({
    sentence,
    score: scoreSentence(sentence, i, sentences.length),
  }));

  // Array.prototype.sort is stable, so earlier sentences win ties
  scored.sort((a, b) => b.score - a.score);

  return scored.slice(0, Math.max(0, maxPoints)).map((s) => s.sentence);
}
