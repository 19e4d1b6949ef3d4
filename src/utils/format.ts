import type { ContentAnalysis } from '../modules/analysis/health-scorer.js';

/**
 * Length in code points, so an emoji counts once.
 */
export function charCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Cut text to `max` code points, ending in "..." when shortened.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max - 3).join('') + '...';
}

/**
 * Whitespace-delimited token count.
 */
export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Substitute `{name}` placeholders. Unknown placeholders are left in place.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Upper-case the first letter of every word, lower-case the rest.
 */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|\P{L})(\p{L})/gu, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

export type ScoreBand = 'excellent' | 'good' | 'poor';

export function scoreBand(score: number): ScoreBand {
  if (score >= 80) return 'excellent';
  if (score >= 60) return 'good';
  return 'poor';
}

export function scoreEmoji(score: number): string {
  if (score >= 90) return '🎯';
  if (score >= 80) return '🔥';
  if (score >= 70) return '✅';
  if (score >= 60) return '⚠️';
  return '❌';
}

export function formatScore(score: number): string {
  return score.toFixed(1);
}

export interface FormattedAnalysis {
  scores: {
    readability: number;
    engagement: number;
    platform_optimization: number;
    overall: number;
  };
  metrics: {
    word_count: number;
    character_count: number;
    emoji_count: number;
    hashtag_count: number;
    cta_present: boolean;
    question_present: boolean;
  };
  analysis: {
    improvements: string[];
    warnings: string[];
    strengths: string[];
  };
}

/**
 * Shape an analysis the way the API and `--json` output report it.
 */
export function formatAnalysis(result: ContentAnalysis): FormattedAnalysis {
  return {
    scores: {
      readability: result.readabilityScore,
      engagement: result.engagementScore,
      platform_optimization: result.platformScore,
      overall: result.overallScore,
    },
    metrics: {
      word_count: result.wordCount,
      character_count: result.characterCount,
      emoji_count: result.emojiCount,
      hashtag_count: result.hashtagCount,
      cta_present: result.ctaPresent,
      question_present: result.questionPresent,
    },
    analysis: {
      improvements: [...result.improvements],
      warnings: [...result.warnings],
      strengths: [...result.strengths],
    },
  };
}
