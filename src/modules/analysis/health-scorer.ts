import { getLogger } from '../../utils/logger.js';
import { resolvePlatformProfile } from '../catalog/lookup.js';
import type { ContentCatalog, PlatformProfile } from '../catalog/schema.js';
import { extractFeatures, type ContentFeatures } from './features.js';

const HIGH_IMPACT_WORDS = [
  'amazing', 'incredible', 'awesome', 'fantastic', 'perfect', 'love', 'beautiful', 'stunning',
];

const MEDIUM_IMPACT_WORDS = [
  'great', 'good', 'nice', 'cool', 'interesting', 'wonderful', 'excellent',
];

const COMPLEX_WORD = /(?<![\p{L}\p{N}_])[\p{L}\p{N}_]{12,}(?![\p{L}\p{N}_])/gu;
// "ÉCOLE" is not a caps word: its tail is not at a word boundary
const CAPS_WORD = /(?<![\p{L}\p{N}_])[A-Z]{3,}(?![\p{L}\p{N}_])/gu;
const EXCESSIVE_PUNCTUATION = /[!?]{3,}/g;

export const SCORE_WEIGHTS = {
  readability: 0.3,
  engagement: 0.4,
  platform: 0.3,
} as const;

export interface SubScore {
  score: number;
  issues: string[];
  strengths: string[];
}

export interface ContentAnalysis {
  readabilityScore: number;
  engagementScore: number;
  platformScore: number;
  overallScore: number;
  wordCount: number;
  characterCount: number;
  emojiCount: number;
  hashtagCount: number;
  ctaPresent: boolean;
  questionPresent: boolean;
  improvements: readonly string[];
  /** Reserved for critical-severity messages; no rule emits one yet. */
  warnings: readonly string[];
  strengths: readonly string[];
}

function countMatches(text: string, pattern: RegExp): number {
  return (text.match(pattern) ?? []).length;
}

/**
 * Starts at 100. Floored at 0 but not capped: the line-break bonus can take
 * a clean caption to 105.
 */
export function scoreReadability(text: string, features: ContentFeatures): SubScore {
  let score = 100;
  const issues: string[] = [];
  const strengths: string[] = [];

  if (features.sentenceCount > 0) {
    const avgSentenceLength = features.wordCount / features.sentenceCount;
    if (avgSentenceLength > 20) {
      score -= 15;
      issues.push('Sentences are too long. Aim for 15-20 words per sentence.');
    } else if (avgSentenceLength <= 15) {
      strengths.push('Good sentence length for readability');
    }
  }

  if (countMatches(text, COMPLEX_WORD) > 2) {
    score -= 10;
    issues.push('Too many complex words. Use simpler alternatives.');
  }

  const capsWords = countMatches(text, CAPS_WORD);
  if (capsWords > 1) {
    score -= 20;
    issues.push('Avoid excessive ALL CAPS - it appears aggressive');
  } else if (capsWords === 0) {
    strengths.push('Good use of capitalization');
  }

  if (countMatches(text, EXCESSIVE_PUNCTUATION) > 0) {
    score -= 15;
    issues.push('Avoid excessive punctuation (!!!, ???)');
  }

  if (text.split('\n').length > 1) {
    score += 5;
    strengths.push('Good use of line breaks for structure');
  }

  return { score: Math.max(0, score), issues, strengths };
}

/**
 * Starts at 0 and ends in [0, 100]. The emoji-overuse penalty alone would
 * otherwise take a bare caption to -5.
 */
export function scoreEngagement(text: string, features: ContentFeatures, imageDescription = ''): SubScore {
  let score = 0;
  const issues: string[] = [];
  const strengths: string[] = [];
  const lower = text.toLowerCase();

  const highCount = HIGH_IMPACT_WORDS.filter((w) => lower.includes(w)).length;
  const mediumCount = MEDIUM_IMPACT_WORDS.filter((w) => lower.includes(w)).length;
  score += Math.min(highCount * 10 + mediumCount * 5, 30);

  if (highCount > 0) {
    strengths.push(`Uses ${highCount} high-impact emotional words`);
  } else if (mediumCount === 0) {
    issues.push('Add emotional words to increase engagement');
  }

  if (features.questionPresent) {
    score += 15;
    strengths.push('Includes question to boost engagement');
  } else {
    issues.push('Consider adding a question to encourage comments');
  }

  if (features.ctaPresent) {
    score += 20;
    strengths.push('Includes clear call-to-action');
  } else {
    issues.push('Add a call-to-action (like, share, comment)');
  }

  if (features.emojiCount > 0 && features.emojiCount <= 5) {
    score += 10;
    strengths.push('Good emoji usage for visual appeal');
  } else if (features.emojiCount > 5) {
    score -= 5;
    issues.push('Too many emojis - use 3-5 for best results');
  } else {
    issues.push('Add 2-3 relevant emojis for visual appeal');
  }

  if (imageDescription) {
    const textWords = new Set(lower.split(/\s+/).filter(Boolean));
    const imageWords = new Set(imageDescription.toLowerCase().split(/\s+/).filter(Boolean));
    const common = [...textWords].filter((w) => imageWords.has(w)).length;

    if (common >= 2) {
      score += 15;
      strengths.push('Good text-image alignment');
    } else {
      issues.push('Ensure text relates to the image content');
    }
  }

  return { score: Math.max(0, Math.min(score, 100)), issues, strengths };
}

/**
 * Starts at 100, floored at 0. A hashtag count above the optimal range but
 * within max_hashtags is neither penalised nor praised.
 */
export function scorePlatformFit(features: ContentFeatures, platform: string, profile: PlatformProfile): SubScore {
  let score = 100;
  const issues: string[] = [];
  const strengths: string[] = [];

  const [lengthMin, lengthMax] = profile.optimalLength;
  const chars = features.characterCount;
  if (chars >= lengthMin && chars <= lengthMax) {
    strengths.push(`Perfect length for ${platform} (${chars} characters)`);
  } else if (chars < lengthMin) {
    score -= 15;
    issues.push(`Too short for ${platform}. Aim for ${lengthMin}-${lengthMax} characters`);
  } else {
    score -= 10;
    issues.push(`Too long for ${platform}. Aim for ${lengthMin}-${lengthMax} characters`);
  }

  const [tagMin, tagMax] = profile.optimalHashtags;
  const tags = features.hashtagCount;
  if (tags >= tagMin && tags <= tagMax) {
    strengths.push(`Good hashtag count for ${platform}`);
  } else if (tags < tagMin) {
    score -= 10;
    issues.push(`Add more hashtags. Use ${tagMin}-${tagMax} for ${platform}`);
  } else if (tags > profile.maxHashtags) {
    score -= 20;
    issues.push(`Too many hashtags for ${platform}. Maximum: ${profile.maxHashtags}`);
  }

  if (!profile.emojiFriendly && features.emojiCount > 2) {
    score -= 10;
    issues.push(`Limit emojis for ${platform} - use sparingly`);
  }

  if (profile.ctaImportant && !features.ctaPresent) {
    score -= 15;
    issues.push(`Add call-to-action - important for ${platform}`);
  }

  return { score: Math.max(0, score), issues, strengths };
}

/**
 * Score a caption for a platform. Deterministic; an unknown platform key is
 * scored against the instagram profile.
 */
export function analyzeContent(
  catalog: ContentCatalog,
  caption: string,
  imageDescription = '',
  platform = 'instagram',
): ContentAnalysis {
  const log = getLogger();
  const features = extractFeatures(caption);
  const profile = resolvePlatformProfile(catalog, platform);

  const readability = scoreReadability(caption, features);
  const engagement = scoreEngagement(caption, features, imageDescription);
  const platformFit = scorePlatformFit(features, platform, profile);

  // Plain weighted sum; readability above 100 carries through
  const overallScore =
    readability.score * SCORE_WEIGHTS.readability +
    engagement.score * SCORE_WEIGHTS.engagement +
    platformFit.score * SCORE_WEIGHTS.platform;

  log.debug(
    { platform, readability: readability.score, engagement: engagement.score, platformFit: platformFit.score },
    'Content analyzed',
  );

  return {
    readabilityScore: readability.score,
    engagementScore: engagement.score,
    platformScore: platformFit.score,
    overallScore,
    wordCount: features.wordCount,
    characterCount: features.characterCount,
    emojiCount: features.emojiCount,
    hashtagCount: features.hashtagCount,
    ctaPresent: features.ctaPresent,
    questionPresent: features.questionPresent,
    improvements: [...readability.issues, ...engagement.issues, ...platformFit.issues],
    warnings: [],
    strengths: [...readability.strengths, ...engagement.strengths, ...platformFit.strengths],
  };
}
