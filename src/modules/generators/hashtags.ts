import { sample, shuffle, type RandomSource } from '../../utils/random.js';
import type { ContentCatalog } from '../catalog/schema.js';

export interface HashtagStrategy {
  allHashtags: string[];
  nicheSpecific: string[];
  contentBased: string[];
  trending: string[];
  totalCount: number;
}

const MAX_KEYWORDS = 10;
const MAX_CUSTOM_TAGS = 8;
const MAX_TOPIC_TAGS = 30;
const TOPIC_MODIFIERS = 5;

export function extractKeywords(catalog: ContentCatalog, text: string): string[] {
  const stopWords = new Set(catalog.hashtags.stopWords);
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 3 && !stopWords.has(w))
    .slice(0, MAX_KEYWORDS);
}

/**
 * Tiered tags for the first niche whose key overlaps the requested one.
 */
export function getNicheHashtags(catalog: ContentCatalog, niche: string, count = 20): string[] {
  const wanted = niche.toLowerCase();

  for (const [key, tiers] of Object.entries(catalog.hashtags.niches)) {
    if (wanted.includes(key) || key.includes(wanted)) {
      return [...tiers.high.slice(0, 4), ...tiers.medium.slice(0, 8), ...tiers.niche.slice(0, 8)].slice(0, count);
    }
  }

  return catalog.hashtags.fallback.slice(0, count);
}

export function generateCustomHashtags(keywords: readonly string[]): string[] {
  const tags: string[] = [];
  for (const keyword of keywords) {
    if (keyword.length <= 2) continue;
    tags.push(`#${keyword}`);
    if (keyword.length > 5) {
      tags.push(`#${keyword}life`, `#${keyword}love`);
    }
  }
  return tags.slice(0, MAX_CUSTOM_TAGS);
}

/**
 * Niche tags, then caption-derived tags, then trending ones, de-duplicated.
 */
export function generateHashtagStrategy(
  catalog: ContentCatalog,
  caption: string,
  niche: string,
  count = 20,
): HashtagStrategy {
  const nicheTags = getNicheHashtags(catalog, niche, Math.floor(count / 2));
  const contentBased = generateCustomHashtags(extractKeywords(catalog, caption));
  const trending = catalog.hashtags.trending.slice(0, 3);

  const allHashtags = [...new Set([...nicheTags, ...contentBased, ...trending])].slice(0, count);

  return {
    allHashtags,
    nicheSpecific: nicheTags.slice(0, 10),
    contentBased,
    trending,
    totalCount: allHashtags.length,
  };
}

/**
 * Topic tag, its plural, a few modified forms and the popular set, in random
 * order.
 */
export function generateTopicHashtags(catalog: ContentCatalog, topic: string, count: number, rng: RandomSource): string[] {
  const base = topic.toLowerCase().trim().replace(/ /g, '');
  const { modifiers, popular } = catalog.hashtags;

  const tags = new Set<string>([`#${base}`, `#${base}s`]);
  for (const mod of sample(modifiers, Math.min(TOPIC_MODIFIERS, modifiers.length), rng)) {
    if (mod) tags.add(`#${base}${mod}`);
  }
  for (const tag of popular) tags.add(tag);

  return shuffle([...tags], rng).slice(0, Math.min(count, MAX_TOPIC_TAGS));
}
