import { charCount, truncate } from '../../utils/format.js';
import { pick, type RandomSource } from '../../utils/random.js';
import { getPostingSpec, getVoice, ownEntry } from '../catalog/lookup.js';
import type { BrandVoiceProfile, ContentCatalog } from '../catalog/schema.js';

export type PostType = 'single_post' | 'thread' | 'carousel';

export const POST_TYPES: readonly PostType[] = ['single_post', 'thread', 'carousel'];

export interface SocialPost {
  /** Display name, e.g. "Linkedin". */
  platform: string;
  content: string;
  /** Space-separated, possibly empty. */
  hashtags: string;
  characterCount: number;
  postType: PostType;
  tips: string[];
}

const THREAD_POINT_CHARS = 200;
const CAROUSEL_POINT_CHARS = 80;
const SINGLE_POINT_CHARS = 100;
const MAX_THREAD_POINTS = 7;
const MAX_CAROUSEL_POINTS = 8;
const MAX_CAROUSEL_SLIDE = 10;
const FALLBACK_CONCLUSION = 'Quality content drives results.';
const RETWEET_LINE = '♻️ Retweet the first tweet if this was helpful!';

function displayName(platform: string): string {
  return platform.charAt(0).toUpperCase() + platform.slice(1).toLowerCase();
}

/**
 * Hashtags for a post: topic tags whose key overlaps a word of the source
 * text (either way round), then up to two platform-generic tags, cut to the
 * platform's optimal hashtag ceiling. Order is first-match order.
 */
export function generatePostHashtags(catalog: ContentCatalog, source: string, platform: string): string {
  const spec = getPostingSpec(catalog, platform);
  const words = source.toLowerCase().match(/(?<![\p{L}\p{N}_])[\p{L}\p{N}_]{4,}(?![\p{L}\p{N}_])/gu) ?? [];
  const tags = new Set<string>();

  for (const word of words) {
    for (const [topic, topicTags] of Object.entries(catalog.hashtags.topics)) {
      if (topic.includes(word) || word.includes(topic)) {
        for (const tag of topicTags.slice(0, 2)) tags.add(tag);
      }
    }
  }

  const generic = ownEntry(catalog.hashtags.generic, platform.toLowerCase()) ?? [];
  for (const tag of generic.slice(0, 2)) tags.add(tag);

  return [...tags].slice(0, spec.optimalHashtags[1]).join(' ');
}

function hashtagSource(keyPoints: readonly string[], title: string): string {
  return `${title} ${keyPoints.join(' ')}`;
}

function composeThread(
  catalog: ContentCatalog,
  keyPoints: readonly string[],
  title: string,
  voice: BrandVoiceProfile,
  rng: RandomSource,
): SocialPost {
  const intro = pick(voice.intro, rng);
  const cta = pick(voice.cta, rng);

  let content = `🧵 THREAD: ${intro} ${title ? title.toLowerCase() : 'this important topic'}\n\n`;

  const shown = keyPoints.slice(0, MAX_THREAD_POINTS);
  shown.forEach((point, i) => {
    content += `${i + 2}/ ${truncate(point, THREAD_POINT_CHARS)}\n\n`;
  });

  // Numbered from the full key-point count, so it skips past hidden points
  content += `${keyPoints.length + 2}/ ${cta}\n\n`;
  content += RETWEET_LINE;

  return {
    platform: 'Twitter',
    content,
    hashtags: generatePostHashtags(catalog, hashtagSource(keyPoints, title), 'twitter'),
    characterCount: charCount(content),
    postType: 'thread',
    tips: [...catalog.tips.thread],
  };
}

function composeCarousel(
  catalog: ContentCatalog,
  keyPoints: readonly string[],
  title: string,
  voice: BrandVoiceProfile,
  rng: RandomSource,
): SocialPost {
  const intro = pick(voice.intro, rng);
  const cta = pick(voice.cta, rng);

  const shown = keyPoints.slice(0, MAX_CAROUSEL_POINTS);

  let content = `📸 CAROUSEL POST: ${intro} ${title ? title.toLowerCase() : 'this topic'}\n\n`;
  content += 'Swipe for the complete breakdown! ➡️\n\n';
  content += 'SLIDE 1: Cover/Title\n';
  content += `SLIDE 2-${Math.min(keyPoints.length + 1, MAX_CAROUSEL_SLIDE)}: Key points\n`;

  shown.forEach((point, i) => {
    content += `• Slide ${i + 2}: ${truncate(point, CAROUSEL_POINT_CHARS)}\n`;
  });

  content += `\nLAST SLIDE: ${cta}\n`;

  return {
    platform: 'Instagram',
    content,
    hashtags: generatePostHashtags(catalog, hashtagSource(keyPoints, title), 'instagram'),
    characterCount: charCount(content),
    postType: 'carousel',
    tips: [...catalog.tips.carousel],
  };
}

function composeSinglePost(
  catalog: ContentCatalog,
  keyPoints: readonly string[],
  title: string,
  platform: string,
  voice: BrandVoiceProfile,
  rng: RandomSource,
): SocialPost {
  const spec = getPostingSpec(catalog, platform);
  const optimalMax = spec.optimalChars[1];

  const intro = pick(voice.intro, rng);
  const conclusion = pick(voice.conclusion, rng);
  const cta = pick(voice.cta, rng);

  let content = `${intro} ${title ? title.toLowerCase() : 'this topic'}.\n\n`;

  keyPoints.slice(0, 3).forEach((point, i) => {
    const shortened = truncate(point, SINGLE_POINT_CHARS);
    content += platform === 'linkedin' ? `🔹 ${shortened}\n\n` : `${i + 1}. ${shortened}\n\n`;
  });

  content += `${conclusion}: ${keyPoints[0] ?? FALLBACK_CONCLUSION}\n\n`;
  content += cta;

  // Drop the block three from the end until the post fits or only
  // intro, conclusion and CTA are left
  while (charCount(content) > optimalMax && content.includes('\n\n')) {
    const blocks = content.split('\n\n');
    if (blocks.length <= 3) break;
    blocks.splice(blocks.length - 3, 1);
    content = blocks.join('\n\n');
  }

  return {
    platform: displayName(platform),
    content,
    hashtags: generatePostHashtags(catalog, hashtagSource(keyPoints, title), platform),
    characterCount: charCount(content),
    postType: 'single_post',
    tips: [...(ownEntry(catalog.tips.singlePost, platform) ?? [])],
  };
}

/**
 * Render key points as a post for one platform. Threads are twitter-only and
 * carousels instagram-only; any other pairing renders a single post.
 */
export function composePost(
  catalog: ContentCatalog,
  keyPoints: readonly string[],
  title: string,
  platform: string,
  voiceName: string,
  postType: PostType,
  rng: RandomSource,
): SocialPost {
  const key = platform.trim().toLowerCase();
  // Validates the platform before any phrase is picked
  getPostingSpec(catalog, key);
  const voice = getVoice(catalog, voiceName);

  if (key === 'twitter' && postType === 'thread') {
    return composeThread(catalog, keyPoints, title, voice, rng);
  }
  if (key === 'instagram' && postType === 'carousel') {
    return composeCarousel(catalog, keyPoints, title, voice, rng);
  }
  return composeSinglePost(catalog, keyPoints, title, key, voice, rng);
}
