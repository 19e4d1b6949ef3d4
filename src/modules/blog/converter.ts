import { getLogger } from '../../utils/logger.js';
import { charCount, wordCount } from '../../utils/format.js';
import type { RandomSource } from '../../utils/random.js';
import { getVoice, normalizePlatform } from '../catalog/lookup.js';
import type { ContentCatalog } from '../catalog/schema.js';
import { composePost, type SocialPost } from './composer.js';
import type { Article } from './extractor.js';
import { extractKeyPoints } from './key-points.js';

export const DEFAULT_ARTICLE_TITLE = 'Blog Post';

export interface ConvertOptions {
  platforms: readonly string[];
  voice: string;
  includeThreads?: boolean;
  includeCarousels?: boolean;
  maxPoints?: number;
}

export interface Conversion {
  keyPoints: string[];
  posts: SocialPost[];
}

/**
 * Wrap pasted text as an article.
 */
export function articleFromText(text: string, title = ''): Article {
  return {
    title: title.trim() || DEFAULT_ARTICLE_TITLE,
    content: text,
    paragraphs: [],
    wordCount: wordCount(text),
    charCount: charCount(text),
  };
}

/**
 * One single post per platform, plus a twitter thread and an instagram
 * carousel when asked for. Key points are ranked once and shared.
 */
export function convertArticle(
  catalog: ContentCatalog,
  article: Article,
  options: ConvertOptions,
  rng: RandomSource,
): Conversion {
  const log = getLogger();
  const { includeThreads = true, includeCarousels = true, maxPoints = 5 } = options;

  // Reject unknown platforms and voices before composing anything
  const platforms = options.platforms.map((p) => normalizePlatform(catalog, p));
  getVoice(catalog, options.voice);
  const keyPoints = extractKeyPoints(article.content, maxPoints);
  const posts: SocialPost[] = [];

  for (const platform of platforms) {
    posts.push(composePost(catalog, keyPoints, article.title, platform, options.voice, 'single_post', rng));

    if (platform === 'twitter' && includeThreads) {
      posts.push(composePost(catalog, keyPoints, article.title, platform, options.voice, 'thread', rng));
    }
    if (platform === 'instagram' && includeCarousels) {
      posts.push(composePost(catalog, keyPoints, article.title, platform, options.voice, 'carousel', rng));
    }
  }

  log.debug({ keyPoints: keyPoints.length, posts: posts.length }, 'Article converted');

  return { keyPoints, posts };
}

function postTypeTitle(postType: string): string {
  return postType
    .split('_')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

/**
 * Plain-text bundle of posts for saving to a file.
 */
export function exportPosts(posts: readonly SocialPost[]): string {
  let out = '';
  for (const post of posts) {
    out += `=== ${post.platform} - ${postTypeTitle(post.postType)} ===\n`;
    out += `Characters: ${post.characterCount}\n\n`;
    out += `${post.content}\n\n`;
    if (post.hashtags) out += `Hashtags: ${post.hashtags}\n\n`;
    out += `Tips: ${post.tips.join(', ')}\n\n`;
    out += '='.repeat(50) + '\n\n';
  }
  return out;
}
