import { beforeAll, describe, expect, it } from 'vitest';
import { DEFAULT_DATA_DIR } from '../../config.js';
import { UnsupportedPlatformError, UnsupportedVoiceError } from '../../errors.js';
import type { RandomSource } from '../../utils/random.js';
import { loadCatalog } from '../catalog/loader.js';
import type { ContentCatalog } from '../catalog/schema.js';
import { composePost, generatePostHashtags } from './composer.js';

let catalog: ContentCatalog;
const first: RandomSource = () => 0;

beforeAll(() => {
  catalog = loadCatalog(DEFAULT_DATA_DIR);
});

describe('generatePostHashtags', () => {
  it('collects topic tags then platform tags', () => {
    expect(generatePostHashtags(catalog, 'Marketing tips for business', 'instagram')).toBe(
      '#marketing #digitalmarketing #business #entrepreneur #instagood #photooftheday',
    );
  });

  it('cuts to the optimal hashtag ceiling', () => {
    expect(generatePostHashtags(catalog, 'Marketing tips for business', 'twitter')).toBe(
      '#marketing #digitalmarketing',
    );
  });
});

describe('composePost', () => {
  it('numbers the closing tweet from the full key-point count', () => {
    const points = Array.from({ length: 8 }, (_, i) => `Point ${i + 1} matters`);
    const post = composePost(catalog, points, 'Growth Tactics', 'twitter', 'professional', 'thread', first);

    expect(post.postType).toBe('thread');
    expect(post.platform).toBe('Twitter');
    expect(post.content.startsWith('🧵 THREAD: Exploring growth tactics\n\n2/ Point 1 matters\n\n')).toBe(true);
    expect(post.content).toContain('8/ Point 7 matters\n\n10/ Share your thoughts\n\n');
    expect(post.content).not.toContain('Point 8 matters');
    expect(post.content.endsWith('♻️ Retweet the first tweet if this was helpful!')).toBe(true);
    expect(post.hashtags).toBe('#trending #tips');
    expect(post.tips).toEqual(['Pin the thread to your profile', 'Engage with replies', 'Share insights in comments']);
  });

  it('lays out an instagram carousel', () => {
    const post = composePost(
      catalog,
      ['First point text', 'Second point text'],
      'Tips',
      'instagram',
      'professional',
      'carousel',
      first,
    );

    expect(post.content).toBe(
      '📸 CAROUSEL POST: Exploring tips\n\n' +
        'Swipe for the complete breakdown! ➡️\n\n' +
        'SLIDE 1: Cover/Title\n' +
        'SLIDE 2-3: Key points\n' +
        '• Slide 2: First point text\n' +
        '• Slide 3: Second point text\n' +
        '\nLAST SLIDE: Share your thoughts\n',
    );
    expect(post.characterCount).toBe(Array.from(post.content).length);
  });

  it('caps the carousel slide range at ten while showing eight points', () => {
    const points = Array.from({ length: 9 }, (_, i) => `Point ${i + 1} matters`);
    const post = composePost(catalog, points, 'Tips', 'instagram', 'professional', 'carousel', first);

    expect(post.content).toContain('SLIDE 2-10: Key points\n');
    expect(post.content).toContain('• Slide 9: Point 8 matters\n\nLAST SLIDE');
    expect(post.content).not.toContain('Point 9 matters');

    const longer = Array.from({ length: 12 }, (_, i) => `Point ${i + 1} matters`);
    expect(composePost(catalog, longer, 'Tips', 'instagram', 'professional', 'carousel', first).content).toContain(
      'SLIDE 2-10: Key points\n',
    );
  });

  it('counts hidden points when numbering a long thread', () => {
    const points = Array.from({ length: 9 }, (_, i) => `Point ${i + 1} matters`);
    const post = composePost(catalog, points, '', 'twitter', 'professional', 'thread', first);

    expect(post.content).toContain('\n\n11/ Share your thoughts\n\n');
  });

  it('falls back to stock wording without key points or title', () => {
    const post = composePost(catalog, [], '', 'instagram', 'professional', 'single_post', first);

    expect(post.content).toBe(
      'Exploring this topic.\n\nIn conclusion: Quality content drives results.\n\nShare your thoughts',
    );
    expect(post.platform).toBe('Instagram');
    expect(post.postType).toBe('single_post');
    expect(post.tips).toEqual(['Add a relevant image', 'Use Stories to drive traffic', 'Engage with comments quickly']);
  });

  it('uses diamond bullets on linkedin', () => {
    const post = composePost(catalog, ['Alpha point here', 'Beta point here'], '', 'LinkedIn', 'professional', 'single_post', first);

    expect(post.content).toBe(
      'Exploring this topic.\n\n🔹 Alpha point here\n\n🔹 Beta point here\n\n' +
        'In conclusion: Alpha point here\n\nShare your thoughts',
    );
    expect(post.platform).toBe('Linkedin');
  });

  it('drops point blocks until the post fits the optimal length', () => {
    const points = ['a'.repeat(100), 'b'.repeat(100), 'c'.repeat(100)];
    const post = composePost(catalog, points, '', 'twitter', 'professional', 'single_post', first);

    expect(post.content).toBe(`Exploring this topic.\n\nIn conclusion: ${'a'.repeat(100)}\n\nShare your thoughts`);
    expect(post.characterCount).toBe(159);
  });

  it('renders a single post for a thread requested off twitter', () => {
    const post = composePost(catalog, ['Alpha point here'], '', 'facebook', 'casual', 'thread', first);
    expect(post.postType).toBe('single_post');
  });

  it('rejects unknown platforms and voices', () => {
    expect(() => composePost(catalog, [], '', 'myspace', 'professional', 'single_post', first)).toThrow(
      UnsupportedPlatformError,
    );
    expect(() => composePost(catalog, [], '', 'twitter', 'grumpy', 'single_post', first)).toThrow(
      UnsupportedVoiceError,
    );
  });
});
