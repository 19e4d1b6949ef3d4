import { z } from 'zod';

const count = z.number().int().nonnegative();

const range = z
  .tuple([count, count])
  .refine(([min, max]) => min <= max, { message: 'range minimum must not exceed maximum' });

const phrases = z.array(z.string().min(1)).min(1);

// ── platforms.json ───────────────────────────────────

export const platformProfileSchema = z
  .object({
    optimal_length: range,
    max_hashtags: count,
    optimal_hashtags: range,
    emoji_friendly: z.boolean(),
    questions_boost: z.boolean(),
    cta_important: z.boolean(),
  })
  .refine((p) => p.optimal_hashtags[1] <= p.max_hashtags, {
    message: 'optimal_hashtags maximum must not exceed max_hashtags',
  })
  .transform((p) => ({
    optimalLength: p.optimal_length,
    maxHashtags: p.max_hashtags,
    optimalHashtags: p.optimal_hashtags,
    emojiFriendly: p.emoji_friendly,
    questionsBoost: p.questions_boost,
    ctaImportant: p.cta_important,
  }));

export const postingSpecSchema = z
  .object({
    max_chars: count,
    optimal_chars: range,
    hashtag_limit: count,
    optimal_hashtags: range,
    emoji_friendly: z.boolean(),
    post_types: z.array(z.string()),
  })
  .transform((s) => ({
    maxChars: s.max_chars,
    optimalChars: s.optimal_chars,
    hashtagLimit: s.hashtag_limit,
    optimalHashtags: s.optimal_hashtags,
    emojiFriendly: s.emoji_friendly,
    postTypes: s.post_types,
  }));

export const platformsFileSchema = z.object({
  profiles: z.record(platformProfileSchema),
  posting: z.record(postingSpecSchema),
});

// ── voices.json ──────────────────────────────────────

export const brandVoiceSchema = z.object({
  intro: phrases,
  transition: phrases,
  conclusion: phrases,
  cta: phrases,
});

export const voicesFileSchema = z.record(brandVoiceSchema);

// ── hashtags.json ────────────────────────────────────

const tags = z.array(z.string().startsWith('#'));

export const hashtagsFileSchema = z
  .object({
    topics: z.record(tags),
    generic: z.record(tags),
    niches: z.record(z.object({ high: tags, medium: tags, niche: tags })),
    trending: tags,
    fallback: tags,
    stop_words: z.array(z.string()),
    modifiers: z.array(z.string()),
    popular: tags,
  })
  .transform((h) => ({
    topics: h.topics,
    generic: h.generic,
    niches: h.niches,
    trending: h.trending,
    fallback: h.fallback,
    stopWords: h.stop_words,
    modifiers: h.modifiers,
    popular: h.popular,
  }));

// ── captions.json ────────────────────────────────────

export const captionsFileSchema = z
  .object({
    prompt_variations: phrases,
    templates: z.record(phrases).refine((t) => 'casual' in t, { message: 'a casual tone is required' }),
    fallback: z.string().min(1),
    quick_templates: z.record(phrases).refine((t) => 'casual' in t, { message: 'a casual style is required' }),
    quick_emojis: z.record(phrases),
    emojis: z.record(phrases),
    platform_specs: z.record(
      z.object({ max_chars: count, hashtags: z.boolean(), emojis: z.boolean() }),
    ),
  })
  .transform((c) => ({
    promptVariations: c.prompt_variations,
    templates: c.templates,
    fallback: c.fallback,
    quickTemplates: c.quick_templates,
    quickEmojis: c.quick_emojis,
    emojis: c.emojis,
    platformSpecs: Object.fromEntries(
      Object.entries(c.platform_specs).map(([platform, s]) => [
        platform,
        { maxChars: s.max_chars, hashtags: s.hashtags, emojis: s.emojis },
      ]),
    ),
  }));

// ── scripts.json ─────────────────────────────────────

export const scriptsFileSchema = z
  .object({
    content_types: z.record(
      z.object({
        structure: z.array(z.string()),
        hooks: phrases,
        specs: z.record(z.string()),
      }),
    ),
    ctas: z.record(phrases).refine((c) => 'general' in c, { message: 'a general audience is required' }),
    audience_hashtags: z.record(tags),
    content_hashtags: z.record(tags),
    templates: z.record(z.array(z.string())).refine((t) => 'tutorial' in t, {
      message: 'a tutorial template is required',
    }),
  })
  .transform((s) => ({
    contentTypes: s.content_types,
    ctas: s.ctas,
    audienceHashtags: s.audience_hashtags,
    contentHashtags: s.content_hashtags,
    templates: s.templates,
  }));

// ── posting-tips.json ────────────────────────────────

export const postingTipsFileSchema = z
  .object({
    single_post: z.record(z.array(z.string())),
    thread: z.array(z.string()),
    carousel: z.array(z.string()),
  })
  .transform((t) => ({ singlePost: t.single_post, thread: t.thread, carousel: t.carousel }));

export type PlatformProfile = z.output<typeof platformProfileSchema>;
export type PostingSpec = z.output<typeof postingSpecSchema>;
export type BrandVoiceProfile = z.output<typeof brandVoiceSchema>;
export type HashtagTables = z.output<typeof hashtagsFileSchema>;
export type CaptionTables = z.output<typeof captionsFileSchema>;
export type ScriptTables = z.output<typeof scriptsFileSchema>;
export type PostingTips = z.output<typeof postingTipsFileSchema>;

export interface ContentCatalog {
  platforms: Record<string, PlatformProfile>;
  posting: Record<string, PostingSpec>;
  voices: Record<string, BrandVoiceProfile>;
  hashtags: HashtagTables;
  captions: CaptionTables;
  scripts: ScriptTables;
  tips: PostingTips;
}
