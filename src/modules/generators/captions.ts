import { getLogger } from '../../utils/logger.js';
import { fillTemplate } from '../../utils/format.js';
import { pick, sample, type RandomSource } from '../../utils/random.js';
import { ownEntry } from '../catalog/lookup.js';
import type { ContentCatalog } from '../catalog/schema.js';
import { cleanCompletion, type TextCompletionClient } from '../completion/client.js';

export interface GeneratorDeps {
  catalog: ContentCatalog;
  completion: TextCompletionClient;
  rng: RandomSource;
}

export interface CaptionRequest {
  topic: string;
  tone: string;
  platform: string;
  count?: number;
}

const MIN_COMPLETION_CHARS = 10;
const CAPTION_MAX_TOKENS = 80;
const DECORATION_EMOJIS = 3;

interface CaptionPlatformSpec {
  maxChars: number;
  hashtags: boolean;
  emojis: boolean;
}

function captionSpec(catalog: ContentCatalog, platform: string): CaptionPlatformSpec | undefined {
  const specs = catalog.captions.platformSpecs;
  return ownEntry(specs, platform.toLowerCase()) ?? ownEntry(specs, 'instagram');
}

/**
 * Long-form instruction prompt for a single caption.
 */
export function buildCaptionPrompt(catalog: ContentCatalog, topic: string, tone: string, platform: string): string {
  const spec = captionSpec(catalog, platform);
  let prompt = `Write a ${tone} ${platform} caption about ${topic}.

Requirements:
- Keep it under ${spec?.maxChars ?? 2200} characters
- Use ${tone} tone
- Make it engaging and shareable`;

  if (spec?.emojis) prompt += '\n- Include relevant emojis';
  if (spec?.hashtags) prompt += '\n- Add 3-5 relevant hashtags';

  return prompt + '\n\nCaption:';
}

/**
 * Three distinct platform emojis, placed before or after the text on a coin flip.
 */
export function decorateWithEmojis(catalog: ContentCatalog, text: string, platform: string, rng: RandomSource): string {
  const emojis = ownEntry(catalog.captions.emojis, platform.toLowerCase()) ?? ownEntry(catalog.captions.emojis, 'instagram') ?? [];
  if (emojis.length === 0) return text;

  const chosen = sample(emojis, DECORATION_EMOJIS, rng).join(' ');
  return rng() < 0.5 ? `${chosen} ${text}` : `${text} ${chosen}`;
}

export async function generateCaptions(request: CaptionRequest, deps: GeneratorDeps): Promise<string[]> {
  const { catalog, completion, rng } = deps;
  const log = getLogger();
  const { topic, tone, platform, count = 3 } = request;
  const values = { topic, tone, platform };

  const variations = catalog.captions.promptVariations;
  const templates =
    ownEntry(catalog.captions.templates, tone.toLowerCase()) ?? ownEntry(catalog.captions.templates, 'casual') ?? [];
  const emojisAllowed = captionSpec(catalog, platform)?.emojis ?? false;

  const captions: string[] = [];

  for (let i = 0; i < count; i++) {
    const prompt = fillTemplate(variations[i % variations.length] ?? '', values);

    // Sequential so seeded runs stay reproducible
    const result = await completion.complete(prompt, { maxTokens: CAPTION_MAX_TOKENS });

    let caption: string | undefined;
    if (result.ok) {
      const cleaned = cleanCompletion(result.text, prompt);
      if (cleaned.length > MIN_COMPLETION_CHARS) caption = cleaned;
    }

    if (caption === undefined) {
      log.debug({ index: i, reason: result.ok ? 'completion too short' : result.reason }, 'Using caption template');
      const template = templates[i % Math.max(templates.length, 1)] ?? catalog.captions.fallback;
      caption = fillTemplate(template, values);
    }

    captions.push(emojisAllowed ? decorateWithEmojis(catalog, caption, platform, rng) : caption);
  }

  return captions;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

/**
 * One-line caption from the quick template set. No completion call.
 */
export function generateQuickCaption(
  catalog: ContentCatalog,
  topic: string,
  style: string,
  platform: string,
  rng: RandomSource,
): string {
  const { quickTemplates, quickEmojis } = catalog.captions;
  const templates = ownEntry(quickTemplates, style.toLowerCase()) ?? ownEntry(quickTemplates, 'casual') ?? [];
  const emojis = ownEntry(quickEmojis, platform.toLowerCase()) ?? ['✨'];

  const emoji = pick(emojis, rng);
  const template = templates.length > 0 ? pick(templates, rng) : catalog.captions.fallback;

  return fillTemplate(template, { topic, Topic: capitalize(topic), emoji });
}
