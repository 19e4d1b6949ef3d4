import { getLogger } from '../../utils/logger.js';
import { fillTemplate, titleCase, wordCount } from '../../utils/format.js';
import { pick, type RandomSource } from '../../utils/random.js';
import { ownEntry } from '../catalog/lookup.js';
import type { ContentCatalog, ScriptTables } from '../catalog/schema.js';
import { cleanCompletion } from '../completion/client.js';
import type { GeneratorDeps } from './captions.js';

export interface ScriptRequest {
  topic: string;
  audience: string;
  contentType: string;
}

export interface ScriptResult {
  script: string;
  contentType: string;
  audience: string;
  topic: string;
  wordCount: number;
  estimatedDuration: string;
  specifications: Record<string, string>;
  structure: string[];
  hashtags: string[];
  source: 'completion' | 'template';
}

type ContentTypeProfile = ScriptTables['contentTypes'][string];

const MIN_COMPLETION_CHARS = 50;
const SCRIPT_MAX_TOKENS = 400;
const SECONDS_PER_WORD = 0.4;
const MAX_SCRIPT_HASHTAGS = 5;
const DEFAULT_CONTENT_TYPE = 'video';
const DEFAULT_TEMPLATE = 'tutorial';

export const CONTENT_TYPES = ['video', 'carousel', 'reel', 'story', 'tutorial', 'thread'] as const;
export const AUDIENCES = ['general', 'creators', 'business', 'students', 'professionals'] as const;

function contentProfile(catalog: ContentCatalog, contentType: string): ContentTypeProfile {
  const types = catalog.scripts.contentTypes;
  const profile = ownEntry(types, contentType) ?? ownEntry(types, DEFAULT_CONTENT_TYPE);
  if (!profile) throw new Error(`No script profile for ${contentType}`);
  return profile;
}

export function createScriptPrompt(catalog: ContentCatalog, topic: string, audience: string, contentType: string): string {
  const { structure, specs } = contentProfile(catalog, contentType);
  const length = specs.duration ?? specs.slides ?? specs.tweets ?? '';

  return `Create a ${contentType} script about ${topic} for ${audience} audience.

Script Requirements:
- Structure: ${structure.join(' → ')}
- Duration/Length: ${length} (${specs.word_count ?? ''})
- Focus: ${specs.focus ?? ''}
- Include engaging hook, valuable content, and strong call-to-action
- Make it conversational and engaging
- Target audience: ${audience}

Topic: ${topic}
Content Type: ${contentType}

Script:`;
}

/**
 * Fill the fallback script for a content type. Types without their own
 * template (story included) use the tutorial one.
 */
export function generateTemplateScript(
  catalog: ContentCatalog,
  topic: string,
  audience: string,
  contentType: string,
  rng: RandomSource,
): string {
  const { templates, ctas } = catalog.scripts;
  const lines = ownEntry(templates, contentType) ?? ownEntry(templates, DEFAULT_TEMPLATE) ?? [];

  const hook = fillTemplate(pick(contentProfile(catalog, contentType).hooks, rng), { topic });
  const ctaPool = ownEntry(ctas, audience) ?? ownEntry(ctas, 'general') ?? [];
  const cta = ctaPool.length > 0 ? fillTemplate(pick(ctaPool, rng), { topic }) : '';

  return fillTemplate(lines.join('\n'), { topic, Topic: titleCase(topic), hook, cta });
}

export function generateScriptHashtags(catalog: ContentCatalog, topic: string, audience: string, contentType: string): string[] {
  const base = topic.toLowerCase().replace(/ /g, '');
  const tags = new Set<string>([
    ...(ownEntry(catalog.scripts.audienceHashtags, audience) ?? []),
    ...(ownEntry(catalog.scripts.contentHashtags, contentType) ?? []),
    `#${base}`,
    `#${base}${contentType}`,
  ]);
  return [...tags].slice(0, MAX_SCRIPT_HASHTAGS);
}

export async function generateScript(request: ScriptRequest, deps: GeneratorDeps): Promise<ScriptResult> {
  const { catalog, completion, rng } = deps;
  const log = getLogger();
  const { topic, audience, contentType } = request;

  const prompt = createScriptPrompt(catalog, topic, audience, contentType);
  const result = await completion.complete(prompt, { maxTokens: SCRIPT_MAX_TOKENS });

  let script: string | undefined;
  if (result.ok) {
    const cleaned = cleanCompletion(result.text, prompt);
    if (cleaned.length > MIN_COMPLETION_CHARS) script = cleaned;
  }

  const source = script === undefined ? 'template' : 'completion';
  if (script === undefined) {
    log.debug({ contentType, reason: result.ok ? 'completion too short' : result.reason }, 'Using script template');
    script = generateTemplateScript(catalog, topic, audience, contentType, rng);
  }

  const profile = contentProfile(catalog, contentType);
  const words = wordCount(script);

  return {
    script,
    contentType,
    audience,
    topic,
    wordCount: words,
    estimatedDuration: `${Math.round(words * SECONDS_PER_WORD)} seconds`,
    specifications: { ...profile.specs },
    structure: [...profile.structure],
    hashtags: generateScriptHashtags(catalog, topic, audience, contentType),
    source,
  };
}
