import { z } from 'zod';
import { getLogger } from '../../utils/logger.js';
import { formatAnalysis } from '../../utils/format.js';
import type { RandomSource } from '../../utils/random.js';
import { RequestValidationError, UnsupportedPlatformError, UnsupportedVoiceError } from '../../errors.js';
import { analyzeContent } from '../analysis/health-scorer.js';
import { listPlatforms, normalizePlatform } from '../catalog/lookup.js';
import type { ContentCatalog } from '../catalog/schema.js';
import type { TextCompletionClient } from '../completion/client.js';
import { articleFromText, convertArticle } from '../blog/converter.js';
import { generateQuickCaption } from '../generators/captions.js';
import { generateTopicHashtags } from '../generators/hashtags.js';
import { AUDIENCES, CONTENT_TYPES, generateScript } from '../generators/scripts.js';

export interface ApiDeps {
  catalog: ContentCatalog;
  completion: TextCompletionClient;
  rng: RandomSource;
  now?: () => Date;
}

export interface ApiRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  /** Parsed JSON body; undefined when the request had none. */
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

const TOPIC_HASHTAG_COUNT = 15;

// ── Request schemas ──────────────────────────────────

const queryBool = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const analyzeQuerySchema = z.object({
  content: z.string({ required_error: 'content is required' }),
  platform: z.string().default('instagram'),
  image_description: z.string().default(''),
});

const analyzeBodySchema = z.object({
  content: z.string().default(''),
  platform: z.string().default('instagram'),
  image_description: z.string().nullish().transform((v) => v ?? ''),
});

const generateFields = {
  topic: z.string({ required_error: 'topic is required' }).min(1, 'topic must not be empty'),
  style: z.string().default('casual'),
  platform: z.string().default('instagram'),
};

const generateQuerySchema = z.object({ ...generateFields, include_hashtags: queryBool.default('true') });
const generateBodySchema = z.object({ ...generateFields, include_hashtags: z.boolean().default(true) });

const scriptBodySchema = z.object({
  topic: z.string({ required_error: 'topic is required' }).min(1, 'topic must not be empty'),
  audience: z.enum(AUDIENCES).default('general'),
  content_type: z.enum(CONTENT_TYPES).default('video'),
  include_hashtags: z.boolean().default(true),
});

const convertBodySchema = z.object({
  content: z.string({ required_error: 'content is required' }).min(1, 'content must not be empty'),
  title: z.string().default(''),
  voice: z.string().default('professional'),
  platforms: z.array(z.string()).min(1).default(['instagram', 'twitter', 'linkedin']),
  include_threads: z.boolean().default(true),
  include_carousels: z.boolean().default(true),
  max_points: z.number().int().min(1).max(20).default(5),
});

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new RequestValidationError(
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
  return parsed.data;
}

/**
 * Decodes percent-escapes still left in a query value after the transport
 * decoded it once. Runs that are not valid UTF-8 stay as written.
 */
export function unquote(text: string): string {
  return text.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => {
    try {
      return decodeURIComponent(run);
    } catch {
      return run;
    }
  });
}

// ── Route handlers ───────────────────────────────────

function describeService(): unknown {
  return {
    message: 'postcraft API is running',
    endpoints: [
      { path: '/analyze', method: 'GET', description: 'Analyze content health (query params)' },
      { path: '/analyze', method: 'POST', description: 'Analyze content health (JSON body)' },
      { path: '/platforms', method: 'GET', description: 'Supported platforms and their guidelines' },
      { path: '/generate', method: 'GET', description: 'Quick caption and hashtags (query params)' },
      { path: '/generate', method: 'POST', description: 'Quick caption and hashtags (JSON body)' },
      { path: '/script', method: 'POST', description: 'Generate a content script' },
      { path: '/convert', method: 'POST', description: 'Convert long-form text into social posts' },
    ],
  };
}

function analyze(catalog: ContentCatalog, content: string, platform: string, imageDescription: string): unknown {
  const key = normalizePlatform(catalog, platform);
  return formatAnalysis(analyzeContent(catalog, content, imageDescription, key));
}

function platforms(catalog: ContentCatalog): unknown {
  const specs = Object.fromEntries(
    Object.entries(catalog.platforms).map(([name, p]) => [
      name,
      {
        optimal_length: `${p.optimalLength[0]}-${p.optimalLength[1]} characters`,
        max_hashtags: p.maxHashtags,
        optimal_hashtags: `${p.optimalHashtags[0]}-${p.optimalHashtags[1]}`,
        emoji_friendly: p.emojiFriendly,
        questions_boost_engagement: p.questionsBoost,
        cta_important: p.ctaImportant,
      },
    ]),
  );
  return { supported_platforms: listPlatforms(catalog), platform_specs: specs };
}

function quickContent(
  deps: ApiDeps,
  input: { topic: string; style: string; platform: string; include_hashtags: boolean },
): unknown {
  const { catalog, rng } = deps;
  const caption = generateQuickCaption(catalog, input.topic, input.style, input.platform, rng);
  const hashtags = input.include_hashtags ? generateTopicHashtags(catalog, input.topic, TOPIC_HASHTAG_COUNT, rng) : [];

  return {
    success: true,
    message: 'Content generated successfully',
    data: {
      caption,
      hashtags,
      topic: input.topic,
      style: input.style,
      platform: input.platform,
      timestamp: (deps.now ?? (() => new Date()))().toISOString(),
    },
  };
}

async function script(deps: ApiDeps, body: unknown): Promise<unknown> {
  const input = validate(scriptBodySchema, body);
  const result = await generateScript(
    { topic: input.topic, audience: input.audience, contentType: input.content_type },
    deps,
  );

  return {
    success: true,
    message: `Successfully generated ${input.content_type} script`,
    data: {
      script: result.script,
      topic: result.topic,
      target_audience: result.audience,
      content_type: result.contentType,
      word_count: result.wordCount,
      estimated_duration: result.estimatedDuration,
      specifications: result.specifications,
      structure: result.structure,
      hashtags: input.include_hashtags ? result.hashtags : [],
      source: result.source,
    },
  };
}

function convert(deps: ApiDeps, body: unknown): unknown {
  const input = validate(convertBodySchema, body);
  const { keyPoints, posts } = convertArticle(
    deps.catalog,
    articleFromText(input.content, input.title),
    {
      platforms: input.platforms,
      voice: input.voice,
      includeThreads: input.include_threads,
      includeCarousels: input.include_carousels,
      maxPoints: input.max_points,
    },
    deps.rng,
  );

  return {
    key_points: keyPoints,
    posts: posts.map((p) => ({
      platform: p.platform,
      content: p.content,
      hashtags: p.hashtags,
      character_count: p.characterCount,
      post_type: p.postType,
      tips: p.tips,
    })),
  };
}

// ── Dispatcher ───────────────────────────────────────

const FAILURE_LABELS: Record<string, string> = {
  '/analyze': 'Analysis failed',
  '/generate': 'Generation failed',
  '/script': 'Script generation failed',
  '/convert': 'Conversion failed',
};

async function route(deps: ApiDeps, req: ApiRequest): Promise<ApiResponse | undefined> {
  const { catalog } = deps;
  const query = Object.fromEntries(req.query);

  switch (`${req.method} ${req.pathname}`) {
    case 'GET /':
      return { status: 200, body: describeService() };
    case 'GET /analyze': {
      const input = validate(analyzeQuerySchema, query);
      return {
        status: 200,
        body: analyze(catalog, unquote(input.content), input.platform, input.image_description),
      };
    }
    case 'POST /analyze': {
      const input = validate(analyzeBodySchema, req.body);
      return { status: 200, body: analyze(catalog, input.content, input.platform, input.image_description) };
    }
    case 'GET /platforms':
      return { status: 200, body: platforms(catalog) };
    case 'GET /generate':
      return { status: 200, body: quickContent(deps, validate(generateQuerySchema, query)) };
    case 'POST /generate':
      return { status: 200, body: quickContent(deps, validate(generateBodySchema, req.body)) };
    case 'POST /script':
      return { status: 200, body: await script(deps, req.body) };
    case 'POST /convert':
      return { status: 200, body: convert(deps, req.body) };
    default:
      return undefined;
  }
}

/**
 * Transport-free request handler. Never throws: validation problems map to
 * 400, unknown routes to 404 and anything else to 500.
 */
export async function handleApiRequest(deps: ApiDeps, req: ApiRequest): Promise<ApiResponse> {
  const log = getLogger();

  try {
    const response = await route(deps, req);
    return response ?? { status: 404, body: { error: 'Not found' } };
  } catch (err) {
    if (err instanceof RequestValidationError) {
      return { status: 400, body: { error: 'Invalid request', issues: err.issues } };
    }
    if (err instanceof UnsupportedPlatformError || err instanceof UnsupportedVoiceError) {
      return { status: 400, body: { error: err.message } };
    }

    const message = err instanceof Error ? err.message : String(err);
    log.error({ method: req.method, path: req.pathname, err: message }, 'API request failed');
    const label = FAILURE_LABELS[req.pathname] ?? 'Request failed';
    return { status: 500, body: { error: `${label}: ${message}` } };
  }
}
