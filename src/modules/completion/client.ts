import Anthropic from '@anthropic-ai/sdk';
import { getLogger } from '../../utils/logger.js';
import type { Config } from '../../config.js';

export type CompletionResult = { ok: true; text: string } | { ok: false; reason: string };

export interface CompletionOptions {
  maxTokens?: number;
}

/**
 * Best-effort short text completion. Implementations never throw; every
 * failure comes back as `{ ok: false }` so callers can fall back to templates.
 */
export interface TextCompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<CompletionResult>;
}

const FAILURE_MARKERS = ['error', 'timeout', 'loading'];

/**
 * Text that reads like a provider status message rather than content.
 */
export function looksLikeFailureText(text: string): boolean {
  const lower = text.toLowerCase();
  return FAILURE_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Remove an echoed prompt from a completion and trim it.
 */
export function cleanCompletion(text: string, prompt: string): string {
  return (prompt ? text.split(prompt).join('') : text).trim();
}

export class AnthropicCompletionClient implements TextCompletionClient {
  private client: Anthropic;
  private log = getLogger();
  private model: string;
  private maxTokens: number;

  constructor(config: Pick<Config, 'anthropicApiKey' | 'completionModel' | 'completionMaxTokens'>) {
    this.client = new Anthropic({ apiKey: config.anthropicApiKey });
    this.model = config.completionModel;
    this.maxTokens = config.completionMaxTokens;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<CompletionResult> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxTokens ?? this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') text += block.text;
      }

      this.log.debug(
        { model: this.model, tokens: response.usage.input_tokens + response.usage.output_tokens },
        'Completion received',
      );

      if (!text.trim()) return { ok: false, reason: 'empty completion' };
      if (looksLikeFailureText(text)) return { ok: false, reason: 'completion reported a failure' };
      return { ok: true, text };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn({ model: this.model, err: reason }, 'Completion request failed');
      return { ok: false, reason };
    }
  }
}

/**
 * Stand-in used when no API key is configured.
 */
export class UnavailableCompletionClient implements TextCompletionClient {
  async complete(): Promise<CompletionResult> {
    return { ok: false, reason: 'completion client not configured' };
  }
}

export function createCompletionClient(config: Config): TextCompletionClient {
  if (!config.anthropicApiKey) {
    getLogger().debug('No ANTHROPIC_API_KEY set, generators will use templates');
    return new UnavailableCompletionClient();
  }
  return new AnthropicCompletionClient(config);
}
