import { beforeAll, describe, expect, it } from 'vitest';
import { DEFAULT_DATA_DIR } from '../../config.js';
import type { RandomSource } from '../../utils/random.js';
import { loadCatalog } from '../catalog/loader.js';
import type { ContentCatalog } from '../catalog/schema.js';
import {
  UnavailableCompletionClient,
  type CompletionResult,
  type TextCompletionClient,
} from '../completion/client.js';
import { buildCaptionPrompt, decorateWithEmojis, generateCaptions, generateQuickCaption } from './captions.js';

class ScriptedCompletion implements TextCompletionClient {
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string) => CompletionResult) {}

  async complete(prompt: string): Promise<CompletionResult> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

let catalog: ContentCatalog;
const first: RandomSource = () => 0;

beforeAll(() => {
  catalog = loadCatalog(DEFAULT_DATA_DIR);
});

describe('buildCaptionPrompt', () => {
  it('lists the platform requirements', () => {
    expect(buildCaptionPrompt(catalog, 'coffee', 'casual', 'twitter')).toBe(
      'Write a casual twitter caption about coffee.\n\n' +
        'Requirements:\n' +
        '- Keep it under 280 characters\n' +
        '- Use casual tone\n' +
        '- Make it engaging and shareable\n' +
        '- Include relevant emojis\n' +
        '- Add 3-5 relevant hashtags\n\n' +
        'Caption:',
    );
  });
});

describe('decorateWithEmojis', () => {
  it('places three distinct emojis on one side', () => {
    expect(decorateWithEmojis(catalog, 'Ship it', 'twitter', first)).toBe('💡 🔥 ⚡ Ship it');
    expect(decorateWithEmojis(catalog, 'Ship it', 'twitter', () => 0.99).startsWith('Ship it ')).toBe(true);
  });
});

describe('generateCaptions', () => {
  it('fills tone templates when completion is unavailable', async () => {
    const captions = await generateCaptions(
      { topic: 'AI tools', tone: 'professional', platform: 'linkedin', count: 2 },
      { catalog, completion: new UnavailableCompletionClient(), rng: first },
    );

    expect(captions).toEqual([
      "Exploring the impact of AI tools in today's landscape. Thoughts?",
      'Key insights about AI tools that are worth considering today.',
    ]);
  });

  it('cycles through the prompt variations', async () => {
    const completion = new ScriptedCompletion(() => ({ ok: false, reason: 'offline' }));
    await generateCaptions(
      { topic: 'coffee', tone: 'casual', platform: 'linkedin', count: 4 },
      { catalog, completion, rng: first },
    );

    expect(completion.prompts).toEqual([
      'Write a casual social media caption about coffee',
      'Create an engaging linkedin post about coffee in casual style',
      'Generate a casual caption for coffee',
      'Write a casual social media caption about coffee',
    ]);
  });

  it('uses a cleaned completion when it is long enough', async () => {
    const completion = new ScriptedCompletion((prompt) => ({ ok: true, text: `${prompt}\nFresh beans, fresh start.` }));
    const captions = await generateCaptions(
      { topic: 'coffee', tone: 'casual', platform: 'linkedin', count: 1 },
      { catalog, completion, rng: first },
    );

    expect(captions).toEqual(['Fresh beans, fresh start.']);
  });

  it('falls back to a template for a too-short completion', async () => {
    const completion = new ScriptedCompletion(() => ({ ok: true, text: 'Nice!' }));
    const captions = await generateCaptions(
      { topic: 'coffee', tone: 'unknown-tone', platform: 'linkedin', count: 1 },
      { catalog, completion, rng: first },
    );

    expect(captions).toEqual(["Just discovered coffee! 😍 What's your favorite thing about this?"]);
  });

  it('decorates captions on emoji-friendly platforms', async () => {
    const captions = await generateCaptions(
      { topic: 'coffee', tone: 'casual', platform: 'twitter', count: 1 },
      { catalog, completion: new UnavailableCompletionClient(), rng: first },
    );

    expect(captions).toEqual(["💡 🔥 ⚡ Just discovered coffee! 😍 What's your favorite thing about this?"]);
  });
});

describe('generateQuickCaption', () => {
  it('fills the template with topic and platform emoji', () => {
    expect(generateQuickCaption(catalog, 'coffee', 'casual', 'twitter', first)).toBe('Living my best coffee life! 🚀');
  });

  it('falls back to casual templates and a sparkle', () => {
    expect(generateQuickCaption(catalog, 'coffee', 'sarcastic', 'myspace', first)).toBe(
      'Living my best coffee life! ✨',
    );
  });
});
