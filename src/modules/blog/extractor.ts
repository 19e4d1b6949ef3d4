import * as cheerio from 'cheerio';
import { getLogger } from '../../utils/logger.js';
import { charCount, wordCount } from '../../utils/format.js';

export interface Article {
  title: string;
  /** Whitespace-collapsed plain text. */
  content: string;
  paragraphs: string[];
  wordCount: number;
  charCount: number;
}

export type ExtractResult = { ok: true; article: Article } | { ok: false; error: string };

export interface FetchArticleOptions {
  timeoutMs?: number;
}

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const CONTENT_SELECTORS = [
  'article',
  '.post-content',
  '.entry-content',
  '.content',
  '.post-body',
  'main',
  '.article-body',
  '[role="main"]',
];

const MIN_PARAGRAPH_CHARS = 50;
const MAX_PARAGRAPHS = 10;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Pull the title and main body text out of an HTML page.
 */
export function parseArticleHtml(html: string): Article {
  const $ = cheerio.load(html);
  $('script, style').remove();

  const title = $('title').first().text().trim() || $('h1').first().text().trim();

  let raw = '';
  for (const selector of CONTENT_SELECTORS) {
    const match = $(selector).first();
    if (match.length > 0) {
      raw = match.text();
      break;
    }
  }
  if (!raw) raw = $('body').text() || $.root().text();

  const content = collapse(raw);

  const paragraphs: string[] = [];
  $('p').each((_, el) => {
    const text = collapse($(el).text());
    if (charCount(text) > MIN_PARAGRAPH_CHARS) paragraphs.push(text);
  });

  return {
    title,
    content,
    paragraphs: paragraphs.slice(0, MAX_PARAGRAPHS),
    wordCount: wordCount(content),
    charCount: charCount(content),
  };
}

export function isFetchableUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
}

/**
 * Fetch a blog page and extract its article. Never throws; failures come
 * back as `{ ok: false, error }` with a user-facing message.
 */
export async function fetchArticle(url: string, options: FetchArticleOptions = {}): Promise<ExtractResult> {
  const log = getLogger();
  const { timeoutMs = 10_000 } = options;

  if (!isFetchableUrl(url)) {
    return { ok: false, error: 'Invalid URL format' };
  }

  let html: string;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    html = await response.text();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn({ url, err: reason }, 'Article fetch failed');
    return { ok: false, error: `Failed to fetch URL: ${reason}` };
  } finally {
    clearTimeout(timeout);
  }

  try {
    const article = parseArticleHtml(html);
    log.debug({ url, words: article.wordCount }, 'Article extracted');
    return { ok: true, article };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Error processing content: ${reason}` };
  }
}
