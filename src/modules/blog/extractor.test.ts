import { afterEach, describe, expect, it, vi } from 'vitest';
import { fetchArticle, isFetchableUrl, parseArticleHtml } from './extractor.js';

const LONG_PARAGRAPH = 'Consistent posting schedules help small teams grow an audience over several months.';

const PAGE = `<html>
<head><title> Growing on Social </title><style>p { color: red; }</style></head>
<body>
<nav>Menu</nav>
<article>
<h1>Heading</h1>
<p>${LONG_PARAGRAPH}</p>
<script>var tracking = true;</script>
<p>Too short to count.</p>
</article>
</body>
</html>`;

describe('parseArticleHtml', () => {
  it('reads the title, main content and long paragraphs', () => {
    const article = parseArticleHtml(PAGE);

    expect(article.title).toBe('Growing on Social');
    expect(article.content).toBe(`Heading ${LONG_PARAGRAPH} Too short to count.`);
    expect(article.paragraphs).toEqual([LONG_PARAGRAPH]);
    expect(article.wordCount).toBe(17);
  });

  it('falls back to the first heading and the body', () => {
    const article = parseArticleHtml('<html><body><h1>Only Heading</h1>\n<div>Body text</div></body></html>');

    expect(article.title).toBe('Only Heading');
    expect(article.content).toBe('Only Heading Body text');
  });
});

describe('isFetchableUrl', () => {
  it('accepts http and https URLs only', () => {
    expect(isFetchableUrl('https://blog.example.com/post')).toBe(true);
    expect(isFetchableUrl('ftp://example.com/file')).toBe(false);
    expect(isFetchableUrl('not a url')).toBe(false);
  });
});

describe('fetchArticle', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('rejects malformed URLs without fetching', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchArticle('example.com/post')).resolves.toEqual({ ok: false, error: 'Invalid URL format' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));

    await expect(fetchArticle('https://blog.example.com/missing')).resolves.toEqual({
      ok: false,
      error: 'Failed to fetch URL: HTTP 404',
    });
  });

  it('reports network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new Error('connect ECONNREFUSED');
      }),
    );

    await expect(fetchArticle('https://blog.example.com/post')).resolves.toEqual({
      ok: false,
      error: 'Failed to fetch URL: connect ECONNREFUSED',
    });
  });

  it('extracts the article from a fetched page', async () => {
    const fetchMock = vi.fn(async () => new Response(PAGE, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await fetchArticle('https://blog.example.com/post');

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.article.title).toBe('Growing on Social');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
