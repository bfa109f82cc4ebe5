import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  extractPostLinks,
  fetchPost,
  filterPostPages,
  filterPostsByYear,
  getPostUrlsForYear,
  loadUrlsFromFile,
  parseSitemapXml,
  sendsSessionCookie,
  FETCH_ERROR_TITLE,
  UNKNOWN_TITLE,
} from './collectors.ts';
import { createLogger } from '../lib/output.ts';

// ── Helpers ──────────────────────────────────────────────────────────────────

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

/** Route fetch calls to canned bodies; unknown URLs get a 404. */
function stubFetch(routes: Record<string, string>) {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
    const body = routes[urlOf(input)];
    return body === undefined
      ? new Response('missing', { status: 404 })
      : new Response(body, { status: 200, headers: { 'content-type': 'application/xml' } });
  });
}

function urlset(urls: string[]): string {
  const entries = urls.map((u) => `  <url><loc>${u}</loc><lastmod>2024-01-01</lastmod></url>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</urlset>`;
}

function sitemapIndex(children: string[]): string {
  const entries = children.map((u) => `  <sitemap><loc>${u}</loc></sitemap>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</sitemapindex>`;
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ── Sitemap ──────────────────────────────────────────────────────────────────

describe('parseSitemapXml', () => {
  it('recognises a sitemap index', () => {
    const xml = sitemapIndex(['https://news.example.com/sitemap/2023', 'https://news.example.com/sitemap/2024']);
    expect(parseSitemapXml(xml)).toEqual({
      kind: 'index',
      locs: ['https://news.example.com/sitemap/2023', 'https://news.example.com/sitemap/2024'],
    });
  });

  it('reads page URLs from a url set and decodes entities', () => {
    const xml = urlset(['https://news.example.com/p/one', 'https://news.example.com/p/two?a=1&amp;b=2']);
    expect(parseSitemapXml(xml)).toEqual({
      kind: 'urlset',
      locs: ['https://news.example.com/p/one', 'https://news.example.com/p/two?a=1&b=2'],
    });
  });

  it('handles namespace prefixes', () => {
    const xml = '<sm:urlset xmlns:sm="x"><sm:url><sm:loc> https://a.example/p/x </sm:loc></sm:url></sm:urlset>';
    expect(parseSitemapXml(xml).locs).toEqual(['https://a.example/p/x']);
  });

  it('returns an empty url set for unrelated XML', () => {
    expect(parseSitemapXml('<rss><channel/></rss>')).toEqual({ kind: 'urlset', locs: [] });
  });
});

describe('filterPostsByYear', () => {
  it('matches /YYYY/ and -YYYY- only', () => {
    const urls = [
      'https://a.example/2024/01/post',
      'https://a.example/p/recap-2024-edition',
      'https://a.example/p/2024recap',
      'https://a.example/2023/12/post',
    ];
    expect(filterPostsByYear(urls, 2024)).toEqual([
      'https://a.example/2024/01/post',
      'https://a.example/p/recap-2024-edition',
    ]);
  });
});

describe('sendsSessionCookie', () => {
  it('allows substack.com and its subdomains', () => {
    expect(sendsSessionCookie('https://substack.com/home')).toBe(true);
    expect(sendsSessionCookie('https://news.substack.com/p/a')).toBe(true);
  });

  it('allows configured domains', () => {
    expect(sendsSessionCookie('https://news.example.com/p/a', ['news.example.com'])).toBe(true);
  });

  it('rejects look-alike and unparsable hosts', () => {
    expect(sendsSessionCookie('https://notsubstack.com/p/a')).toBe(false);
    expect(sendsSessionCookie('https://substack.com.other.example/')).toBe(false);
    expect(sendsSessionCookie('not a url')).toBe(false);
  });
});

describe('getPostUrlsForYear', () => {
  it('sends the cookie to the newsletter host only', async () => {
    const fetchSpy = stubFetch({
      'https://news.example.com/sitemap.xml': sitemapIndex(['https://cdn.other.example/sitemap-2024.xml']),
      'https://cdn.other.example/sitemap-2024.xml': urlset(['https://news.example.com/p/a']),
    });

    const urls = await getPostUrlsForYear('https://news.example.com', 2024, {
      timeoutMs: 1000,
      cookie: 'test-secret',
      cookieDomains: ['news.example.com'],
    });

    expect(urls).toEqual(['https://news.example.com/p/a']);
    expect(fetchSpy.mock.calls[0]?.[1]?.headers).toMatchObject({ Cookie: 'substack.sid=test-secret' });
    expect(fetchSpy.mock.calls[1]?.[1]?.headers).not.toHaveProperty('Cookie');
  });

  it('follows the year sitemap from an index', async () => {
    stubFetch({
      'https://news.example.com/sitemap.xml': sitemapIndex([
        'https://news.example.com/sitemap/2023',
        'https://news.example.com/sitemap/2024',
      ]),
      'https://news.example.com/sitemap/2024': urlset([
        'https://news.example.com/p/a',
        'https://news.example.com/p/b',
        'https://news.example.com/p/c',
      ]),
    });

    const urls = await getPostUrlsForYear('https://news.example.com/', 2024, { timeoutMs: 1000, limit: 2 });
    expect(urls).toEqual(['https://news.example.com/p/a', 'https://news.example.com/p/b']);
  });

  it('falls back to filtering a flat sitemap by year', async () => {
    stubFetch({
      'https://news.example.com/sitemap.xml': urlset([
        'https://news.example.com/2024/03/spring',
        'https://news.example.com/2022/03/old',
      ]),
    });

    const urls = await getPostUrlsForYear('https://news.example.com', 2024, { timeoutMs: 1000 });
    expect(urls).toEqual(['https://news.example.com/2024/03/spring']);
  });

  it('returns nothing when the sitemap cannot be fetched', async () => {
    stubFetch({});
    const lines: string[] = [];
    const logger = createLogger({ ciMode: true, write: (line) => lines.push(line) });

    const urls = await getPostUrlsForYear('https://news.example.com', 2024, { timeoutMs: 1000, logger });
    expect(urls).toEqual([]);
    expect(lines).toContain(
      'Error fetching sitemap https://news.example.com/sitemap.xml: HTTP 404 for https://news.example.com/sitemap.xml',
    );
  });
});

// ── URL File ─────────────────────────────────────────────────────────────────

describe('loadUrlsFromFile', () => {
  it('keeps trimmed http lines up to the limit', () => {
    const dir = mkdtempSync(join(tmpdir(), 'link-urls-'));
    try {
      const file = join(dir, 'posts.txt');
      writeFileSync(file, '# my posts\n  https://a.example/p/1  \n\nnot-a-url\nhttp://a.example/p/2\nhttps://a.example/p/3\n');
      expect(loadUrlsFromFile(file)).toEqual(['https://a.example/p/1', 'http://a.example/p/2', 'https://a.example/p/3']);
      expect(loadUrlsFromFile(file, { limit: 2 })).toEqual(['https://a.example/p/1', 'http://a.example/p/2']);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('returns an empty list for a missing file', () => {
    expect(loadUrlsFromFile(join(tmpdir(), 'definitely-missing-link-file.txt'))).toEqual([]);
  });
});

// ── Post Extraction ──────────────────────────────────────────────────────────

describe('extractPostLinks', () => {
  const POST_URL = 'https://news.example.com/p/hello';

  it('takes links from the article and filters noise', () => {
    const html = `<html><head><title>Site</title></head><body>
      <nav><a href="https://outside.example/">Nav</a></nav>
      <h1> Hello World </h1>
      <article>
        <a href="#top">Top</a>
        <a href="mailto:editor@example.com">Mail</a>
        <a href="tel:+15550100">Call</a>
        <a href="https://news.substack.com/subscribe?ref=x">Subscribe</a>
        <a href="https://news.substack.com/p/hello/comments">Comments</a>
        <a href="/about">About</a>
        <a href="https://ext.example/a">A</a>
        <a href="https://ext.example/a">A again</a>
        <a href="notes.html">Notes</a>
        <a>No href</a>
      </article>
    </body></html>`;

    expect(extractPostLinks(html, POST_URL)).toEqual({
      title: 'Hello World',
      links: [
        'https://news.example.com/about',
        'https://ext.example/a',
        'https://news.example.com/p/notes.html',
      ],
    });
  });

  it('keeps substack links that are not newsletter chrome', () => {
    const html = '<article><a href="https://other.substack.com/p/essay">Essay</a></article>';
    expect(extractPostLinks(html, POST_URL).links).toEqual(['https://other.substack.com/p/essay']);
  });

  it('falls back to a content div, then the title tag', () => {
    const html = `<html><head><title>Fallback Title</title></head><body>
      <div class="header"><a href="https://header.example/">Header</a></div>
      <div class="body markup post-content"><a href="https://inside.example/">Inside</a></div>
    </body></html>`;

    expect(extractPostLinks(html, POST_URL)).toEqual({
      title: 'Fallback Title',
      links: ['https://inside.example/'],
    });
  });

  it('uses the whole page when there is no content area', () => {
    const html = '<body><a href="https://one.example/">1</a><p><a href="https://two.example/">2</a></p></body>';
    expect(extractPostLinks(html, POST_URL)).toEqual({
      title: UNKNOWN_TITLE,
      links: ['https://one.example/', 'https://two.example/'],
    });
  });
});

describe('fetchPost', () => {
  it('sends the session cookie to substack.com hosts', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(
      new Response('<h1>Paid</h1><article><a href="https://x.example/">x</a></article>', { status: 200 }),
    );

    const post = await fetchPost('https://news.substack.com/p/paid', { timeoutMs: 1000, cookie: 'test-secret' });
    expect(post).toEqual({ title: 'Paid', links: ['https://x.example/'] });

    const init = fetchSpy.mock.calls[0]?.[1];
    expect(init?.headers).toMatchObject({ Cookie: 'substack.sid=test-secret' });
  });

  it('sends the session cookie to an allowed custom domain', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response('<h1>Paid</h1>', { status: 200 }));

    await fetchPost('https://news.example.com/p/paid', {
      timeoutMs: 1000,
      cookie: 'test-secret',
      cookieDomains: ['news.example.com'],
    });

    expect(fetchSpy.mock.calls[0]?.[1]?.headers).toMatchObject({ Cookie: 'substack.sid=test-secret' });
  });

  it('keeps the session cookie away from other hosts', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response('<h1>Elsewhere</h1>', { status: 200 }));

    await fetchPost('https://tracker.other.example/p/x', {
      timeoutMs: 1000,
      cookie: 'test-secret',
      cookieDomains: ['news.example.com'],
    });

    expect(fetchSpy.mock.calls[0]?.[1]?.headers).not.toHaveProperty('Cookie');
  });

  it('reports a failed fetch with no links', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response('oops', { status: 500 }));
    const post = await fetchPost('https://news.example.com/p/down', { timeoutMs: 1000 });
    expect(post).toEqual({ title: FETCH_ERROR_TITLE, links: [] });
  });
});

describe('filterPostPages', () => {
  it('keeps /p/ URLs', () => {
    expect(filterPostPages([
      'https://news.example.com/p/one',
      'https://news.example.com/about',
      'https://news.example.com/archive',
    ])).toEqual(['https://news.example.com/p/one']);
  });
});
