/**
 * Post collectors. Find the posts to check and the links inside each post.
 *
 * Covers: sitemap discovery (index → per-year sitemap, or year filtering),
 * plain-text URL files, and link extraction from a post's HTML.
 */

import { existsSync, readFileSync } from 'fs';
import * as cheerio from 'cheerio';
import { silentLogger } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import { getHostname, matchesDomainList } from './domain-policy.ts';
import { DEFAULT_HEADERS } from './probe.ts';
import type { PostLinks } from './types.ts';

// ── Constants ────────────────────────────────────────────────────────────────

export const SESSION_COOKIE_NAME = 'substack.sid';
/** Hosts that always receive the session cookie (and their subdomains). */
export const SESSION_COOKIE_DOMAINS = ['substack.com'];
export const UNKNOWN_TITLE = 'Unknown Title';
export const FETCH_ERROR_TITLE = 'Error fetching post';

const INTERNAL_PATH_MARKERS = ['/subscribe', '/comments', '/share'];

export interface FetchOptions {
  timeoutMs: number;
  /** Session cookie value for paywalled posts. */
  cookie?: string;
  /** Extra hosts the cookie may go to, e.g. a custom-domain newsletter. */
  cookieDomains?: readonly string[];
  logger?: Logger;
}

/** Whether a request to `url` may carry the session cookie. */
export function sendsSessionCookie(url: string, cookieDomains: readonly string[] = []): boolean {
  const hostname = getHostname(url);
  return hostname !== null && matchesDomainList(hostname, [...SESSION_COOKIE_DOMAINS, ...cookieDomains]);
}

function requestHeaders(url: string, options: FetchOptions): Record<string, string> {
  return options.cookie && sendsSessionCookie(url, options.cookieDomains)
    ? { ...DEFAULT_HEADERS, Cookie: `${SESSION_COOKIE_NAME}=${options.cookie}` }
    : { ...DEFAULT_HEADERS };
}

async function fetchText(url: string, options: FetchOptions): Promise<string> {
  const response = await fetch(url, {
    headers: requestHeaders(url, options),
    redirect: 'follow',
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} for ${url}`);
  }
  return response.text();
}

// ── Sitemap ──────────────────────────────────────────────────────────────────

export interface SitemapContents {
  /** `index` lists child sitemaps; `urlset` lists pages. */
  kind: 'index' | 'urlset';
  locs: string[];
}

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&', '&lt;': '<', '&gt;': '>', '&quot;': '"', '&apos;': "'",
};

function decodeXmlText(text: string): string {
  return text
    .replace(/^<!\[CDATA\[([\s\S]*)\]\]>$/, '$1')
    .replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity)
    .trim();
}

function extractLocs(xml: string, element: 'sitemap' | 'url'): string[] {
  const blockRegex = new RegExp(`<(?:[\\w-]+:)?${element}\\b[^>]*>([\\s\\S]*?)</(?:[\\w-]+:)?${element}>`, 'g');
  const locRegex = /<(?:[\w-]+:)?loc>([\s\S]*?)<\/(?:[\w-]+:)?loc>/;
  const locs: string[] = [];

  let match: RegExpExecArray | null;
  while ((match = blockRegex.exec(xml)) !== null) {
    const loc = locRegex.exec(match[1]);
    if (loc) {
      const value = decodeXmlText(loc[1]);
      if (value) locs.push(value);
    }
  }
  return locs;
}

/**
 * Parse a sitemap document. Sitemap elements are simple enough that a pair of
 * regexes covers them, including namespace-prefixed tags.
 */
export function parseSitemapXml(xml: string): SitemapContents {
  const children = extractLocs(xml, 'sitemap');
  if (children.length > 0) return { kind: 'index', locs: children };
  return { kind: 'urlset', locs: extractLocs(xml, 'url') };
}

/** Fetch and parse a sitemap. Throws when the request fails. */
export async function loadSitemap(sitemapUrl: string, options: FetchOptions): Promise<SitemapContents> {
  const contents = parseSitemapXml(await fetchText(sitemapUrl, options));
  if (contents.kind === 'index') {
    (options.logger ?? silentLogger).info(`Found sitemap index with ${contents.locs.length} sitemaps`);
  }
  return contents;
}

/** Like loadSitemap, but failures give an empty URL set and a warning. */
export async function fetchSitemap(sitemapUrl: string, options: FetchOptions): Promise<SitemapContents> {
  const log = options.logger ?? silentLogger;
  try {
    return await loadSitemap(sitemapUrl, options);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Error fetching sitemap ${sitemapUrl}: ${message}`);
    return { kind: 'urlset', locs: [] };
  }
}

/** URLs carrying the year as a path segment (`/2024/`) or a dashed token (`-2024-`). */
export function filterPostsByYear(urls: readonly string[], year: number): string[] {
  return urls.filter((url) => url.includes(`/${year}/`) || url.includes(`-${year}-`));
}

/**
 * Post URLs for one year. Uses the first child sitemap whose URL names the
 * year, and falls back to filtering the top-level entries by year.
 */
export async function getPostUrlsForYear(
  baseUrl: string,
  year: number,
  options: FetchOptions & { limit?: number },
): Promise<string[]> {
  const log = options.logger ?? silentLogger;
  const sitemapUrl = `${baseUrl.replace(/\/+$/, '')}/sitemap.xml`;
  log.info(`Fetching sitemap from ${sitemapUrl}...`);

  const top = await fetchSitemap(sitemapUrl, options);
  const yearSitemap = top.locs.find((loc) => loc.includes(String(year)) && loc.includes('sitemap'));

  if (yearSitemap) {
    log.info(`Fetching year-specific sitemap: ${yearSitemap}`);
    try {
      const posts = extractLocs(await fetchText(yearSitemap, options), 'url');
      const limited = options.limit ? posts.slice(0, options.limit) : posts;
      log.info(`Found ${limited.length} posts from ${year}`);
      return limited;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Error fetching year sitemap: ${message}`);
    }
  }

  const filtered = filterPostsByYear(top.locs, year);
  return options.limit ? filtered.slice(0, options.limit) : filtered;
}

// ── URL File ─────────────────────────────────────────────────────────────────

/** Post URLs from a text file: trimmed lines starting with `http`. */
export function loadUrlsFromFile(path: string, options: { limit?: number; logger?: Logger } = {}): string[] {
  const log = options.logger ?? silentLogger;
  log.info(`Loading URLs from ${path}...`);

  if (!existsSync(path)) {
    log.error(`Error: File not found: ${path}`);
    return [];
  }

  let urls: string[];
  try {
    urls = readFileSync(path, 'utf-8')
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.startsWith('http'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Error loading URLs from file: ${message}`);
    return [];
  }

  if (options.limit) urls = urls.slice(0, options.limit);
  log.info(`Loaded ${urls.length} URLs from file`);
  return urls;
}

// ── Post Extraction ──────────────────────────────────────────────────────────

function isInternalNewsletterLink(href: string): boolean {
  return href.includes('substack.com') && INTERNAL_PATH_MARKERS.some((marker) => href.includes(marker));
}

function resolveLink(href: string, postUrl: string): string {
  if (href.startsWith('http')) return href;
  try {
    return new URL(href, postUrl).href;
  } catch {
    return href;
  }
}

/**
 * Title and candidate links of a post.
 *
 * Links come from the `<article>`, else the first div whose class mentions
 * post/article/content, else the whole page. Fragment, mailto: and tel: links
 * and newsletter chrome (subscribe/comments/share) are dropped; relative links
 * are resolved against the post URL; duplicates keep their first position.
 */
export function extractPostLinks(html: string, postUrl: string): PostLinks {
  const $ = cheerio.load(html);

  const heading = $('h1').first();
  const titleTag = heading.length > 0 ? heading : $('title').first();
  const title = titleTag.length > 0 ? titleTag.text().trim() : UNKNOWN_TITLE;

  let content = $('article').first();
  if (content.length === 0) {
    content = $('div')
      .filter((_, el) => /post|article|content/.test($(el).attr('class') ?? ''))
      .first();
  }
  const anchors = content.length > 0 ? content.find('a[href]') : $('a[href]');

  const links: string[] = [];
  const seen = new Set<string>();
  anchors.each((_, el) => {
    const href = $(el).attr('href');
    if (href === undefined) return;
    if (href.startsWith('#') || href.startsWith('mailto:') || href.startsWith('tel:')) return;
    if (isInternalNewsletterLink(href)) return;

    const link = resolveLink(href, postUrl);
    if (seen.has(link)) return;
    seen.add(link);
    links.push(link);
  });

  return { title, links };
}

/** Fetch a post and extract its links. A failed fetch gives no links. */
export async function fetchPost(postUrl: string, options: FetchOptions): Promise<PostLinks> {
  const log = options.logger ?? silentLogger;
  log.debug(`  Extracting links from ${postUrl}...`);
  try {
    const post = extractPostLinks(await fetchText(postUrl, options), postUrl);
    log.debug(`    Found ${post.links.length} unique links`);
    return post;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    log.debug(`    Error extracting links: ${message}`);
    return { title: FETCH_ERROR_TITLE, links: [] };
  }
}

// ── Filtering ────────────────────────────────────────────────────────────────

/** Keep only newsletter post pages (`/p/<slug>`). */
export function filterPostPages(urls: readonly string[]): string[] {
  return urls.filter((url) => url.includes('/p/'));
}
