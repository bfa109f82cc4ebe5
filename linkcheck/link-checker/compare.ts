/**
 * Sitemap vs history comparison.
 */

import { writeFileSync } from 'fs';
import { silentLogger } from '../lib/output.ts';
import { fetchSitemap, filterPostPages, loadSitemap } from './collectors.ts';
import type { FetchOptions } from './collectors.ts';
import type { HistoryTracker } from './history.ts';

export const DEFAULT_UNCHECKED_FILE = 'unchecked_posts.txt';

export interface PostComparison {
  /** Unique post URLs in the sitemap. */
  total: number;
  checked: string[];
  /** Sorted. */
  unchecked: string[];
}

/**
 * Every `/p/` post URL the sitemap lists. A sitemap index is followed one
 * level down. Throws when the top-level sitemap cannot be fetched; a failed
 * child sitemap is only a warning.
 */
export async function getSitemapPosts(baseUrl: string, options: FetchOptions): Promise<string[]> {
  const log = options.logger ?? silentLogger;
  const sitemapUrl = `${baseUrl.replace(/\/+$/, '')}/sitemap.xml`;
  log.info(`Fetching posts from ${sitemapUrl}...`);

  const top = await loadSitemap(sitemapUrl, options);
  if (top.kind === 'urlset') return filterPostPages(top.locs);

  const pages: string[] = [];
  for (const child of top.locs) {
    const contents = await fetchSitemap(child, options);
    pages.push(...contents.locs);
  }
  return filterPostPages(pages);
}

export function comparePosts(sitemapPosts: readonly string[], history: HistoryTracker): PostComparison {
  const unique = [...new Set(sitemapPosts)];
  const checked = unique.filter((url) => history.isChecked(url));
  const unchecked = unique.filter((url) => !history.isChecked(url)).sort();
  return { total: unique.length, checked, unchecked };
}

/** One URL per line. */
export function writeUncheckedList(urls: readonly string[], path: string): void {
  writeFileSync(path, urls.map((url) => `${url}\n`).join(''), 'utf-8');
}
