/**
 * Seeds the checked-posts history from an earlier CSV report.
 *
 * Reads a CSV with a "Post URL" (or "post_url") column, e.g. a broken-link
 * report from a previous run, and records every unseen post URL as checked.
 */

import { readFileSync } from 'fs';
import { parse as csvParse } from 'csv-parse/sync';
import { z } from 'zod';
import type { HistoryTracker } from './history.ts';

// ── Errors ───────────────────────────────────────────────────────────────────

export class ImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImportError';
  }
}

// ── Parsing ──────────────────────────────────────────────────────────────────

const csvRowsSchema = z.array(z.array(z.string()));

/** Index of the first header naming the post URL, case-insensitively; -1 if none. */
export function findPostUrlColumn(headers: readonly string[]): number {
  return headers.findIndex((header) => {
    const lower = header.toLowerCase();
    return lower.includes('post url') || lower.includes('post_url');
  });
}

/** Unique `http…` post URLs from CSV text, in first-seen order. */
export function readPostUrlsFromCsv(content: string): string[] {
  let parsed: unknown;
  try {
    parsed = csvParse(content, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ImportError(`Failed to parse CSV: ${message}`);
  }

  const rows = csvRowsSchema.parse(parsed);
  const [headers = [], ...body] = rows;
  const column = findPostUrlColumn(headers);
  if (column === -1) {
    throw new ImportError(`Could not find 'Post URL' column. Found columns: ${headers.join(', ')}`);
  }

  const urls = new Set<string>();
  for (const row of body) {
    const url = (row[column] ?? '').trim();
    if (url.startsWith('http')) urls.add(url);
  }
  return [...urls];
}

// ── Import ───────────────────────────────────────────────────────────────────

export interface ImportResult {
  found: number;
  added: number;
  skipped: number;
}

/** Midnight of the given day in local time, as `YYYY-MM-DDT00:00:00`. */
export function defaultImportDate(now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}T00:00:00`;
}

/** Add the post URLs of a CSV file to the history, stamped with `date`. */
export function importCheckedPosts(csvPath: string, history: HistoryTracker, date: string): ImportResult {
  let content: string;
  try {
    content = readFileSync(csvPath, 'utf-8');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ImportError(`Could not read ${csvPath}: ${message}`);
  }

  const urls = readPostUrlsFromCsv(content);
  let added = 0;
  for (const url of urls) {
    if (!history.isChecked(url)) {
      history.markChecked(url, date);
      added++;
    }
  }
  return { found: urls.length, added, skipped: urls.length - added };
}
