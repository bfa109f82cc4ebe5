/**
 * Checked-post history. Records which posts earlier runs already processed.
 *
 * Stored as pretty-printed JSON:
 *   { "lastUpdated": "<ISO>", "checkedPosts": { "<postUrl>": "<ISO>" } }
 *
 * Files written with snake_case keys (`last_updated`, `checked_posts`) are read
 * too. I/O problems never abort a run: they are logged as warnings and the
 * tracker carries on with what it has.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname, join, basename } from 'path';
import { z } from 'zod';
import { silentLogger } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import type { HistoryFile } from './types.ts';

// ── Schema ───────────────────────────────────────────────────────────────────

const checkedPostsSchema = z.record(z.string(), z.string());

const historyFileSchema = z
  .object({
    lastUpdated: z.string().optional(),
    last_updated: z.string().optional(),
    checkedPosts: checkedPostsSchema.optional(),
    checked_posts: checkedPostsSchema.optional(),
  })
  .passthrough()
  .transform((raw) => ({
    lastUpdated: raw.lastUpdated ?? raw.last_updated,
    checkedPosts: raw.checkedPosts ?? raw.checked_posts ?? {},
  }));

// ── Tracker ──────────────────────────────────────────────────────────────────

export interface HistoryTrackerOptions {
  logger?: Logger;
  /** Clock used for timestamps. */
  now?: () => Date;
}

export class HistoryTracker {
  private checked = new Map<string, string>();
  private filePath: string | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: HistoryTrackerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Replace the in-memory history with the contents of `path`.
   * A missing file gives an empty history; an unreadable one a warning.
   */
  load(path: string): void {
    this.filePath = path;
    this.checked = new Map();

    if (!existsSync(path)) {
      this.logger.info(`No history file at ${path}; starting fresh.`);
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not read history file ${path}: ${message}`);
      return;
    }

    const result = historyFileSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`Ignoring history file ${path}: unexpected format`);
      return;
    }

    this.checked = new Map(Object.entries(result.data.checkedPosts));
    this.logger.info(`Loaded history: ${this.checked.size} previously checked posts`);
  }

  isChecked(postUrl: string): boolean {
    return this.checked.has(postUrl);
  }

  /** Record a post as processed, stamped with the current time. */
  markChecked(postUrl: string, at: string = this.now().toISOString()): void {
    this.checked.set(postUrl, at);
  }

  /** Posts not yet in the history, in input order. */
  filterUnchecked(postUrls: readonly string[]): string[] {
    return postUrls.filter((url) => !this.checked.has(url));
  }

  get size(): number {
    return this.checked.size;
  }

  entries(): HistoryFile['checkedPosts'] {
    return Object.fromEntries(this.checked);
  }

  toJSON(): HistoryFile {
    return { lastUpdated: this.now().toISOString(), checkedPosts: this.entries() };
  }

  /**
   * Write the history atomically (temp file in the same directory, then rename).
   * Returns false, after a warning, when the write fails or no path is known.
   */
  save(path: string | undefined = this.filePath): boolean {
    if (!path) {
      this.logger.warn('No history file configured; history not saved.');
      return false;
    }

    try {
      const dir = dirname(path);
      mkdirSync(dir, { recursive: true });
      const tmpFile = join(dir, `.${basename(path)}-${process.pid}-${Date.now()}.tmp`);
      writeFileSync(tmpFile, JSON.stringify(this.toJSON(), null, 2) + '\n', 'utf-8');
      renameSync(tmpFile, path);
      this.filePath = path;
      this.logger.dim(`History saved: ${this.checked.size} checked posts → ${path}`);
      return true;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not save history file ${path}: ${message}`);
      return false;
    }
  }
}
