/**
 * Compare Command Handler
 *
 * Lists sitemap posts that the history file does not cover yet.
 */

import type { CommandHandler, CommandResult } from '../lib/cli.ts';
import { parseFloatOpt, stringOpt } from '../lib/cli.ts';
import { createLogger, isCI } from '../lib/output.ts';
import { ConfigError } from '../link-checker/config.ts';
import { HistoryTracker } from '../link-checker/history.ts';
import { DEFAULT_UNCHECKED_FILE, comparePosts, getSitemapPosts, writeUncheckedList } from '../link-checker/compare.ts';
import { DEFAULT_HISTORY_FILE } from './import-history.ts';

async function runCompare(args: string[], options: Record<string, unknown>): Promise<CommandResult> {
  const log = createLogger({ ciMode: options.ci === true || isCI() });

  const baseUrl = stringOpt(options['base-url']) ?? args[0];
  if (!baseUrl) throw new ConfigError('Usage: linkcheck compare --base-url=<url> [--history-file=<file>]');

  const historyFile = stringOpt(options['history-file']) ?? args[1] ?? DEFAULT_HISTORY_FILE;
  const output = stringOpt(options.output) ?? DEFAULT_UNCHECKED_FILE;
  const timeoutMs = parseFloatOpt(options.timeout, 10) * 1000;

  const posts = await getSitemapPosts(baseUrl, { timeoutMs, logger: log });
  const history = new HistoryTracker({ logger: log });
  history.load(historyFile);

  const result = comparePosts(posts, history);

  log.log(`\n${'='.repeat(50)}`);
  log.heading('COMPARISON RESULTS');
  log.log('='.repeat(50));
  log.log(`Total posts in sitemap: ${result.total}`);
  log.log(`Already checked:        ${result.checked.length}`);
  log.log(`Not yet checked:        ${result.unchecked.length}`);
  log.log(`${'='.repeat(50)}\n`);

  if (result.unchecked.length > 0) {
    log.log('UNCHECKED POSTS:');
    for (const url of result.unchecked) log.log(`  ${url}`);
    writeUncheckedList(result.unchecked, output);
    log.success(`\nSaved unchecked URLs to: ${output}`);
  }

  return { output: '', exitCode: 0 };
}

export const commands: Record<string, CommandHandler> = {
  default: runCompare,
};

export function getHelp(): string {
  return `
Compare - Find sitemap posts not yet in the history

Usage:
  linkcheck compare --base-url=<url> [options]

Options:
  --history-file=<file>   History file to compare against (default: checked_posts.json)
  --output=<file>         Where to write unchecked URLs (default: unchecked_posts.txt)
  --timeout=<seconds>     Sitemap request timeout (default: 10)
`;
}
