/**
 * Import-History Command Handler
 *
 * Seeds the checked-posts history from a CSV with a Post URL column.
 */

import type { CommandHandler, CommandResult } from '../lib/cli.ts';
import { stringOpt } from '../lib/cli.ts';
import { createLogger, isCI } from '../lib/output.ts';
import { ConfigError } from '../link-checker/config.ts';
import { HistoryTracker } from '../link-checker/history.ts';
import { defaultImportDate, importCheckedPosts } from '../link-checker/history-import.ts';

export const DEFAULT_HISTORY_FILE = 'checked_posts.json';

async function runImport(args: string[], options: Record<string, unknown>): Promise<CommandResult> {
  const log = createLogger({ ciMode: options.ci === true || isCI() });

  const csvPath = args[0];
  if (!csvPath) throw new ConfigError('Usage: linkcheck import-history <file.csv> [--history-file=<file>]');
  if (!csvPath.toLowerCase().endsWith('.csv')) {
    throw new ConfigError('Input must be a .csv file');
  }

  const historyFile = stringOpt(options['history-file']) ?? DEFAULT_HISTORY_FILE;
  const date = stringOpt(options.date) ?? defaultImportDate();

  const history = new HistoryTracker({ logger: log });
  history.load(historyFile);
  log.log(`Existing history: ${history.size} posts`);

  log.log(`Reading CSV file: ${csvPath}`);
  const result = importCheckedPosts(csvPath, history, date);
  log.log(`Found ${result.found} unique post URLs`);
  log.success(`Added ${result.added} new posts to history`);
  log.log(`Skipped ${result.skipped} already in history`);

  const saved = history.save(historyFile);
  return { output: '', exitCode: saved ? 0 : 1 };
}

export const commands: Record<string, CommandHandler> = {
  default: runImport,
};

export function getHelp(): string {
  return `
Import-History - Mark posts from an earlier report as checked

Usage:
  linkcheck import-history <file.csv> [options]

Options:
  --history-file=<file>   History file to update (default: checked_posts.json)
  --date=<iso>            Timestamp for imported posts (default: today, T00:00:00)

The CSV needs a "Post URL" or "post_url" column.
`;
}
