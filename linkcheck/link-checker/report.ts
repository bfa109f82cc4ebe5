/**
 * Report generation and summary output for a check run.
 */

import { writeFileSync } from 'fs';
import { silentLogger } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import type { BrokenLinkRecord, RunStatistics } from './types.ts';

export const CSV_COLUMNS = ['post_title', 'post_url', 'broken_link', 'error_type'] as const;

// ── CSV ──────────────────────────────────────────────────────────────────────

/** Quote a field only when it contains a comma, quote or line break. */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Header plus one CRLF-terminated row per record. */
export function toCsv(records: readonly BrokenLinkRecord[]): string {
  const rows = records.map((r) => [r.postTitle, r.postUrl, r.brokenLink, r.reason].map(csvField).join(','));
  return [CSV_COLUMNS.join(','), ...rows].map((line) => `${line}\r\n`).join('');
}

/**
 * Write the CSV report. Nothing is written when there are no broken links.
 * Returns whether a file was written.
 */
export function writeCsvReport(
  records: readonly BrokenLinkRecord[],
  outputFile: string,
  logger: Logger = silentLogger,
): boolean {
  if (records.length === 0) return false;

  logger.log(`\nGenerating report: ${outputFile}`);
  writeFileSync(outputFile, toCsv(records), 'utf-8');
  logger.success(`Report generated with ${records.length} broken links`);
  return true;
}

// ── Summary ──────────────────────────────────────────────────────────────────

/** Print the run counters. `brokenFound` is the number of report rows. */
export function printSummary(stats: Readonly<RunStatistics>, brokenFound: number, logger: Logger): void {
  const c = logger.colors;

  logger.log(`\n${'='.repeat(50)}`);
  logger.heading('SUMMARY');
  logger.log('='.repeat(50));
  logger.log(`Posts checked:              ${stats.postsChecked}`);
  logger.log(`Posts skipped (history):    ${stats.postsSkipped}`);
  logger.log(`Total links checked:        ${stats.linksChecked}`);
  logger.log(`Links skipped (assumed OK): ${stats.linksSkipped}`);
  logger.log(`Links auto-flagged broken:  ${stats.linksAutoBroken}`);
  logger.log(`Cache hits:                 ${stats.cacheHits}`);
  logger.log(`Retries performed:          ${stats.retries}`);
  if (stats.linkFaults > 0) {
    logger.log(`${c.yellow}Internal check errors:      ${stats.linkFaults}${c.reset}`);
  }
  logger.log(`Broken links found:         ${brokenFound > 0 ? c.red : c.green}${brokenFound}${c.reset}`);

  if (brokenFound === 0) {
    logger.success('\nNo broken links found!');
  }
}
