/**
 * Batch link checking — bounded-concurrency fan-out of one post's links.
 *
 * A fixed pool of workers pulls from a shared queue. Each worker holds its
 * slot through the politeness delay that follows every check, so at most
 * `concurrency` checks (or delays) are outstanding at any moment.
 */

import { sleep as realSleep } from '../lib/resilience.ts';
import type { Sleeper } from '../lib/resilience.ts';
import { silentLogger, truncate } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import type { LinkVerifier } from './verifier.ts';
import type { BrokenLinkRecord, RunStatistics } from './types.ts';

// ── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_CONCURRENCY = 10;
export const DEFAULT_POLITENESS_DELAY_MS = 100;

// ── Batch Checking ───────────────────────────────────────────────────────────

export interface BatchOptions {
  concurrency?: number;
  politenessDelayMs?: number;
  sleep?: Sleeper;
  logger?: Logger;
  /** Receives `linkFaults` increments for checks that reject. */
  stats?: RunStatistics;
}

/**
 * Check every link of one post. Returns broken records in completion order.
 * A check that rejects is logged and left out; sibling checks continue.
 */
export async function checkBatch(
  verifier: LinkVerifier,
  links: readonly string[],
  postTitle: string,
  postUrl: string,
  options: BatchOptions = {},
): Promise<BrokenLinkRecord[]> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const politenessDelayMs = options.politenessDelayMs ?? DEFAULT_POLITENESS_DELAY_MS;
  const pause = options.sleep ?? realSleep;
  const log = options.logger ?? silentLogger;

  const records: BrokenLinkRecord[] = [];
  if (links.length === 0) return records;

  const queue = [...links];

  async function worker(): Promise<void> {
    for (let link = queue.shift(); link !== undefined; link = queue.shift()) {
      try {
        const result = await verifier.checkWithRetry(link);
        if (result.isBroken) {
          records.push({ postTitle, postUrl, brokenLink: link, reason: result.reason });
          const cachedNote = result.servedFromCache ? ' (cached)' : '';
          log.debug(`    ${log.colors.red}✗${log.colors.reset} ${truncate(link, 80)}: ${result.reason}${cachedNote}`);
        }
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        if (options.stats) options.stats.linkFaults++;
        log.warn(`    Error checking ${truncate(link, 80)}: ${message}`);
      }

      if (politenessDelayMs > 0) await pause(politenessDelayMs);
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, links.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return records;
}
