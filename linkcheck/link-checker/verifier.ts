/**
 * Link verifier: domain policy, cache and retry loop around a Probe.
 *
 * Order of decisions for one URL:
 *   1. auto-broken domain → broken, no request
 *   2. skip domain        → OK, no request
 *   3. cached or in-flight → joined result, counted as a cache hit
 *   4. probe with up to maxRetries retries on retryable outcomes,
 *      sleeping base × 2^i between attempts
 */

import { backoffDelayMs, sleep as realSleep } from '../lib/resilience.ts';
import type { Sleeper } from '../lib/resilience.ts';
import { silentLogger, truncate } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import { classifyDomain } from './domain-policy.ts';
import type { RunState } from './stats.ts';
import type { DomainPolicySet, LinkClassification, Probe, ProbeOutcome } from './types.ts';

// ── Constants ────────────────────────────────────────────────────────────────

export const KNOWN_BROKEN_REASON = 'Known broken domain';
export const SKIPPED_REASON = 'Skipped (bot-blocking domain)';
export const OK_REASON = 'OK';

// ── Verifier ─────────────────────────────────────────────────────────────────

export interface LinkVerifierOptions {
  policy: DomainPolicySet;
  probe: Probe;
  state: RunState;
  maxRetries: number;
  baseRetryDelayMs: number;
  sleep?: Sleeper;
  logger?: Logger;
}

export class LinkVerifier {
  private readonly policy: DomainPolicySet;
  private readonly probe: Probe;
  private readonly state: RunState;
  private readonly maxRetries: number;
  private readonly baseRetryDelayMs: number;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;

  constructor(options: LinkVerifierOptions) {
    this.policy = options.policy;
    this.probe = options.probe;
    this.state = options.state;
    this.maxRetries = Math.max(0, options.maxRetries);
    this.baseRetryDelayMs = options.baseRetryDelayMs;
    this.sleep = options.sleep ?? realSleep;
    this.logger = options.logger ?? silentLogger;
  }

  async checkWithRetry(url: string): Promise<LinkClassification> {
    const { cache, stats } = this.state;

    switch (classifyDomain(url, this.policy)) {
      case 'auto-broken':
        stats.linksAutoBroken++;
        stats.brokenLinks++;
        return { isBroken: true, kind: 'domain-broken', reason: KNOWN_BROKEN_REASON, servedFromCache: false };
      case 'skip':
        stats.linksSkipped++;
        return { isBroken: false, kind: 'domain-skipped', reason: SKIPPED_REASON, servedFromCache: false };
      case 'none':
        break;
    }

    const cached = cache.lookup(url);
    if (cached) {
      stats.cacheHits++;
      return cached;
    }

    const running = cache.inFlight(url);
    if (running) {
      stats.cacheHits++;
      const joined = await running;
      return { ...joined, servedFromCache: true };
    }

    stats.linksChecked++;
    return cache.track(url, this.probeWithRetry(url));
  }

  private async probeWithRetry(url: string): Promise<LinkClassification> {
    const { cache, stats } = this.state;
    const attempts = this.maxRetries + 1;

    let outcome: ProbeOutcome = { kind: 'ok' };
    for (let attempt = 0; attempt < attempts; attempt++) {
      outcome = await this.probe.probeOnce(url);
      if (outcome.kind === 'ok' || !outcome.retryable) break;
      if (attempt === attempts - 1) break;

      const delayMs = backoffDelayMs(this.baseRetryDelayMs, attempt);
      stats.retries++;
      this.logger.debug(
        `    Retry ${attempt + 1}/${this.maxRetries} for ${truncate(url, 60)} in ${delayMs / 1000}s (${outcome.reason})`,
      );
      await this.sleep(delayMs);
    }

    const classification: LinkClassification = outcome.kind === 'ok'
      ? { isBroken: false, kind: 'ok', reason: OK_REASON, servedFromCache: false }
      : { isBroken: true, kind: outcome.error, reason: outcome.reason, servedFromCache: false };

    cache.store(url, classification);
    if (classification.isBroken) stats.brokenLinks++;
    return classification;
  }
}
