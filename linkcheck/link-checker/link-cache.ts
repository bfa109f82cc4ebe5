/**
 * Run-scoped link cache with in-flight de-duplication.
 *
 * Keyed by the exact URL string. Entries live for one run and are never
 * persisted. A URL that is currently being probed is tracked in a separate
 * in-flight map so concurrent checks join the running probe instead of
 * issuing a duplicate request.
 */

import type { LinkClassification } from './types.ts';

export class LinkCache {
  private readonly entries = new Map<string, LinkClassification>();
  private readonly pending = new Map<string, Promise<LinkClassification>>();

  /** Cached classification flagged as served from cache, or undefined on a miss. */
  lookup(url: string): LinkClassification | undefined {
    const entry = this.entries.get(url);
    return entry ? { ...entry, servedFromCache: true } : undefined;
  }

  /** Last write wins. */
  store(url: string, classification: LinkClassification): void {
    this.entries.set(url, { ...classification, servedFromCache: false });
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Probe already running for this URL, if any. */
  inFlight(url: string): Promise<LinkClassification> | undefined {
    return this.pending.get(url);
  }

  /**
   * Register a running probe. The entry is removed once it settles, by which
   * time the verifier has stored the final classification.
   */
  track(url: string, probe: Promise<LinkClassification>): Promise<LinkClassification> {
    this.pending.set(url, probe);
    const clear = (): void => {
      if (this.pending.get(url) === probe) this.pending.delete(url);
    };
    void probe.then(clear, clear);
    return probe;
  }

  /** Number of probes currently running (diagnostics and tests). */
  get inFlightCount(): number {
    return this.pending.size;
  }
}
