/**
 * Run statistics, plain counters owned by the components that bump them.
 */

import type { RunStatistics } from './types.ts';
import { LinkCache } from './link-cache.ts';

export function createRunStatistics(): RunStatistics {
  return {
    linksChecked: 0,
    cacheHits: 0,
    brokenLinks: 0,
    retries: 0,
    postsSkipped: 0,
    linksSkipped: 0,
    linksAutoBroken: 0,
    postsChecked: 0,
    linkFaults: 0,
  };
}

/** Frozen copy handed to the report writer at run end. */
export function snapshotStatistics(stats: RunStatistics): Readonly<RunStatistics> {
  return Object.freeze({ ...stats });
}

/** Mutable state shared by the verifier and dispatcher for one run. */
export interface RunState {
  cache: LinkCache;
  stats: RunStatistics;
}

export function createRunState(): RunState {
  return { cache: new LinkCache(), stats: createRunStatistics() };
}
