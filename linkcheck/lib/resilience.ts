/**
 * Resilience utilities: sleeping and exponential backoff.
 *
 * The retry loop itself lives in link-checker/verifier.ts because it retries on
 * classified probe outcomes rather than on thrown errors.
 */

/** Sleep function signature; injectable so tests never wait on real timers. */
export type Sleeper = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `retryIndex` (0-based): base, 2×base, 4×base, …
 * Pure doubling, no jitter and no cap.
 */
export function backoffDelayMs(baseMs: number, retryIndex: number): number {
  return baseMs * Math.pow(2, retryIndex);
}
