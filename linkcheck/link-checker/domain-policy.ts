/**
 * Domain policy: host-based overrides that bypass network probing.
 *
 * `skip` domains are assumed OK (bot-blocking sites), `autoBroken` domains are
 * assumed broken. Both match the host itself and any subdomain of it.
 */

import type { DomainDecision, DomainPolicySet } from './types.ts';

// ── Domain Helpers ───────────────────────────────────────────────────────────

/** Lowercased hostname of a URL, or null when it cannot be parsed. */
export function getHostname(url: string): string | null {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return hostname || null;
  } catch {
    return null;
  }
}

export function matchesDomainList(hostname: string, domains: Iterable<string>): boolean {
  for (const d of domains) {
    if (hostname === d || hostname.endsWith('.' + d)) return true;
  }
  return false;
}

/**
 * Normalize a user-supplied domain entry: `https://Sub.Example.com/path` and
 * `*.example.com` become `sub.example.com` and `example.com`.
 */
export function normalizeDomain(entry: string): string {
  return entry
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
    .replace(/[/?#].*$/, '')
    .replace(/^\*\./, '')
    .replace(/\.$/, '');
}

export function createDomainPolicy(
  skip: Iterable<string> = [],
  autoBroken: Iterable<string> = [],
): DomainPolicySet {
  const normalize = (list: Iterable<string>): Set<string> =>
    new Set([...list].map(normalizeDomain).filter(Boolean));
  return { skip: normalize(skip), autoBroken: normalize(autoBroken) };
}

// ── Classification ───────────────────────────────────────────────────────────

/**
 * Classify a URL's host against the policy. Auto-broken wins over skip.
 * Unparsable URLs fall through to full probing.
 */
export function classifyDomain(url: string, policy: DomainPolicySet): DomainDecision {
  const hostname = getHostname(url);
  if (!hostname) return 'none';

  if (matchesDomainList(hostname, policy.autoBroken)) return 'auto-broken';
  if (matchesDomainList(hostname, policy.skip)) return 'skip';
  return 'none';
}
