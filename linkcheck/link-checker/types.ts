/**
 * Types for the link-checker pipeline.
 */

/** Why a link was classified the way it was. */
export type LinkErrorKind =
  | 'domain-broken'
  | 'domain-skipped'
  | 'host-override'
  | 'http-not-found'
  | 'http-server-error'
  | 'http-client-error'
  | 'soft-404'
  | 'timeout'
  | 'tls-error'
  | 'dns-failure'
  | 'connection-error'
  | 'unknown-error';

export interface LinkClassification {
  readonly isBroken: boolean;
  readonly kind: LinkErrorKind | 'ok';
  /** Error kind plus detail, e.g. "HTTP 404" or "SSL Error: certificate has expired". */
  readonly reason: string;
  readonly servedFromCache: boolean;
}

export interface BrokenLinkRecord {
  readonly postTitle: string;
  readonly postUrl: string;
  readonly brokenLink: string;
  readonly reason: string;
}

/** Result of a single HTTP attempt. Classification is a value, never a thrown error. */
export type ProbeOutcome =
  | { kind: 'ok' }
  | { kind: 'broken'; error: LinkErrorKind; reason: string; retryable: boolean };

export interface Probe {
  probeOnce(url: string): Promise<ProbeOutcome>;
}

export type DomainDecision = 'auto-broken' | 'skip' | 'none';

export interface DomainPolicySet {
  readonly skip: ReadonlySet<string>;
  readonly autoBroken: ReadonlySet<string>;
}

export interface RunStatistics {
  linksChecked: number;
  cacheHits: number;
  brokenLinks: number;
  retries: number;
  postsSkipped: number;
  linksSkipped: number;
  linksAutoBroken: number;
  postsChecked: number;
  /** Unexpected internal faults swallowed by the batch dispatcher. */
  linkFaults: number;
}

/** Title and candidate links extracted from one post. */
export interface PostLinks {
  title: string;
  links: string[];
}

/** On-disk shape of the checked-posts history file. */
export interface HistoryFile {
  lastUpdated: string;
  checkedPosts: Record<string, string>;
}
