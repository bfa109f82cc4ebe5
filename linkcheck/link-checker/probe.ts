/**
 * Transport probe — one HTTP attempt against a URL, classified.
 *
 * Every outcome, including network exceptions, comes back as a tagged
 * ProbeOutcome so the retry loop never has to catch anything. Rules, in order:
 * host override, 404, 5xx (retryable), other 4xx, soft-404 title check, OK.
 */

import * as cheerio from 'cheerio';
import { getHostname, matchesDomainList, normalizeDomain } from './domain-policy.ts';
import type { Probe, ProbeOutcome } from './types.ts';

// ── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  'DNT': '1',
  'Upgrade-Insecure-Requests': '1',
};

/** Lowercase phrases that mark a 200 page as "not found" when they appear in its title. */
export const SOFT_404_PATTERNS = [
  '404 error', 'page not found', 'not found', '404',
  "page doesn't exist", 'page does not exist',
  'no longer available', 'has been removed',
  "couldn't find", 'could not find',
];

export const SOFT_404_REASON = 'Soft 404 (page title indicates error)';

const DETAIL_MAX_CHARS = 80;

const TIMEOUT_NAMES = ['TimeoutError', 'AbortError'];
const TIMEOUT_CODES = ['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'];

/** Resolver messages and codes that mean the host does not exist. */
const DNS_FAILURE_MARKERS = [
  'ENOTFOUND',
  'Name or service not known',
  'nodename nor servname',
  'No address associated with hostname',
];

const CONNECTION_CODES = [
  'ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN',
  'EPIPE', 'ECONNABORTED', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED',
];

// ── Status Classification ────────────────────────────────────────────────────

/** Classify an HTTP status. Returns null for 1xx–3xx, which need the body check. */
export function classifyStatus(status: number): ProbeOutcome | null {
  if (status === 404) {
    return { kind: 'broken', error: 'http-not-found', reason: 'HTTP 404', retryable: false };
  }
  if (status >= 500) {
    return { kind: 'broken', error: 'http-server-error', reason: `HTTP ${status}`, retryable: true };
  }
  if (status >= 400) {
    return { kind: 'broken', error: 'http-client-error', reason: `HTTP ${status}`, retryable: false };
  }
  return null;
}

// ── Soft 404 ─────────────────────────────────────────────────────────────────

/** Text of the first <title> element, or null when the page has none. */
export function extractPageTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const title = $('title').first();
  return title.length > 0 ? title.text() : null;
}

export function isSoft404Title(title: string): boolean {
  const lower = title.toLowerCase();
  return SOFT_404_PATTERNS.some((phrase) => lower.includes(phrase));
}

// ── Exception Classification ─────────────────────────────────────────────────

interface ErrorFacts {
  names: string[];
  codes: string[];
  /** All messages and codes joined, for substring matching. */
  text: string;
  /** Most specific human-readable message (the innermost cause). */
  detail: string;
}

function errorChain(err: unknown): unknown[] {
  const chain: unknown[] = [];
  const queue: unknown[] = [err];
  while (queue.length > 0 && chain.length < 8) {
    const current = queue.shift();
    if (current === undefined || current === null) continue;
    chain.push(current);
    if (current instanceof AggregateError) queue.push(...current.errors);
    if (current instanceof Error) queue.push(current.cause);
  }
  return chain;
}

function collectErrorFacts(err: unknown): ErrorFacts {
  const names: string[] = [];
  const codes: string[] = [];
  const messages: string[] = [];

  for (const e of errorChain(err)) {
    if (e instanceof Error) {
      names.push(e.name);
      if (e.message) messages.push(e.message);
    } else {
      messages.push(String(e));
    }
    if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
      codes.push(e.code);
    }
  }

  // "fetch failed" says nothing; prefer the cause's message.
  const specific = messages.filter((m) => m !== 'fetch failed');
  const detail = specific[specific.length - 1] ?? messages[0] ?? 'unknown error';

  return { names, codes, text: [...messages, ...codes].join(' | '), detail };
}

function isTlsCode(code: string): boolean {
  return /^(CERT_|ERR_TLS_|ERR_SSL_|UNABLE_TO_)/.test(code)
    || code.includes('SELF_SIGNED')
    || code === 'EPROTO';
}

/**
 * Map a network exception to a broken outcome. Unrecognised faults are not
 * retryable so an unexpected error cannot loop.
 */
export function classifyTransportError(err: unknown): ProbeOutcome {
  const facts = collectErrorFacts(err);
  const detail = facts.detail.slice(0, DETAIL_MAX_CHARS);

  if (facts.names.some((n) => TIMEOUT_NAMES.includes(n)) || facts.codes.some((c) => TIMEOUT_CODES.includes(c))) {
    return { kind: 'broken', error: 'timeout', reason: 'Timeout', retryable: true };
  }
  if (DNS_FAILURE_MARKERS.some((marker) => facts.text.includes(marker))) {
    return { kind: 'broken', error: 'dns-failure', reason: 'DNS Failure', retryable: false };
  }
  if (facts.codes.some(isTlsCode) || /certificate|ssl routines|tlsv1 alert/i.test(facts.text)) {
    return { kind: 'broken', error: 'tls-error', reason: `SSL Error: ${detail}`, retryable: false };
  }
  if (facts.codes.some((c) => CONNECTION_CODES.includes(c))) {
    return { kind: 'broken', error: 'connection-error', reason: `Connection Error: ${detail}`, retryable: true };
  }
  return { kind: 'broken', error: 'unknown-error', reason: `Unknown Error: ${detail}`, retryable: false };
}

// ── HTTP Probe ───────────────────────────────────────────────────────────────

export interface HttpProbeOptions {
  timeoutMs: number;
  /** Host suffix → reason. Matching hosts are reported broken without a request. */
  hostOverrides?: Record<string, string>;
  headers?: Record<string, string>;
}

export class HttpProbe implements Probe {
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly overrides: Map<string, string>;

  constructor(options: HttpProbeOptions) {
    this.timeoutMs = options.timeoutMs;
    this.headers = { ...DEFAULT_HEADERS, ...(options.headers ?? {}) };
    this.overrides = new Map(
      Object.entries(options.hostOverrides ?? {}).map(([host, reason]): [string, string] => [normalizeDomain(host), reason]),
    );
  }

  async probeOnce(url: string): Promise<ProbeOutcome> {
    const override = this.findOverride(url);
    if (override !== undefined) {
      return { kind: 'broken', error: 'host-override', reason: override, retryable: false };
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: this.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      return classifyTransportError(err);
    }

    const byStatus = classifyStatus(response.status);
    if (byStatus) {
      await discardBody(response);
      return byStatus;
    }

    return this.checkTitle(response);
  }

  private findOverride(url: string): string | undefined {
    if (this.overrides.size === 0) return undefined;
    const hostname = getHostname(url);
    if (!hostname) return undefined;
    for (const [host, reason] of this.overrides) {
      if (matchesDomainList(hostname, [host])) return reason;
    }
    return undefined;
  }

  /** Soft-404 check on the page title. Unreadable or unparsable bodies count as OK. */
  private async checkTitle(response: Response): Promise<ProbeOutcome> {
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType && !/html|xml/i.test(contentType)) {
      await discardBody(response);
      return { kind: 'ok' };
    }

    try {
      const title = extractPageTitle(await response.text());
      if (title !== null && isSoft404Title(title)) {
        return { kind: 'broken', error: 'soft-404', reason: SOFT_404_REASON, retryable: false };
      }
    } catch {
      // Unreadable body: fail open.
    }
    return { kind: 'ok' };
  }
}

/** Release the connection for responses whose body we do not need. */
async function discardBody(response: Response): Promise<void> {
  if (!response.body) return;
  await response.body.cancel().catch(() => undefined);
}
