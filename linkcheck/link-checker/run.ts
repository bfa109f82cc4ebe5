/**
 * Link check run: posts in, broken-link report out.
 *
 * Collects post URLs, optionally drops posts the history already covers, then
 * processes posts one at a time: extract links, fan them out through the
 * batch checker, mark the post checked. History, summary and CSV report are
 * written at the end.
 */

import type { Sleeper } from '../lib/resilience.ts';
import { createLogger, formatCount } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import { formatDuration } from '../lib/cli.ts';
import type { CheckConfig, PostSource } from './config.ts';
import { createDomainPolicy, getHostname } from './domain-policy.ts';
import { HttpProbe } from './probe.ts';
import { LinkVerifier } from './verifier.ts';
import { checkBatch } from './batch.ts';
import { HistoryTracker } from './history.ts';
import { createRunState, snapshotStatistics } from './stats.ts';
import { fetchPost, getPostUrlsForYear, loadUrlsFromFile } from './collectors.ts';
import { printSummary, writeCsvReport } from './report.ts';
import type { BrokenLinkRecord, PostLinks, Probe, RunStatistics } from './types.ts';

// ── Types ────────────────────────────────────────────────────────────────────

/** Collaborators a run talks to. Defaults hit the network and filesystem. */
export interface RunDependencies {
  probe?: Probe;
  listPosts?: (source: PostSource, limit: number | undefined) => Promise<string[]>;
  fetchPost?: (postUrl: string) => Promise<PostLinks>;
  sleep?: Sleeper;
  logger?: Logger;
  now?: () => Date;
}

export interface RunResult {
  records: BrokenLinkRecord[];
  stats: Readonly<RunStatistics>;
  reportWritten: boolean;
}

// ── Run ──────────────────────────────────────────────────────────────────────

function describeSource(source: PostSource): string[] {
  return source.kind === 'file'
    ? ['Input: File', `URL file: ${source.path}`]
    : ['Input: Sitemap', `Base URL: ${source.baseUrl}`, `Year: ${source.year}`];
}

/** The newsletter's own host receives the session cookie when it runs on a custom domain. */
function cookieDomainsFor(source: PostSource): string[] {
  const hostname = source.kind === 'sitemap' ? getHostname(source.baseUrl) : null;
  return hostname ? [hostname] : [];
}

export async function runLinkCheck(config: CheckConfig, deps: RunDependencies = {}): Promise<RunResult> {
  const log = deps.logger ?? createLogger({ verbose: config.verbose });
  const timeoutMs = config.timeoutSeconds * 1000;
  const fetchOptions = {
    timeoutMs,
    cookie: config.cookie,
    cookieDomains: cookieDomainsFor(config.input),
    logger: log,
  };

  const listPosts = deps.listPosts ?? ((source: PostSource, limit: number | undefined) =>
    source.kind === 'file'
      ? Promise.resolve(loadUrlsFromFile(source.path, { limit, logger: log }))
      : getPostUrlsForYear(source.baseUrl, source.year, { ...fetchOptions, limit }));
  const loadPost = deps.fetchPost ?? ((postUrl: string) => fetchPost(postUrl, fetchOptions));

  const state = createRunState();
  const history = new HistoryTracker({ logger: log, now: deps.now });
  const verifier = new LinkVerifier({
    policy: createDomainPolicy(config.skipDomains, config.autoBrokenDomains),
    probe: deps.probe ?? new HttpProbe({ timeoutMs, hostOverrides: config.hostOverrides }),
    state,
    maxRetries: config.maxRetries,
    baseRetryDelayMs: config.baseRetryDelaySeconds * 1000,
    sleep: deps.sleep,
    logger: log,
  });

  log.heading('Newsletter Link Checker');
  log.log('='.repeat(50));
  log.log(`Concurrency: ${config.concurrency}`);
  log.log(`Max retries: ${config.maxRetries}`);

  if (config.historyFile) {
    history.load(config.historyFile);
    log.log(`History file: ${config.historyFile}`);
    if (config.onlyNew) log.log('Mode: Only new posts (skipping previously checked)');
  }

  for (const line of describeSource(config.input)) log.log(line);
  let postUrls = await listPosts(config.input, config.limit);
  if (config.limit) log.log(`Post limit: ${config.limit}`);

  if (config.onlyNew && config.historyFile) {
    const total = postUrls.length;
    postUrls = history.filterUnchecked(postUrls);
    state.stats.postsSkipped = total - postUrls.length;
    log.log(`Posts to check: ${postUrls.length} new (skipped ${state.stats.postsSkipped} already checked)`);
  }
  log.log(`${'='.repeat(50)}\n`);

  const records: BrokenLinkRecord[] = [];

  if (postUrls.length === 0) {
    log.warn('No posts to check!');
    if (config.historyFile) history.save();
    return { records, stats: snapshotStatistics(state.stats), reportWritten: false };
  }

  const startTime = Date.now();

  for (const [i, postUrl] of postUrls.entries()) {
    log.log(`[${i + 1}/${postUrls.length}] Processing: ${postUrl}`);
    const post = await loadPost(postUrl);

    if (post.links.length === 0) {
      log.debug('  No links found in this post\n');
    } else {
      const cached = post.links.filter((link) => state.cache.has(link)).length;
      log.debug(`  Checking ${post.links.length} links (${post.links.length - cached} new, ${cached} cached)...`);

      const broken = await checkBatch(verifier, post.links, post.title, postUrl, {
        concurrency: config.concurrency,
        politenessDelayMs: config.politenessDelayMs,
        sleep: deps.sleep,
        logger: log,
        stats: state.stats,
      });
      records.push(...broken);
      log.debug(`  Found ${formatCount(broken.length, 'broken link')} in this post\n`);
    }

    state.stats.postsChecked++;
    if (config.historyFile) history.markChecked(postUrl);
  }

  log.log(`\nCompleted in ${formatDuration(Date.now() - startTime)}`);

  if (config.historyFile) history.save();

  const stats = snapshotStatistics(state.stats);
  printSummary(stats, records.length, log);
  const reportWritten = writeCsvReport(records, config.output, log);

  return { records, stats, reportWritten };
}
