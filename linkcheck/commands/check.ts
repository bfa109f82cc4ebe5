/**
 * Check Command Handler
 *
 * Verifies every link in a set of newsletter posts and writes a CSV report of
 * the broken ones.
 */

import type { CommandHandler, CommandResult } from '../lib/cli.ts';
import { createLogger, isCI } from '../lib/output.ts';
import { ConfigError, buildCheckConfig } from '../link-checker/config.ts';
import { runLinkCheck } from '../link-checker/run.ts';

async function runCheck(args: string[], options: Record<string, unknown>): Promise<CommandResult> {
  if (args.length > 0) {
    throw new ConfigError(`Unexpected argument: ${args[0]}`);
  }
  const log = createLogger({ verbose: options.verbose === true, ciMode: options.ci === true || isCI() });
  const config = buildCheckConfig(options, process.env, log);

  await runLinkCheck(config, { logger: log });
  return { output: '', exitCode: 0 };
}

export const commands: Record<string, CommandHandler> = {
  default: runCheck,
  check: runCheck,
};

export function getHelp(): string {
  return `
Check - Find broken links in newsletter posts

Usage:
  linkcheck check --base-url=<url> --year=<yyyy>   Check posts from the sitemap for a year
  linkcheck check --url-file=<file>                Check posts listed in a file

Input:
  --base-url=<url>             Newsletter home page, e.g. https://example.substack.com
  --year=<yyyy>                Year to check (uses <base-url>/sitemap.xml)
  --url-file=<file>            File with one post URL per line
  --limit=<n>                  Maximum number of posts to check

Checking:
  --concurrency=<n>            Links checked in parallel per post (default: 10)
  --timeout=<seconds>          Per-request timeout (default: 10)
  --max-retries=<n>            Retries for timeouts, 5xx and connection errors (default: 3)
  --retry-delay=<seconds>      Base backoff delay, doubled per retry (default: 1)
  --politeness-delay=<ms>      Pause after each link check (default: 100)
  --skip-domains <a> <b>       Domains assumed OK (default: wikipedia.org; "none" clears)
  --skip-domains-file=<file>   More skip domains, one per line
  --broken-domains <a> <b>     Domains reported broken without a request
  --broken-domains-file=<file> More broken domains, one per line
  --overrides-file=<file>      JSON object of "host": "reason" hard overrides
  --cookie=<value>             Session cookie for paywalled posts (or SUBSTACK_SID)

History:
  --history-file=<file>        Track checked posts across runs
  --only-new                   Skip posts already in the history file

Output:
  --output=<file>              CSV report (default: broken_links_report.csv)
  --verbose                    Per-link output
  --ci                         Plain output without colours

Examples:
  linkcheck check --base-url=https://example.substack.com --year=2024 --limit=5
  linkcheck check --url-file=posts.txt --history-file=checked_posts.json --only-new
`;
}
