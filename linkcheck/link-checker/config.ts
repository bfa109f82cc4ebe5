/**
 * Check configuration: CLI options and environment to a validated CheckConfig.
 *
 * Raw options come from parseCliArgs; values are coerced here and validated
 * with zod. Anything invalid raises ConfigError, which the entry point turns
 * into exit code 1.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { parseListOpt, stringOpt } from '../lib/cli.ts';
import { getEnvValue } from '../lib/env.ts';
import { silentLogger } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';

// ── Errors ───────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Schema ───────────────────────────────────────────────────────────────────

export const DEFAULT_SKIP_DOMAINS = ['wikipedia.org'];
/** Options that take several space-separated values on the command line. */
export const MULTI_VALUE_OPTIONS = ['skip-domains', 'broken-domains'] as const;

export const DEFAULT_REPORT_FILE = 'broken_links_report.csv';
export const SESSION_COOKIE_ENV = 'SUBSTACK_SID';

const inputSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('sitemap'),
    baseUrl: z.string().url(),
    year: z.number().int().min(1990).max(9999),
  }),
  z.object({
    kind: z.literal('file'),
    path: z.string().min(1),
  }),
]);

export const hostOverridesSchema = z.record(z.string().min(1), z.string().min(1));

export const checkConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).default(10),
    timeoutSeconds: z.number().positive().default(10),
    maxRetries: z.number().int().min(0).default(3),
    baseRetryDelaySeconds: z.number().min(0).default(1),
    politenessDelayMs: z.number().min(0).default(100),
    skipDomains: z.array(z.string()).default(() => [...DEFAULT_SKIP_DOMAINS]),
    autoBrokenDomains: z.array(z.string()).default([]),
    verbose: z.boolean().default(false),
    historyFile: z.string().min(1).optional(),
    onlyNew: z.boolean().default(false),
    output: z.string().min(1).default(DEFAULT_REPORT_FILE),
    limit: z.number().int().positive().optional(),
    input: inputSchema,
    cookie: z.string().min(1).optional(),
    hostOverrides: hostOverridesSchema.default({}),
  })
  .refine((config) => !config.onlyNew || config.historyFile !== undefined, {
    message: '--only-new requires --history-file',
    path: ['onlyNew'],
  });

export type CheckConfig = z.infer<typeof checkConfigSchema>;
export type CheckConfigInput = z.input<typeof checkConfigSchema>;
export type PostSource = CheckConfig['input'];

/** Validate a config object, raising ConfigError with every problem listed. */
export function parseCheckConfig(input: CheckConfigInput): CheckConfig {
  const result = checkConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${where}${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}

// ── File Loaders ─────────────────────────────────────────────────────────────

/**
 * Read a domain list: one per line, blank lines and `#` comments ignored.
 * A missing or unreadable file gives an empty list and a warning.
 */
export function loadDomainsFromFile(path: string, logger: Logger = silentLogger): string[] {
  if (!existsSync(path)) {
    logger.warn(`Domain file not found: ${path}`);
    return [];
  }
  try {
    return readFileSync(path, 'utf-8')
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Could not read domain file ${path}: ${message}`);
    return [];
  }
}

/** Read a JSON object of host → reason. Unlike domain lists, a bad file is a ConfigError. */
export function loadHostOverrides(path: string): Record<string, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not read overrides file ${path}: ${message}`);
  }
  const result = hostOverridesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Overrides file ${path} must be a JSON object of "host": "reason" pairs`);
  }
  return result.data;
}

// ── CLI → Config ─────────────────────────────────────────────────────────────

function numberOption(opts: Record<string, unknown>, key: string, integer: boolean): number | undefined {
  const raw = opts[key];
  if (raw === undefined) return undefined;
  if (typeof raw !== 'string' || raw.trim() === '') {
    throw new ConfigError(`--${key} needs a numeric value`);
  }
  const n = Number(raw);
  if (!Number.isFinite(n) || (integer && !Number.isInteger(n))) {
    throw new ConfigError(`Invalid --${key}: ${raw}`);
  }
  return n;
}

function resolvePostSource(opts: Record<string, unknown>): CheckConfigInput['input'] {
  const urlFile = stringOpt(opts['url-file']);
  const year = numberOption(opts, 'year', true);

  if (urlFile && year !== undefined) {
    throw new ConfigError('Use either --year or --url-file, not both');
  }
  if (urlFile) return { kind: 'file', path: urlFile };
  if (year === undefined) {
    throw new ConfigError('No posts to check: pass --year (with --base-url) or --url-file');
  }

  const baseUrl = stringOpt(opts['base-url']);
  if (!baseUrl) throw new ConfigError('--year needs --base-url to locate the sitemap');
  return { kind: 'sitemap', baseUrl: baseUrl.replace(/\/+$/, ''), year };
}

/**
 * `--skip-domains none` clears the default list; otherwise the CLI list
 * replaces the default. File entries are appended either way.
 */
function resolveSkipDomains(opts: Record<string, unknown>, logger: Logger): string[] {
  const cli = parseListOpt(opts['skip-domains']);
  let domains = cli ?? [...DEFAULT_SKIP_DOMAINS];
  if (cli && cli.length === 1 && cli[0].toLowerCase() === 'none') domains = [];

  const file = stringOpt(opts['skip-domains-file']);
  if (file) domains = [...domains, ...loadDomainsFromFile(file, logger)];
  return domains;
}

function resolveBrokenDomains(opts: Record<string, unknown>, logger: Logger): string[] {
  let domains = parseListOpt(opts['broken-domains']) ?? [];
  const file = stringOpt(opts['broken-domains-file']);
  if (file) domains = [...domains, ...loadDomainsFromFile(file, logger)];
  return domains;
}

/** Build and validate the config for a `check` run from parsed CLI options. */
export function buildCheckConfig(
  opts: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = silentLogger,
): CheckConfig {
  const overridesFile = stringOpt(opts['overrides-file']);

  return parseCheckConfig({
    concurrency: numberOption(opts, 'concurrency', true),
    timeoutSeconds: numberOption(opts, 'timeout', false),
    maxRetries: numberOption(opts, 'max-retries', true),
    baseRetryDelaySeconds: numberOption(opts, 'retry-delay', false),
    politenessDelayMs: numberOption(opts, 'politeness-delay', false),
    skipDomains: resolveSkipDomains(opts, logger),
    autoBrokenDomains: resolveBrokenDomains(opts, logger),
    verbose: opts.verbose === true,
    historyFile: stringOpt(opts['history-file']),
    onlyNew: opts['only-new'] === true,
    output: stringOpt(opts.output),
    limit: numberOption(opts, 'limit', true),
    input: resolvePostSource(opts),
    cookie: stringOpt(opts.cookie) ?? getEnvValue(SESSION_COOKIE_ENV, env),
    hostOverrides: overridesFile ? loadHostOverrides(overridesFile) : undefined,
  });
}
