/**
 * Shared CLI Utilities
 *
 * Argument parsing and option coercion used by every command.
 */

/** Result of running one command. */
export interface CommandResult {
  output: string;
  exitCode: number;
}

export type CommandHandler = (args: string[], options: Record<string, unknown>) => Promise<CommandResult>;

/**
 * Parsed CLI arguments.
 * Named options are stored as key-value pairs.
 * Positional arguments are stored in _positional.
 */
export interface ParsedCliArgs {
  _positional: string[];
  [key: string]: string | boolean | string[];
}

/**
 * Parse CLI arguments, handling both --key=value and --key value formats.
 * Bare '--' separators are skipped. Boolean flags (no value) are set to true.
 * Keys in `multiValue` take every following token up to the next option
 * (`--skip-domains a.com b.org`) and are stored as arrays.
 */
export function parseCliArgs(argv: string[], multiValue: readonly string[] = []): ParsedCliArgs {
  const opts: ParsedCliArgs = { _positional: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') continue;
    if (arg.startsWith('--')) {
      const raw = arg.slice(2);
      const eqIdx = raw.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value format
        opts[raw.slice(0, eqIdx)] = raw.slice(eqIdx + 1);
      } else {
        // --key value or --flag format
        const next = argv[i + 1];
        if (multiValue.includes(raw) && next !== undefined && !next.startsWith('--')) {
          const values: string[] = [];
          while (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
            values.push(argv[++i]);
          }
          opts[raw] = values;
        } else if (next !== undefined && !next.startsWith('--')) {
          opts[raw] = next;
          i++;
        } else {
          opts[raw] = true;
        }
      }
    } else {
      opts._positional.push(arg);
    }
  }
  return opts;
}

/** Read a string option, ignoring boolean flags. */
export function stringOpt(val: unknown): string | undefined {
  return typeof val === 'string' && val.length > 0 ? val : undefined;
}

/**
 * Parse a numeric CLI option with a fallback, accepting fractions such as
 * delays in seconds. Returns fallback on undefined, boolean flags, or NaN.
 */
export function parseFloatOpt(val: unknown, fallback: number): number {
  if (typeof val !== 'string') return fallback;
  const n = parseFloat(val);
  return Number.isNaN(n) ? fallback : n;
}

/**
 * Parse a comma- or whitespace-separated list option (`--skip-domains=a.com,b.org`),
 * or the array a multi-value option collected.
 * Returns undefined when the option was not given, so callers can apply defaults.
 */
export function parseListOpt(val: unknown): string[] | undefined {
  let raw: string;
  if (typeof val === 'string') {
    raw = val;
  } else if (Array.isArray(val) && val.every((item): item is string => typeof item === 'string')) {
    raw = val.join(' ');
  } else {
    return undefined;
  }
  return raw
    .split(/[,\s]+/)
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}
