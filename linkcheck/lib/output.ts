/**
 * Output Utilities
 *
 * Terminal colors and the console logger shared by every command.
 * Supports CI mode (no colors) via --ci flag or CI=true environment variable,
 * and a verbose mode that enables per-link debug output.
 */

export interface Colors {
  red: string;
  green: string;
  yellow: string;
  blue: string;
  dim: string;
  bold: string;
  reset: string;
}

export interface Logger {
  colors: Colors;
  ciMode: boolean;
  verbose: boolean;
  log: (...args: unknown[]) => void;
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  success: (msg: string) => void;
  dim: (msg: string) => void;
  /** Printed only in verbose mode. */
  debug: (msg: string) => void;
  heading: (msg: string) => void;
}

export interface LoggerOptions {
  verbose?: boolean;
  ciMode?: boolean;
  /** Line sink; defaults to console.log. Tests pass a collector. */
  write?: (line: string) => void;
}

/**
 * Detect if running in CI mode
 */
export function isCI(): boolean {
  return process.argv.includes('--ci') || process.env.CI === 'true';
}

/**
 * Get color codes (empty strings in CI mode)
 */
export function getColors(ciMode: boolean = isCI()): Colors {
  if (ciMode) {
    return { red: '', green: '', yellow: '', blue: '', dim: '', bold: '', reset: '' };
  }

  return {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    dim: '\x1b[2m',
    bold: '\x1b[1m',
    reset: '\x1b[0m',
  };
}

/**
 * Create a logger with color support
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const ciMode = options.ciMode ?? isCI();
  const verbose = options.verbose ?? false;
  const write = options.write ?? ((line: string) => console.log(line));
  const c = getColors(ciMode);

  return {
    colors: c,
    ciMode,
    verbose,

    log: (...args: unknown[]) => write(args.map(String).join(' ')),
    error: (msg: string) => write(`${c.red}${msg}${c.reset}`),
    warn: (msg: string) => write(`${c.yellow}${msg}${c.reset}`),
    info: (msg: string) => write(`${c.blue}${msg}${c.reset}`),
    success: (msg: string) => write(`${c.green}${msg}${c.reset}`),
    dim: (msg: string) => write(`${c.dim}${msg}${c.reset}`),
    debug: (msg: string) => {
      if (verbose) write(msg);
    },
    heading: (msg: string) => write(`${c.bold}${c.blue}${msg}${c.reset}`),
  };
}

/** A logger that drops everything (library callers that want silence). */
export const silentLogger: Logger = createLogger({ ciMode: true, write: () => {} });

/**
 * Format a count with proper pluralization
 */
export function formatCount(count: number, singular: string, plural: string | null = null): string {
  const form = count === 1 ? singular : (plural || singular + 's');
  return `${count} ${form}`;
}

/** Truncate long URLs for one-line log output. */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
