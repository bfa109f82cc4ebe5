#!/usr/bin/env -S node --import tsx

/**
 * linkcheck: broken-link checker for newsletter posts.
 *
 * Usage:
 *   linkcheck [check] --base-url=<url> --year=<yyyy> [options]
 *   linkcheck [check] --url-file=<file> [options]
 *   linkcheck import-history <file.csv> [--history-file=<file>]
 *   linkcheck compare --base-url=<url> [--history-file=<file>]
 *   linkcheck <command> --help
 */

import 'dotenv/config';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseCliArgs } from './lib/cli.ts';
import type { CommandHandler } from './lib/cli.ts';
import { getColors } from './lib/output.ts';
import { MULTI_VALUE_OPTIONS } from './link-checker/config.ts';
import * as checkCommand from './commands/check.ts';
import * as importHistoryCommand from './commands/import-history.ts';
import * as compareCommand from './commands/compare.ts';

interface CommandModule {
  commands: Record<string, CommandHandler>;
  getHelp: () => string;
}

const COMMANDS: Record<string, CommandModule> = {
  'check': checkCommand,
  'import-history': importHistoryCommand,
  'compare': compareCommand,
};

const DEFAULT_COMMAND = 'check';

function generalHelp(): string {
  return `
linkcheck - Find broken links in newsletter posts

Commands:
  check            Check post links and write a CSV report (default)
  import-history   Mark posts from an earlier report as checked
  compare          List sitemap posts not yet checked

Run "linkcheck <command> --help" for options.
`;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const opts = parseCliArgs(argv, MULTI_VALUE_OPTIONS);
  const [first, ...rest] = opts._positional;

  const named = first !== undefined && first in COMMANDS;
  const name = named ? first : DEFAULT_COMMAND;
  const args = named ? rest : opts._positional;
  const command = COMMANDS[name];

  if (opts.help === true) {
    console.log(named ? command.getHelp() : generalHelp());
    return 0;
  }

  const handler = command.commands.default;
  const result = await handler(args, opts);
  if (result.output) console.log(result.output);
  return result.exitCode;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      const c = getColors();
      const message = err instanceof Error ? err.message : String(err);
      console.error(`${c.red}Error: ${message}${c.reset}`);
      process.exit(1);
    });
}
