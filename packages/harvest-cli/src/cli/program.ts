/**
 * @module @textharvest/cli/cli/program
 * Command-line entry: wires the command modules to commander
 */

import { Command } from 'commander';
import { createLogger, LogLevel, parseLogLevel, type Logger } from '@textharvest/core';
import { run as runExtensions } from './commands/extensions';
import { run as runExtract } from './commands/extract';
import { run as runReapply } from './commands/reapply';
import { createConsolePresenter } from './presenter';
import type { CommandContext, CommandFlags, CommandModule, Presenter } from './types';

export const VERSION = '0.1.0';

export interface ProgramOptions {
  cwd?: string;
  presenter?: Presenter;
  /** Replaces the logger built from --verbose / --quiet */
  logger?: Logger;
  /** Receives the exit code of every command; sets `process.exitCode` by default */
  onExit?: (code: number) => void;
}

/**
 * Logger on stderr: debug with --verbose, errors only with --quiet,
 * TEXTHARVEST_LOG_LEVEL or warnings otherwise
 */
export function createCliLogger(flags: CommandFlags): Logger {
  let level: LogLevel;
  if (flags.verbose === true) {
    level = LogLevel.DEBUG;
  } else if (flags.quiet === true) {
    level = LogLevel.ERROR;
  } else {
    level = parseLogLevel(process.env.TEXTHARVEST_LOG_LEVEL, LogLevel.WARN);
  }
  return createLogger({ level, prefix: 'textharvest', stream: 'stderr' });
}

export function createProgram(options: ProgramOptions = {}): Command {
  const onExit = options.onExit ?? ((code: number) => {
    process.exitCode = code;
  });

  const contextFor = (flags: CommandFlags): CommandContext => ({
    cwd: options.cwd ?? process.cwd(),
    presenter: options.presenter ?? createConsolePresenter(),
    logger: options.logger ?? createCliLogger(flags),
  });

  const runCommand = async (command: CommandModule['run'], argv: string[], flags: CommandFlags) => {
    onExit(await command(contextFor(flags), argv, flags));
  };

  const program = new Command();
  program
    .name('textharvest')
    .description('Extract translatable text from source and asset trees')
    .version(VERSION);

  program
    .command('extract')
    .description('Scan a directory and write extraction listings plus a master worksheet')
    .argument('<dir>', 'directory to scan')
    .requiredOption('-o, --out <dir>', 'output directory')
    .option('-e, --ext <list>', 'comma-separated extensions, e.g. "py,.lua,txt"')
    .option('-p, --preset <name>', 'extension preset: code, web or all')
    .option('--min-length <n>', 'shortest text kept after cleaning')
    .option('--max-chunk <n>', 'longest chunk before splitting')
    .option('--dedupe <mode>', 'none, location or text')
    .option('-c, --config <file>', 'JSON configuration file')
    .option('--memory <file>', 'translation memory used for the statistics')
    .option('--stats', 'print extraction statistics')
    .option('--json', 'print JSON output')
    .option('-v, --verbose', 'debug logging')
    .option('-q, --quiet', 'errors only')
    .action(async (dir: string, flags: CommandFlags) => runCommand(runExtract, [dir], flags));

  program
    .command('reapply')
    .description('Read a filled-in master worksheet back into a translation map')
    .argument('<worksheet>', 'master_translation.txt to read')
    .option('-m, --memory <file>', 'merge the translations into this JSON translation memory')
    .option('--strict', 'fail on the first malformed record')
    .option('--json', 'print JSON output')
    .option('-v, --verbose', 'debug logging')
    .option('-q, --quiet', 'errors only')
    .action(async (worksheet: string, flags: CommandFlags) => runCommand(runReapply, [worksheet], flags));

  program
    .command('extensions')
    .description('List the default extensions or those of a preset')
    .option('-p, --preset <name>', 'code, web or all')
    .option('--json', 'print JSON output')
    .action(async (flags: CommandFlags) => runCommand(runExtensions, [], flags));

  return program;
}
