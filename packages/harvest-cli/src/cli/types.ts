/**
 * CLI command module type definition
 */

import type { Logger } from '@textharvest/core';

/**
 * Where command output goes: `write` and `json` to stdout, `error` to stderr
 */
export interface Presenter {
  write(text: string): void;
  error(text: string): void;
  json(data: unknown): void;
}

export interface CommandContext {
  cwd: string;
  presenter: Presenter;
  logger: Logger;
}

export type CommandFlags = Record<string, unknown>;

export type CommandModule = {
  run: (ctx: CommandContext, argv: string[], flags: CommandFlags) => Promise<number>;
};
