import { getExitCode, isHarvestError } from '@textharvest/core';
import { colors } from './utils';
import type { CommandContext } from './types';

export interface FailureOptions {
  jsonMode: boolean;
  quiet: boolean;
  timing: number;
}

/**
 * Print a command failure and return its exit code
 */
export function reportFailure(ctx: CommandContext, error: unknown, options: FailureOptions): number {
  const message = error instanceof Error ? error.message : String(error);
  const code = isHarvestError(error) ? error.code : 'HARVEST_UNEXPECTED_ERROR';
  const hint = isHarvestError(error) ? error.hint : undefined;
  const exitCode = isHarvestError(error) ? getExitCode(error) : 1;

  ctx.logger.debug('Command failed', { code, error: message });

  if (options.jsonMode) {
    ctx.presenter.json({ ok: false, code, message, hint, timing: options.timing });
    return exitCode;
  }

  ctx.presenter.error(colors.red(message));
  if (!options.quiet) {
    ctx.presenter.error(`Code: ${code}`);
    if (hint) {
      ctx.presenter.error(`Hint: ${hint}`);
    }
  }
  return exitCode;
}
