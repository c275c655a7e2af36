/**
 * @textharvest/cli
 * Command-line driver for textharvest
 */

export { createCliLogger, createProgram, VERSION } from './cli/program';
export type { ProgramOptions } from './cli/program';
export { createConsolePresenter } from './cli/presenter';
export type { TextSink } from './cli/presenter';
export { reportFailure } from './cli/failure';
export {
  ExtractInputSchema,
  ExtensionsInputSchema,
  PRESET_NAMES,
  ReapplyInputSchema,
  parseInput,
} from './cli/schemas';
export type { ExtractInput, ExtensionsInput, ReapplyInput } from './cli/schemas';
export { run as runExtract } from './cli/commands/extract';
export { run as runReapply } from './cli/commands/reapply';
export { run as runExtensions } from './cli/commands/extensions';
export type { CommandContext, CommandFlags, CommandModule, Presenter } from './cli/types';
export { box, colors, formatTiming, keyValue, safeSymbols, TimingTracker } from './cli/utils';
