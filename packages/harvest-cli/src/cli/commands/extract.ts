/**
 * textharvest extract command
 */

import { stat } from 'node:fs/promises';
import path from 'node:path';
import {
  createHarvestError,
  getExtensionPreset,
  loadHarvestConfig,
  parseExtensionList,
  resolveHarvestConfig,
  type HarvestConfig,
} from '@textharvest/core';
import { computeExtractionStats, extractTexts, formatExtractionStats } from '@textharvest/engine';
import { loadTranslationMemory, saveExtractedTexts } from '@textharvest/store';
import { reportFailure } from '../failure';
import { ExtractInputSchema, parseInput, type ExtractInput } from '../schemas';
import type { CommandModule } from '../types';
import { box, colors, formatTiming, keyValue, safeSymbols, TimingTracker } from '../utils';

const MAX_LISTED_FAILURES = 10;

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const jsonMode = flags.json === true;
  const quiet = flags.quiet === true;
  const tracker = new TimingTracker();

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const input = parseInput(ExtractInputSchema, { ...flags, dir: argv[0] });
    const rootDir = await resolveDirectory(ctx.cwd, input.dir);
    const config = await buildConfig(ctx.cwd, input);
    const outputDir = path.resolve(ctx.cwd, input.out);

    const result = await extractTexts(rootDir, {
      config,
      logger: ctx.logger,
      signal: controller.signal,
      onProgress: progress => ctx.logger.debug('Processed file', progress),
    });
    const saved = await saveExtractedTexts(result.chunks, outputDir, { logger: ctx.logger });
    if (controller.signal.aborted) {
      throw createHarvestError('HARVEST_ABORTED', 'Extraction aborted while writing output', { outputDir });
    }

    const translations = input.memory ? await loadTranslationMemory(path.resolve(ctx.cwd, input.memory)) : undefined;
    const stats = input.stats
      ? computeExtractionStats(result, {
          extensions: config.extensions,
          translations,
          maxChunkSize: config.maxChunkSize,
        })
      : undefined;

    if (jsonMode) {
      ctx.presenter.json({
        ok: true,
        root: rootDir,
        outputDir,
        masterPath: saved.masterPath,
        filesProcessed: result.totalFilesProcessed,
        textsFound: result.totalTextsFound,
        filesWritten: saved.files.length,
        processingTime: result.processingTime,
        errors: result.errors,
        stats,
        timing: tracker.getElapsed(),
      });
      return 0;
    }

    if (!quiet) {
      const lines = keyValue({
        'Files Processed': result.totalFilesProcessed,
        'Texts Found': result.totalTextsFound,
        'Files Written': saved.files.length,
        'Worksheet': saved.masterPath,
      });

      if (result.errors.length > 0) {
        lines.push('', colors.yellow(`${safeSymbols.warning} ${result.errors.length} file(s) could not be read`));
        for (const failure of result.errors.slice(0, MAX_LISTED_FAILURES)) {
          lines.push(colors.gray(`  ${safeSymbols.bullet} ${failure.file}: ${failure.message}`));
        }
        if (result.errors.length > MAX_LISTED_FAILURES) {
          lines.push(colors.gray(`  ... ${result.errors.length - MAX_LISTED_FAILURES} more`));
        }
      }

      lines.push(
        '',
        `${safeSymbols.check} ${colors.green('Extraction complete')} · ${colors.gray(formatTiming(tracker.getElapsed()))}`
      );
      ctx.presenter.write(box('Text Extraction', lines));
    }

    if (stats) {
      ctx.presenter.write(formatExtractionStats(stats));
    }

    return 0;
  } catch (error) {
    return reportFailure(ctx, error, { jsonMode, quiet, timing: tracker.getElapsed() });
  } finally {
    process.off('SIGINT', onSigint);
  }
};

/**
 * Absolute path of an existing directory
 *
 * @throws HarvestError HARVEST_INVALID_PATH
 */
async function resolveDirectory(cwd: string, dir: string): Promise<string> {
  const absolute = path.resolve(cwd, dir);
  const isDirectory = await stat(absolute).then(
    stats => stats.isDirectory(),
    () => false
  );
  if (!isDirectory) {
    throw createHarvestError('HARVEST_INVALID_PATH', `Directory not found: ${absolute}`, { path: absolute });
  }
  return absolute;
}

/**
 * Config file (or defaults) overridden by the command-line flags
 */
async function buildConfig(cwd: string, input: ExtractInput): Promise<HarvestConfig> {
  const base = input.config ? await loadHarvestConfig(path.resolve(cwd, input.config)) : resolveHarvestConfig();

  let extensions = [...base.extensions];
  if (input.ext !== undefined) {
    extensions = parseExtensionList(input.ext);
  } else if (input.preset) {
    extensions = getExtensionPreset(input.preset);
  }

  return resolveHarvestConfig({
    extensions,
    minTextLength: input.minLength ?? base.minTextLength,
    maxChunkSize: input.maxChunk ?? base.maxChunkSize,
    dedupe: input.dedupe ?? base.dedupe,
  });
}
