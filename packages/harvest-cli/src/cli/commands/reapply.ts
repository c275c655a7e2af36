/**
 * textharvest reapply command
 */

import path from 'node:path';
import {
  loadTranslationMemory,
  loadTranslationWorksheet,
  mergeTranslations,
  saveTranslationMemory,
} from '@textharvest/store';
import { reportFailure } from '../failure';
import { ReapplyInputSchema, parseInput } from '../schemas';
import type { CommandModule } from '../types';
import { box, colors, formatTiming, keyValue, safeSymbols, TimingTracker } from '../utils';

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const jsonMode = flags.json === true;
  const quiet = flags.quiet === true;
  const tracker = new TimingTracker();

  try {
    const input = parseInput(ReapplyInputSchema, { ...flags, worksheet: argv[0] });
    const worksheetPath = path.resolve(ctx.cwd, input.worksheet);

    const parsed = await loadTranslationWorksheet(worksheetPath, { strict: input.strict, logger: ctx.logger });

    let memory: { path: string; entries: number } | undefined;
    if (input.memory) {
      const memoryPath = path.resolve(ctx.cwd, input.memory);
      const merged = mergeTranslations(await loadTranslationMemory(memoryPath), parsed.translations);
      await saveTranslationMemory(memoryPath, merged);
      memory = { path: memoryPath, entries: merged.size };
    }

    if (jsonMode) {
      ctx.presenter.json({
        ok: true,
        worksheet: worksheetPath,
        records: parsed.recordCount,
        translations: Object.fromEntries(parsed.translations),
        rejected: parsed.rejected,
        memory,
        timing: tracker.getElapsed(),
      });
      return 0;
    }

    if (!quiet) {
      const lines = keyValue({
        'Records': parsed.recordCount,
        'Translations': parsed.translations.size,
        'Rejected': parsed.rejected.length,
      });
      if (memory) {
        lines.push(keyValue('Memory', `${memory.path} (${memory.entries} entries)`));
      }

      if (parsed.translations.size > 0) {
        lines.push('');
        for (const [original, translation] of parsed.translations) {
          lines.push(`${original} ${safeSymbols.arrow} ${translation}`);
        }
      }

      for (const record of parsed.rejected) {
        lines.push(colors.yellow(`${safeSymbols.warning} ${record.message}`));
      }

      lines.push(
        '',
        `${safeSymbols.check} ${colors.green('Worksheet parsed')} · ${colors.gray(formatTiming(tracker.getElapsed()))}`
      );
      ctx.presenter.write(box('Translation Worksheet', lines));
    }

    return 0;
  } catch (error) {
    return reportFailure(ctx, error, { jsonMode, quiet, timing: tracker.getElapsed() });
  }
};
