/**
 * @module @textharvest/store/worksheet/reapply
 * Reads a filled-in master worksheet back into an original → translation map
 */

import { promises as fsp } from 'node:fs';
import { createHarvestError, getErrnoCode, SilentLogger, type Logger } from '@textharvest/core';
import { RECORD_DELIMITER, WORKSHEET_FIELDS } from './format';

export interface ParseWorksheetOptions {
  /** Throw on the first rejected record instead of skipping it */
  strict?: boolean;
  logger?: Logger;
}

export interface RejectedRecord {
  /** 1-based line of the offending `Translation:` */
  line: number;
  translation: string;
  message: string;
}

export interface ParsedWorksheet {
  translations: Map<string, string>;
  rejected: RejectedRecord[];
  /** `ID:` lines seen */
  recordCount: number;
}

/**
 * Placeholder values a translator has not filled in
 */
function isPlaceholder(value: string): boolean {
  return value === '' || value === ' ';
}

/**
 * Parse worksheet text. A `Translation:` is paired with the last `Original:`
 * of its own record; records end at `---` or at the next `ID:`. Only the
 * first line of a multi-line original is kept.
 *
 * @throws HarvestError HARVEST_WORKSHEET_PARSE_ERROR in strict mode
 */
export function parseTranslationWorksheet(content: string, options: ParseWorksheetOptions = {}): ParsedWorksheet {
  const logger = options.logger ?? new SilentLogger();
  const translations = new Map<string, string>();
  const rejected: RejectedRecord[] = [];
  let recordCount = 0;
  let original: string | undefined;

  for (const [index, line] of content.split(/\r?\n/).entries()) {
    if (line.startsWith(WORKSHEET_FIELDS.id)) {
      recordCount++;
      original = undefined;
    } else if (line === RECORD_DELIMITER) {
      original = undefined;
    } else if (line.startsWith(WORKSHEET_FIELDS.original)) {
      original = line.slice(WORKSHEET_FIELDS.original.length);
    } else if (line.startsWith(WORKSHEET_FIELDS.translation)) {
      const translation = line.slice(WORKSHEET_FIELDS.translation.length);
      if (isPlaceholder(translation)) {
        continue;
      }

      if (original === undefined) {
        const record = {
          line: index + 1,
          translation,
          message: `Translation on line ${index + 1} has no Original in its record`,
        };
        if (options.strict) {
          throw createHarvestError('HARVEST_WORKSHEET_PARSE_ERROR', record.message, { line: record.line });
        }
        logger.warn('Rejected worksheet record', { line: record.line, code: 'HARVEST_WORKSHEET_PARSE_ERROR' });
        rejected.push(record);
        continue;
      }

      translations.set(original, translation);
    }
  }

  return { translations, rejected, recordCount };
}

/**
 * @throws HarvestError HARVEST_FILE_OPEN_ERROR when the worksheet cannot be read
 */
export async function loadTranslationWorksheet(
  filePath: string,
  options: ParseWorksheetOptions = {}
): Promise<ParsedWorksheet> {
  let content: string;
  try {
    content = await fsp.readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createHarvestError('HARVEST_FILE_OPEN_ERROR', `Could not open translation file ${filePath}: ${message}`, {
      path: filePath,
      errno: getErrnoCode(error),
    });
  }

  const parsed = parseTranslationWorksheet(content, options);
  options.logger?.info('Parsed translation worksheet', {
    file: filePath,
    records: parsed.recordCount,
    translations: parsed.translations.size,
    rejected: parsed.rejected.length,
  });
  return parsed;
}
