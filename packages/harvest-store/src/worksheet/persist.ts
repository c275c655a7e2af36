/**
 * @module @textharvest/store/worksheet/persist
 * Writes the per-file listings and the master worksheet of a run
 */

import path from 'node:path';
import {
  EXTRACTED_FILE_SUFFIX,
  MASTER_WORKSHEET_NAME,
  SilentLogger,
  type Logger,
  type TextChunk,
  type TranslationRecord,
} from '@textharvest/core';
import { writeFileAtomic } from '../fs/atomic';
import { ensureDir } from '../fs/ensure';
import { formatExtractedFile, formatMasterWorksheet, toTranslationRecords } from './format';

export interface SaveOptions {
  logger?: Logger;
}

export interface SavedFile {
  /** `filePath` shared by the chunks of the group */
  sourcePath: string;
  outputPath: string;
  chunkCount: number;
}

export interface SavedWorksheets {
  files: SavedFile[];
  masterPath: string;
  records: TranslationRecord[];
}

/**
 * Chunks grouped by exact `filePath`, groups in order of first appearance
 */
export function groupByFile(chunks: readonly TextChunk[]): Map<string, TextChunk[]> {
  const groups = new Map<string, TextChunk[]>();
  for (const chunk of chunks) {
    const group = groups.get(chunk.filePath);
    if (group) {
      group.push(chunk);
    } else {
      groups.set(chunk.filePath, [chunk]);
    }
  }
  return groups;
}

/**
 * `<basename>_extracted.txt`, or `<basename>_<n>_extracted.txt` once the plain name is taken
 */
export function claimOutputName(sourcePath: string, taken: Set<string>): string {
  const basename = path.basename(sourcePath);
  let name = `${basename}${EXTRACTED_FILE_SUFFIX}`;
  for (let n = 2; taken.has(name); n++) {
    name = `${basename}_${n}${EXTRACTED_FILE_SUFFIX}`;
  }
  taken.add(name);
  return name;
}

/**
 * Write one listing per source file and the master worksheet into `outputDir`.
 *
 * @throws HarvestError HARVEST_PERSIST_ERROR when the directory or a file cannot be written
 */
export async function saveExtractedTexts(
  chunks: readonly TextChunk[],
  outputDir: string,
  options: SaveOptions = {}
): Promise<SavedWorksheets> {
  const logger = options.logger ?? new SilentLogger();

  await ensureDir(outputDir);

  const files: SavedFile[] = [];
  const taken = new Set<string>();

  for (const [sourcePath, group] of groupByFile(chunks)) {
    const outputPath = path.join(outputDir, claimOutputName(sourcePath, taken));
    await writeFileAtomic(outputPath, formatExtractedFile(sourcePath, group));
    files.push({ sourcePath, outputPath, chunkCount: group.length });
    logger.debug('Wrote extracted texts', { source: sourcePath, output: outputPath, chunks: group.length });
  }

  const records = toTranslationRecords(chunks);
  const masterPath = path.join(outputDir, MASTER_WORKSHEET_NAME);
  await writeFileAtomic(masterPath, formatMasterWorksheet(records));

  logger.info('Saved extracted texts', { outputDir, files: files.length, records: records.length });

  return { files, masterPath, records };
}
