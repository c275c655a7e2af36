/**
 * @module @textharvest/engine/pipeline/extract-texts
 * Scan → extract → (dedupe) → split, packaged as one ExtractionResult
 */

import {
  createHarvestError,
  resolveHarvestConfig,
  SilentLogger,
  type ExtractionResult,
  type FileError,
  type HarvestConfig,
  type Logger,
  type TextChunk,
} from '@textharvest/core';
import { dedupeChunks } from '../deduplication/chunk-deduplicator';
import { extractFromFile } from '../extraction/extraction-engine';
import { createPatternRegistry, type PatternRegistry } from '../patterns/pattern-registry';
import { scanDirectory } from '../scanning/file-scanner';
import { splitChunks } from '../splitting/chunk-splitter';

export interface ExtractTextsOptions {
  config?: HarvestConfig;
  registry?: PatternRegistry;
  logger?: Logger;
  /** Checked between files */
  signal?: AbortSignal;
  /** Called after every file */
  onProgress?: (progress: { current: number; total: number; file: string }) => void;
}

/**
 * Extract every chunk from the allowed files under `rootDir`.
 *
 * Files are processed in sorted order, so the chunk order is reproducible.
 * Unreadable files are counted in `totalFilesProcessed` and listed in
 * `errors`, contributing no chunks.
 */
export async function extractTexts(rootDir: string, options: ExtractTextsOptions = {}): Promise<ExtractionResult> {
  const startTime = performance.now();
  const config = options.config ?? resolveHarvestConfig();
  const registry = options.registry ?? createPatternRegistry();
  const logger = options.logger ?? new SilentLogger();

  const files = await scanDirectory(rootDir, { extensions: config.extensions, logger });
  logger.info('Extracting texts', { root: rootDir, files: files.length, extensions: config.extensions });

  const extracted: TextChunk[] = [];
  const errors: FileError[] = [];

  for (const [index, filePath] of files.entries()) {
    if (options.signal?.aborted) {
      throw createHarvestError('HARVEST_ABORTED', `Extraction aborted after ${index} of ${files.length} files`, {
        root: rootDir,
        filesProcessed: index,
      });
    }

    const result = await extractFromFile(filePath, {
      registry,
      minTextLength: config.minTextLength,
      logger,
    });
    for (const chunk of result.chunks) {
      extracted.push(chunk);
    }
    if (result.error) {
      errors.push(result.error);
    }

    options.onProgress?.({ current: index + 1, total: files.length, file: filePath });
  }

  const deduped = dedupeChunks(extracted, config.dedupe);
  const chunks = splitChunks(deduped, config.maxChunkSize);

  const processingTime = Math.round(performance.now() - startTime) / 1000;

  logger.info('Extraction complete', {
    filesProcessed: files.length,
    rawTexts: extracted.length,
    textsFound: chunks.length,
    failedFiles: errors.length,
    processingTime,
  });

  return {
    chunks,
    totalFilesProcessed: files.length,
    totalTextsFound: chunks.length,
    processingTime,
    errors,
  };
}
