/**
 * @module @textharvest/engine/extraction/extraction-engine
 * Per-file, per-line application of the pattern rules
 */

import { open, type FileHandle } from 'node:fs/promises';
import {
  DEFAULT_MIN_TEXT_LENGTH,
  SilentLogger,
  getErrnoCode,
  type FileError,
  type Logger,
  type TextChunk,
} from '@textharvest/core';
import { cleanText } from '../cleaning/text-cleaner';
import type { PatternRegistry } from '../patterns/pattern-registry';

export interface ExtractionOptions {
  registry: PatternRegistry;
  minTextLength?: number;
  logger?: Logger;
}

export interface FileExtraction {
  filePath: string;
  chunks: TextChunk[];
  linesRead: number;
  /** Set when the file could not be read; `chunks` then holds what was read before the failure */
  error?: FileError;
}

/**
 * Chunks for one raw line. Every rule match whose cleaned capture is long
 * enough becomes a chunk, so one value can appear once per matching rule.
 */
export function extractFromLine(
  line: string,
  lineNumber: number,
  filePath: string,
  options: Pick<ExtractionOptions, 'registry' | 'minTextLength'>
): TextChunk[] {
  const minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
  const chunks: TextChunk[] = [];

  for (const match of options.registry.matchLine(line)) {
    const text = cleanText(match.capture);
    if (text.length < minTextLength) {
      continue;
    }

    chunks.push(Object.freeze({
      text,
      filePath,
      lineNumber,
      columnStart: match.captureStart,
      columnEnd: match.captureEnd,
      context: line,
      originalText: match.match,
      ruleId: match.ruleId,
    }));
  }

  return chunks;
}

/**
 * Read a file as UTF-8, line by line, and extract from every line.
 * A file that cannot be read is reported in the result, never thrown.
 */
export async function extractFromFile(filePath: string, options: ExtractionOptions): Promise<FileExtraction> {
  const logger = options.logger ?? new SilentLogger();
  const chunks: TextChunk[] = [];
  let lineNumber = 0;

  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (error) {
    return fileFailure(filePath, error, chunks, lineNumber, logger);
  }

  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      return fileFailure(filePath, new Error(`Not a regular file: ${filePath}`), chunks, lineNumber, logger);
    }

    for await (const line of handle.readLines({ encoding: 'utf8' })) {
      lineNumber++;
      for (const chunk of extractFromLine(line, lineNumber, filePath, options)) {
        chunks.push(chunk);
      }
    }
  } catch (error) {
    return fileFailure(filePath, error, chunks, lineNumber, logger);
  } finally {
    await handle.close();
  }

  logger.debug('Extracted file', { file: filePath, lines: lineNumber, chunks: chunks.length });

  return { filePath, chunks, linesRead: lineNumber };
}

function fileFailure(
  filePath: string,
  error: unknown,
  chunks: TextChunk[],
  linesRead: number,
  logger: Logger
): FileExtraction {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('Error reading file', {
    file: filePath,
    code: 'HARVEST_FILE_OPEN_ERROR',
    errno: getErrnoCode(error),
    error: message,
    linesRead,
  });

  return {
    filePath,
    chunks,
    linesRead,
    error: { file: filePath, code: 'HARVEST_FILE_OPEN_ERROR', message },
  };
}
