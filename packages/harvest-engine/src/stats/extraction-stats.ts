/**
 * Run summary shown after an extraction
 */

import {
  DEFAULT_MAX_CHUNK_SIZE,
  LARGE_TEXT_THRESHOLD,
  VERY_LARGE_TEXT_THRESHOLD,
  type ExtractionResult,
} from '@textharvest/core';

export interface ExtractionStats {
  filesProcessed: number;
  textsFound: number;
  processingTime: number;
  averageTextsPerFile: number;
  extensions: string[];
  largeTexts: number;
  veryLargeTexts: number;
  maxTextLength: number;
  averageTextLength: number;
  translationsCompleted: number;
  /** Percentage of found texts that have a translation */
  translationProgress: number;
  maxChunkSize: number;
}

export interface StatsOptions {
  extensions?: readonly string[];
  /** Translations collected so far, keyed by original text */
  translations?: ReadonlyMap<string, string>;
  maxChunkSize?: number;
}

export function computeExtractionStats(result: ExtractionResult, options: StatsOptions = {}): ExtractionStats {
  const lengths = result.chunks.map(chunk => chunk.text.length);
  const totalLength = lengths.reduce((sum, length) => sum + length, 0);
  const translationsCompleted = options.translations?.size ?? 0;

  return {
    filesProcessed: result.totalFilesProcessed,
    textsFound: result.totalTextsFound,
    processingTime: result.processingTime,
    averageTextsPerFile: result.totalFilesProcessed > 0 ? result.totalTextsFound / result.totalFilesProcessed : 0,
    extensions: [...(options.extensions ?? [])],
    largeTexts: lengths.filter(length => length > LARGE_TEXT_THRESHOLD).length,
    veryLargeTexts: lengths.filter(length => length > VERY_LARGE_TEXT_THRESHOLD).length,
    maxTextLength: lengths.reduce((max, length) => Math.max(max, length), 0),
    averageTextLength: lengths.length > 0 ? totalLength / lengths.length : 0,
    translationsCompleted,
    translationProgress: result.totalTextsFound > 0 ? (translationsCompleted / result.totalTextsFound) * 100 : 0,
    maxChunkSize: options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE,
  };
}

export function formatExtractionStats(stats: ExtractionStats): string {
  return [
    'EXTRACTION STATISTICS',
    '====================',
    `Files Processed: ${stats.filesProcessed}`,
    `Texts Found: ${stats.textsFound}`,
    `Processing Time: ${stats.processingTime.toFixed(2)} seconds`,
    `Average Texts per File: ${stats.averageTextsPerFile.toFixed(2)}`,
    `File Extensions Processed: ${stats.extensions.join(', ')}`,
    '',
    'TEXT SIZE STATISTICS',
    '===================',
    `Large Texts (>${LARGE_TEXT_THRESHOLD} chars): ${stats.largeTexts}`,
    `Very Large Texts (>${VERY_LARGE_TEXT_THRESHOLD} chars): ${stats.veryLargeTexts}`,
    `Maximum Text Length: ${stats.maxTextLength} chars`,
    `Average Text Length: ${stats.averageTextLength.toFixed(1)} chars`,
    '',
    'TRANSLATION STATISTICS',
    '=====================',
    `Translations Completed: ${stats.translationsCompleted}`,
    `Translation Progress: ${stats.translationProgress.toFixed(1)}%`,
    `Max Chunk Size: ${stats.maxChunkSize.toLocaleString('en-US')} characters`,
  ].join('\n');
}
