/**
 * Extraction records shared by the engine, the store and the CLI
 */

import type { ErrorCode } from '../error/harvest-error';

/**
 * Identifies a fragment produced by splitting an oversized chunk
 */
export interface FragmentInfo {
  /** Zero-based position of the fragment within its source chunk */
  readonly index: number;
  /** `filePath` of the chunk the fragment was cut from */
  readonly sourcePath: string;
}

/**
 * One extracted unit of text with file/line/column provenance.
 *
 * Columns are UTF-16 offsets of the captured value on the raw line, before
 * any unescaping. After splitting, `filePath` carries a `_chunk_<n>` suffix and
 * `fragment` tells the real path apart from the synthetic one.
 */
export interface TextChunk {
  readonly text: string;
  readonly filePath: string;
  readonly lineNumber: number;
  readonly columnStart: number;
  readonly columnEnd: number;
  readonly context: string;
  readonly originalText: string;
  readonly ruleId: string;
  readonly fragment?: FragmentInfo;
}

/**
 * A file that contributed nothing because it could not be read
 */
export interface FileError {
  readonly file: string;
  readonly code: ErrorCode;
  readonly message: string;
}

export interface ExtractionResult {
  readonly chunks: readonly TextChunk[];
  /** Files matched by the scan, counted before splitting */
  readonly totalFilesProcessed: number;
  /** Chunks after splitting */
  readonly totalTextsFound: number;
  /** Wall-clock seconds, millisecond resolution */
  readonly processingTime: number;
  readonly errors: readonly FileError[];
}

/**
 * One entry of the master worksheet
 */
export interface TranslationRecord {
  id: number;
  file: string;
  line: number;
  original: string;
  translation: string;
}
