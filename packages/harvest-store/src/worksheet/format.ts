/**
 * Line-record formats of the extraction output.
 *
 * The master worksheet is read back by `parseTranslationWorksheet`: its
 * field labels and their order must not change.
 */

import type { TextChunk, TranslationRecord } from '@textharvest/core';

export const WORKSHEET_FIELDS = {
  id: 'ID: ',
  file: 'File: ',
  line: 'Line: ',
  original: 'Original: ',
  translation: 'Translation: ',
} as const;

export const RECORD_DELIMITER = '---';

export const MASTER_HEADER = '=== MASTER TRANSLATION FILE ===';

/**
 * Per-source file listing: line, raw context, cleaned text and raw match of every chunk
 */
export function formatExtractedFile(sourcePath: string, chunks: readonly TextChunk[]): string {
  const parts = [`=== EXTRACTED TEXTS FROM: ${sourcePath} ===\n\n`];

  for (const chunk of chunks) {
    parts.push(
      `Line ${chunk.lineNumber}:\n` +
        `Context: ${chunk.context}\n` +
        `Text: ${chunk.text}\n` +
        `Original: ${chunk.originalText}\n` +
        `${RECORD_DELIMITER}\n\n`
    );
  }

  return parts.join('');
}

/**
 * One record per chunk, in order, with ids from 1 and empty translations
 */
export function toTranslationRecords(chunks: readonly TextChunk[]): TranslationRecord[] {
  return chunks.map((chunk, index) => ({
    id: index + 1,
    file: chunk.filePath,
    line: chunk.lineNumber,
    original: chunk.text,
    translation: '',
  }));
}

export function formatMasterWorksheet(records: readonly TranslationRecord[]): string {
  const parts = [`${MASTER_HEADER}\n\n`];

  for (const record of records) {
    parts.push(
      `${WORKSHEET_FIELDS.id}${record.id}\n` +
        `${WORKSHEET_FIELDS.file}${record.file}\n` +
        `${WORKSHEET_FIELDS.line}${record.line}\n` +
        `${WORKSHEET_FIELDS.original}${record.original}\n` +
        `${WORKSHEET_FIELDS.translation}${record.translation}\n` +
        `${RECORD_DELIMITER}\n\n`
    );
  }

  return parts.join('');
}
