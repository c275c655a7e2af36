/**
 * @textharvest/store
 * Worksheet persistence, worksheet parsing and translation memory
 */

// Filesystem
export { ensureDir } from './fs/ensure';
export { writeFileAtomic } from './fs/atomic';
export { readJson, sortKeysRecursively, writeJson } from './fs/json';

// Worksheets
export {
  MASTER_HEADER,
  RECORD_DELIMITER,
  WORKSHEET_FIELDS,
  formatExtractedFile,
  formatMasterWorksheet,
  toTranslationRecords,
} from './worksheet/format';
export { claimOutputName, groupByFile, saveExtractedTexts } from './worksheet/persist';
export type { SaveOptions, SavedFile, SavedWorksheets } from './worksheet/persist';
export { loadTranslationWorksheet, parseTranslationWorksheet } from './worksheet/reapply';
export type { ParseWorksheetOptions, ParsedWorksheet, RejectedRecord } from './worksheet/reapply';

// Translation memory
export {
  TranslationMemorySchema,
  loadTranslationMemory,
  mergeTranslations,
  saveTranslationMemory,
} from './memory/translation-memory';
