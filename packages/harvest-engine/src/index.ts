/**
 * @textharvest/engine
 * Pattern-based text extraction for localization
 */

// Patterns
export {
  ASSIGNMENT_KEYS,
  TAG_KEYS,
  PatternRegistry,
  countCaptureGroups,
  createDefaultRules,
  createPatternRegistry,
} from './patterns/pattern-registry';
export type { LineMatch, PatternRule } from './patterns/pattern-registry';

// Cleaning
export { cleanText } from './cleaning/text-cleaner';

// Scanning
export { scanDirectory } from './scanning/file-scanner';
export type { ScanOptions } from './scanning/file-scanner';

// Extraction
export { extractFromFile, extractFromLine } from './extraction/extraction-engine';
export type { ExtractionOptions, FileExtraction } from './extraction/extraction-engine';

// Splitting
export { deriveFragment, joinSlices, splitChunks, splitText } from './splitting/chunk-splitter';
export type { TextSlice } from './splitting/chunk-splitter';

// Deduplication
export { dedupeChunks } from './deduplication/chunk-deduplicator';

// Pipeline
export { extractTexts } from './pipeline/extract-texts';
export type { ExtractTextsOptions } from './pipeline/extract-texts';

// Statistics
export { computeExtractionStats, formatExtractionStats } from './stats/extraction-stats';
export type { ExtractionStats, StatsOptions } from './stats/extraction-stats';
