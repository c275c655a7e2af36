export type {
  FragmentInfo,
  TextChunk,
  FileError,
  ExtractionResult,
  TranslationRecord,
} from './chunk';
