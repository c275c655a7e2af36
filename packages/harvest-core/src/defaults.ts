/**
 * Default configurations for textharvest
 */

/**
 * Extensions scanned when no allow-list is configured.
 * Source code, config formats and game engine scene/asset files.
 */
export const DEFAULT_EXTENSIONS: readonly string[] = [
  '.csv', '.erb', '.erh', '.py', '.cpp', '.c', '.h', '.hpp', '.cs', '.java',
  '.js', '.ts', '.jsx', '.tsx', '.xml', '.json', '.yaml', '.yml', '.ini',
  '.cfg', '.txt', '.lua', '.rpy', '.unity', '.prefab', '.asset', '.scene',
  '.csproj', '.sln',
];

/**
 * Used by `parseExtensionList` when the input names no extension at all
 */
export const FALLBACK_EXTENSIONS: readonly string[] = ['.csv', '.erb', '.erh'];

export const EXTENSION_PRESETS = {
  code: ['.py', '.cpp', '.c', '.h', '.hpp', '.cs', '.java'],
  web: ['.html', '.css', '.js', '.ts', '.jsx', '.tsx', '.json', '.xml'],
  all: [
    '.py', '.cpp', '.c', '.h', '.hpp', '.cs', '.java', '.js', '.ts', '.jsx',
    '.tsx', '.html', '.css', '.xml', '.json', '.yaml', '.yml', '.ini', '.cfg',
    '.txt', '.lua', '.rpy', '.unity', '.prefab', '.asset', '.scene',
  ],
} as const satisfies Record<string, readonly string[]>;

export type ExtensionPreset = keyof typeof EXTENSION_PRESETS;

/**
 * Shorter cleaned captures are dropped
 */
export const DEFAULT_MIN_TEXT_LENGTH = 3;

/**
 * Longest chunk text (in UTF-16 code units) kept after splitting
 */
export const DEFAULT_MAX_CHUNK_SIZE = 50_000;

/**
 * Thresholds of the text size statistics
 */
export const LARGE_TEXT_THRESHOLD = 1_000;
export const VERY_LARGE_TEXT_THRESHOLD = 10_000;

export const MASTER_WORKSHEET_NAME = 'master_translation.txt';
export const EXTRACTED_FILE_SUFFIX = '_extracted.txt';
export const FRAGMENT_SUFFIX = '_chunk_';
