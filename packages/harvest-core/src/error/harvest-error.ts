/**
 * @module @textharvest/core/error
 * Standardized error class for textharvest
 */

export class HarvestError extends Error {
  constructor(
    public code: string,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarvestError';
  }
}

/**
 * Maps HarvestError codes to CLI exit codes
 */
export function getExitCode(err: HarvestError): number {
  if (err.code === 'HARVEST_ABORTED') {return 130;}
  if (err.code === 'HARVEST_PERSIST_ERROR') {return 3;}
  if (err.code === 'HARVEST_INVALID_CONFIG') {return 2;}
  if (err.code === 'HARVEST_INVALID_PATH') {return 2;}
  return 1;
}

/**
 * Error codes with their standard hints
 */
export const ERROR_HINTS = {
  HARVEST_SCAN_ERROR: 'Source directory could not be traversed - check it exists and is readable',
  HARVEST_FILE_OPEN_ERROR: 'File could not be opened - check permissions and encoding',
  HARVEST_WORKSHEET_PARSE_ERROR: 'Worksheet record is malformed - every Translation needs an Original in the same record',
  HARVEST_MEMORY_PARSE_ERROR: 'Translation memory must be a JSON object of string to string',
  HARVEST_PERSIST_ERROR: 'Output could not be written - check the output directory is writable',
  HARVEST_INVALID_CONFIG: 'Invalid configuration - check values and try again',
  HARVEST_INVALID_PATH: 'Invalid file or directory path - check path exists and is accessible',
  HARVEST_ABORTED: 'Extraction was cancelled - output may be incomplete, run it again',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

/**
 * Create a HarvestError with standardized code and hint
 */
export function createHarvestError(
  code: ErrorCode,
  message: string,
  meta?: Record<string, unknown>
): HarvestError {
  return new HarvestError(code, message, ERROR_HINTS[code], meta);
}

/**
 * Create a HarvestError from a generic error
 */
export function wrapError(error: unknown, code: ErrorCode = 'HARVEST_PERSIST_ERROR'): HarvestError {
  if (error instanceof HarvestError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return createHarvestError(code, message, { originalError: error });
}

export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError;
}

/**
 * Node's errno code (ENOENT, EACCES, ...) of a thrown value, if it has one
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
