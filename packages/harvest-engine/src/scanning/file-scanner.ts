/**
 * @module @textharvest/engine/scanning/file-scanner
 * Recursive, extension-filtered enumeration of the files to extract from
 */

import fg from 'fast-glob';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import {
  getErrnoCode,
  getExtension,
  SilentLogger,
  wrapError,
  type Logger,
} from '@textharvest/core';

export interface ScanOptions {
  /** Case-folded extensions with their leading dot */
  extensions: readonly string[];
  logger?: Logger;
}

/**
 * List every regular file under `rootDir` whose extension is allowed,
 * sorted lexically. Hidden files and directories are included. Symbolic
 * links are not followed, so aliased directories and link cycles are walked
 * at most once.
 *
 * Failures are logged, never thrown: a root that cannot be opened yields an
 * empty list, and a traversal error yields the files found before it.
 */
export async function scanDirectory(rootDir: string, options: ScanOptions): Promise<string[]> {
  const logger = options.logger ?? new SilentLogger();
  const allowed = new Set(options.extensions.map(ext => ext.toLowerCase()));
  const files: string[] = [];

  try {
    const rootStats = await stat(rootDir);
    if (!rootStats.isDirectory()) {
      reportScanError(logger, rootDir, new Error(`Not a directory: ${rootDir}`), files.length);
      return files;
    }
  } catch (error) {
    reportScanError(logger, rootDir, error, files.length);
    return files;
  }

  const stream = fg.stream('**/*', {
    cwd: rootDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: false,
  });

  try {
    for await (const entry of stream) {
      const relativePath = entry.toString();
      if (allowed.has(getExtension(relativePath))) {
        files.push(path.join(rootDir, relativePath));
      }
    }
  } catch (error) {
    reportScanError(logger, rootDir, error, files.length);
  }

  files.sort();

  logger.debug('Directory scan complete', { root: rootDir, filesFound: files.length });

  return files;
}

function reportScanError(logger: Logger, rootDir: string, error: unknown, filesFound: number): void {
  const scanError = wrapError(error, 'HARVEST_SCAN_ERROR');
  logger.error('Error scanning directory', {
    root: rootDir,
    code: scanError.code,
    errno: getErrnoCode(error),
    error: scanError.message,
    filesFound,
  });
}
