/**
 * Directory creation utilities for textharvest store
 */

import { promises as fsp } from 'node:fs';
import { createHarvestError, getErrnoCode } from '@textharvest/core';

/**
 * Ensure directory exists (mkdirp)
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fsp.mkdir(dirPath, { recursive: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createHarvestError('HARVEST_PERSIST_ERROR', `Cannot create directory ${dirPath}: ${message}`, {
      path: dirPath,
      errno: getErrnoCode(error),
    });
  }
}
