/**
 * Write-then-rename file output
 */

import { promises as fsp } from 'node:fs';
import { createHarvestError, getErrnoCode } from '@textharvest/core';

/**
 * Write `content` to `<filePath>.tmp`, then rename it over `filePath`.
 * Readers see either the previous file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.tmp`;

  try {
    await fsp.writeFile(tmp, content, 'utf8');

    // Windows-safe atomic rename
    if (process.platform === 'win32') {
      await unlinkIfExists(filePath);
    }

    await fsp.rename(tmp, filePath);
  } catch (error) {
    await fsp.rm(tmp, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw createHarvestError('HARVEST_PERSIST_ERROR', `Cannot write ${filePath}: ${message}`, {
      path: filePath,
      errno: getErrnoCode(error),
    });
  }
}

async function unlinkIfExists(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath);
  } catch (error) {
    if (getErrnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }
}
