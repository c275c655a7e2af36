/**
 * JSON file operations for textharvest store
 */

import { promises as fsp } from 'node:fs';
import { getErrnoCode } from '@textharvest/core';
import { writeFileAtomic } from './atomic';

/**
 * Recursively sort object keys for deterministic output
 */
export function sortKeysRecursively(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysRecursively);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries.map(([key, entry]) => [key, sortKeysRecursively(entry)]));
}

/**
 * Parsed content of a JSON file, or null when it does not exist
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fsp.readFile(filePath, 'utf8');
    return JSON.parse(content);
  } catch (error) {
    if (getErrnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Write JSON file atomically with sorted keys
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const content = JSON.stringify(sortKeysRecursively(data), null, 2) + '\n';
  await writeFileAtomic(filePath, content);
}
