/**
 * Translations kept between runs as a JSON object of original → translation
 */

import path from 'node:path';
import { z } from 'zod';
import { createHarvestError } from '@textharvest/core';
import { ensureDir } from '../fs/ensure';
import { readJson, writeJson } from '../fs/json';

export const TranslationMemorySchema = z.record(z.string(), z.string());

/**
 * @throws HarvestError HARVEST_PERSIST_ERROR
 */
export async function saveTranslationMemory(
  filePath: string,
  translations: ReadonlyMap<string, string>
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await writeJson(filePath, Object.fromEntries(translations));
}

/**
 * Empty when the file does not exist.
 *
 * @throws HarvestError HARVEST_MEMORY_PARSE_ERROR on unreadable or malformed content
 */
export async function loadTranslationMemory(filePath: string): Promise<Map<string, string>> {
  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createHarvestError('HARVEST_MEMORY_PARSE_ERROR', `Cannot read translation memory ${filePath}: ${message}`, {
      path: filePath,
    });
  }

  if (data === null) {
    return new Map();
  }

  const parsed = TranslationMemorySchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw createHarvestError(
      'HARVEST_MEMORY_PARSE_ERROR',
      `Invalid translation memory ${filePath}: ${issues.join('; ')}`,
      { path: filePath }
    );
  }

  return new Map(Object.entries(parsed.data));
}

/**
 * `base` overlaid with `updates`; neither input is modified
 */
export function mergeTranslations(
  base: ReadonlyMap<string, string>,
  updates: ReadonlyMap<string, string>
): Map<string, string> {
  return new Map([...base, ...updates]);
}
