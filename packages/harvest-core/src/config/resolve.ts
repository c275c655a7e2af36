/**
 * Building and loading the extraction configuration
 */

import { readFile } from 'node:fs/promises';
import { createHarvestError, getErrnoCode } from '../error/harvest-error';
import { HarvestConfigSchema, type HarvestConfig, type HarvestConfigInput } from './schema';

/**
 * Validate input, fill in defaults and freeze the result
 */
export function resolveHarvestConfig(input: HarvestConfigInput = {}): HarvestConfig {
  return parseHarvestConfig(input);
}

/**
 * Same as `resolveHarvestConfig` for values of unknown shape, such as parsed JSON
 */
export function parseHarvestConfig(input: unknown): HarvestConfig {
  const parsed = HarvestConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw createHarvestError('HARVEST_INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`, {
      issues,
    });
  }

  const { extensions, minTextLength, maxChunkSize, dedupe } = parsed.data;
  return Object.freeze({
    extensions: Object.freeze(extensions),
    minTextLength,
    maxChunkSize,
    dedupe,
  });
}

export function getSupportedExtensions(config: HarvestConfig): string[] {
  return [...config.extensions];
}

/**
 * Configuration identical to `config` except for its extension allow-list
 */
export function withSupportedExtensions(config: HarvestConfig, extensions: readonly string[]): HarvestConfig {
  return resolveHarvestConfig({
    extensions: [...extensions],
    minTextLength: config.minTextLength,
    maxChunkSize: config.maxChunkSize,
    dedupe: config.dedupe,
  });
}

/**
 * Read a JSON configuration file
 */
export async function loadHarvestConfig(filePath: string): Promise<HarvestConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw createHarvestError('HARVEST_INVALID_PATH', `Cannot read config file ${filePath}`, {
      file: filePath,
      errno: getErrnoCode(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw createHarvestError('HARVEST_INVALID_CONFIG', `Config file ${filePath} is not valid JSON`, {
      file: filePath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  return parseHarvestConfig(raw);
}
