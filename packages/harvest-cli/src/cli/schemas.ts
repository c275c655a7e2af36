/**
 * @module @textharvest/cli/cli/schemas
 * Input schemas for CLI commands
 */

import { z } from 'zod';
import { DedupeModeSchema, createHarvestError, type ExtensionPreset } from '@textharvest/core';

export const PRESET_NAMES = ['code', 'web', 'all'] as const satisfies readonly ExtensionPreset[];

const PositiveIntFlag = z.coerce.number().int().positive();

const OutputFlags = {
  json: z.boolean().optional().default(false),
  verbose: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
};

// ============================================================================
// Extract Command
// ============================================================================

export const ExtractInputSchema = z.object({
  dir: z.string({ required_error: 'A directory to scan is required' }).min(1),
  out: z.string({ required_error: '--out is required' }).min(1),
  ext: z.string().optional(),
  preset: z.enum(PRESET_NAMES).optional(),
  minLength: PositiveIntFlag.optional(),
  maxChunk: PositiveIntFlag.optional(),
  dedupe: DedupeModeSchema.optional(),
  config: z.string().optional(),
  memory: z.string().optional(),
  stats: z.boolean().optional().default(false),
  ...OutputFlags,
}).refine(input => input.ext === undefined || input.preset === undefined, {
  message: 'Use either --ext or --preset, not both',
  path: ['ext'],
});

export type ExtractInput = z.infer<typeof ExtractInputSchema>;

// ============================================================================
// Reapply Command
// ============================================================================

export const ReapplyInputSchema = z.object({
  worksheet: z.string({ required_error: 'A worksheet file is required' }).min(1),
  memory: z.string().optional(),
  strict: z.boolean().optional().default(false),
  ...OutputFlags,
});

export type ReapplyInput = z.infer<typeof ReapplyInputSchema>;

// ============================================================================
// Extensions Command
// ============================================================================

export const ExtensionsInputSchema = z.object({
  preset: z.enum(PRESET_NAMES).optional(),
  json: z.boolean().optional().default(false),
});

export type ExtensionsInput = z.infer<typeof ExtensionsInputSchema>;

/**
 * Validate raw command input
 *
 * @throws HarvestError HARVEST_INVALID_CONFIG listing every issue
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`);
    throw createHarvestError('HARVEST_INVALID_CONFIG', `Invalid arguments: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}
