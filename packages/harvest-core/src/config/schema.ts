/**
 * @module @textharvest/core/config/schema
 * Validation schema for the extraction configuration
 */

import { z } from 'zod';
import { DEFAULT_EXTENSIONS, DEFAULT_MAX_CHUNK_SIZE, DEFAULT_MIN_TEXT_LENGTH } from '../defaults';
import { normalizeExtensions } from './extensions';

export const DedupeModeSchema = z.enum(['none', 'location', 'text']);

export type DedupeMode = z.infer<typeof DedupeModeSchema>;

export const HarvestConfigSchema = z.object({
  extensions: z
    .array(z.string())
    .default([...DEFAULT_EXTENSIONS])
    .transform(normalizeExtensions)
    .refine(list => list.length > 0, { message: 'At least one extension is required' }),
  minTextLength: z.number().int().positive().default(DEFAULT_MIN_TEXT_LENGTH),
  maxChunkSize: z.number().int().positive().default(DEFAULT_MAX_CHUNK_SIZE),
  dedupe: DedupeModeSchema.default('none'),
}).strict();

export type HarvestConfigInput = z.input<typeof HarvestConfigSchema>;

/**
 * Resolved configuration. Built once by the owner of a run and read-only
 * while the run is in progress.
 */
export interface HarvestConfig {
  readonly extensions: readonly string[];
  readonly minTextLength: number;
  readonly maxChunkSize: number;
  readonly dedupe: DedupeMode;
}
