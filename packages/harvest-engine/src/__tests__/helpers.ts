/**
 * Test helpers for the engine specs
 */

import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { vi } from 'vitest';
import type { Logger, TextChunk } from '@textharvest/core';

export async function createTempDir(prefix = 'textharvest-engine-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Write `{ 'relative/path': 'content' }` under `root`
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content, 'utf8');
  }
}

export function makeChunk(overrides: Partial<TextChunk> = {}): TextChunk {
  return {
    text: 'Hello World',
    filePath: '/game/data/dialog.txt',
    lineNumber: 1,
    columnStart: 1,
    columnEnd: 12,
    context: '"Hello World"',
    originalText: '"Hello World"',
    ruleId: 'double-quoted',
    ...overrides,
  };
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}
