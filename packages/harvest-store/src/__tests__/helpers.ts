import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TextChunk } from '@textharvest/core';

export async function createTempDir(prefix = 'textharvest-store-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export function makeChunk(overrides: Partial<TextChunk> = {}): TextChunk {
  return {
    text: 'Hello World',
    filePath: '/game/a/dialog.txt',
    lineNumber: 1,
    columnStart: 7,
    columnEnd: 18,
    context: 'name: "Hello World"',
    originalText: '"Hello World"',
    ruleId: 'double-quoted',
    ...overrides,
  };
}
