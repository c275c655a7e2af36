import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { vi } from 'vitest';
import type { CommandContext } from '../cli/types';

export async function createTempProject(files: Record<string, string> = {}): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'textharvest-cli-'));
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content, 'utf8');
  }
  return root;
}

export function createTestContext(cwd: string) {
  const presenter = {
    write: vi.fn(),
    error: vi.fn(),
    json: vi.fn(),
  };
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  const ctx: CommandContext = { cwd, presenter, logger };
  return { ctx, presenter, logger };
}

/**
 * Lines of the n-th `write` call
 */
export function writtenLines(write: ReturnType<typeof vi.fn>, call = 0): string[] {
  const text: unknown = write.mock.calls[call]?.[0];
  return typeof text === 'string' ? text.split('\n') : [];
}
