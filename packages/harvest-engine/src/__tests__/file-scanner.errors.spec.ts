import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULT_EXTENSIONS } from '@textharvest/core';
import { scanDirectory } from '../scanning/file-scanner';
import { createMockLogger, createTempDir } from './helpers';

vi.mock('fast-glob', () => ({
  default: {
    stream: async function* () {
      yield 'a.txt';
      yield 'skip.png';
      yield 'nested/b.lua';
      throw Object.assign(new Error('EACCES: permission denied, scandir'), { code: 'EACCES' });
    },
  },
}));

describe('scanDirectory with a failing traversal', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should keep the files found before the error and log it', async () => {
    const logger = createMockLogger();

    const files = await scanDirectory(root, { extensions: DEFAULT_EXTENSIONS, logger });

    expect(files).toEqual([join(root, 'a.txt'), join(root, 'nested/b.lua')]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Error scanning directory',
      expect.objectContaining({
        root,
        code: 'HARVEST_SCAN_ERROR',
        errno: 'EACCES',
        error: 'EACCES: permission denied, scandir',
        filesFound: 2,
      })
    );
  });
});
