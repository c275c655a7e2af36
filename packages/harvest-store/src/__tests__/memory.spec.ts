import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { writeFileAtomic } from '../fs/atomic';
import { sortKeysRecursively } from '../fs/json';
import { loadTranslationMemory, mergeTranslations, saveTranslationMemory } from '../memory/translation-memory';
import { createTempDir } from './helpers';

describe('translation memory', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should save sorted keys and load them back', async () => {
    const file = join(root, 'memory', 'fr.json');
    const translations = new Map([
      ['Start Game', 'Commencer'],
      ['Options', 'Options'],
    ]);

    await saveTranslationMemory(file, translations);

    expect(await readFile(file, 'utf8')).toBe('{\n  "Options": "Options",\n  "Start Game": "Commencer"\n}\n');
    expect(await loadTranslationMemory(file)).toEqual(translations);
    expect(await readdir(join(root, 'memory'))).toEqual(['fr.json']);
  });

  it('should load an empty memory when the file is missing', async () => {
    expect((await loadTranslationMemory(join(root, 'missing.json'))).size).toBe(0);
  });

  it('should reject values that are not strings', async () => {
    const file = join(root, 'bad.json');
    await writeFile(file, '{"Hello": 1}');

    await expect(loadTranslationMemory(file)).rejects.toMatchObject({ code: 'HARVEST_MEMORY_PARSE_ERROR' });
  });

  it('should reject content that is not JSON', async () => {
    const file = join(root, 'broken.json');
    await writeFile(file, 'not json');

    await expect(loadTranslationMemory(file)).rejects.toThrow(`Cannot read translation memory ${file}`);
  });

  it('should merge updates over the base', () => {
    const base = new Map([['a', 'A'], ['b', 'B']]);
    const merged = mergeTranslations(base, new Map([['b', 'BB'], ['c', 'C']]));

    expect([...merged]).toEqual([['a', 'A'], ['b', 'BB'], ['c', 'C']]);
    expect(base.get('b')).toBe('B');
  });
});

describe('file helpers', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should sort keys at every depth', () => {
    const sorted = sortKeysRecursively({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } });
    expect(JSON.stringify(sorted)).toBe('{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}');
  });

  it('should replace a file and leave no temporary behind', async () => {
    const file = join(root, 'out.txt');

    await writeFileAtomic(file, 'first');
    await writeFileAtomic(file, 'second');

    expect(await readFile(file, 'utf8')).toBe('second');
    expect(await readdir(root)).toEqual(['out.txt']);
  });

  it('should fail with a persist error when the directory is missing', async () => {
    await expect(writeFileAtomic(join(root, 'missing', 'out.txt'), 'x')).rejects.toMatchObject({
      code: 'HARVEST_PERSIST_ERROR',
    });
  });
});
