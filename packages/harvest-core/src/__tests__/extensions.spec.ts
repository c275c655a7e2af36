import { describe, it, expect } from 'vitest';
import {
  getExtensionPreset,
  isExtensionPreset,
  normalizeExtension,
  parseExtensionList,
} from '../config/extensions';
import { getExtension } from '../utils/paths';

describe('Extension parsing', () => {
  it('should normalize a single extension', () => {
    expect(normalizeExtension('PY')).toBe('.py');
    expect(normalizeExtension(' .Lua ')).toBe('.lua');
    expect(normalizeExtension('   ')).toBe('');
  });

  it('should parse a comma-separated list', () => {
    expect(parseExtensionList('py, .CPP,js,,  ')).toEqual(['.py', '.cpp', '.js']);
  });

  it('should fall back when nothing is given', () => {
    expect(parseExtensionList('')).toEqual(['.csv', '.erb', '.erh']);
    expect(parseExtensionList(' , ')).toEqual(['.csv', '.erb', '.erh']);
  });

  it('should expose presets', () => {
    expect(isExtensionPreset('code')).toBe(true);
    expect(isExtensionPreset('toString')).toBe(false);
    expect(getExtensionPreset('code')).toEqual(['.py', '.cpp', '.c', '.h', '.hpp', '.cs', '.java']);
    expect(getExtensionPreset('web')).toContain('.html');
    expect(getExtensionPreset('all')).toHaveLength(26);
  });
});

describe('Path Utilities', () => {
  it('should case-fold extensions', () => {
    expect(getExtension('scenes/Intro.RPY')).toBe('.rpy');
    expect(getExtension('archive.tar.gz')).toBe('.gz');
    expect(getExtension('.gitignore')).toBe('');
    expect(getExtension('Makefile')).toBe('');
  });
});
