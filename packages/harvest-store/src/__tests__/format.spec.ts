import { describe, it, expect } from 'vitest';
import { formatExtractedFile, formatMasterWorksheet, toTranslationRecords } from '../worksheet/format';
import { makeChunk } from './helpers';

describe('worksheet formats', () => {
  const chunks = [
    makeChunk(),
    makeChunk({ text: 'Bye', lineNumber: 2, context: 'say("Bye")', originalText: '"Bye"' }),
  ];

  it('should list every chunk of a source file', () => {
    expect(formatExtractedFile('/game/a/dialog.txt', chunks)).toBe(
      '=== EXTRACTED TEXTS FROM: /game/a/dialog.txt ===\n\n' +
        'Line 1:\nContext: name: "Hello World"\nText: Hello World\nOriginal: "Hello World"\n---\n\n' +
        'Line 2:\nContext: say("Bye")\nText: Bye\nOriginal: "Bye"\n---\n\n'
    );
  });

  it('should number records from one with empty translations', () => {
    expect(toTranslationRecords(chunks)).toEqual([
      { id: 1, file: '/game/a/dialog.txt', line: 1, original: 'Hello World', translation: '' },
      { id: 2, file: '/game/a/dialog.txt', line: 2, original: 'Bye', translation: '' },
    ]);
  });

  it('should render the master worksheet', () => {
    expect(formatMasterWorksheet(toTranslationRecords(chunks))).toBe(
      '=== MASTER TRANSLATION FILE ===\n\n' +
        'ID: 1\nFile: /game/a/dialog.txt\nLine: 1\nOriginal: Hello World\nTranslation: \n---\n\n' +
        'ID: 2\nFile: /game/a/dialog.txt\nLine: 2\nOriginal: Bye\nTranslation: \n---\n\n'
    );
  });

  it('should render only the header for no chunks', () => {
    expect(formatMasterWorksheet([])).toBe('=== MASTER TRANSLATION FILE ===\n\n');
  });
});
