import { describe, it, expect } from 'vitest';
import { cleanText } from '../cleaning/text-cleaner';

describe('cleanText', () => {
  it('should unescape control sequences', () => {
    expect(cleanText('Hello\\nWorld')).toBe('Hello\nWorld');
    expect(cleanText('a\\tb')).toBe('a\tb');
    expect(cleanText('a\\rb')).toBe('a\rb');
  });

  it('should unescape quotes and backslashes', () => {
    expect(cleanText('He said \\"hi\\"')).toBe('He said "hi"');
    expect(cleanText("it\\'s")).toBe("it's");
    expect(cleanText('C:\\\\Games')).toBe('C:\\Games');
  });

  it('should trim surrounding whitespace', () => {
    expect(cleanText('   Start Game \t ')).toBe('Start Game');
    expect(cleanText('  \\n  ')).toBe('');
  });

  it('should substitute newlines before backslash pairs', () => {
    // \\n: the \n pair is found first, leaving a lone backslash
    expect(cleanText('a\\\\nb')).toBe('a\\\nb');
  });

  it('should be stable on output without backslashes', () => {
    const samples = ['Hello', '  padded  ', 'line\\nbreak', 'say \\"hi\\"', 'tab\\there', 'C:\\\\Games'];

    for (const sample of samples) {
      const once = cleanText(sample);
      expect(cleanText(once)).toBe(once);
    }
  });
});
