import { describe, it, expect } from 'vitest';
import {
  PatternRegistry,
  countCaptureGroups,
  createDefaultRules,
  createPatternRegistry,
} from '../patterns/pattern-registry';

describe('PatternRegistry', () => {
  const registry = createPatternRegistry();

  it('should build the default rules in order', () => {
    const ids = createDefaultRules().map(rule => rule.id);

    expect(ids).toHaveLength(19);
    expect(ids.slice(0, 3)).toEqual(['double-quoted', 'single-quoted', 'assign:text']);
    expect(ids).toContain('assign:content');
    expect(ids).toContain('tag:string');
    expect(ids[ids.length - 1]).toBe('tag:content');
    expect(registry.size).toBe(19);
  });

  it('should capture a key/value pair twice, once per rule', () => {
    const matches = registry.matchLine('name: "Hello World"');

    expect(matches).toEqual([
      {
        ruleId: 'double-quoted',
        capture: 'Hello World',
        captureStart: 7,
        captureEnd: 18,
        match: '"Hello World"',
      },
      {
        ruleId: 'assign:name',
        capture: 'Hello World',
        captureStart: 7,
        captureEnd: 18,
        match: 'name: "Hello World"',
      },
    ]);
  });

  it('should keep escaped quotes inside a literal', () => {
    const matches = registry.matchLine('say("He said \\"hi\\"")');

    expect(matches).toHaveLength(1);
    expect(matches[0].capture).toBe('He said \\"hi\\"');
    expect(matches[0].match).toBe('"He said \\"hi\\""');
  });

  it('should match single quotes with the = form', () => {
    const matches = registry.matchLine("label = 'Options'");

    expect(matches.map(match => [match.ruleId, match.match])).toEqual([
      ['single-quoted', "'Options'"],
      ['assign:label', "label = 'Options'"],
    ]);
  });

  it('should match XML-style tags', () => {
    expect(registry.matchLine('<text>Start Game</text>')).toEqual([
      {
        ruleId: 'tag:text',
        capture: 'Start Game',
        captureStart: 6,
        captureEnd: 16,
        match: '<text>Start Game</text>',
      },
    ]);
  });

  it('should return every non-overlapping match of a rule', () => {
    const captures = registry.matchLine('"abc" + "def"').map(match => match.capture);
    expect(captures).toEqual(['abc', 'def']);
  });

  it('should return nothing for a line without text', () => {
    expect(registry.matchLine('local x = 42')).toEqual([]);
    expect(registry.matchLine('')).toEqual([]);
  });
});

describe('custom rules', () => {
  it('should count capturing groups', () => {
    expect(countCaptureGroups(/a(b)(c)/)).toBe(2);
    expect(countCaptureGroups(/(?:x)y/)).toBe(0);
    expect(countCaptureGroups(/say\((\w+)\)/g)).toBe(1);
  });

  it('should keep the flags of a rule', () => {
    const registry = new PatternRegistry([{ id: 'caption', pattern: /CAPTION:(\w+)/i }]);
    expect(registry.matchLine('caption:Hello')[0]).toMatchObject({ capture: 'Hello', captureStart: 8 });
  });

  it('should reject rules without exactly one capturing group', () => {
    expect(() => createPatternRegistry([{ id: 'none', pattern: /abc/ }])).toThrow(
      'Pattern rule "none" must have exactly one capturing group, found 0'
    );
    expect(() => createPatternRegistry([{ id: 'two', pattern: /(a)(b)/ }])).toThrow(/found 2/);
  });

  it('should reject duplicate rule ids', () => {
    expect(() =>
      createPatternRegistry([
        { id: 'same', pattern: /"(\w+)"/ },
        { id: 'same', pattern: /'(\w+)'/ },
      ])
    ).toThrow('Duplicate pattern rule id "same"');
  });
});
