/**
 * @module @textharvest/engine/patterns/pattern-registry
 * Ordered set of single-capture text rules applied to every line
 */

import { createHarvestError } from '@textharvest/core';

export interface PatternRule {
  /** Unique identifier, recorded on every chunk the rule produces */
  readonly id: string;
  /** Must contain exactly one capturing group: the extracted value */
  readonly pattern: RegExp;
}

export interface LineMatch {
  readonly ruleId: string;
  /** Raw value of the capturing group */
  readonly capture: string;
  /** Offsets of the capture on the line, end exclusive */
  readonly captureStart: number;
  readonly captureEnd: number;
  /** Whole match, delimiters included */
  readonly match: string;
}

/**
 * Keys whose `key: "value"` / `key = 'value'` assignments are extracted
 */
export const ASSIGNMENT_KEYS = [
  'text', 'label', 'message', 'title', 'description', 'name', 'value', 'content',
] as const;

/**
 * Tags whose `<tag>value</tag>` bodies are extracted
 */
export const TAG_KEYS = [
  'text', 'string', 'message', 'label', 'title', 'description', 'name', 'value', 'content',
] as const;

/**
 * The built-in rules, in application order: quoted literals first, then
 * key/value assignments, then XML-style tags.
 */
export function createDefaultRules(): PatternRule[] {
  return [
    { id: 'double-quoted', pattern: /"([^"\\]*(?:\\.[^"\\]*)*)"/ },
    { id: 'single-quoted', pattern: /'([^'\\]*(?:\\.[^'\\]*)*)'/ },
    ...ASSIGNMENT_KEYS.map(key => ({
      id: `assign:${key}`,
      pattern: new RegExp(`${key}\\s*[:=]\\s*["']([^"']+)["']`),
    })),
    ...TAG_KEYS.map(key => ({
      id: `tag:${key}`,
      pattern: new RegExp(`<${key}>([^<]+)</${key}>`),
    })),
  ];
}

/**
 * Number of capturing groups in a pattern
 */
export function countCaptureGroups(pattern: RegExp): number {
  // An empty alternative always matches, so exec reports every group
  const emptyMatch = new RegExp(`${pattern.source}|`, pattern.flags.replace(/[gy]/g, '')).exec('');
  return emptyMatch ? emptyMatch.length - 1 : 0;
}

interface CompiledRule {
  readonly id: string;
  readonly matcher: RegExp;
}

/**
 * Rules are independent: a value caught by a key rule is caught again by the
 * quoted-literal rule. Callers that want one chunk per value de-duplicate
 * afterwards.
 */
export class PatternRegistry {
  private readonly compiled: readonly CompiledRule[];

  constructor(readonly rules: readonly PatternRule[]) {
    const ids = new Set<string>();
    this.compiled = rules.map(rule => {
      if (ids.has(rule.id)) {
        throw createHarvestError('HARVEST_INVALID_CONFIG', `Duplicate pattern rule id "${rule.id}"`, {
          ruleId: rule.id,
        });
      }
      ids.add(rule.id);

      const groups = countCaptureGroups(rule.pattern);
      if (groups !== 1) {
        throw createHarvestError(
          'HARVEST_INVALID_CONFIG',
          `Pattern rule "${rule.id}" must have exactly one capturing group, found ${groups}`,
          { ruleId: rule.id, pattern: rule.pattern.source }
        );
      }

      // g for matchAll, d for capture offsets
      const flags = Array.from(new Set(`${rule.pattern.flags}gd`)).join('');
      return { id: rule.id, matcher: new RegExp(rule.pattern.source, flags) };
    });
  }

  /**
   * Every match of every rule on one line, grouped by rule in rule order
   */
  matchLine(line: string): LineMatch[] {
    const matches: LineMatch[] = [];

    for (const rule of this.compiled) {
      for (const match of line.matchAll(rule.matcher)) {
        const span = match.indices?.[1];
        const capture = match[1];
        if (!span || capture === undefined) {
          continue;
        }
        matches.push({
          ruleId: rule.id,
          capture,
          captureStart: span[0],
          captureEnd: span[1],
          match: match[0],
        });
      }
    }

    return matches;
  }

  get size(): number {
    return this.compiled.length;
  }
}

export function createPatternRegistry(rules: readonly PatternRule[] = createDefaultRules()): PatternRegistry {
  return new PatternRegistry(rules);
}
