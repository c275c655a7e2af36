/**
 * Unescaping and trimming of captured values
 */

/**
 * Applied in order. The backslash pair comes last, so a backslash it leaves
 * behind never starts another substitution.
 */
const ESCAPE_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ['\\n', '\n'],
  ['\\t', '\t'],
  ['\\r', '\r'],
  ['\\"', '"'],
  ["\\'", "'"],
  ['\\\\', '\\'],
];

export function cleanText(raw: string): string {
  let cleaned = raw;
  for (const [token, replacement] of ESCAPE_SUBSTITUTIONS) {
    cleaned = cleaned.replaceAll(token, replacement);
  }
  return cleaned.trim();
}
