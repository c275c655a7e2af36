/**
 * Optional post-filter collapsing the overlapping matches of different rules
 */

import type { DedupeMode, TextChunk } from '@textharvest/core';

/**
 * Key under which two chunks count as the same, or null to keep everything
 */
function keyFor(mode: DedupeMode): ((chunk: TextChunk) => string) | null {
  switch (mode) {
    case 'location':
      return chunk => `${chunk.filePath}\u0000${chunk.lineNumber}\u0000${chunk.columnStart}\u0000${chunk.text}`;
    case 'text':
      return chunk => chunk.text;
    case 'none':
      return null;
  }
}

/**
 * Keep the first chunk of every key, in input order.
 * `location` drops a capture matched by several rules at the same column,
 * but keeps two occurrences of one literal on a line;
 * `text` keeps one chunk per distinct text across the whole run.
 */
export function dedupeChunks(chunks: readonly TextChunk[], mode: DedupeMode): TextChunk[] {
  const key = keyFor(mode);
  if (!key) {
    return [...chunks];
  }

  const seen = new Set<string>();
  const kept: TextChunk[] = [];

  for (const chunk of chunks) {
    const chunkKey = key(chunk);
    if (seen.has(chunkKey)) {
      continue;
    }
    seen.add(chunkKey);
    kept.push(chunk);
  }

  return kept;
}
