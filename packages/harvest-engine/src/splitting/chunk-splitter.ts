/**
 * @module @textharvest/engine/splitting/chunk-splitter
 * Bounds chunk texts to a maximum size, preferring cuts at spaces
 */

import { DEFAULT_MAX_CHUNK_SIZE, FRAGMENT_SUFFIX, type TextChunk } from '@textharvest/core';

export interface TextSlice {
  text: string;
  /** True when one space between this slice and the next was dropped */
  cutAtSpace: boolean;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Slice `text` into pieces of at most `maxChunkSize` code units.
 *
 * Each cut moves back to the last space in (start, boundary]; the space is
 * dropped. Without such a space the cut is a hard one at the boundary, pulled
 * back by one if it would separate a surrogate pair.
 * Joining the slices, with a space after every `cutAtSpace` slice, gives back
 * `text`.
 */
export function splitText(text: string, maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE): TextSlice[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
  }

  if (text.length <= maxChunkSize) {
    return [{ text, cutAtSpace: false }];
  }

  const slices: TextSlice[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxChunkSize, text.length);

    if (end < text.length) {
      const lastSpace = text.lastIndexOf(' ', end);
      if (lastSpace > start) {
        end = lastSpace;
      } else if (end - 1 > start && isHighSurrogate(text.charCodeAt(end - 1))) {
        end--;
      }
    }

    const slice = text.slice(start, end);
    start = end;

    let cutAtSpace = false;
    if (start < text.length && text[start] === ' ') {
      start++;
      cutAtSpace = true;
    }

    slices.push({ text: slice, cutAtSpace });
  }

  return slices;
}

/**
 * New chunk for the `index`-th piece of `source`. The source is left as is.
 */
export function deriveFragment(source: TextChunk, index: number, text: string): TextChunk {
  return Object.freeze({
    ...source,
    text,
    filePath: `${source.filePath}${FRAGMENT_SUFFIX}${index}`,
    fragment: Object.freeze({ index, sourcePath: source.filePath }),
  });
}

/**
 * Chunks within bounds pass through untouched; oversized ones are replaced
 * by their fragments, in order.
 */
export function splitChunks(
  chunks: readonly TextChunk[],
  maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE
): TextChunk[] {
  const result: TextChunk[] = [];

  for (const chunk of chunks) {
    if (chunk.text.length <= maxChunkSize) {
      result.push(chunk);
      continue;
    }

    splitText(chunk.text, maxChunkSize).forEach((slice, index) => {
      result.push(deriveFragment(chunk, index, slice.text));
    });
  }

  return result;
}

/**
 * Inverse of `splitText`
 */
export function joinSlices(slices: readonly TextSlice[]): string {
  return slices.map(slice => (slice.cutAtSpace ? `${slice.text} ` : slice.text)).join('');
}
