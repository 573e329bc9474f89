import { CHUNKING_CONFIG, chunkIdFor } from '@eduflow/shared';
import type { Chunk } from '@eduflow/shared';
import { InvalidInputError } from '../errors';

/**
 * Chunking Service
 *
 * Fixed-size sliding window over the extracted text:
 * - window of `chunkSize` characters
 * - advances by `chunkSize - overlap` each step
 * - the last window may be shorter; it is never padded
 * - a boundary never splits a surrogate pair, so a window next to an astral
 *   character (e.g. 𝑥) may be one unit shorter or longer
 *
 * Output is a pure function of (documentId, text, chunkSize, overlap), so a
 * re-ingested document gets identical boundaries and chunk ids.
 */

export interface ChunkingOptions {
  chunkSize?: number;
  overlap?: number;
}

export function validateChunking(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1 || chunkSize > CHUNKING_CONFIG.MAX_CHUNK_SIZE) {
    throw new InvalidInputError(
      `chunkSize must be an integer between 1 and ${CHUNKING_CONFIG.MAX_CHUNK_SIZE}`,
      { chunkSize }
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new InvalidInputError('overlap must be an integer with 0 <= overlap < chunkSize', {
      chunkSize,
      overlap,
    });
  }
}

export function chunkText(
  documentId: string,
  text: string,
  options: ChunkingOptions = {}
): Chunk[] {
  const chunkSize = options.chunkSize ?? CHUNKING_CONFIG.CHUNK_SIZE;
  const overlap = options.overlap ?? CHUNKING_CONFIG.CHUNK_OVERLAP;
  validateChunking(chunkSize, overlap);

  const chunks: Chunk[] = [];
  const step = chunkSize - overlap;

  let start = 0;
  while (start < text.length) {
    const end = alignBoundary(text, Math.min(start + chunkSize, text.length), start);
    const sequence = chunks.length;

    chunks.push({
      id: chunkIdFor(documentId, sequence),
      documentId,
      sequence,
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
    });

    if (end === text.length) {
      break;
    }
    start = alignBoundary(text, start + step, start);
  }

  return chunks;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Keep a boundary off the middle of a surrogate pair: step back one unit, or
 * forward when stepping back would not move past `floor`.
 */
function alignBoundary(text: string, index: number, floor: number): number {
  if (index >= text.length || !isLowSurrogate(text.charCodeAt(index))) {
    return index;
  }
  return index - 1 > floor ? index - 1 : index + 1;
}

/**
 * Inverse of chunkText: drops each chunk's leading overlap and joins.
 */
export function reconstructText(chunks: readonly Chunk[]): string {
  let text = '';
  for (const chunk of chunks) {
    text += chunk.text.slice(text.length - chunk.startOffset);
  }
  return text;
}
