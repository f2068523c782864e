// Fixed-size chunking of in-memory buffers. Pure: no I/O, no shared state.

import { IncompleteSequenceError, InvalidChunkSizeError } from '../drive/errors.js';

export interface IndexedChunk {
  index: number;
  payload: Buffer;
}

/**
 * Split `data` into consecutive slices of `chunkSize` bytes.
 * Chunk i covers [i*chunkSize, min((i+1)*chunkSize, length)); only the last
 * chunk may be shorter. An empty buffer yields no chunks.
 *
 * Slices share memory with `data`.
 */
export function split(data: Buffer, chunkSize: number): Buffer[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidChunkSizeError(chunkSize);
  }

  const chunks: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    chunks.push(data.subarray(offset, Math.min(offset + chunkSize, data.length)));
  }
  return chunks;
}

/**
 * Reassemble chunks into the original buffer.
 *
 * Input order does not matter; the indexes must form exactly 0..n-1.
 * When `expectedCount` is given, the set must also contain that many chunks.
 */
export function join(chunks: readonly IndexedChunk[], expectedCount?: number): Buffer {
  const ordered = [...chunks].sort((a, b) => a.index - b.index);

  for (let i = 0; i < ordered.length; i++) {
    const chunk = ordered[i];
    if (chunk === undefined || chunk.index !== i) {
      const found = chunk === undefined ? 'nothing' : `index ${chunk.index}`;
      throw new IncompleteSequenceError(`expected index ${i}, found ${found}`);
    }
  }

  if (expectedCount !== undefined && ordered.length !== expectedCount) {
    throw new IncompleteSequenceError(`expected ${expectedCount} chunks, got ${ordered.length}`);
  }

  return Buffer.concat(ordered.map((c) => c.payload));
}
