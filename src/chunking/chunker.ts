/**
 * Text Chunker
 *
 * Splits document text into overlapping fixed-size windows, cutting at the
 * last sentence end or line break of a window when one sits past its midpoint.
 *
 * @example
 * ```ts
 * chunkText('The sky is blue. Water is wet. Fire is hot.', 20, 5);
 * // ['The sky is blue.', 'blue. Water is wet.', 'wet. Fire is hot.']
 * ```
 */

import { ConfigurationError } from '../core/errors.js';
import type { Chunk, Document } from '../types/index.js';

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_CHUNK_OVERLAP = 50;

/** A boundary is only used when it lies past this fraction of the window */
const BOUNDARY_MIN_FRACTION = 0.5;

export interface ChunkerOptions {
  /** Code points per chunk (default: 512) */
  size?: number;
  /** Code points shared by consecutive chunks (default: 50) */
  overlap?: number;
}

export function validateChunkOptions(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${size}`, {
      configKey: 'chunking.size',
    });
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got ${overlap}`, {
      configKey: 'chunking.overlap',
    });
  }
  if (overlap >= size) {
    throw new ConfigurationError(`Chunk overlap (${overlap}) must be smaller than chunk size (${size})`, {
      configKey: 'chunking.overlap',
    });
  }
}

/**
 * Position just after the last `.` or newline of `window`, or -1 when there
 * is none past the window's midpoint.
 */
function findBreak(window: readonly string[], size: number): number {
  const breakPoint = Math.max(window.lastIndexOf('.'), window.lastIndexOf('\n'));
  return breakPoint > size * BOUNDARY_MIN_FRACTION ? breakPoint + 1 : -1;
}

/**
 * Split text into overlapping, boundary-aware chunks.
 * Sizes count code points, so a window never splits a surrogate pair.
 * Every returned chunk is trimmed and at most `size` code points long.
 *
 * Chunking ends with the window that reaches the end of the text: no
 * trailing fragment already contained in the last chunk is emitted, so
 * counts can be one lower than a splitter that keeps stepping back by
 * `overlap` after the final window.
 */
export function chunkText(text: string, size: number = DEFAULT_CHUNK_SIZE, overlap: number = DEFAULT_CHUNK_OVERLAP): string[] {
  validateChunkOptions(size, overlap);

  const chars = Array.from(text);
  if (chars.length <= size) {
    return [text.trim()];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < chars.length) {
    let end = Math.min(start + size, chars.length);
    let window = chars.slice(start, end);

    if (end < chars.length) {
      const cut = findBreak(window, size);
      if (cut !== -1) {
        window = window.slice(0, cut);
        end = start + cut;
      }
    }

    chunks.push(window.join('').trim());

    if (end >= chars.length) break;

    // A short cut window with a large overlap would step backwards
    const next = end - overlap;
    start = next > start ? next : end;
  }

  return chunks;
}

/**
 * Chunker bound to a validated size/overlap pair.
 */
export class Chunker {
  readonly size: number;
  readonly overlap: number;

  constructor(options: ChunkerOptions = {}) {
    this.size = options.size ?? DEFAULT_CHUNK_SIZE;
    this.overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
    validateChunkOptions(this.size, this.overlap);
  }

  split(text: string): string[] {
    return chunkText(text, this.size, this.overlap);
  }

  /**
   * Chunk a document, numbering the non-empty chunks and copying its metadata.
   */
  chunkDocument(document: Document): Chunk[] {
    const texts = this.split(document.text).filter((text) => text.length > 0);

    return texts.map((text, chunkId) => ({
      text,
      metadata: {
        ...document.metadata,
        chunkId,
        totalChunks: texts.length,
      },
    }));
  }
}
