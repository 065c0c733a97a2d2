/**
 * In-Memory Search Backend
 *
 * Useful for small corpora, local experiments and tests without a search
 * cluster. Vector search is a brute-force cosine scan; keyword search is
 * fuzzy lexical matching via Fuse.js (any query term may match).
 *
 * @example
 * ```typescript
 * const backend = new MemorySearchBackend({ dimensions: 384 });
 * await backend.bulkIndex(items);
 *
 * const hits = await backend.keywordSearch('vector search', 5);
 * ```
 */

import Fuse from 'fuse.js';
import { fusionKey } from '../retrieval/fusion.js';
import { cosineSimilarity, isFiniteVector } from '../utils/math.js';
import type {
  BulkIndexResult,
  IndexItem,
  IndexItemError,
  RankedHit,
  SearchBackend,
  SearchCallOptions,
} from '../types/index.js';

interface StoredChunk extends IndexItem {
  id: string;
}

export interface MemorySearchBackendOptions {
  /** Expected vector dimension. Inferred from the first indexed item when omitted. */
  dimensions?: number;
  /** Fuse.js threshold (0 = exact, 1 = match anything, default: 0.3) */
  fuzzyThreshold?: number;
}

export class MemorySearchBackend implements SearchBackend {
  private chunks: Map<string, StoredChunk> = new Map();
  private fuse: Fuse<StoredChunk>;
  private dimensions?: number;
  private fuzzyThreshold: number;

  constructor(options: MemorySearchBackendOptions = {}) {
    this.dimensions = options.dimensions;
    this.fuzzyThreshold = options.fuzzyThreshold ?? 0.3;
    this.fuse = this.createFuse([]);
  }

  private createFuse(docs: StoredChunk[]): Fuse<StoredChunk> {
    return new Fuse(docs, {
      keys: ['text'],
      includeScore: true,
      threshold: this.fuzzyThreshold,
      ignoreLocation: true,
      useExtendedSearch: true,
      minMatchCharLength: 2,
    });
  }

  async vectorSearch(vector: number[], k: number, options: SearchCallOptions = {}): Promise<RankedHit[]> {
    options.signal?.throwIfAborted();
    if (this.chunks.size === 0) return [];

    const scored: Array<{ chunk: StoredChunk; score: number }> = [];
    for (const chunk of this.chunks.values()) {
      if (chunk.vector.length !== vector.length) continue;
      scored.push({ chunk, score: cosineSimilarity(vector, chunk.vector) });
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map(({ chunk, score }) => ({
        text: chunk.text,
        metadata: chunk.metadata,
        score: { mode: 'vector' as const, value: score },
      }));
  }

  async keywordSearch(text: string, k: number, options: SearchCallOptions = {}): Promise<RankedHit[]> {
    options.signal?.throwIfAborted();

    const terms = tokenize(text);
    if (terms.length === 0 || this.chunks.size === 0) return [];

    // Extended search: `|` separates alternatives, so any term may match
    const results = this.fuse.search(terms.join(' | '), { limit: k });

    return results.map((result) => ({
      text: result.item.text,
      metadata: result.item.metadata,
      score: { mode: 'keyword' as const, value: 1 - (result.score ?? 0) },
    }));
  }

  async bulkIndex(items: IndexItem[]): Promise<BulkIndexResult> {
    const errors: IndexItemError[] = [];
    let successCount = 0;

    items.forEach((item, index) => {
      const problem = this.validate(item);
      if (problem) {
        errors.push({ index, reason: problem, type: 'invalid_item' });
        return;
      }

      this.dimensions ??= item.vector.length;
      const id = fusionKey(item.metadata);
      this.chunks.set(id, { ...item, id });
      successCount++;
    });

    if (successCount > 0) {
      this.fuse = this.createFuse(Array.from(this.chunks.values()));
    }

    return { successCount, errors };
  }

  async count(): Promise<number> {
    return this.chunks.size;
  }

  delete(source: string, chunkId: number): boolean {
    const deleted = this.chunks.delete(fusionKey({ source, chunkId }));
    if (deleted) {
      this.fuse = this.createFuse(Array.from(this.chunks.values()));
    }
    return deleted;
  }

  clear(): void {
    this.chunks.clear();
    this.fuse = this.createFuse([]);
  }

  private validate(item: IndexItem): string | undefined {
    if (item.text.trim().length === 0) {
      return 'Chunk text is empty';
    }
    if (!isFiniteVector(item.vector)) {
      return 'Vector is empty or contains non-finite values';
    }
    if (this.dimensions !== undefined && item.vector.length !== this.dimensions) {
      return `Vector dimension mismatch: expected ${this.dimensions}, got ${item.vector.length}`;
    }
    return undefined;
  }
}

/**
 * Lowercase alphanumeric terms, at least two characters long.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((term) => term.length > 1);
}
