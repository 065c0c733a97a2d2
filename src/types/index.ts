/**
 * Core types shared by the chunker, fuser, retriever and their collaborators.
 */

export type { Logger, LogLevel } from './logger.js';

/**
 * Metadata attached to a raw document when it is loaded.
 */
export interface DocumentMetadata {
  /** Source identifier (path relative to the ingested directory) */
  source: string;
  /** Human title (file name without extension) */
  title: string;
  /** ISO-8601 load timestamp */
  createdAt: string;
}

/**
 * A raw document. Discarded once it has been chunked.
 */
export interface Document {
  readonly text: string;
  readonly metadata: DocumentMetadata;
}

/**
 * Metadata persisted with every chunk.
 */
export interface ChunkMetadata extends DocumentMetadata {
  /** Zero-based position of the chunk within its document */
  chunkId: number;
  /** Number of chunks the document was split into */
  totalChunks: number;
}

export interface Chunk {
  readonly text: string;
  readonly metadata: ChunkMetadata;
}

export type SearchMode = 'vector' | 'keyword' | 'hybrid';

export const SEARCH_MODES: readonly SearchMode[] = ['vector', 'keyword', 'hybrid'];

/**
 * Relevance score tagged with the mode that produced it.
 *
 * Vector scores are cosine-derived, keyword scores are lexical (BM25 or fuzzy),
 * hybrid scores are RRF sums. Values of different modes are not comparable.
 */
export type HitScore =
  | { mode: 'vector'; value: number }
  | { mode: 'keyword'; value: number }
  | { mode: 'hybrid'; value: number };

export interface RankedHit {
  text: string;
  metadata: ChunkMetadata;
  score: HitScore;
}

/**
 * Hit produced by rank fusion, with its zero-based position in each input list.
 */
export interface FusedHit extends RankedHit {
  score: { mode: 'hybrid'; value: number };
  ranks: {
    vector?: number;
    keyword?: number;
  };
}

export interface SearchCallOptions {
  signal?: AbortSignal;
}

/**
 * Maps text to fixed-length dense vectors.
 */
export interface Embedder {
  /** Expected vector dimension, when known */
  readonly dimensions?: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface IndexItem {
  text: string;
  vector: number[];
  metadata: ChunkMetadata;
}

/**
 * Failure of a single item inside a bulk index request.
 */
export interface IndexItemError {
  /** Position of the item in the submitted batch */
  index: number;
  reason: string;
  type?: string;
  status?: number;
}

export interface BulkIndexResult {
  successCount: number;
  errors: IndexItemError[];
}

/**
 * Search collaborator: vector k-NN search, lexical search and bulk indexing.
 * Returned lists are ordered best-first.
 */
export interface SearchBackend {
  vectorSearch(vector: number[], k: number, options?: SearchCallOptions): Promise<RankedHit[]>;
  keywordSearch(text: string, k: number, options?: SearchCallOptions): Promise<RankedHit[]>;
  bulkIndex(items: IndexItem[]): Promise<BulkIndexResult>;
  count(): Promise<number>;
}
