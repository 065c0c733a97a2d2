/**
 * Ingester
 *
 * Load -> chunk -> embed (batched) -> bulk index. Items rejected by the
 * backend are reported, not thrown; embedding and transport failures
 * propagate.
 *
 * @example
 * ```ts
 * const ingester = new Ingester({
 *   chunker: new Chunker({ size: 512, overlap: 50 }),
 *   embedder,
 *   backend,
 *   logger,
 * });
 *
 * const report = await ingester.ingestDirectory('data/documents');
 * console.log(`${report.indexed}/${report.chunks} chunks indexed`);
 * ```
 */

import type { Chunker } from '../chunking/chunker.js';
import { ConfigurationError, EmbeddingError } from '../core/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import type { BulkIndexResult, Chunk, Document, Embedder, IndexItemError, SearchBackend } from '../types/index.js';
import { loadDocuments, type LoadOptions } from './loader.js';

export const DEFAULT_BATCH_SIZE = 32;

/** Item errors written to the log after an ingestion run */
const LOGGED_ERRORS = 5;

export interface IngesterOptions {
  chunker: Chunker;
  embedder: Embedder;
  backend: SearchBackend;
  /** Chunks per embedding call and bulk request (default: 32) */
  batchSize?: number;
  logger?: Logger;
}

export interface IngestReport {
  /** Documents chunked */
  documents: number;
  /** Chunks produced */
  chunks: number;
  /** Chunks the backend accepted */
  indexed: number;
  /** Rejected chunks; `index` is the chunk's position in this run */
  errors: IndexItemError[];
  /** Chunks in the backend after the run */
  total: number;
}

export class Ingester {
  private chunker: Chunker;
  private embedder: Embedder;
  private backend: SearchBackend;
  private batchSize: number;
  private logger: Logger;

  constructor(options: IngesterOptions) {
    this.chunker = options.chunker;
    this.embedder = options.embedder;
    this.backend = options.backend;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.logger = options.logger ?? silentLogger;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new ConfigurationError(`Batch size must be a positive integer, got ${this.batchSize}`, {
        configKey: 'ingestion.batchSize',
      });
    }
  }

  async ingestDirectory(directory: string, options: Omit<LoadOptions, 'logger'> = {}): Promise<IngestReport> {
    const documents = await loadDocuments(directory, { ...options, logger: this.logger });
    return this.ingest(documents);
  }

  async ingest(documents: readonly Document[]): Promise<IngestReport> {
    const chunks = documents.flatMap((document) => this.chunker.chunkDocument(document));
    this.logger.info({ documents: documents.length, chunks: chunks.length }, `Created ${chunks.length} chunks`);

    let indexed = 0;
    const errors: IndexItemError[] = [];

    for (let start = 0; start < chunks.length; start += this.batchSize) {
      const batch = chunks.slice(start, start + this.batchSize);
      const result = await this.indexBatch(batch);

      indexed += result.successCount;
      for (const error of result.errors) {
        errors.push({ ...error, index: start + error.index });
      }

      this.logger.debug(
        { processed: Math.min(start + batch.length, chunks.length), of: chunks.length },
        'Indexed batch'
      );
    }

    if (errors.length > 0) {
      this.logger.warn({ failed: errors.length }, `${errors.length} chunks were rejected by the backend`);
      for (const error of errors.slice(0, LOGGED_ERRORS)) {
        this.logger.warn({ index: error.index, type: error.type, status: error.status }, error.reason);
      }
    }

    const total = await this.backend.count();
    this.logger.info({ indexed, failed: errors.length, total }, `Indexed ${indexed} chunks`);

    return { documents: documents.length, chunks: chunks.length, indexed, errors, total };
  }

  private async indexBatch(batch: Chunk[]): Promise<BulkIndexResult> {
    const vectors = await this.embedder.embedBatch(batch.map((chunk) => chunk.text));
    if (vectors.length !== batch.length) {
      throw new EmbeddingError(`Embedder returned ${vectors.length} vectors for ${batch.length} chunks`, {
        expected: batch.length,
        actual: vectors.length,
      });
    }

    return this.backend.bulkIndex(
      batch.map((chunk, i) => ({
        text: chunk.text,
        vector: vectors[i],
        metadata: chunk.metadata,
      }))
    );
  }
}
