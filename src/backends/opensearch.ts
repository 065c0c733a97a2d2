/**
 * OpenSearch Search Backend
 *
 * Talks to the OpenSearch REST API through undici:
 * - k-NN (HNSW) queries on the `text_vector` field for vector search
 * - BM25 `match` queries with automatic fuzziness for keyword search
 * - NDJSON `_bulk` requests for ingestion
 * - index provisioning (k-NN enabled settings and mappings)
 *
 * Responses are validated with zod before they reach the retriever.
 *
 * @example
 * ```typescript
 * const backend = new OpenSearchBackend({
 *   node: 'https://localhost:9200',
 *   index: 'rag-documents',
 *   username: 'admin',
 *   password: process.env.OPENSEARCH_PASSWORD,
 * });
 *
 * await backend.ensureIndex({ dimension: 384 });
 * const hits = await backend.keywordSearch('opensearch architecture', 5);
 * await backend.close();
 * ```
 */

import { Agent, request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { BackendError, BackendUnavailableError, describeError } from '../core/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import type {
  BulkIndexResult,
  ChunkMetadata,
  IndexItem,
  IndexItemError,
  RankedHit,
  SearchBackend,
  SearchCallOptions,
} from '../types/index.js';

const BACKEND = 'opensearch';

export type VectorEngine = 'lucene' | 'faiss' | 'nmslib';
export type VectorSpaceType = 'cosinesimil' | 'l2' | 'innerproduct';

export interface IndexSettings {
  /** Embedding dimension (e.g., 384 for all-MiniLM-L6-v2) */
  dimension: number;
  /** k-NN engine (default: 'lucene') */
  engine?: VectorEngine;
  /** Distance function (default: 'cosinesimil') */
  spaceType?: VectorSpaceType;
  /** HNSW bidirectional links per node (default: 16) */
  m?: number;
  /** HNSW candidate list size while indexing (default: 100) */
  efConstruction?: number;
  /** HNSW candidate list size while searching (default: 100) */
  efSearch?: number;
  /** Default: 1 */
  shards?: number;
  /** Default: 1 */
  replicas?: number;
}

export interface OpenSearchBackendOptions {
  /** Cluster URL, e.g. 'https://localhost:9200' */
  node: string;
  /** Index holding the chunks */
  index: string;
  username?: string;
  password?: string;
  /** Verify TLS certificates (default: false, clusters often run self-signed) */
  verifyCerts?: boolean;
  /** HNSW `ef_search` sent with every k-NN query (default: 100) */
  efSearch?: number;
  /** Refresh the index after bulk requests so new chunks are searchable (default: true) */
  refreshOnBulk?: boolean;
  /** Custom undici dispatcher (connection pool, proxy, MockAgent) */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export type EnsureIndexOutcome = 'created' | 'exists' | 'recreated';

type Method = 'GET' | 'POST' | 'PUT' | 'HEAD' | 'DELETE';

/**
 * Chunk metadata as persisted in the index.
 */
export interface StoredMetadata {
  source: string;
  title: string;
  chunk_id: number;
  total_chunks: number;
  created_at: string;
}

const storedMetadataSchema = z.object({
  source: z.string().default(''),
  title: z.string().default(''),
  chunk_id: z.number().int().default(0),
  total_chunks: z.number().int().default(1),
  created_at: z.string().default(''),
});

const searchResponseSchema = z.object({
  hits: z.object({
    hits: z.array(
      z.object({
        _score: z.number().nullable().optional(),
        _source: z.object({
          text: z.string(),
          metadata: storedMetadataSchema.default({}),
        }),
      })
    ),
  }),
});

const bulkItemSchema = z.object({
  status: z.number(),
  error: z
    .object({
      type: z.string().optional(),
      reason: z.string().nullable().optional(),
    })
    .optional(),
});

const bulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(z.record(z.string(), bulkItemSchema)),
});

const countResponseSchema = z.object({ count: z.number() });

const infoResponseSchema = z.object({
  cluster_name: z.string(),
  version: z.object({ number: z.string() }),
});

const acknowledgedSchema = z.object({ acknowledged: z.boolean() });

const errorBodySchema = z.object({
  error: z.union([
    z.string(),
    z.object({ type: z.string().optional(), reason: z.string().nullable().optional() }),
  ]),
});

const jsonObjectSchema = z.record(z.string(), z.unknown());

export function toStoredMetadata(metadata: ChunkMetadata): StoredMetadata {
  return {
    source: metadata.source,
    title: metadata.title,
    chunk_id: metadata.chunkId,
    total_chunks: metadata.totalChunks,
    created_at: metadata.createdAt,
  };
}

export function fromStoredMetadata(metadata: StoredMetadata): ChunkMetadata {
  return {
    source: metadata.source,
    title: metadata.title,
    chunkId: metadata.chunk_id,
    totalChunks: metadata.total_chunks,
    createdAt: metadata.created_at,
  };
}

/**
 * Settings and mappings of a k-NN enabled chunk index.
 */
export function buildIndexBody(settings: IndexSettings): Record<string, unknown> {
  return {
    settings: {
      index: {
        number_of_shards: settings.shards ?? 1,
        number_of_replicas: settings.replicas ?? 1,
        knn: true,
        'knn.algo_param.ef_search': settings.efSearch ?? 100,
      },
    },
    mappings: {
      properties: {
        text: {
          type: 'text',
          analyzer: 'standard',
        },
        text_vector: {
          type: 'knn_vector',
          dimension: settings.dimension,
          method: {
            name: 'hnsw',
            space_type: settings.spaceType ?? 'cosinesimil',
            engine: settings.engine ?? 'lucene',
            parameters: {
              ef_construction: settings.efConstruction ?? 100,
              m: settings.m ?? 16,
            },
          },
        },
        metadata: {
          properties: {
            source: { type: 'keyword' },
            chunk_id: { type: 'integer' },
            total_chunks: { type: 'integer' },
            title: { type: 'text' },
            created_at: { type: 'date' },
          },
        },
      },
    },
  };
}

interface SendOptions {
  body?: unknown;
  /** Pre-serialized NDJSON body */
  ndjson?: string;
  signal?: AbortSignal;
}

interface RawResponse {
  status: number;
  data: unknown;
}

export class OpenSearchBackend implements SearchBackend {
  private node: string;
  private index: string;
  private headers: Record<string, string>;
  private efSearch: number;
  private refreshOnBulk: boolean;
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private logger: Logger;

  constructor(options: OpenSearchBackendOptions) {
    this.node = options.node.endsWith('/') ? options.node.slice(0, -1) : options.node;
    this.index = options.index;
    this.efSearch = options.efSearch ?? 100;
    this.refreshOnBulk = options.refreshOnBulk ?? true;
    this.logger = options.logger ?? silentLogger;

    this.headers = {};
    if (options.username !== undefined) {
      const credentials = Buffer.from(`${options.username}:${options.password ?? ''}`).toString('base64');
      this.headers.authorization = `Basic ${credentials}`;
    }

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: options.verifyCerts ?? false } });
      this.ownsDispatcher = true;
    }
  }

  get indexName(): string {
    return this.index;
  }

  async vectorSearch(vector: number[], k: number, options: SearchCallOptions = {}): Promise<RankedHit[]> {
    const body = {
      size: k,
      query: {
        knn: {
          text_vector: {
            vector,
            k,
            method_parameters: {
              ef_search: this.efSearch,
            },
          },
        },
      },
      _source: ['text', 'metadata'],
    };

    const data = await this.search(body, options.signal);
    return data.hits.hits.map((hit) => ({
      text: hit._source.text,
      metadata: fromStoredMetadata(hit._source.metadata),
      score: { mode: 'vector' as const, value: hit._score ?? 0 },
    }));
  }

  async keywordSearch(text: string, k: number, options: SearchCallOptions = {}): Promise<RankedHit[]> {
    const body = {
      size: k,
      query: {
        match: {
          text: {
            query: text,
            fuzziness: 'AUTO',
          },
        },
      },
      _source: ['text', 'metadata'],
    };

    const data = await this.search(body, options.signal);
    return data.hits.hits.map((hit) => ({
      text: hit._source.text,
      metadata: fromStoredMetadata(hit._source.metadata),
      score: { mode: 'keyword' as const, value: hit._score ?? 0 },
    }));
  }

  /**
   * Index chunks with one `_bulk` request. Item failures are collected,
   * never thrown; only a failure of the whole request throws.
   */
  async bulkIndex(items: IndexItem[]): Promise<BulkIndexResult> {
    if (items.length === 0) {
      return { successCount: 0, errors: [] };
    }

    const action = JSON.stringify({ index: { _index: this.index } });
    const ndjson = items
      .map((item) =>
        `${action}\n${JSON.stringify({
          text: item.text,
          text_vector: item.vector,
          metadata: toStoredMetadata(item.metadata),
        })}\n`
      )
      .join('');

    const path = this.refreshOnBulk ? '/_bulk?refresh=true' : '/_bulk';
    const response = await this.send('POST', path, { ndjson });
    const data = this.expectOk(response, bulkResponseSchema, 'bulk index');

    const errors: IndexItemError[] = [];
    let successCount = 0;

    data.items.forEach((entry, index) => {
      const result = Object.values(entry)[0];
      if (!result) return;

      if (result.error || result.status >= 300) {
        errors.push({
          index,
          reason: result.error?.reason ?? `Item failed with status ${result.status}`,
          type: result.error?.type,
          status: result.status,
        });
      } else {
        successCount++;
      }
    });

    this.logger.debug({ index: this.index, successCount, failed: errors.length }, 'Bulk request finished');
    return { successCount, errors };
  }

  async count(): Promise<number> {
    const response = await this.send('GET', `/${encodeURIComponent(this.index)}/_count`);
    return this.expectOk(response, countResponseSchema, 'count').count;
  }

  /**
   * Cluster name and version, also a cheap connectivity check.
   */
  async info(): Promise<{ clusterName: string; version: string }> {
    const response = await this.send('GET', '/');
    const data = this.expectOk(response, infoResponseSchema, 'info');
    return { clusterName: data.cluster_name, version: data.version.number };
  }

  async indexExists(): Promise<boolean> {
    const response = await this.send('HEAD', `/${encodeURIComponent(this.index)}`);
    if (response.status === 404) return false;
    this.expectStatus(response, 'index exists');
    return true;
  }

  async createIndex(settings: IndexSettings): Promise<void> {
    const response = await this.send('PUT', `/${encodeURIComponent(this.index)}`, {
      body: buildIndexBody(settings),
    });
    this.expectOk(response, acknowledgedSchema, 'create index');
    this.logger.info(
      {
        index: this.index,
        dimension: settings.dimension,
        engine: settings.engine ?? 'lucene',
        spaceType: settings.spaceType ?? 'cosinesimil',
      },
      'Created vector index'
    );
  }

  async deleteIndex(): Promise<void> {
    const response = await this.send('DELETE', `/${encodeURIComponent(this.index)}`);
    this.expectOk(response, acknowledgedSchema, 'delete index');
    this.logger.info({ index: this.index }, 'Deleted index');
  }

  /**
   * Create the index unless it exists; with `recreate`, drop it first.
   */
  async ensureIndex(settings: IndexSettings, options: { recreate?: boolean } = {}): Promise<EnsureIndexOutcome> {
    const exists = await this.indexExists();

    if (exists && !options.recreate) {
      return 'exists';
    }
    if (exists) {
      await this.deleteIndex();
    }

    await this.createIndex(settings);
    return exists ? 'recreated' : 'created';
  }

  async getIndexInfo(): Promise<{ mappings: Record<string, unknown>; settings: Record<string, unknown>; count: number }> {
    const name = encodeURIComponent(this.index);
    const [mappings, settings, count] = await Promise.all([
      this.send('GET', `/${name}/_mapping`).then((r) => this.expectOk(r, jsonObjectSchema, 'get mapping')),
      this.send('GET', `/${name}/_settings`).then((r) => this.expectOk(r, jsonObjectSchema, 'get settings')),
      this.count(),
    ]);
    return { mappings, settings, count };
  }

  /**
   * Release the connection pool, if this backend created it.
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async search(body: unknown, signal?: AbortSignal): Promise<z.infer<typeof searchResponseSchema>> {
    const response = await this.send('POST', `/${encodeURIComponent(this.index)}/_search`, { body, signal });
    return this.expectOk(response, searchResponseSchema, 'search');
  }

  private async send(method: Method, path: string, options: SendOptions = {}): Promise<RawResponse> {
    const headers: Record<string, string> = { ...this.headers };
    let payload: string | undefined;

    if (options.ndjson !== undefined) {
      headers['content-type'] = 'application/x-ndjson';
      payload = options.ndjson;
    } else if (options.body !== undefined) {
      headers['content-type'] = 'application/json';
      payload = JSON.stringify(options.body);
    }

    this.logger.debug({ method, path }, 'OpenSearch request');

    let statusCode: number;
    let text: string;
    try {
      const response = await request(`${this.node}${path}`, {
        method,
        headers,
        body: payload,
        dispatcher: this.dispatcher,
        signal: options.signal,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (error) {
      if (options.signal?.aborted) throw error;
      throw new BackendUnavailableError(`Cannot reach OpenSearch at ${this.node}: ${describeError(error)}`, {
        backend: BACKEND,
        cause: error,
      });
    }

    return { status: statusCode, data: parseJson(text) };
  }

  private expectStatus(response: RawResponse, operation: string): void {
    if (response.status < 300) return;

    const reason = errorReason(response.data);
    const message = `OpenSearch ${operation} failed with status ${response.status}${reason ? `: ${reason}` : ''}`;

    if (response.status === 401 || response.status === 403) {
      throw new BackendUnavailableError(message, { backend: BACKEND, status: response.status });
    }
    throw new BackendError(message, { backend: BACKEND, status: response.status });
  }

  private expectOk<T>(response: RawResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>, operation: string): T {
    this.expectStatus(response, operation);

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new BackendError(`Unexpected OpenSearch ${operation} response: ${parsed.error.message}`, {
        backend: BACKEND,
        status: response.status,
        retriable: false,
      });
    }
    return parsed.data;
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function errorReason(data: unknown): string | undefined {
  const parsed = errorBodySchema.safeParse(data);
  if (!parsed.success) {
    return typeof data === 'string' && data.length > 0 ? data : undefined;
  }
  const { error } = parsed.data;
  if (typeof error === 'string') return error;
  return error.reason ?? error.type;
}
