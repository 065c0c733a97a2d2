/**
 * Configuration
 *
 * Settings are read from environment variables and validated with zod.
 * Every variable has a default suitable for a local single-node cluster
 * and a local Ollama server.
 *
 * @example
 * ```typescript
 * const config = loadConfig();            // process.env
 * const config = loadConfig({ CHUNK_SIZE: '256', CHUNK_OVERLAP: '32' });
 * ```
 */

import { z } from 'zod';
import { validateChunkOptions } from './chunking/chunker.js';
import { ConfigurationError } from './core/errors.js';
import type { VectorEngine, VectorSpaceType } from './backends/opensearch.js';
import type { EmbeddingProvider } from './embedders/base.js';
import type { LogLevel } from './types/logger.js';

export interface RagConfig {
  opensearch: {
    host: string;
    port: number;
    username: string;
    password: string;
    useSsl: boolean;
    verifyCerts: boolean;
  };
  index: {
    name: string;
    dimension: number;
    engine: VectorEngine;
    spaceType: VectorSpaceType;
    m: number;
    efConstruction: number;
    efSearch: number;
  };
  embedding: {
    provider: EmbeddingProvider;
    /** Provider default when unset */
    model?: string;
    baseUrl?: string;
    apiKey?: string;
    batchSize: number;
  };
  chunking: {
    size: number;
    overlap: number;
  };
  retrieval: {
    topK: number;
    alpha: number;
  };
  dataDir: string;
  logLevel: LogLevel;
}

const flag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  OPENSEARCH_HOST: z.string().default('localhost'),
  OPENSEARCH_PORT: positiveInt.max(65535).default(9200),
  OPENSEARCH_USER: z.string().default('admin'),
  OPENSEARCH_PASSWORD: z.string().default('admin'),
  OPENSEARCH_USE_SSL: flag.default('true'),
  OPENSEARCH_VERIFY_CERTS: flag.default('false'),

  RAG_INDEX_NAME: z.string().default('rag-documents'),
  VECTOR_DIMENSION: positiveInt.default(384),
  VECTOR_ENGINE: z.enum(['lucene', 'faiss', 'nmslib']).default('lucene'),
  VECTOR_SPACE_TYPE: z.enum(['cosinesimil', 'l2', 'innerproduct']).default('cosinesimil'),
  HNSW_M: positiveInt.default(16),
  HNSW_EF_CONSTRUCTION: positiveInt.default(100),
  HNSW_EF_SEARCH: positiveInt.default(100),

  EMBEDDING_PROVIDER: z.enum(['ollama', 'openai']).default('ollama'),
  EMBEDDING_MODEL: z.string().optional(),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_BATCH_SIZE: positiveInt.default(32),

  CHUNK_SIZE: positiveInt.default(512),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),

  TOP_K_RESULTS: positiveInt.default(5),
  HYBRID_SEARCH_ALPHA: z.coerce.number().min(0).max(1).default(0.5),

  RAG_DATA_DIR: z.string().default('data/documents'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = Record<string, string | undefined>;

/**
 * Build a validated configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(env: Env = process.env): RagConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(`Invalid configuration: ${key ?? 'environment'}: ${issue?.message ?? 'invalid value'}`, {
      configKey: key,
      cause: parsed.error,
    });
  }

  const e = parsed.data;
  validateChunkOptions(e.CHUNK_SIZE, e.CHUNK_OVERLAP);

  return {
    opensearch: {
      host: e.OPENSEARCH_HOST,
      port: e.OPENSEARCH_PORT,
      username: e.OPENSEARCH_USER,
      password: e.OPENSEARCH_PASSWORD,
      useSsl: e.OPENSEARCH_USE_SSL,
      verifyCerts: e.OPENSEARCH_VERIFY_CERTS,
    },
    index: {
      name: e.RAG_INDEX_NAME,
      dimension: e.VECTOR_DIMENSION,
      engine: e.VECTOR_ENGINE,
      spaceType: e.VECTOR_SPACE_TYPE,
      m: e.HNSW_M,
      efConstruction: e.HNSW_EF_CONSTRUCTION,
      efSearch: e.HNSW_EF_SEARCH,
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      baseUrl: e.EMBEDDING_BASE_URL,
      apiKey: e.EMBEDDING_API_KEY,
      batchSize: e.EMBEDDING_BATCH_SIZE,
    },
    chunking: {
      size: e.CHUNK_SIZE,
      overlap: e.CHUNK_OVERLAP,
    },
    retrieval: {
      topK: e.TOP_K_RESULTS,
      alpha: e.HYBRID_SEARCH_ALPHA,
    },
    dataDir: e.RAG_DATA_DIR,
    logLevel: e.LOG_LEVEL,
  };
}

export function opensearchUrl(config: RagConfig['opensearch']): string {
  return `${config.useSsl ? 'https' : 'http'}://${config.host}:${config.port}`;
}
