/**
 * Base HTTP Embedder
 *
 * Shared plumbing for embedding services reached over HTTP:
 * JSON POST via fetch, response error mapping, batching and
 * vector validation. Providers only describe their request and
 * response shapes.
 */

import { z } from 'zod';
import {
  BackendError,
  BackendUnavailableError,
  ConfigurationError,
  EmbeddingError,
  describeError,
} from '../core/errors.js';
import type { Embedder } from '../types/index.js';
import { isFiniteVector } from '../utils/math.js';

export type EmbeddingProvider = 'openai' | 'ollama';

export interface HttpEmbedderConfig {
  /** Embedding model name */
  model?: string;
  /** API base URL, provider default when omitted */
  baseUrl?: string;
  /** API key (sent as a bearer token by providers that need one) */
  apiKey?: string;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Expected vector dimension; vectors of another length raise EmbeddingError */
  dimensions?: number;
  /** Maximum texts per request (default: 32) */
  batchSize?: number;
}

const errorBodySchema = z.object({
  error: z.union([
    z.string(),
    z.object({
      message: z.string().optional(),
      code: z.union([z.string(), z.number()]).nullable().optional(),
      type: z.string().optional(),
    }),
  ]),
});

/**
 * Abstract base class for HTTP embedders
 */
export abstract class BaseHttpEmbedder implements Embedder {
  abstract readonly provider: EmbeddingProvider;
  readonly dimensions?: number;
  protected config: HttpEmbedderConfig;
  protected batchSize: number;

  constructor(config: HttpEmbedderConfig = {}) {
    this.config = config;
    this.dimensions = config.dimensions;
    this.batchSize = config.batchSize ?? 32;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new ConfigurationError(`Embedding batch size must be a positive integer, got ${this.batchSize}`, {
        configKey: 'embedding.batchSize',
      });
    }
  }

  get model(): string {
    return this.config.model ?? this.getDefaultModel();
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], signal);
    if (!vector) {
      throw new EmbeddingError(`${this.provider} returned no embedding`, { expected: 1, actual: 0 });
    }
    return vector;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const result = await this.requestEmbeddings(batch, signal);

      if (result.length !== batch.length) {
        throw new EmbeddingError(
          `${this.provider} returned ${result.length} embeddings for ${batch.length} inputs`,
          { expected: batch.length, actual: result.length }
        );
      }
      for (const vector of result) {
        this.checkVector(vector);
        vectors.push(vector);
      }
    }

    return vectors;
  }

  /**
   * Embed one batch (at most `batchSize` texts), in input order.
   */
  protected abstract requestEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  protected abstract getDefaultModel(): string;

  protected abstract getBaseUrl(): string;

  protected buildHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      ...this.config.headers,
    };
  }

  /**
   * POST a JSON body and return the parsed JSON response.
   */
  protected async postJson(endpoint: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.getBaseUrl()}${endpoint}`;
    const headers = this.buildHeaders();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new BackendUnavailableError(`Cannot reach ${this.provider} embeddings at ${url}: ${describeError(error)}`, {
        backend: this.provider,
        cause: error,
      });
    }

    if (!response.ok) {
      await this.handleError(response);
    }

    return response.json();
  }

  /**
   * Validate a response body against a schema
   */
  protected parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingError(`Unexpected ${this.provider} embeddings response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async handleError(response: Response): Promise<never> {
    let errorData: unknown;
    try {
      errorData = await response.json();
    } catch {
      errorData = undefined;
    }

    const parsed = errorBodySchema.safeParse(errorData);
    let detail = response.statusText;
    if (parsed.success) {
      const { error } = parsed.data;
      detail = typeof error === 'string' ? error : error.message ?? error.type ?? detail;
    }

    const message = `${this.provider} embeddings request failed with status ${response.status}${detail ? `: ${detail}` : ''}`;

    if (response.status === 401 || response.status === 403) {
      throw new BackendUnavailableError(message, { backend: this.provider, status: response.status });
    }
    throw new BackendError(message, { backend: this.provider, status: response.status });
  }

  private checkVector(vector: number[]): void {
    if (!isFiniteVector(vector)) {
      throw new EmbeddingError(`${this.provider} returned an empty or non-finite embedding`);
    }
    if (this.dimensions !== undefined && vector.length !== this.dimensions) {
      throw new EmbeddingError(
        `Embedding dimension mismatch: expected ${this.dimensions}, got ${vector.length}`,
        { expected: this.dimensions, actual: vector.length }
      );
    }
  }
}
