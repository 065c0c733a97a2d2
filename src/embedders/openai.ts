/**
 * OpenAI Embedder
 *
 * Works with the OpenAI API and OpenAI-compatible servers
 * (vLLM, LM Studio, LocalAI...) through `baseUrl`.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { BaseHttpEmbedder, type HttpEmbedderConfig } from './base.js';

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string().optional(),
});

export interface OpenAIEmbedderConfig extends HttpEmbedderConfig {
  /** Organization ID */
  organization?: string;
  /** Ask the model to shorten its vectors (text-embedding-3 models) */
  requestDimensions?: boolean;
}

export class OpenAIEmbedder extends BaseHttpEmbedder {
  readonly provider = 'openai';
  private openaiConfig: OpenAIEmbedderConfig;

  constructor(config: OpenAIEmbedderConfig = {}) {
    super(config);
    this.openaiConfig = config;
  }

  protected getDefaultModel(): string {
    return 'text-embedding-3-small';
  }

  protected getBaseUrl(): string {
    return this.config.baseUrl || 'https://api.openai.com/v1';
  }

  protected buildHeaders(): Record<string, string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new ConfigurationError('API key not configured for embedding provider: openai', {
        configKey: 'embedding.apiKey',
      });
    }

    const headers: Record<string, string> = {
      ...super.buildHeaders(),
      Authorization: `Bearer ${apiKey}`,
    };
    if (this.openaiConfig.organization) {
      headers['OpenAI-Organization'] = this.openaiConfig.organization;
    }
    return headers;
  }

  protected async requestEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const body = {
      model: this.model,
      input: texts,
      ...(this.openaiConfig.requestDimensions && this.dimensions !== undefined && { dimensions: this.dimensions }),
    };

    const data = this.parse(embeddingResponseSchema, await this.postJson('/embeddings', body, signal));

    // Order is not guaranteed, `index` is
    return [...data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
