/**
 * Ollama Embedder
 *
 * Local embeddings via the Ollama `/api/embed` endpoint (v0.1.33+),
 * which accepts a batch of inputs in one call.
 */

import { z } from 'zod';
import { BaseHttpEmbedder, type HttpEmbedderConfig } from './base.js';

const embedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

export interface OllamaEmbedderConfig extends HttpEmbedderConfig {
  /** Keep the model loaded for this long (e.g., '5m') */
  keepAlive?: string;
}

export class OllamaEmbedder extends BaseHttpEmbedder {
  readonly provider = 'ollama';
  private ollamaConfig: OllamaEmbedderConfig;

  constructor(config: OllamaEmbedderConfig = {}) {
    super(config);
    this.ollamaConfig = config;
  }

  protected getDefaultModel(): string {
    return 'all-minilm';
  }

  protected getBaseUrl(): string {
    return this.config.baseUrl || 'http://127.0.0.1:11434/api';
  }

  protected async requestEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const body: { model: string; input: string[]; keep_alive?: string } = {
      model: this.model,
      input: texts,
    };
    if (this.ollamaConfig.keepAlive) {
      body.keep_alive = this.ollamaConfig.keepAlive;
    }

    const data = this.parse(embedResponseSchema, await this.postJson('/embed', body, signal));
    return data.embeddings;
  }
}
