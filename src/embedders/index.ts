import type { RagConfig } from '../config.js';
import type { BaseHttpEmbedder } from './base.js';
import { OllamaEmbedder } from './ollama.js';
import { OpenAIEmbedder } from './openai.js';

export { BaseHttpEmbedder, type EmbeddingProvider, type HttpEmbedderConfig } from './base.js';
export { OpenAIEmbedder, type OpenAIEmbedderConfig } from './openai.js';
export { OllamaEmbedder, type OllamaEmbedderConfig } from './ollama.js';

/**
 * Create the embedder selected by configuration, expecting vectors of the
 * configured index dimension.
 */
export function createEmbedder(config: Pick<RagConfig, 'embedding' | 'index'>): BaseHttpEmbedder {
  const options = {
    model: config.embedding.model,
    baseUrl: config.embedding.baseUrl,
    apiKey: config.embedding.apiKey,
    batchSize: config.embedding.batchSize,
    dimensions: config.index.dimension,
  };

  switch (config.embedding.provider) {
    case 'openai':
      return new OpenAIEmbedder(options);
    case 'ollama':
      return new OllamaEmbedder(options);
  }
}
