export * from './types/index.js';
export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';
export * from './core/errors.js';

export { Chunker, chunkText, validateChunkOptions, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './chunking/chunker.js';
export type { ChunkerOptions } from './chunking/chunker.js';

export { fuse, fusionKey, reciprocalRank, validateAlpha, validateTopK, RRF_K, DEFAULT_ALPHA } from './retrieval/fusion.js';
export { formatResults, formatContext, buildContext, PREVIEW_LENGTH } from './retrieval/format.js';
export { Retriever, isSearchMode, OVERFETCH_FACTOR, DEFAULT_TOP_K } from './retrieval/retriever.js';
export type {
  ChannelFailure,
  RetrievalChannel,
  RetrievalResult,
  RetrieveOptions,
  RetrieverOptions,
} from './retrieval/retriever.js';

export * from './embedders/index.js';
export * from './backends/index.js';
export * from './ingestion/index.js';

export { loadConfig, opensearchUrl } from './config.js';
export type { Env, RagConfig } from './config.js';
export { fromPino, createCliLogger } from './utils/logger.js';
