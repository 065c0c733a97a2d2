export { MemorySearchBackend, tokenize, type MemorySearchBackendOptions } from './memory.js';
export {
  OpenSearchBackend,
  buildIndexBody,
  fromStoredMetadata,
  toStoredMetadata,
  type EnsureIndexOutcome,
  type IndexSettings,
  type OpenSearchBackendOptions,
  type StoredMetadata,
  type VectorEngine,
  type VectorSpaceType,
} from './opensearch.js';
