export { loadDocuments, DEFAULT_EXTENSIONS, type LoadOptions } from './loader.js';
export { Ingester, DEFAULT_BATCH_SIZE, type IngesterOptions, type IngestReport } from './ingester.js';
