/**
 * Retriever - query-time dispatch to vector, keyword or hybrid search.
 *
 * Hybrid mode runs both sub-searches concurrently, over-fetching candidates,
 * and merges them with {@link fuse}. A failing channel degrades to an empty
 * list instead of failing the query. Every such failure is logged and
 * reported, and a query whose channels all failed is logged as an error.
 *
 * @example
 * ```ts
 * const retriever = new Retriever({ embedder, backend, logger: fromPino(pino()) });
 *
 * const hits = await retriever.retrieve('water properties', 'hybrid', 5);
 * console.log(retriever.formatResults(hits));
 * ```
 */

import { AbortError, ConfigurationError } from '../core/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import {
  SEARCH_MODES,
  type Embedder,
  type RankedHit,
  type SearchBackend,
  type SearchMode,
} from '../types/index.js';
import { DEFAULT_ALPHA, fuse, validateAlpha, validateTopK } from './fusion.js';
import { buildContext, formatResults } from './format.js';

/** Candidates requested from each channel in hybrid mode, per result wanted */
export const OVERFETCH_FACTOR = 2;

export const DEFAULT_TOP_K = 5;

export type RetrievalChannel = 'vector' | 'keyword';

export interface ChannelFailure {
  channel: RetrievalChannel;
  error: Error;
}

export interface RetrievalResult {
  mode: SearchMode;
  hits: RankedHit[];
  /** Channels that failed and were treated as returning nothing */
  failures: ChannelFailure[];
  /** True when at least one channel failed */
  degraded: boolean;
}

export interface RetrieverOptions {
  embedder: Embedder;
  backend: SearchBackend;
  logger?: Logger;
  /** Default vector weight for hybrid fusion (default: 0.5) */
  alpha?: number;
  /** Default number of results (default: 5) */
  defaultK?: number;
  /** Hybrid over-fetch multiplier (default: 2) */
  overfetchFactor?: number;
  /** Called for every channel failure that was degraded to an empty list */
  onChannelFailure?: (failure: ChannelFailure, query: string) => void;
}

export interface RetrieveOptions {
  /** Vector weight for this query, overrides the retriever default */
  alpha?: number;
  signal?: AbortSignal;
}

interface ChannelOutcome {
  hits: RankedHit[];
  failure?: ChannelFailure;
}

export function isSearchMode(value: string): value is SearchMode {
  return SEARCH_MODES.some((mode) => mode === value);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === 'string' ? reason : undefined;
}

export class Retriever {
  private embedder: Embedder;
  private backend: SearchBackend;
  private logger: Logger;
  private alpha: number;
  private defaultK: number;
  private overfetchFactor: number;
  private onChannelFailure?: RetrieverOptions['onChannelFailure'];

  constructor(options: RetrieverOptions) {
    this.embedder = options.embedder;
    this.backend = options.backend;
    this.logger = options.logger ?? silentLogger;
    this.alpha = options.alpha ?? DEFAULT_ALPHA;
    this.defaultK = options.defaultK ?? DEFAULT_TOP_K;
    this.overfetchFactor = options.overfetchFactor ?? OVERFETCH_FACTOR;
    this.onChannelFailure = options.onChannelFailure;

    validateAlpha(this.alpha);
    validateTopK(this.defaultK);
    if (!Number.isInteger(this.overfetchFactor) || this.overfetchFactor < 1) {
      throw new ConfigurationError(`overfetchFactor must be an integer >= 1, got ${this.overfetchFactor}`, {
        configKey: 'retrieval.overfetchFactor',
      });
    }
  }

  /**
   * Retrieve the `k` most relevant chunks for a query.
   *
   * @throws ConfigurationError for an unknown mode, a bad `k` or `alpha`
   * @throws AbortError when `options.signal` is aborted
   */
  async retrieve(
    query: string,
    mode: string = 'hybrid',
    k: number = this.defaultK,
    options: RetrieveOptions = {}
  ): Promise<RankedHit[]> {
    const result = await this.retrieveDetailed(query, mode, k, options);
    return result.hits;
  }

  /**
   * Same as {@link retrieve}, also reporting which channels failed.
   */
  async retrieveDetailed(
    query: string,
    mode: string = 'hybrid',
    k: number = this.defaultK,
    options: RetrieveOptions = {}
  ): Promise<RetrievalResult> {
    if (!isSearchMode(mode)) {
      throw new ConfigurationError(`Unknown retrieval mode: ${mode} (expected one of ${SEARCH_MODES.join(', ')})`, {
        configKey: 'retrieval.mode',
      });
    }
    validateTopK(k);
    const alpha = options.alpha ?? this.alpha;
    validateAlpha(alpha);

    const { signal } = options;
    if (signal?.aborted) {
      throw new AbortError(abortReason(signal));
    }

    this.logger.debug({ mode, k }, `Retrieving for query "${query}"`);

    let outcomes: ChannelOutcome[];
    let hits: RankedHit[];

    if (mode === 'vector') {
      const vector = await this.vectorChannel(query, k, signal);
      outcomes = [vector];
      hits = vector.hits;
    } else if (mode === 'keyword') {
      const keyword = await this.keywordChannel(query, k, signal);
      outcomes = [keyword];
      hits = keyword.hits;
    } else {
      const candidates = k * this.overfetchFactor;
      const [vector, keyword] = await Promise.all([
        this.vectorChannel(query, candidates, signal),
        this.keywordChannel(query, candidates, signal),
      ]);
      outcomes = [vector, keyword];
      hits = fuse(vector.hits, keyword.hits, alpha, k);
    }

    const failures = outcomes
      .map((outcome) => outcome.failure)
      .filter((failure): failure is ChannelFailure => failure !== undefined);

    if (failures.length === outcomes.length) {
      this.logger.error(
        { mode, channels: failures.map((f) => f.channel) },
        'All retrieval channels failed; returning no results'
      );
    }

    this.logger.debug({ mode, hits: hits.length, failed: failures.length }, 'Retrieval finished');

    return { mode, hits, failures, degraded: failures.length > 0 };
  }

  formatResults(results: readonly RankedHit[]): string {
    return formatResults(results);
  }

  buildContext(query: string, results: readonly RankedHit[]): string {
    return buildContext(query, results);
  }

  private vectorChannel(query: string, k: number, signal?: AbortSignal): Promise<ChannelOutcome> {
    return this.runChannel('vector', query, signal, async () => {
      const vector = await this.embedder.embed(query, signal);
      return this.backend.vectorSearch(vector, k, { signal });
    });
  }

  private keywordChannel(query: string, k: number, signal?: AbortSignal): Promise<ChannelOutcome> {
    return this.runChannel('keyword', query, signal, () => this.backend.keywordSearch(query, k, { signal }));
  }

  private async runChannel(
    channel: RetrievalChannel,
    query: string,
    signal: AbortSignal | undefined,
    search: () => Promise<RankedHit[]>
  ): Promise<ChannelOutcome> {
    try {
      return { hits: await search() };
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortError(abortReason(signal));
      }

      const failure: ChannelFailure = { channel, error: toError(error) };
      this.logger.warn(
        { channel, err: failure.error },
        `Error during ${channel} search, continuing without it: ${failure.error.message}`
      );
      this.onChannelFailure?.(failure, query);
      return { hits: [], failure };
    }
  }
}
