/**
 * Weighted Reciprocal Rank Fusion (RRF).
 *
 * Merges a vector ranking and a keyword ranking using only each hit's rank
 * position, never its raw score: cosine and BM25 scores live on different
 * scales and cannot be added.
 *
 *   score(d) = alpha / (rank_vector(d) + RRF_K) + (1 - alpha) / (rank_keyword(d) + RRF_K)
 *
 * with zero-based ranks. A hit missing from one list gets nothing from it.
 */

import { ConfigurationError } from '../core/errors.js';
import type { ChunkMetadata, FusedHit, RankedHit } from '../types/index.js';

/** RRF damping constant (Cormack et al., 2009) */
export const RRF_K = 60;

/** Default vector weight: 0 = keyword only, 1 = vector only */
export const DEFAULT_ALPHA = 0.5;

/**
 * Identity of a chunk across independently ranked lists.
 */
export function fusionKey(metadata: Pick<ChunkMetadata, 'source' | 'chunkId'>): string {
  return `${metadata.source}#${metadata.chunkId}`;
}

/**
 * Contribution of a single zero-based rank position.
 *
 * @example
 * ```ts
 * reciprocalRank(0);       // 1/60
 * reciprocalRank(2, 0.5);  // 0.5/62
 * ```
 */
export function reciprocalRank(rank: number, weight = 1): number {
  return weight / (rank + RRF_K);
}

export function validateAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new ConfigurationError(`alpha must be a number between 0 and 1, got ${alpha}`, {
      configKey: 'retrieval.alpha',
    });
  }
}

export function validateTopK(k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new ConfigurationError(`k must be a positive integer, got ${k}`, {
      configKey: 'retrieval.topK',
    });
  }
}

interface FusionEntry {
  key: string;
  hit: RankedHit;
  score: number;
  ranks: FusedHit['ranks'];
}

/**
 * Fuse two ranked lists into one, at most `k` long.
 *
 * When a chunk appears in both lists its contributions are summed and the
 * vector hit's text and metadata are kept. Ties are ordered by fusion key.
 */
export function fuse(
  vectorRanked: readonly RankedHit[],
  keywordRanked: readonly RankedHit[],
  alpha: number,
  k: number
): FusedHit[] {
  validateAlpha(alpha);
  validateTopK(k);

  const entries = new Map<string, FusionEntry>();

  const accumulate = (list: readonly RankedHit[], channel: 'vector' | 'keyword', weight: number) => {
    list.forEach((hit, rank) => {
      const key = fusionKey(hit.metadata);
      const existing = entries.get(key);

      if (!existing) {
        entries.set(key, {
          key,
          hit,
          score: reciprocalRank(rank, weight),
          ranks: channel === 'vector' ? { vector: rank } : { keyword: rank },
        });
        return;
      }

      // Only the best position of a chunk within one list counts
      if (existing.ranks[channel] !== undefined) return;

      existing.score += reciprocalRank(rank, weight);
      existing.ranks[channel] = rank;
    });
  };

  accumulate(vectorRanked, 'vector', alpha);
  accumulate(keywordRanked, 'keyword', 1 - alpha);

  return Array.from(entries.values())
    .sort((a, b) => b.score - a.score || compareKeys(a.key, b.key))
    .slice(0, k)
    .map((entry) => ({
      text: entry.hit.text,
      metadata: entry.hit.metadata,
      score: { mode: 'hybrid' as const, value: entry.score },
      ranks: entry.ranks,
    }));
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
