import type { RankedHit } from '../types/index.js';

/** Characters of hit text shown by {@link formatResults} */
export const PREVIEW_LENGTH = 300;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Human-readable listing of hits for terminals and logs.
 */
export function formatResults(results: readonly RankedHit[]): string {
  if (results.length === 0) {
    return 'No results found.';
  }

  return results
    .map((result, i) =>
      `[${i + 1}] Source: ${result.metadata.source || 'Unknown'} (chunk ${result.metadata.chunkId})\n` +
      `    Score: ${result.score.value.toFixed(4)}\n` +
      `    Text: ${preview(result.text)}\n`
    )
    .join('\n');
}

/**
 * Retrieved passages as numbered context blocks.
 */
export function formatContext(results: readonly RankedHit[]): string {
  return results
    .map((result, i) => `Document ${i + 1} (${result.metadata.source || 'Unknown'}):\n${result.text}`)
    .join('\n\n');
}

/**
 * Prompt asking a language model to answer from the retrieved context only.
 */
export function buildContext(query: string, results: readonly RankedHit[]): string {
  return (
    'Answer the following question based only on the provided context.\n\n' +
    `Context:\n${formatContext(results)}\n\n` +
    `Question: ${query}\n\n` +
    'Answer:'
  );
}
