import { describe, it, expect } from 'vitest';
import { buildContext, formatContext, formatResults } from '../../src/retrieval/format.js';
import type { RankedHit } from '../../src/types/index.js';
import { metadata } from '../helpers/hits.js';

const water: RankedHit = {
  text: 'Water is wet.',
  metadata: metadata('physics.txt', 2),
  score: { mode: 'vector', value: 0.87654 },
};

const fire: RankedHit = {
  text: 'Fire is hot.',
  metadata: metadata('chemistry.md', 0),
  score: { mode: 'hybrid', value: 0.0165 },
};

describe('formatResults', () => {
  it('should report an empty result list', () => {
    expect(formatResults([])).toBe('No results found.');
  });

  it('should format one block per hit', () => {
    expect(formatResults([water, fire])).toBe(
      '[1] Source: physics.txt (chunk 2)\n' +
        '    Score: 0.8765\n' +
        '    Text: Water is wet.\n' +
        '\n' +
        '[2] Source: chemistry.md (chunk 0)\n' +
        '    Score: 0.0165\n' +
        '    Text: Fire is hot.\n'
    );
  });

  it('should truncate long text to 300 characters', () => {
    const long: RankedHit = { ...water, text: 'x'.repeat(350) };

    expect(formatResults([long])).toBe(
      '[1] Source: physics.txt (chunk 2)\n' + '    Score: 0.8765\n' + `    Text: ${'x'.repeat(300)}...\n`
    );
  });

  it('should not mark text of exactly 300 characters as truncated', () => {
    const exact: RankedHit = { ...water, text: 'y'.repeat(300) };

    expect(formatResults([exact])).toContain(`    Text: ${'y'.repeat(300)}\n`);
    expect(formatResults([exact])).not.toContain('...');
  });

  it('should label hits without a source', () => {
    const anonymous: RankedHit = { ...water, metadata: { ...water.metadata, source: '' } };

    expect(formatResults([anonymous])).toMatch(/^\[1\] Source: Unknown \(chunk 2\)\n/);
  });
});

describe('buildContext', () => {
  it('should number the passages and append the question', () => {
    expect(buildContext('What is wet?', [water, fire])).toBe(
      'Answer the following question based only on the provided context.\n\n' +
        'Context:\n' +
        'Document 1 (physics.txt):\nWater is wet.\n\n' +
        'Document 2 (chemistry.md):\nFire is hot.\n\n' +
        'Question: What is wet?\n\n' +
        'Answer:'
    );
  });

  it('should keep the full passage text', () => {
    const long: RankedHit = { ...water, text: 'z'.repeat(400) };

    expect(formatContext([long])).toBe(`Document 1 (physics.txt):\n${'z'.repeat(400)}`);
  });
});
