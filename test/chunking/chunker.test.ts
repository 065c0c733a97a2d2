import { describe, it, expect } from 'vitest';
import { Chunker, chunkText, validateChunkOptions } from '../../src/chunking/chunker.js';
import { ConfigurationError } from '../../src/core/errors.js';

const SENTENCES = 'The sky is blue. Water is wet. Fire is hot.';

describe('chunkText', () => {
  it('should split at sentence boundaries instead of mid-word', () => {
    expect(chunkText(SENTENCES, 20, 5)).toEqual([
      'The sky is blue.',
      'blue. Water is wet.',
      'wet. Fire is hot.',
    ]);
  });

  it('should return the trimmed text as a single chunk when it fits', () => {
    expect(chunkText('  short text  ', 20, 5)).toEqual(['short text']);
  });

  it('should return a single empty chunk for empty text', () => {
    expect(chunkText('', 20, 5)).toEqual(['']);
  });

  it('should cut at a newline past the window midpoint', () => {
    expect(chunkText('first line\nsecond part here', 15, 0)).toEqual([
      'first line',
      'second part her',
      'e',
    ]);
  });

  it('should use fixed windows when there is no boundary', () => {
    const text = 'a'.repeat(25);
    const chunks = chunkText(text, 10, 2);

    expect(chunks.map((c) => c.length)).toEqual([10, 10, 9]);
  });

  it('should cover the text when the overlap is removed', () => {
    const text = 'abcdefghijklmnopqrstuvwxyz0123456789';
    const size = 10;
    const overlap = 3;
    const chunks = chunkText(text, size, overlap);

    const rebuilt = chunks[0] + chunks.slice(1).map((c) => c.slice(overlap)).join('');
    expect(rebuilt).toBe(text);
  });

  it('should ignore a boundary in the first half of the window', () => {
    // '.' at index 2 is not past 10 * 0.5
    expect(chunkText('ab.defghijklmnop', 10, 0)).toEqual(['ab.defghij', 'klmnop']);
  });

  it('should always move forward when the overlap exceeds a cut window', () => {
    expect(chunkText('abcdef.ghijklmnopqrst', 10, 8)).toEqual([
      'abcdef.',
      'ghijklmnop',
      'ijklmnopqr',
      'klmnopqrst',
    ]);
  });

  it('should keep every chunk within the size limit', () => {
    const text = 'Lorem ipsum dolor sit amet. Consectetur adipiscing elit.\nSed do eiusmod tempor. '.repeat(20);

    for (const chunk of chunkText(text, 64, 16)) {
      expect(chunk.length).toBeLessThanOrEqual(64);
    }
  });

  it('should count code points and never split a surrogate pair', () => {
    const chunks = chunkText('ab' + '😀'.repeat(10), 5, 0);

    expect(chunks).toEqual(['ab😀😀😀', '😀😀😀😀😀', '😀😀']);
    for (const chunk of chunks) {
      expect(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(chunk)).toBe(false);
    }
  });

  it('should be deterministic', () => {
    const text = 'One. Two. Three. Four. Five. Six. Seven. Eight. Nine. Ten.'.repeat(5);

    expect(chunkText(text, 30, 10)).toEqual(chunkText(text, 30, 10));
  });

  it('should reject an overlap that is not smaller than the size', () => {
    expect(() => chunkText(SENTENCES, 10, 10)).toThrow(ConfigurationError);
    expect(() => chunkText(SENTENCES, 10, 15)).toThrow(/must be smaller than chunk size/);
  });
});

describe('validateChunkOptions', () => {
  it('should report the offending option', () => {
    try {
      validateChunkOptions(0, 0);
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.configKey).toBe('chunking.size');
      }
    }
  });

  it('should reject negative and fractional values', () => {
    expect(() => validateChunkOptions(10, -1)).toThrow(ConfigurationError);
    expect(() => validateChunkOptions(10.5, 1)).toThrow(ConfigurationError);
  });

  it('should accept a zero overlap', () => {
    expect(() => validateChunkOptions(10, 0)).not.toThrow();
  });
});

describe('Chunker', () => {
  const metadata = { source: 'notes/physics.txt', title: 'physics', createdAt: '2024-05-01T00:00:00.000Z' };

  it('should default to 512 characters with a 50 character overlap', () => {
    const chunker = new Chunker();

    expect(chunker.size).toBe(512);
    expect(chunker.overlap).toBe(50);
  });

  it('should validate options once at construction', () => {
    expect(() => new Chunker({ size: 20, overlap: 20 })).toThrow(ConfigurationError);
  });

  it('should number chunks and copy the document metadata', () => {
    const chunker = new Chunker({ size: 20, overlap: 5 });
    const chunks = chunker.chunkDocument({ text: SENTENCES, metadata });

    expect(chunks).toEqual([
      { text: 'The sky is blue.', metadata: { ...metadata, chunkId: 0, totalChunks: 3 } },
      { text: 'blue. Water is wet.', metadata: { ...metadata, chunkId: 1, totalChunks: 3 } },
      { text: 'wet. Fire is hot.', metadata: { ...metadata, chunkId: 2, totalChunks: 3 } },
    ]);
  });

  it('should drop whitespace-only chunks', () => {
    const chunker = new Chunker({ size: 20, overlap: 5 });

    expect(chunker.chunkDocument({ text: '   ', metadata })).toEqual([]);
  });
});
