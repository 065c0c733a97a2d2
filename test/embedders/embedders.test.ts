import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAIEmbedder } from '../../src/embedders/openai.js';
import { OllamaEmbedder } from '../../src/embedders/ollama.js';
import { createEmbedder } from '../../src/embedders/index.js';
import { loadConfig } from '../../src/config.js';
import {
  BackendError,
  BackendUnavailableError,
  ConfigurationError,
  EmbeddingError,
} from '../../src/core/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('Embedders', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('OpenAIEmbedder', () => {
    it('should post to /embeddings and order vectors by index', async () => {
      const mockFetch = vi.fn().mockImplementation(async () =>
        jsonResponse({
          data: [
            { index: 1, embedding: [0, 1] },
            { index: 0, embedding: [1, 0] },
          ],
          model: 'text-embedding-3-small',
        })
      );
      vi.stubGlobal('fetch', mockFetch);

      const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });
      const vectors = await embedder.embedBatch(['first', 'second']);

      expect(vectors).toEqual([
        [1, 0],
        [0, 1],
      ]);

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://api.openai.com/v1/embeddings');
      expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
      expect(requestBody(init)).toEqual({ model: 'text-embedding-3-small', input: ['first', 'second'] });
    });

    it('should require an API key', async () => {
      const mockFetch = vi.fn();
      vi.stubGlobal('fetch', mockFetch);

      const error = await new OpenAIEmbedder().embed('hello').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).not.toBeInstanceOf(BackendUnavailableError);
      expect(error).toMatchObject({ configKey: 'embedding.apiKey', retriable: false });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should request shortened vectors when asked to', async () => {
      const mockFetch = vi.fn().mockImplementation(async () =>
        jsonResponse({ data: [{ index: 0, embedding: [0.5, 0.5] }] })
      );
      vi.stubGlobal('fetch', mockFetch);

      const embedder = new OpenAIEmbedder({
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:8000/v1',
        model: 'text-embedding-3-large',
        dimensions: 2,
        requestDimensions: true,
      });
      await embedder.embed('hello');

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('http://localhost:8000/v1/embeddings');
      expect(requestBody(init)).toEqual({ model: 'text-embedding-3-large', input: ['hello'], dimensions: 2 });
    });

    it('should map rate limits to a retriable BackendError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockImplementation(async () => jsonResponse({ error: { message: 'Rate limit reached' } }, 429))
      );

      const error = await new OpenAIEmbedder({ apiKey: 'test-secret' }).embed('hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({
        message: 'openai embeddings request failed with status 429: Rate limit reached',
        backend: 'openai',
        status: 429,
        retriable: true,
      });
    });

    it('should map 401 to BackendUnavailableError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockImplementation(async () => jsonResponse({ error: { message: 'Incorrect API key' } }, 401))
      );

      await expect(new OpenAIEmbedder({ apiKey: 'test-secret' }).embed('hello')).rejects.toThrow(
        BackendUnavailableError
      );
    });
  });

  describe('OllamaEmbedder', () => {
    it('should post model and input to /embed', async () => {
      const mockFetch = vi.fn().mockImplementation(async () => jsonResponse({ embeddings: [[0.1, 0.2, 0.3]] }));
      vi.stubGlobal('fetch', mockFetch);

      const vector = await new OllamaEmbedder().embed('hello');

      expect(vector).toEqual([0.1, 0.2, 0.3]);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('http://127.0.0.1:11434/api/embed');
      expect(init.method).toBe('POST');
      expect(requestBody(init)).toEqual({ model: 'all-minilm', input: ['hello'] });
    });

    it('should split large inputs into batches', async () => {
      const mockFetch = vi.fn().mockImplementation(async (_url: string, init: RequestInit) => {
        const body = requestBody(init);
        const count = typeof body === 'object' && body !== null && 'input' in body && Array.isArray(body.input)
          ? body.input.length
          : 0;
        return jsonResponse({ embeddings: Array.from({ length: count }, () => [1, 1]) });
      });
      vi.stubGlobal('fetch', mockFetch);

      const vectors = await new OllamaEmbedder({ batchSize: 2 }).embedBatch(['a', 'b', 'c']);

      expect(vectors).toHaveLength(3);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(requestBody(mockFetch.mock.calls[1][1])).toEqual({ model: 'all-minilm', input: ['c'] });
    });

    it('should send keep_alive when configured', async () => {
      const mockFetch = vi.fn().mockImplementation(async () => jsonResponse({ embeddings: [[1]] }));
      vi.stubGlobal('fetch', mockFetch);

      await new OllamaEmbedder({ keepAlive: '5m', model: 'nomic-embed-text' }).embed('hello');

      expect(requestBody(mockFetch.mock.calls[0][1])).toEqual({
        model: 'nomic-embed-text',
        input: ['hello'],
        keep_alive: '5m',
      });
    });

    it('should reject vectors of the wrong dimension', async () => {
      vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ embeddings: [[1, 2]] })));

      const error = await new OllamaEmbedder({ dimensions: 3 }).embed('hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ expected: 3, actual: 2 });
    });

    it('should reject a response with too few vectors', async () => {
      vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ embeddings: [[1, 2]] })));

      await expect(new OllamaEmbedder().embedBatch(['a', 'b'])).rejects.toThrow(
        'ollama returned 1 embeddings for 2 inputs'
      );
    });

    it('should reject a malformed response', async () => {
      vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ embedding: [1, 2] })));

      await expect(new OllamaEmbedder().embed('hello')).rejects.toThrow(EmbeddingError);
    });

    it('should map network failures to BackendUnavailableError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

      await expect(new OllamaEmbedder().embed('hello')).rejects.toThrow(
        'Cannot reach ollama embeddings at http://127.0.0.1:11434/api/embed: fetch failed'
      );
    });

    it('should return no vectors for no texts', async () => {
      const mockFetch = vi.fn();
      vi.stubGlobal('fetch', mockFetch);

      expect(await new OllamaEmbedder().embedBatch([])).toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should reject an invalid batch size', () => {
      expect(() => new OllamaEmbedder({ batchSize: 0 })).toThrow(ConfigurationError);
    });
  });

  describe('createEmbedder', () => {
    it('should build the configured provider', () => {
      const config = loadConfig({
        EMBEDDING_PROVIDER: 'openai',
        EMBEDDING_MODEL: 'text-embedding-3-small',
        EMBEDDING_API_KEY: 'test-secret',
        VECTOR_DIMENSION: '1536',
      });
      const embedder = createEmbedder(config);

      expect(embedder).toBeInstanceOf(OpenAIEmbedder);
      expect(embedder.model).toBe('text-embedding-3-small');
      expect(embedder.dimensions).toBe(1536);
    });

    it('should use the OpenAI default model when none is configured', () => {
      const embedder = createEmbedder(loadConfig({ EMBEDDING_PROVIDER: 'openai', EMBEDDING_API_KEY: 'test-secret' }));

      expect(embedder).toBeInstanceOf(OpenAIEmbedder);
      expect(embedder.model).toBe('text-embedding-3-small');
    });

    it('should default to Ollama', () => {
      const embedder = createEmbedder(loadConfig({}));

      expect(embedder).toBeInstanceOf(OllamaEmbedder);
      expect(embedder.model).toBe('all-minilm');
      expect(embedder.dimensions).toBe(384);
    });
  });
});
