export interface RagErrorOptions {
  suggestions?: string[];
  retriable?: boolean;
  cause?: unknown;
}

export class RagError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RagError';
    this.suggestions = options.suggestions ?? [];
    this.retriable = options.retriable ?? false;
  }
}

/**
 * Error thrown when configuration or call arguments are invalid
 * (chunk sizes, retrieval mode, fusion weight, environment settings).
 */
export class ConfigurationError extends RagError {
  configKey?: string;

  constructor(
    message: string,
    options?: {
      configKey?: string;
      cause?: unknown;
    }
  ) {
    super(message, {
      suggestions: [
        'Check the configuration file or environment variables.',
        'Ensure all required configuration keys are set.',
        'Verify the configuration values are in the correct format.'
      ],
      retriable: false,
      cause: options?.cause,
    });
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

/**
 * Error thrown when a search backend or embedding service call fails
 */
export class BackendError extends RagError {
  backend: string;
  status?: number;

  constructor(
    message: string,
    options: {
      backend: string;
      status?: number;
      retriable?: boolean;
      cause?: unknown;
      suggestions?: string[];
    }
  ) {
    super(message, {
      suggestions: options.suggestions ?? [
        'Inspect the backend response body for error details.',
        'Retry if this is a transient 5xx/429 error.'
      ],
      retriable: options.retriable ?? (options.status !== undefined && isRetryableStatus(options.status)),
      cause: options.cause,
    });
    this.name = 'BackendError';
    this.backend = options.backend;
    this.status = options.status;
  }
}

/**
 * Error thrown when a backend cannot be reached or rejects our credentials
 */
export class BackendUnavailableError extends BackendError {
  constructor(
    message: string,
    options: {
      backend: string;
      status?: number;
      cause?: unknown;
    }
  ) {
    const authFailure = options.status === 401 || options.status === 403;
    super(message, {
      backend: options.backend,
      status: options.status,
      retriable: !authFailure,
      cause: options.cause,
      suggestions: authFailure
        ? ['Verify the configured username/password or API key.', 'Check that the account has access to the index.']
        : ['Confirm the host and port are reachable from this environment.', 'Check that the service is running.'],
    });
    this.name = 'BackendUnavailableError';
  }
}

/**
 * Error thrown when an embedder returns vectors that cannot be used
 */
export class EmbeddingError extends RagError {
  expected?: number;
  actual?: number;

  constructor(message: string, options?: { expected?: number; actual?: number }) {
    super(message, {
      suggestions: [
        'Check that the embedding model matches the configured vector dimension.',
        'Verify the embedding endpoint returns one vector per input.'
      ],
      retriable: false,
    });
    this.name = 'EmbeddingError';
    this.expected = options?.expected;
    this.actual = options?.actual;
  }
}

/**
 * Error thrown when a retrieval is aborted through its AbortSignal
 */
export class AbortError extends RagError {
  reason?: string;

  constructor(reason?: string) {
    super(reason || 'Retrieval was aborted', {
      suggestions: ['Check if the abort was intentional (user-triggered or timeout).'],
      retriable: true,
    });
    this.name = 'AbortError';
    this.reason = reason;
  }
}

export function isRetryableStatus(status: number): boolean {
  return [408, 425, 429, 500, 502, 503, 504].includes(status);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
