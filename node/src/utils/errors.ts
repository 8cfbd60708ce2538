export type RetrievalStage = 'embedding' | 'vector_search' | 'dataset' | 'source';

/** Retrieval failures propagate to the caller; there is no silent fallback for them. */
export class RetrievalError extends Error {
  readonly stage: RetrievalStage;
  readonly retryable: boolean;

  constructor(stage: RetrievalStage, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RetrievalError';
    this.stage = stage;
    this.retryable = options.retryable ?? true;
  }
}

export type GenerativeFailureKind =
  | 'not_configured'
  | 'timeout'
  | 'http'
  | 'circuit_open'
  | 'empty_content'
  | 'invalid_json'
  | 'schema_mismatch';

/** Generative failures are absorbed by the selector and enricher into their fallbacks. */
export class GenerativeError extends Error {
  readonly kind: GenerativeFailureKind;

  constructor(kind: GenerativeFailureKind, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'GenerativeError';
    this.kind = kind;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
