/**
 * Retrieval Error Classes
 * Only InvalidQueryError ever reaches a caller; the stage errors are caught
 * at the stage boundary and turned into that stage's fallback.
 */

/**
 * Base error for all retrieval errors
 */
export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'RetrievalError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Permanent Errors (reported at the boundary, never retried)
 */

export class InvalidQueryError extends RetrievalError {
  constructor(
    message: string,
    public readonly field: 'query' | 'topK' | 'policy',
  ) {
    super(message, 'RETRIEVAL_INVALID_QUERY', false);
    this.name = 'InvalidQueryError';
  }
}

/**
 * Stage Errors (absorbed by the stage that raised them)
 */

export class StageTimeoutError extends RetrievalError {
  constructor(
    public readonly stage: string,
    public readonly timeoutMs: number,
  ) {
    super(`${stage} timed out after ${timeoutMs}ms`, 'STAGE_TIMEOUT', true);
    this.name = 'StageTimeoutError';
  }
}

export class StageAbortedError extends RetrievalError {
  constructor(public readonly stage: string) {
    super(`${stage} aborted`, 'STAGE_ABORTED', false);
    this.name = 'StageAbortedError';
  }
}

export class MalformedResponseError extends RetrievalError {
  constructor(
    message: string,
    public readonly purpose: string,
  ) {
    super(message, 'MALFORMED_RESPONSE', true);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Helper: extract a loggable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
