/**
 * Provider error normalisation.
 *
 * Maps OpenAI SDK failures onto a small set of kinds using the SDK's error
 * classes and structured fields (status, code, param).
 */

import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  AuthenticationError,
  BadRequestError,
  InternalServerError,
  PermissionDeniedError,
  RateLimitError,
} from 'openai';

export type LLMErrorKind =
  | 'rate_limited'
  | 'auth_failed'
  | 'unsupported_parameter'
  | 'malformed_response'
  | 'timeout'
  | 'aborted'
  | 'unavailable'
  | 'bad_request'
  | 'unknown';

const RETRYABLE_KINDS: ReadonlySet<LLMErrorKind> = new Set(['rate_limited', 'unavailable']);

export class LLMError extends Error {
  readonly kind: LLMErrorKind;
  readonly status?: number;
  /** Request parameter the provider rejected, when it names one */
  readonly param?: string;

  constructor(
    kind: LLMErrorKind,
    message: string,
    options?: { status?: number; param?: string; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'LLMError';
    this.kind = kind;
    this.status = options?.status;
    this.param = options?.param;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/**
 * Convert anything thrown by the OpenAI client into an LLMError.
 */
export function toLLMError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }

  // Abort and connection errors extend APIError without a status, check them first
  if (error instanceof APIUserAbortError) {
    return new LLMError('aborted', 'Request was aborted', { cause: error });
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new LLMError('timeout', 'Request timed out', { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new LLMError('unavailable', error.message, { cause: error });
  }

  if (error instanceof APIError) {
    const options = {
      status: error.status,
      param: error.param ?? undefined,
      cause: error,
    };

    if (error instanceof RateLimitError) {
      return new LLMError('rate_limited', error.message, options);
    }
    if (error instanceof AuthenticationError || error instanceof PermissionDeniedError) {
      return new LLMError('auth_failed', error.message, options);
    }
    if (error instanceof BadRequestError && error.code === 'unsupported_parameter') {
      return new LLMError('unsupported_parameter', error.message, options);
    }
    if (error instanceof InternalServerError) {
      return new LLMError('unavailable', error.message, options);
    }
    return new LLMError('bad_request', error.message, options);
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new LLMError('aborted', 'Request was aborted', { cause: error });
  }

  return new LLMError(
    'unknown',
    error instanceof Error ? error.message : String(error),
    { cause: error }
  );
}
