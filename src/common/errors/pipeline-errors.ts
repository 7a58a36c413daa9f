/**
 * Pipeline Error Classes
 * Typed failures raised by the chunker, retriever, reranker, generation and
 * formatting stages. Graph nodes convert them into PipelineErrorRecord values.
 */

export type PipelineErrorKind =
  | 'InputError'
  | 'IndexUnavailable'
  | 'GenerationError'
  | 'FormatError'
  | 'RerankFailure';

export type GenerationFailureReason =
  | 'RateLimited'
  | 'Timeout'
  | 'Malformed'
  | 'Upstream';

/**
 * Serializable error carried on the pipeline state
 */
export interface PipelineErrorRecord {
  kind: PipelineErrorKind;
  code: string;
  message: string;
  retryable: boolean;
  reason?: GenerationFailureReason;
}

/**
 * Base error for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly kind: PipelineErrorKind,
    public readonly code: string,
    public readonly fatal: boolean = true,
    public readonly retryable: boolean = false,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
    Error.captureStackTrace(this, this.constructor);
  }

  toRecord(): PipelineErrorRecord {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * Rejected before the state machine runs (blank query, bad chunking input)
 */
export class InputError extends PipelineError {
  constructor(message: string = 'Input is empty') {
    super(message, 'InputError', 'INPUT_INVALID', true, false);
    this.name = 'InputError';
  }
}

/**
 * Retrieval backend unreachable or timed out
 */
export class IndexUnavailableError extends PipelineError {
  constructor(message: string, cause?: Error) {
    super(message, 'IndexUnavailable', 'INDEX_UNAVAILABLE', true, true, cause);
    this.name = 'IndexUnavailableError';
  }
}

export class GenerationError extends PipelineError {
  constructor(
    message: string,
    public readonly reason: GenerationFailureReason,
    cause?: Error,
  ) {
    super(
      message,
      'GenerationError',
      `GENERATION_${reason.toUpperCase()}`,
      true,
      true,
      cause,
    );
    this.name = 'GenerationError';
  }

  override toRecord(): PipelineErrorRecord {
    return { ...super.toRecord(), reason: this.reason };
  }
}

/**
 * Generation output could not be turned into a cited answer
 */
export class FormatError extends PipelineError {
  constructor(message: string) {
    super(message, 'FormatError', 'FORMAT_MALFORMED_OUTPUT', true, false);
    this.name = 'FormatError';
  }
}

/**
 * Soft failure: logged into metadata, never surfaced as the pipeline error
 */
export class RerankFailure extends PipelineError {
  constructor(message: string, cause?: Error) {
    super(message, 'RerankFailure', 'RERANK_FAILED', false, true, cause);
    this.name = 'RerankFailure';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Record for any thrown value; non-pipeline errors go through `fallback`
 */
export function toErrorRecord(
  error: unknown,
  fallback: (message: string, cause: Error) => PipelineError,
): PipelineErrorRecord {
  if (error instanceof PipelineError) {
    return error.toRecord();
  }
  return fallback(errorMessage(error), asError(error)).toRecord();
}
