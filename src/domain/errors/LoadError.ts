/** Machine-readable reason a load (or one of its batches) failed. */
export type LoadErrorCode =
  | 'INVALID_REQUEST'
  | 'SOURCE_ERROR'
  | 'INVALID_SCHEMA'
  | 'TABLE_NOT_FOUND'
  | 'TABLE_CREATE_FAILED'
  | 'DISPATCH_ERROR'
  | 'STREAM_ERROR';

/**
 * Error raised by the load pipeline.
 *
 * Every code except `DISPATCH_ERROR` is fatal: it ends the load and is reported
 * as the load's outcome. Dispatch errors stay local to one batch.
 */
export class LoadError extends Error {
  readonly code: LoadErrorCode;

  constructor(code: LoadErrorCode, message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'LoadError';
    this.code = code;
  }
}

export function isLoadError(error: unknown): error is LoadError {
  return error instanceof LoadError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Keep a `LoadError` as is; anything else becomes a `fallback`-coded error wrapping it. */
export function toLoadError(error: unknown, fallback: LoadErrorCode): LoadError {
  if (isLoadError(error)) return error;
  return new LoadError(fallback, errorMessage(error), { cause: error });
}
