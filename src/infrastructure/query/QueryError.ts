/** Raised by `HttpQueryClient` when a statement could not be executed. */
export class QueryError extends Error {
  /** HTTP status, when the endpoint answered with one. */
  readonly status: number | undefined;

  constructor(message: string, options?: { readonly status?: number; readonly cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'QueryError';
    this.status = options?.status;
  }
}
