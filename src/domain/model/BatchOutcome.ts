/** Result of dispatching one insert statement. */
export type BatchOutcome =
  | { readonly status: 'ACKNOWLEDGED' }
  | { readonly status: 'FAILED'; readonly message: string };
