import type { BatchStatus } from './BatchStatus.js';

/** Bookkeeping for one batch of lines. The lines themselves are not retained. */
export interface Batch {
  /** Unique batch identifier (UUID). */
  readonly id: string;
  /** Zero-based batch index within the load, in source order. */
  readonly index: number;
  readonly status: BatchStatus;
  /** Lines pulled from the source into this batch, blank ones included. */
  readonly lineCount: number;
  /** Value fragments rendered for the batch (non-blank lines). */
  readonly recordCount: number;
  /** Failure message when `status` is `FAILED`. */
  readonly error?: string;
}

/** Create a new batch in `PENDING` status. */
export function createBatch(id: string, index: number, lineCount: number): Batch {
  return {
    id,
    index,
    status: 'PENDING',
    lineCount,
    recordCount: 0,
  };
}
