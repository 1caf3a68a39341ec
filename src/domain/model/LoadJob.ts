import type { LoadError } from '../errors/LoadError.js';
import type { SourceSpec } from './SourceSpec.js';

export const DEFAULT_BATCH_SIZE = 100_000;

/** Input formats the loader understands. Records are comma-delimited lines. */
export type LoadFormat = 'csv';

/** A fully resolved load: what to read, where to write it, and how to batch it. */
export interface LoadRequest {
  readonly source: SourceSpec;
  readonly table: string;
  /** Schema description (`a:uint8, b:uint64`). When set, a missing table is created. */
  readonly schema?: string;
  /** Leading lines discarded before any record is considered data. Default: `0`. */
  readonly skipHeaderLines?: number;
  /** Maximum lines per insert statement. Default: `100000`. */
  readonly batchSize?: number;
  readonly format?: LoadFormat;
}

/** Counters accumulated while a load runs. */
export interface LoadSummary {
  /** Data lines pulled into batches (header lines excluded). */
  readonly linesRead: number;
  readonly headerLinesSkipped: number;
  /** Blank or whitespace-only lines that produced no value fragment. */
  readonly blankLinesDropped: number;
  /** Records in batches the endpoint acknowledged. */
  readonly recordsSent: number;
  /** Records in batches the endpoint rejected. */
  readonly recordsFailed: number;
  readonly batchesDispatched: number;
  readonly batchesFailed: number;
  /** Batches whose every line was blank. */
  readonly batchesSkipped: number;
  readonly elapsedMs: number;
}

/** Real-time progress for an in-flight load. */
export interface LoadProgress extends LoadSummary {
  /** Batches seen so far, in any status. */
  readonly totalBatches: number;
}

/** One rejected insert statement. */
export interface BatchFailure {
  readonly batchId: string;
  readonly batchIndex: number;
  readonly recordCount: number;
  readonly message: string;
}

/**
 * Terminal result of a load.
 *
 * `COMPLETED` may still carry `failures`: per-batch dispatch errors never stop a load.
 */
export type LoadOutcome =
  | {
      readonly status: 'COMPLETED';
      readonly summary: LoadSummary;
      readonly failures: readonly BatchFailure[];
    }
  | { readonly status: 'FAILED'; readonly error: LoadError; readonly summary: LoadSummary }
  | { readonly status: 'ABORTED'; readonly summary: LoadSummary };

/** Result of calling `preview()`. */
export interface PreviewResult {
  /** Sampled records split into fields. */
  readonly rows: readonly (readonly string[])[];
  readonly totalSampled: number;
  /** Widest sampled row. */
  readonly columnCount: number;
  /** Columns declared by the schema, or `null` when no schema is set. */
  readonly schemaColumnCount: number | null;
  /** Indices (into `rows`) whose field count differs from the schema's. */
  readonly mismatchedRows: readonly number[];
}

export function emptySummary(): LoadSummary {
  return {
    linesRead: 0,
    headerLinesSkipped: 0,
    blankLinesDropped: 0,
    recordsSent: 0,
    recordsFailed: 0,
    batchesDispatched: 0,
    batchesFailed: 0,
    batchesSkipped: 0,
    elapsedMs: 0,
  };
}
