import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { Batch } from '../domain/model/Batch.js';
import type { LoadStatus } from '../domain/model/LoadStatus.js';
import type { BatchFailure, LoadProgress, LoadSummary } from '../domain/model/LoadJob.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { QueryExecutor } from '../domain/ports/QueryExecutor.js';
import { canTransition } from '../domain/model/LoadStatus.js';
import { BatchSplitter } from '../domain/services/BatchSplitter.js';
import { HeaderSkipper } from '../domain/services/HeaderSkipper.js';
import { RecordTransformer } from '../domain/services/RecordTransformer.js';
import { StatementDispatcher } from '../domain/services/StatementDispatcher.js';
import { TableResolver } from '../domain/services/TableResolver.js';
import { errorMessage } from '../domain/errors/LoadError.js';
import { EventBus } from './EventBus.js';

export interface LoadJobSettings {
  readonly table: string;
  readonly schema: string | undefined;
  readonly skipHeaderLines: number;
  readonly batchSize: number;
  readonly transformConcurrency: number;
  readonly executor: QueryExecutor;
  readonly logger: Logger;
}

/**
 * Mutable state holder shared across all use cases within a single load.
 *
 * Internal: not exported from the public API. The pipeline
 * services are built here once, so invalid settings fail at construction time,
 * and are shared read-only for the whole load.
 */
export class LoadJobContext {
  readonly table: string;
  readonly schema: string | undefined;
  readonly skipHeaderLines: number;
  readonly batchSize: number;
  readonly eventBus: EventBus;
  readonly logger: Logger;

  readonly headerSkipper: HeaderSkipper;
  readonly splitter: BatchSplitter;
  readonly transformer: RecordTransformer;
  readonly dispatcher: StatementDispatcher;
  readonly resolver: TableResolver;

  source: DataSource | null = null;

  readonly loadId: string;
  status: LoadStatus = 'CREATED';
  batches: Batch[] = [];
  batchIndexById = new Map<string, number>();
  failures: BatchFailure[] = [];
  startedAt?: number;
  finishedAt?: number;

  linesRead = 0;
  headerLinesSkipped = 0;
  blankLinesDropped = 0;
  recordsSent = 0;
  recordsFailed = 0;
  batchesDispatched = 0;
  batchesFailed = 0;
  batchesSkipped = 0;

  abortController: AbortController | null = null;

  constructor(settings: LoadJobSettings) {
    if (settings.table.trim().length === 0) {
      throw new Error('Target table name is required');
    }

    this.table = settings.table;
    this.schema = settings.schema;
    this.skipHeaderLines = settings.skipHeaderLines;
    this.batchSize = settings.batchSize;
    this.loadId = randomUUID();
    this.logger = settings.logger.child({ loadId: this.loadId, table: settings.table });
    this.eventBus = new EventBus((error, event) => {
      this.logger.warn({ event: event.type }, `event handler failed: ${errorMessage(error)}`);
    });

    this.headerSkipper = new HeaderSkipper(settings.skipHeaderLines);
    this.splitter = new BatchSplitter(settings.batchSize);
    this.transformer = new RecordTransformer(settings.transformConcurrency);
    this.dispatcher = new StatementDispatcher(settings.executor);
    this.resolver = new TableResolver(settings.executor);
  }

  transitionTo(newStatus: LoadStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  get aborted(): boolean {
    return this.abortController?.signal.aborted ?? false;
  }

  buildSummary(): LoadSummary {
    const end = this.finishedAt ?? Date.now();
    return {
      linesRead: this.linesRead,
      headerLinesSkipped: this.headerLinesSkipped,
      blankLinesDropped: this.blankLinesDropped,
      recordsSent: this.recordsSent,
      recordsFailed: this.recordsFailed,
      batchesDispatched: this.batchesDispatched,
      batchesFailed: this.batchesFailed,
      batchesSkipped: this.batchesSkipped,
      elapsedMs: this.startedAt ? end - this.startedAt : 0,
    };
  }

  buildProgress(): LoadProgress {
    return { ...this.buildSummary(), totalBatches: this.batches.length };
  }

  /** Stop the clock; the summary reported afterwards no longer grows. */
  finish(): void {
    this.finishedAt = Date.now();
  }

  assertSourceConfigured(): DataSource {
    if (!this.source) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }
    return this.source;
  }

  registerBatch(batch: Batch): void {
    this.batchIndexById.set(batch.id, this.batches.length);
    this.batches.push(batch);
  }

  updateBatch(batchId: string, changes: Partial<Pick<Batch, 'status' | 'recordCount' | 'error'>>): void {
    const pos = this.batchIndexById.get(batchId);
    if (pos === undefined) return;
    const batch = this.batches[pos];
    if (!batch) return;
    this.batches[pos] = { ...batch, ...changes };
  }
}
