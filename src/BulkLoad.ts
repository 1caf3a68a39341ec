import type { Logger } from 'pino';
import type { LoadOutcome, PreviewResult } from './domain/model/LoadJob.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { QueryExecutor } from './domain/ports/QueryExecutor.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { LoadStatusResult } from './application/usecases/GetLoadStatus.js';
import { DEFAULT_BATCH_SIZE } from './domain/model/LoadJob.js';
import { DEFAULT_TRANSFORM_CONCURRENCY } from './domain/services/RecordTransformer.js';
import { LoadJobContext } from './application/LoadJobContext.js';
import { StartLoad } from './application/usecases/StartLoad.js';
import { PreviewLoad } from './application/usecases/PreviewLoad.js';
import { AbortLoad } from './application/usecases/AbortLoad.js';
import { GetLoadStatus } from './application/usecases/GetLoadStatus.js';
import { createLogger } from './logger.js';

export interface BulkLoadConfig {
  /** Target table. */
  readonly table: string;
  /** Schema description (`a:uint8, b:uint64`). When set, a missing table is created from it. */
  readonly schema?: string;
  /** Leading lines discarded before any record. Default: `0`. */
  readonly skipHeaderLines?: number;
  /** Maximum lines per insert statement. Default: `100000`. */
  readonly batchSize?: number;
  /** Concurrent slices used to render one batch. Default: `4`. */
  readonly transformConcurrency?: number;
  /** Query endpoint the statements are sent to. */
  readonly executor: QueryExecutor;
  /** Destination for diagnostics. Default: a pino logger at `LOG_LEVEL` (or `info`). */
  readonly logger?: Logger;
}

/**
 * Facade for one streaming bulk load into a remote table.
 *
 * Delegates to use cases: `StartLoad`, `PreviewLoad`, `AbortLoad`, `GetLoadStatus`.
 *
 * @example
 * ```ts
 * const load = new BulkLoad({ table: 'events', schema: 'id:uint64, name:string', executor })
 *   .from(new FilePathSource('./events.csv'));
 *
 * load.on('batch:failed', (e) => console.warn(e.error));
 * const outcome = await load.start();
 * ```
 */
export class BulkLoad {
  private readonly ctx: LoadJobContext;
  private readonly startLoad: StartLoad;
  private readonly previewLoad: PreviewLoad;
  private readonly abortLoad: AbortLoad;
  private readonly getLoadStatus: GetLoadStatus;

  constructor(config: BulkLoadConfig) {
    this.ctx = new LoadJobContext({
      table: config.table,
      schema: config.schema,
      skipHeaderLines: config.skipHeaderLines ?? 0,
      batchSize: config.batchSize ?? DEFAULT_BATCH_SIZE,
      transformConcurrency: config.transformConcurrency ?? DEFAULT_TRANSFORM_CONCURRENCY,
      executor: config.executor,
      logger: config.logger ?? createLogger(),
    });

    this.startLoad = new StartLoad(this.ctx);
    this.previewLoad = new PreviewLoad(this.ctx);
    this.abortLoad = new AbortLoad(this.ctx);
    this.getLoadStatus = new GetLoadStatus(this.ctx);
  }

  /** Set the data source. Returns `this` for chaining. */
  from(source: DataSource): this {
    this.ctx.source = source;
    return this;
  }

  /** Subscribe to a typed domain event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every domain event. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Sample and split the first records without touching the query endpoint. */
  async preview(maxLines = 10): Promise<PreviewResult> {
    return this.previewLoad.execute(maxLines);
  }

  /**
   * Resolve the table, then stream every batch to the endpoint.
   *
   * Resolves with the outcome; fatal errors do not reject.
   */
  async start(): Promise<LoadOutcome> {
    return this.startLoad.execute();
  }

  /** Stop before the next batch. The statement in flight, if any, still completes. */
  abort(): void {
    this.abortLoad.execute();
  }

  getStatus(): LoadStatusResult {
    return this.getLoadStatus.execute();
  }

  getLoadId(): string {
    return this.getLoadStatus.getLoadId();
  }
}
