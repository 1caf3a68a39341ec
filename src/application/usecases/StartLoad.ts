import { randomUUID } from 'node:crypto';
import type { LineBatch } from '../../domain/services/BatchSplitter.js';
import type { LoadOutcome } from '../../domain/model/LoadJob.js';
import type { TableSchema } from '../../domain/model/TableSchema.js';
import type { ResolvedTable } from '../../domain/services/TableResolver.js';
import { createBatch } from '../../domain/model/Batch.js';
import { parseTableSchema } from '../../domain/model/TableSchema.js';
import { splitLines } from '../../domain/services/LineSplitter.js';
import { toLoadError } from '../../domain/errors/LoadError.js';
import type { LoadJobContext } from '../LoadJobContext.js';

/**
 * Use case: run the whole load.
 *
 * Setup (schema parse, source open, table resolution) happens once; then batches are read,
 * transformed and dispatched one at a time, in source order. Fatal errors end
 * the load and are returned as a `FAILED` outcome; failed batches are collected
 * and the load goes on.
 */
export class StartLoad {
  constructor(private readonly ctx: LoadJobContext) {}

  async execute(): Promise<LoadOutcome> {
    const source = this.ctx.assertSourceConfigured();
    this.assertCanStart();

    this.ctx.transitionTo('RESOLVING');
    this.ctx.abortController = new AbortController();
    this.ctx.startedAt = Date.now();

    this.ctx.eventBus.emit({
      type: 'load:started',
      loadId: this.ctx.loadId,
      table: this.ctx.table,
      source: source.metadata().fileName,
      timestamp: Date.now(),
    });
    this.ctx.logger.info({ source: source.metadata().fileName, batchSize: this.ctx.batchSize }, 'load started');

    try {
      const schema = this.ctx.schema === undefined ? null : parseTableSchema(this.ctx.schema);
      await source.open?.();
      const resolved = await this.resolveTable(schema);

      if (this.ctx.status !== 'ABORTED') {
        this.ctx.transitionTo('LOADING');
        await this.streamBatches(resolved.tableRef);
      }

      this.ctx.finish();
      if (this.ctx.status === 'ABORTED') {
        return { status: 'ABORTED', summary: this.ctx.buildSummary() };
      }

      this.ctx.transitionTo('COMPLETED');
      const summary = this.ctx.buildSummary();
      this.ctx.eventBus.emit({
        type: 'load:completed',
        loadId: this.ctx.loadId,
        summary,
        failedBatches: this.ctx.failures.length,
        timestamp: Date.now(),
      });
      this.ctx.logger.info({ summary }, 'load completed');

      return { status: 'COMPLETED', summary, failures: [...this.ctx.failures] };
    } catch (error) {
      const loadError = toLoadError(error, 'STREAM_ERROR');
      this.ctx.finish();

      if (this.ctx.status === 'ABORTED') {
        return { status: 'ABORTED', summary: this.ctx.buildSummary() };
      }

      this.ctx.transitionTo('FAILED');
      this.ctx.eventBus.emit({
        type: 'load:failed',
        loadId: this.ctx.loadId,
        code: loadError.code,
        error: loadError.message,
        timestamp: Date.now(),
      });
      this.ctx.logger.error({ code: loadError.code }, `load into ${this.ctx.table} failed: ${loadError.message}`);

      return { status: 'FAILED', error: loadError, summary: this.ctx.buildSummary() };
    }
  }

  private assertCanStart(): void {
    if (this.ctx.status !== 'PREVIEWED' && this.ctx.status !== 'CREATED') {
      throw new Error(`Cannot start load from status '${this.ctx.status}'`);
    }
  }

  private async resolveTable(schema: TableSchema | null): Promise<ResolvedTable> {
    const resolved = await this.ctx.resolver.resolve(this.ctx.table, schema);

    if (resolved.created && resolved.statement !== undefined) {
      this.ctx.eventBus.emit({
        type: 'table:created',
        loadId: this.ctx.loadId,
        table: this.ctx.table,
        tableRef: resolved.tableRef,
        statement: resolved.statement,
        timestamp: Date.now(),
      });
      this.ctx.logger.info({ tableRef: resolved.tableRef }, 'table created');
    } else {
      this.ctx.eventBus.emit({
        type: 'table:verified',
        loadId: this.ctx.loadId,
        table: this.ctx.table,
        tableRef: resolved.tableRef,
        timestamp: Date.now(),
      });
    }

    return resolved;
  }

  private async streamBatches(tableRef: string): Promise<void> {
    const source = this.ctx.assertSourceConfigured();
    const { lines, skipped, exhausted } = await this.ctx.headerSkipper.skip(splitLines(source.read()));
    this.ctx.headerLinesSkipped = skipped;

    if (exhausted) {
      this.ctx.logger.info({ skipped }, 'source ended inside the header, nothing to load');
      return;
    }

    for await (const batch of this.ctx.splitter.split(lines)) {
      if (this.ctx.aborted) break;
      await this.processBatch(batch, tableRef);
    }
  }

  private async processBatch({ lines, batchIndex }: LineBatch, tableRef: string): Promise<void> {
    const batchId = randomUUID();
    this.ctx.registerBatch(createBatch(batchId, batchIndex, lines.length));
    this.ctx.linesRead += lines.length;
    this.ctx.updateBatch(batchId, { status: 'PROCESSING' });

    this.ctx.eventBus.emit({
      type: 'batch:started',
      loadId: this.ctx.loadId,
      batchId,
      batchIndex,
      lineCount: lines.length,
      timestamp: Date.now(),
    });

    const transformed = await this.ctx.transformer.transform(lines);

    if (transformed === null) {
      this.ctx.blankLinesDropped += lines.length;
      this.ctx.batchesSkipped++;
      this.ctx.updateBatch(batchId, { status: 'SKIPPED' });
      this.ctx.eventBus.emit({
        type: 'batch:skipped',
        loadId: this.ctx.loadId,
        batchId,
        batchIndex,
        lineCount: lines.length,
        timestamp: Date.now(),
      });
      this.emitProgress();
      return;
    }

    this.ctx.blankLinesDropped += transformed.droppedCount;
    const { recordCount } = transformed;
    const outcome = await this.ctx.dispatcher.dispatch(tableRef, transformed.values);

    if (outcome.status === 'ACKNOWLEDGED') {
      this.ctx.recordsSent += recordCount;
      this.ctx.batchesDispatched++;
      this.ctx.updateBatch(batchId, { status: 'COMPLETED', recordCount });
      this.ctx.eventBus.emit({
        type: 'batch:dispatched',
        loadId: this.ctx.loadId,
        batchId,
        batchIndex,
        recordCount,
        timestamp: Date.now(),
      });
    } else {
      this.ctx.recordsFailed += recordCount;
      this.ctx.batchesFailed++;
      this.ctx.failures.push({ batchId, batchIndex, recordCount, message: outcome.message });
      this.ctx.updateBatch(batchId, { status: 'FAILED', recordCount, error: outcome.message });
      this.ctx.eventBus.emit({
        type: 'batch:failed',
        loadId: this.ctx.loadId,
        batchId,
        batchIndex,
        recordCount,
        error: outcome.message,
        timestamp: Date.now(),
      });
      this.ctx.logger.warn(
        { batchIndex, recordCount },
        `cannot insert data into ${this.ctx.table}, error: ${outcome.message}`,
      );
    }

    this.emitProgress();
  }

  private emitProgress(): void {
    this.ctx.eventBus.emit({
      type: 'load:progress',
      loadId: this.ctx.loadId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
  }
}
