import type { Logger } from 'pino';
import type { LoadOutcome, LoadRequest } from '../domain/model/LoadJob.js';
import type { QueryExecutor } from '../domain/ports/QueryExecutor.js';
import type { DomainEvent } from '../domain/events/DomainEvents.js';
import type { OpenSourceOptions } from '../infrastructure/sources/openSource.js';
import { emptySummary } from '../domain/model/LoadJob.js';
import { describeSource } from '../domain/model/SourceSpec.js';
import { parseTableSchema } from '../domain/model/TableSchema.js';
import { toLoadError } from '../domain/errors/LoadError.js';
import type { LoadErrorCode } from '../domain/errors/LoadError.js';
import { openSource } from '../infrastructure/sources/openSource.js';
import { BulkLoad } from '../BulkLoad.js';
import { createLogger } from '../logger.js';

export interface RunLoadDependencies {
  readonly executor: QueryExecutor;
  readonly logger?: Logger;
  readonly transformConcurrency?: number;
  readonly sourceOptions?: OpenSourceOptions;
  /** Receives every domain event of the load. */
  readonly onEvent?: (event: DomainEvent) => void;
}

/**
 * Run one load end to end from a resolved request.
 *
 * The request is validated and the load built before the source is opened, so
 * `INVALID_REQUEST`, `INVALID_SCHEMA` and `SOURCE_ERROR` are reported without
 * any statement reaching the endpoint.
 */
export async function runLoad(request: LoadRequest, deps: RunLoadDependencies): Promise<LoadOutcome> {
  const logger = deps.logger ?? createLogger();
  const precheckFailed = (error: unknown, fallback: LoadErrorCode): LoadOutcome => {
    const loadError = toLoadError(error, fallback);
    logger.error(
      { code: loadError.code, table: request.table, source: describeSource(request.source) },
      `load precheck failed: ${loadError.message}`,
    );
    return { status: 'FAILED', error: loadError, summary: emptySummary() };
  };

  let load: BulkLoad;
  try {
    if (request.schema !== undefined) {
      parseTableSchema(request.schema);
    }
    load = new BulkLoad({
      table: request.table,
      schema: request.schema,
      skipHeaderLines: request.skipHeaderLines,
      batchSize: request.batchSize,
      transformConcurrency: deps.transformConcurrency,
      executor: deps.executor,
      logger,
    });
  } catch (error) {
    return precheckFailed(error, 'INVALID_REQUEST');
  }

  try {
    load.from(await openSource(request.source, deps.sourceOptions));
  } catch (error) {
    return precheckFailed(error, 'SOURCE_ERROR');
  }

  if (deps.onEvent) {
    load.onAny(deps.onEvent);
  }
  return load.start();
}
