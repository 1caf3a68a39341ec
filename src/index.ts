// Main entry point
export { BulkLoad } from './BulkLoad.js';
export type { BulkLoadConfig } from './BulkLoad.js';
export { runLoad } from './application/runLoad.js';
export type { RunLoadDependencies } from './application/runLoad.js';

// Domain model
export type {
  LoadRequest,
  LoadFormat,
  LoadSummary,
  LoadProgress,
  LoadOutcome,
  BatchFailure,
  PreviewResult,
} from './domain/model/LoadJob.js';
export { DEFAULT_BATCH_SIZE, emptySummary } from './domain/model/LoadJob.js';
export type { SourceSpec } from './domain/model/SourceSpec.js';
export { resolveSourceSpec, describeSource } from './domain/model/SourceSpec.js';
export type { TableSchema, ColumnDefinition } from './domain/model/TableSchema.js';
export { parseTableSchema, renderColumnDefinitions, renderColumnNames } from './domain/model/TableSchema.js';
export type { Batch } from './domain/model/Batch.js';
export type { BatchOutcome } from './domain/model/BatchOutcome.js';
export { BatchStatus } from './domain/model/BatchStatus.js';
export { LoadStatus, canTransition } from './domain/model/LoadStatus.js';
export { LoadError, isLoadError } from './domain/errors/LoadError.js';
export type { LoadErrorCode } from './domain/errors/LoadError.js';

// Use case result types
export type { LoadStatusResult } from './application/usecases/GetLoadStatus.js';

// Domain services (for building custom pipelines)
export { splitLines } from './domain/services/LineSplitter.js';
export { HeaderSkipper } from './domain/services/HeaderSkipper.js';
export type { SkippedStream } from './domain/services/HeaderSkipper.js';
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export type { LineBatch } from './domain/services/BatchSplitter.js';
export { RecordTransformer, renderFragment } from './domain/services/RecordTransformer.js';
export type { TransformedBatch } from './domain/services/RecordTransformer.js';
export { StatementDispatcher } from './domain/services/StatementDispatcher.js';
export { TableResolver } from './domain/services/TableResolver.js';
export type { ResolvedTable } from './domain/services/TableResolver.js';
export { showTablesLike, createTable, tableReference, insertInto } from './domain/services/StatementBuilder.js';

// Application internals
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { QueryExecutor, QueryResult, QueryColumn } from './domain/ports/QueryExecutor.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  LoadStartedEvent,
  TableVerifiedEvent,
  TableCreatedEvent,
  BatchStartedEvent,
  BatchDispatchedEvent,
  BatchFailedEvent,
  BatchSkippedEvent,
  LoadProgressEvent,
  LoadCompletedEvent,
  LoadFailedEvent,
  LoadAbortedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { UrlSource } from './infrastructure/sources/UrlSource.js';
export type { UrlSourceOptions } from './infrastructure/sources/UrlSource.js';
export { openSource } from './infrastructure/sources/openSource.js';
export type { OpenSourceOptions } from './infrastructure/sources/openSource.js';
export { HttpQueryClient } from './infrastructure/query/HttpQueryClient.js';
export type { HttpQueryClientOptions } from './infrastructure/query/HttpQueryClient.js';
export { QueryError } from './infrastructure/query/QueryError.js';

// Ambient
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export { loadConfig, ConfigError } from './config/index.js';
export type { AppConfig } from './config/index.js';
