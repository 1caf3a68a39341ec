import type { LoadProgress, LoadSummary } from '../model/LoadJob.js';
import type { LoadErrorCode } from '../errors/LoadError.js';

/** Emitted when `start()` is called, before the table is resolved. */
export interface LoadStartedEvent {
  readonly type: 'load:started';
  readonly loadId: string;
  readonly table: string;
  /** File name (or `stdin` / URL file name) of the source. */
  readonly source: string;
  readonly timestamp: number;
}

/** Emitted when the target table was found and will be used as is. */
export interface TableVerifiedEvent {
  readonly type: 'table:verified';
  readonly loadId: string;
  readonly table: string;
  readonly tableRef: string;
  readonly timestamp: number;
}

/** Emitted after the target table was created from the schema. */
export interface TableCreatedEvent {
  readonly type: 'table:created';
  readonly loadId: string;
  readonly table: string;
  readonly tableRef: string;
  readonly statement: string;
  readonly timestamp: number;
}

/** Emitted when a batch has been cut from the source, before it is transformed. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly loadId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly lineCount: number;
  readonly timestamp: number;
}

/** Emitted when the endpoint acknowledged a batch's insert statement. */
export interface BatchDispatchedEvent {
  readonly type: 'batch:dispatched';
  readonly loadId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted when a batch's insert statement failed. The load carries on. */
export interface BatchFailedEvent {
  readonly type: 'batch:failed';
  readonly loadId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly recordCount: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for a batch made only of blank lines. Nothing is sent. */
export interface BatchSkippedEvent {
  readonly type: 'batch:skipped';
  readonly loadId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly lineCount: number;
  readonly timestamp: number;
}

/** Emitted after every batch with updated counters. */
export interface LoadProgressEvent {
  readonly type: 'load:progress';
  readonly loadId: string;
  readonly progress: LoadProgress;
  readonly timestamp: number;
}

/** Emitted when the source is exhausted. `failedBatches > 0` means completed with errors. */
export interface LoadCompletedEvent {
  readonly type: 'load:completed';
  readonly loadId: string;
  readonly summary: LoadSummary;
  readonly failedBatches: number;
  readonly timestamp: number;
}

/** Emitted when a fatal error ends the load. */
export interface LoadFailedEvent {
  readonly type: 'load:failed';
  readonly loadId: string;
  readonly code: LoadErrorCode;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when `abort()` is called. */
export interface LoadAbortedEvent {
  readonly type: 'load:aborted';
  readonly loadId: string;
  readonly progress: LoadProgress;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | LoadStartedEvent
  | TableVerifiedEvent
  | TableCreatedEvent
  | BatchStartedEvent
  | BatchDispatchedEvent
  | BatchFailedEvent
  | BatchSkippedEvent
  | LoadProgressEvent
  | LoadCompletedEvent
  | LoadFailedEvent
  | LoadAbortedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
