import type { LoadStatus } from '../../domain/model/LoadStatus.js';
import type { BatchFailure, LoadProgress } from '../../domain/model/LoadJob.js';
import type { Batch } from '../../domain/model/Batch.js';
import type { LoadJobContext } from '../LoadJobContext.js';

/** Result of querying load status. */
export interface LoadStatusResult {
  readonly status: LoadStatus;
  readonly progress: LoadProgress;
  readonly batches: readonly Batch[];
  readonly failures: readonly BatchFailure[];
}

/** Use case: query the current state, progress, and batch details of a load. */
export class GetLoadStatus {
  constructor(private readonly ctx: LoadJobContext) {}

  execute(): LoadStatusResult {
    return {
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
      batches: this.ctx.batches,
      failures: this.ctx.failures,
    };
  }

  getLoadId(): string {
    return this.ctx.loadId;
  }
}
