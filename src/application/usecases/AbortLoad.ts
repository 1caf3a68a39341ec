import type { LoadJobContext } from '../LoadJobContext.js';

/**
 * Use case: stop the load at the next batch boundary. Terminal state.
 *
 * A statement already in flight is not cancelled; only batches not yet cut
 * from the source are given up.
 */
export class AbortLoad {
  constructor(private readonly ctx: LoadJobContext) {}

  execute(): void {
    if (this.ctx.status !== 'RESOLVING' && this.ctx.status !== 'LOADING') {
      throw new Error(`Cannot abort load from status '${this.ctx.status}'`);
    }

    this.ctx.transitionTo('ABORTED');
    this.ctx.abortController?.abort();

    this.ctx.eventBus.emit({
      type: 'load:aborted',
      loadId: this.ctx.loadId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
    this.ctx.logger.info('load aborted');
  }
}
