import type { BatchOutcome } from '../model/BatchOutcome.js';
import type { QueryExecutor } from '../ports/QueryExecutor.js';
import { errorMessage } from '../errors/LoadError.js';
import { insertInto } from './StatementBuilder.js';

/**
 * Sends one batch as a single `INSERT` statement.
 *
 * Never rejects for a failed statement: the failure is returned as the outcome
 * so the caller can report it and move on to the next batch. No retries.
 */
export class StatementDispatcher {
  constructor(private readonly executor: QueryExecutor) {}

  async dispatch(tableRef: string, valueList: string): Promise<BatchOutcome> {
    try {
      await this.executor.execute(insertInto(tableRef, valueList));
      return { status: 'ACKNOWLEDGED' };
    } catch (error) {
      return { status: 'FAILED', message: errorMessage(error) };
    }
  }
}
