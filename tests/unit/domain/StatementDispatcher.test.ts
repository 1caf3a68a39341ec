import { describe, it, expect, vi } from 'vitest';
import { StatementDispatcher } from '../../../src/domain/services/StatementDispatcher.js';
import type { QueryExecutor } from '../../../src/domain/ports/QueryExecutor.js';

function executorWith(execute: QueryExecutor['execute']): QueryExecutor {
  return { execute };
}

describe('StatementDispatcher', () => {
  it('should send a single INSERT statement for the batch', async () => {
    const execute = vi.fn<QueryExecutor['execute']>().mockResolvedValue({});
    const dispatcher = new StatementDispatcher(executorWith(execute));

    const outcome = await dispatcher.dispatch('t (a, b)', '(1,x), (2,y)');

    expect(outcome).toEqual({ status: 'ACKNOWLEDGED' });
    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledWith('INSERT INTO t (a, b) VALUES (1,x), (2,y);');
  });

  it('should return the failure message instead of rejecting', async () => {
    const execute = vi.fn<QueryExecutor['execute']>().mockRejectedValue(new Error('type mismatch in column a'));
    const dispatcher = new StatementDispatcher(executorWith(execute));

    const outcome = await dispatcher.dispatch('t', '(x)');

    expect(outcome).toEqual({ status: 'FAILED', message: 'type mismatch in column a' });
  });

  it('should not retry a failed statement', async () => {
    const execute = vi.fn<QueryExecutor['execute']>().mockRejectedValue(new Error('boom'));
    await new StatementDispatcher(executorWith(execute)).dispatch('t', '(1)');

    expect(execute).toHaveBeenCalledTimes(1);
  });
});
