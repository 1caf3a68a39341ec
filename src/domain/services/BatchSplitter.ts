/** A bounded group of consecutive source lines. */
export interface LineBatch {
  readonly lines: readonly string[];
  /** Zero-based, increasing in source order. */
  readonly batchIndex: number;
}

/**
 * Domain service that groups a stream of lines into fixed-size batches.
 *
 * Pure logic with no I/O. Operates as an async generator that
 * yields batches as they fill up, so at most one batch of lines is held in memory.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be at least 1');
    }
  }

  /**
   * Split a stream of lines into batches of `batchSize`.
   *
   * The final batch may contain fewer lines than `batchSize`. Blank lines are
   * kept; dropping them is the transformer's job.
   */
  async *split(lines: AsyncIterable<string>): AsyncIterable<LineBatch> {
    let buffer: string[] = [];
    let batchIndex = 0;

    for await (const line of lines) {
      buffer.push(line);

      if (buffer.length >= this.batchSize) {
        yield { lines: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { lines: buffer, batchIndex };
    }
  }
}
