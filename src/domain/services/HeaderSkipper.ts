export interface SkippedStream {
  /** The lines left after the header. */
  readonly lines: AsyncIterable<string>;
  /** Header lines actually consumed. */
  readonly skipped: number;
  /** `true` when the source ended before the whole header was consumed. */
  readonly exhausted: boolean;
}

/** Domain service that discards a fixed number of leading lines. */
export class HeaderSkipper {
  constructor(private readonly count: number) {
    if (!Number.isInteger(count) || count < 0) {
      throw new Error('Header skip count must be a non-negative integer');
    }
  }

  /**
   * Consume the header eagerly, then hand back the rest of the stream.
   *
   * A source shorter than the header is not an error: the result is simply
   * `exhausted` with an empty `lines` stream.
   */
  async skip(lines: AsyncIterable<string>): Promise<SkippedStream> {
    const iterator = lines[Symbol.asyncIterator]();
    let skipped = 0;

    while (skipped < this.count) {
      const next = await iterator.next();
      if (next.done) {
        return { lines: emptyLines(), skipped, exhausted: true };
      }
      skipped++;
    }

    return { lines: remaining(iterator), skipped, exhausted: false };
  }
}

async function* remaining(iterator: AsyncIterator<string>): AsyncIterable<string> {
  try {
    for (;;) {
      const next = await iterator.next();
      if (next.done) return;
      yield next.value;
    }
  } finally {
    await iterator.return?.();
  }
}

async function* emptyLines(): AsyncIterable<string> {}
