import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { LoadError } from '../../domain/errors/LoadError.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

/**
 * Data source over an `AsyncIterable` such as `process.stdin` or an upload stream.
 *
 * Reads until the stream signals its end; there is no timeout. Streams can only
 * be read once.
 */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<string | Buffer>;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: AsyncIterable<string | Buffer>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    if (this.consumed) {
      throw new LoadError('SOURCE_ERROR', 'StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    yield* this.stream;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
