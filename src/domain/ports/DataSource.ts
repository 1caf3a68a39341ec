/** Metadata about the data source, used for logging and the `load:started` event. */
export interface SourceMetadata {
  readonly fileName: string;
  readonly fileSize?: number;
}

/**
 * Port for reading raw text from any origin (file, URL, standard input, memory).
 *
 * `read()` is lazy and single-pass as far as callers are concerned: the pipeline
 * splits its chunks into lines and never asks for the data twice.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers. Chunk boundaries need not align with lines. */
  read(): AsyncIterable<string | Buffer>;
  /** Check that the data can be reached before anything is sent. Rejects with `SOURCE_ERROR`. */
  open?(): Promise<void>;
  metadata(): SourceMetadata;
}
