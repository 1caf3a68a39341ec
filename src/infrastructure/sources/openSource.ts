import type { DataSource } from '../../domain/ports/DataSource.js';
import type { SourceSpec } from '../../domain/model/SourceSpec.js';
import { FilePathSource, assertReadable } from './FilePathSource.js';
import { StreamSource } from './StreamSource.js';
import { UrlSource } from './UrlSource.js';
import type { UrlSourceOptions } from './UrlSource.js';

export interface OpenSourceOptions {
  readonly url?: UrlSourceOptions;
  /** Stream used for `{ kind: 'stdin' }`. Default: `process.stdin`. */
  readonly stdin?: AsyncIterable<string | Buffer>;
}

/**
 * Resolve a `SourceSpec` into a data source, once.
 *
 * Paths are checked for read access and URLs are fetched here, so a bad source
 * fails with `SOURCE_ERROR` before anything is sent to the query endpoint.
 */
export async function openSource(spec: SourceSpec, options?: OpenSourceOptions): Promise<DataSource> {
  switch (spec.kind) {
    case 'path':
      await assertReadable(spec.path);
      return new FilePathSource(spec.path);
    case 'url': {
      const source = new UrlSource(spec.url, options?.url);
      await source.open();
      return source;
    }
    case 'stdin':
      return new StreamSource(options?.stdin ?? process.stdin, { fileName: 'stdin' });
  }
}
