import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { LoadError, errorMessage } from '../../domain/errors/LoadError.js';

export interface UrlSourceOptions {
  /** Custom HTTP headers to send with the request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Request timeout in milliseconds, up to the response headers. Default: `30000` (30 seconds). */
  readonly timeout?: number;
  /** File name for metadata. Default: extracted from URL path. */
  readonly fileName?: string;
}

/**
 * Data source that fetches a remote file using the Fetch API.
 *
 * `open()` performs the request up front so an unreachable URL or an HTTP error
 * surfaces as a `SOURCE_ERROR` before the load starts; `read()` opens lazily
 * otherwise. The response body is then streamed chunk by chunk.
 */
export class UrlSource implements DataSource {
  private readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;
  private readonly fileNameOverride: string | undefined;
  private response: Response | null = null;

  constructor(url: string, options?: UrlSourceOptions) {
    this.url = url;
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30000;
    this.fileNameOverride = options?.fileName;
  }

  async open(): Promise<void> {
    if (this.response) return;

    let response: Response;
    try {
      response = await this.fetchWithTimeout();
    } catch (error) {
      throw new LoadError('SOURCE_ERROR', `cannot fetch ${this.url}: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new LoadError('SOURCE_ERROR', `UrlSource: HTTP ${String(response.status)} ${response.statusText} for ${this.url}`);
    }
    this.response = response;
  }

  async *read(): AsyncIterable<string> {
    await this.open();
    const response = this.response;
    if (!response) return;
    // A response body can only be consumed once.
    this.response = null;

    if (!response.body) {
      yield await response.text();
      return;
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder('utf-8');

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield decoder.decode(value, { stream: true });
      }
      // Flush remaining bytes
      const final = decoder.decode();
      if (final) yield final;
    } finally {
      reader.releaseLock();
    }
  }

  metadata(): SourceMetadata {
    return { fileName: this.fileNameOverride ?? this.extractFileName() };
  }

  private async fetchWithTimeout(): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      return await fetch(this.url, {
        headers: { ...this.headers },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private extractFileName(): string {
    try {
      const segments = new URL(this.url).pathname.split('/');
      const last = segments[segments.length - 1];
      return last && last.length > 0 ? decodeURIComponent(last) : 'remote-file';
    } catch {
      return 'remote-file';
    }
  }
}
