import type { QueryColumn, QueryExecutor, QueryResult } from '../../domain/ports/QueryExecutor.js';
import { errorMessage } from '../../domain/errors/LoadError.js';
import { QueryError } from './QueryError.js';
import { engineErrorMessage, queryResponseSchema } from './QueryResponse.js';
import type { QueryResponse, QueryResponseField } from './QueryResponse.js';

interface PageRequest {
  readonly method: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface HttpQueryClientOptions {
  /** Path of the statement handler, appended to the endpoint. Default: `/v1/statement`. */
  readonly statementPath?: string;
  /** Per-request timeout in milliseconds. Default: `30000`. */
  readonly timeout?: number;
  /** Extra HTTP headers sent with every request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Upper bound on `next_uri` pages followed for one statement. Default: `10000`. */
  readonly maxPages?: number;
}

/**
 * `QueryExecutor` over the query service's HTTP handler.
 *
 * The statement is POSTed as plain text; the JSON reply is validated, and
 * further pages are fetched through `next_uri` until the result is complete.
 * One instance is shared read-only by every statement of a load.
 */
export class HttpQueryClient implements QueryExecutor {
  private readonly endpoint: string;
  private readonly statementUrl: string;
  private readonly timeout: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly maxPages: number;

  constructor(endpoint: string, options?: HttpQueryClientOptions) {
    this.endpoint = endpoint;
    this.statementUrl = new URL(options?.statementPath ?? '/v1/statement', endpoint).toString();
    this.timeout = options?.timeout ?? 30000;
    this.headers = options?.headers ?? {};
    this.maxPages = options?.maxPages ?? 10000;
  }

  async execute(statement: string): Promise<QueryResult> {
    let page = await this.request(this.statementUrl, {
      method: 'POST',
      headers: { 'content-type': 'text/plain; charset=utf-8' },
      body: statement,
    });

    let columns = page.columns ? toColumns(page.columns.fields) : undefined;
    let rows = page.data ?? undefined;
    let pages = 1;

    while (page.next_uri) {
      if (pages >= this.maxPages) {
        throw new QueryError(`query result exceeded ${String(this.maxPages)} pages`);
      }
      page = await this.request(new URL(page.next_uri, this.endpoint).toString(), { method: 'GET' });
      pages++;

      if (!columns && page.columns) {
        columns = toColumns(page.columns.fields);
      }
      if (page.data) {
        rows = [...(rows ?? []), ...page.data];
      }
    }

    return {
      columns,
      rows,
      stats: page.stats ?? undefined,
    };
  }

  /** The timeout covers the whole exchange, body included. */
  private async request(url: string, init: PageRequest): Promise<QueryResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      return await this.exchange(url, init, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new QueryError(`no answer from query endpoint ${url} within ${String(this.timeout)} ms`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async exchange(url: string, init: PageRequest, signal: AbortSignal): Promise<QueryResponse> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method,
        headers: { ...this.headers, ...init.headers },
        body: init.body,
        signal,
      });
    } catch (error) {
      throw new QueryError(`cannot reach query endpoint ${url}: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new QueryError(`HTTP ${String(response.status)} ${response.statusText}: ${text}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new QueryError(`invalid response from query endpoint: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = queryResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new QueryError(`invalid response from query endpoint: ${where}${issue?.message ?? 'unexpected shape'}`);
    }

    if (parsed.data.error) {
      throw new QueryError(engineErrorMessage(parsed.data.error), { status: response.status });
    }

    return parsed.data;
  }
}

function toColumns(fields: readonly QueryResponseField[]): QueryColumn[] {
  return fields.map((field) => ({
    name: field.name,
    dataType: describeType(field.data_type),
  }));
}

function describeType(dataType: unknown): string | undefined {
  if (dataType === undefined || dataType === null) return undefined;
  return typeof dataType === 'string' ? dataType : JSON.stringify(dataType);
}
