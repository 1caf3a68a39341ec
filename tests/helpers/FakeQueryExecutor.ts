import type { QueryExecutor, QueryResult } from '../../src/domain/ports/QueryExecutor.js';

export interface FakeQueryExecutorOptions {
  /** Tables that exist before the load starts. */
  readonly tables?: readonly string[];
  /** Return a message to reject the n-th (zero-based) INSERT with it. */
  readonly failInsert?: (insertIndex: number, statement: string) => string | undefined;
  /** Reject every statement, as if the endpoint were down. */
  readonly unreachable?: boolean;
}

/** In-process stand-in for the query endpoint. Records every statement it receives. */
export class FakeQueryExecutor implements QueryExecutor {
  readonly statements: string[] = [];
  private readonly tables: Set<string>;
  private insertCount = 0;

  constructor(private readonly options: FakeQueryExecutorOptions = {}) {
    this.tables = new Set(options.tables ?? []);
  }

  get inserts(): string[] {
    return this.statements.filter((s) => s.startsWith('INSERT INTO '));
  }

  hasTable(name: string): boolean {
    return this.tables.has(name);
  }

  async execute(statement: string): Promise<QueryResult> {
    this.statements.push(statement);
    await Promise.resolve();

    if (this.options.unreachable) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:8000');
    }

    const show = /^SHOW TABLES LIKE '(.+)';$/.exec(statement);
    if (show?.[1] !== undefined) {
      const rows = this.tables.has(show[1]) ? [[show[1]]] : [];
      return { columns: [{ name: 'name', dataType: 'String' }], rows };
    }

    const create = /^CREATE TABLE ([^(\s]+)\(/.exec(statement);
    if (create?.[1] !== undefined) {
      this.tables.add(create[1]);
      return {};
    }

    if (statement.startsWith('INSERT INTO ')) {
      const index = this.insertCount++;
      const failure = this.options.failInsert?.(index, statement);
      if (failure !== undefined) {
        throw new Error(failure);
      }
    }

    return {};
  }
}

/** Value fragments of an INSERT statement, sorted: fragment order inside a batch is unspecified. */
export function fragmentsOf(statement: string): string[] {
  const marker = ' VALUES ';
  const values = statement.slice(statement.indexOf(marker) + marker.length, -1);
  return [...(values.match(/\([^()]*\)/g) ?? [])].sort();
}
