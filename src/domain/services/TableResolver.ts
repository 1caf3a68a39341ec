import type { TableSchema } from '../model/TableSchema.js';
import type { QueryExecutor, QueryResult } from '../ports/QueryExecutor.js';
import { LoadError, errorMessage } from '../errors/LoadError.js';
import { createTable, showTablesLike, tableReference } from './StatementBuilder.js';

export interface ResolvedTable {
  /** Insert target handed to the dispatcher for every batch. */
  readonly tableRef: string;
  /** `true` when the table was created from the schema. */
  readonly created: boolean;
  /** The `CREATE TABLE` statement, when one was issued. */
  readonly statement?: string;
}

/**
 * Decides, once per load, whether the target table is used as is or created.
 *
 * Without a schema the table must already exist. With a schema an existing
 * table wins (the schema is ignored) and a missing one is created from it.
 */
export class TableResolver {
  constructor(private readonly executor: QueryExecutor) {}

  async resolve(table: string, schema: TableSchema | null): Promise<ResolvedTable> {
    if (schema === null) {
      return this.verifyExisting(table);
    }

    if (await this.existsOrFalse(table)) {
      return { tableRef: tableReference(table), created: false };
    }

    const statement = createTable(table, schema);
    try {
      await this.executor.execute(statement);
    } catch (error) {
      throw new LoadError('TABLE_CREATE_FAILED', `cannot create table ${table}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return { tableRef: tableReference(table, schema), created: true, statement };
  }

  /** Rejects with the transport error when the check itself cannot run. */
  async exists(table: string): Promise<boolean> {
    const result = await this.executor.execute(showTablesLike(table));
    return hasRows(result);
  }

  private async verifyExisting(table: string): Promise<ResolvedTable> {
    let found: boolean;
    try {
      found = await this.exists(table);
    } catch (error) {
      throw new LoadError('TABLE_NOT_FOUND', `table ${table} not found: ${errorMessage(error)}`, { cause: error });
    }

    if (!found) {
      throw new LoadError('TABLE_NOT_FOUND', `table ${table} not found`);
    }
    return { tableRef: tableReference(table), created: false };
  }

  private async existsOrFalse(table: string): Promise<boolean> {
    try {
      return await this.exists(table);
    } catch {
      // An unreadable existence check falls through to creation, which reports its own error.
      return false;
    }
  }
}

function hasRows(result: QueryResult): boolean {
  return result.columns !== undefined && result.rows !== undefined && result.rows.length > 0;
}
