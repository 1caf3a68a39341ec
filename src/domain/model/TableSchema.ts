import { LoadError } from '../errors/LoadError.js';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: string;
}

/** Target table columns, in the order they were declared. */
export interface TableSchema {
  readonly columns: readonly ColumnDefinition[];
}

export const INVALID_SCHEMA_MESSAGE = 'not a valid schema, please input schema in format like a:uint8,b:uint64';

/**
 * Parse a schema description such as `a:uint8, b:uint64`.
 *
 * All whitespace is removed first. Each comma-separated field must split on `:`
 * into exactly two non-empty tokens, otherwise the whole schema is rejected.
 * A column name declared twice is rejected as well.
 */
export function parseTableSchema(raw: string): TableSchema {
  const compact = raw.replace(/\s+/g, '');
  const columns: ColumnDefinition[] = [];
  const seen = new Set<string>();

  for (const field of compact.split(',')) {
    const tokens = field.split(':').filter((token) => token.length > 0);
    const [name, type] = tokens;
    if (tokens.length !== 2 || name === undefined || type === undefined) {
      throw new LoadError('INVALID_SCHEMA', INVALID_SCHEMA_MESSAGE);
    }
    if (seen.has(name)) {
      throw new LoadError('INVALID_SCHEMA', `duplicate column '${name}' in schema`);
    }
    seen.add(name);
    columns.push({ name, type });
  }

  return { columns };
}

/** `a uint8, b uint64`: the column list of a `CREATE TABLE` statement. */
export function renderColumnDefinitions(schema: TableSchema): string {
  return schema.columns.map((column) => `${column.name} ${column.type}`).join(', ');
}

/** `a, b`: the column list of an `INSERT INTO` target. */
export function renderColumnNames(schema: TableSchema): string {
  return schema.columns.map((column) => column.name).join(', ');
}
