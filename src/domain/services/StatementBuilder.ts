import type { TableSchema } from '../model/TableSchema.js';
import { renderColumnDefinitions, renderColumnNames } from '../model/TableSchema.js';

// Table names, column types and values are passed through verbatim.

export function showTablesLike(table: string): string {
  return `SHOW TABLES LIKE '${table}';`;
}

export function createTable(table: string, schema: TableSchema): string {
  return `CREATE TABLE ${table}(${renderColumnDefinitions(schema)}) Engine = Fuse;`;
}

/** Insert target: the bare table name, or `table (a, b)` when a schema names the columns. */
export function tableReference(table: string, schema?: TableSchema | null): string {
  return schema ? `${table} (${renderColumnNames(schema)})` : table;
}

export function insertInto(tableRef: string, valueList: string): string {
  return `INSERT INTO ${tableRef} VALUES ${valueList};`;
}
