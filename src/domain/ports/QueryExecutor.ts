export interface QueryColumn {
  readonly name: string;
  readonly dataType?: string;
}

/** Structured reply of one statement. Absent fields mean the endpoint returned none. */
export interface QueryResult {
  readonly columns?: readonly QueryColumn[];
  readonly rows?: readonly (readonly unknown[])[];
  readonly stats?: Readonly<Record<string, unknown>>;
}

/**
 * Port to the remote query service. Implementations reject when the statement
 * could not be executed, whatever the reason (transport, HTTP status, engine error).
 */
export interface QueryExecutor {
  execute(statement: string): Promise<QueryResult>;
}
