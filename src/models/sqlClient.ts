export interface SqlQueryResult {
  rows: unknown[];
  rowCount: number | null;
}

/** The slice of pg's Pool the repositories use. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
}
