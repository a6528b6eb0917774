// src/core/execution/db-executor.ts

// low-level canonical shape
export type QueryResult = {
  columns: string[];
  values: unknown[][];
};

/**
 * Runs generated SQL text. The compiler never calls this on its own; a session
 * hands the current text over on an explicit run request.
 */
export interface DbExecutor {
  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;
  dispose?(): Promise<void>;
}

// --- helpers ---

/**
 * Convert an array of row objects into a QueryResult.
 */
export function rowsToQueryResult(
  rows: Array<Record<string, unknown>>
): QueryResult {
  if (rows.length === 0) {
    return { columns: [], values: [] };
  }

  const columns = Object.keys(rows[0]);
  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}
