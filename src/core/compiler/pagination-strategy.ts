/**
 * Strategy interface for compiling pagination clauses.
 * Limit and offset arrive as 0 when unset.
 */
export interface PaginationStrategy {
  readonly name: string;
  /**
   * @param hasOrderBy - whether the statement already carries an ORDER BY line
   * @returns lines to append after ORDER BY (empty when nothing is paginated)
   */
  compilePagination(limit: number, offset: number, hasOrderBy: boolean): string[];
  /**
   * @returns text placed right after `SELECT` (such as `TOP n`), or undefined
   */
  compileSelectPrefix(limit: number, offset: number): string | undefined;
}

/**
 * `LIMIT n` / `OFFSET n`, each on its own line and only when greater than zero.
 */
export class StandardLimitOffsetPagination implements PaginationStrategy {
  readonly name = 'standard';

  compilePagination(limit: number, offset: number): string[] {
    const lines: string[] = [];
    if (limit > 0) lines.push(`LIMIT ${limit}`);
    if (offset > 0) lines.push(`OFFSET ${offset}`);
    return lines;
  }

  compileSelectPrefix(): undefined {
    return undefined;
  }
}

/**
 * SQL Server paging. Without an offset the limit becomes `SELECT TOP n`;
 * with one, `OFFSET n ROWS [FETCH NEXT m ROWS ONLY]`. SQL Server only accepts
 * OFFSET after an ORDER BY, so a neutral one is added when the statement has none.
 */
export class SqlServerOffsetFetchPagination implements PaginationStrategy {
  readonly name = 'mssql';

  compilePagination(limit: number, offset: number, hasOrderBy: boolean): string[] {
    if (offset <= 0) return [];
    const lines: string[] = [];
    if (!hasOrderBy) lines.push('ORDER BY (SELECT NULL)');
    lines.push(`OFFSET ${offset} ROWS`);
    if (limit > 0) lines.push(`FETCH NEXT ${limit} ROWS ONLY`);
    return lines;
  }

  compileSelectPrefix(limit: number, offset: number): string | undefined {
    return limit > 0 && offset <= 0 ? `TOP ${limit}` : undefined;
  }
}

export type PaginationStrategyName = 'standard' | 'mssql';

export const createPaginationStrategy = (name: PaginationStrategyName): PaginationStrategy =>
  name === 'mssql' ? new SqlServerOffsetFetchPagination() : new StandardLimitOffsetPagination();
