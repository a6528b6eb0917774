import type { ClauseSnapshot } from '../../query-builder/clause-types.js';
import { qualifyColumn } from '../graph/column-ref.js';
import { FromClauseBuilder, type GraphView } from './from-clause-builder.js';
import { PredicateCompiler } from './predicate-compiler.js';
import { StandardLimitOffsetPagination, type PaginationStrategy } from './pagination-strategy.js';

export interface SelectAssemblyOptions {
  /** Nodes left out of both the SELECT list and FROM */
  exclude?: ReadonlySet<string>;
  /** Replaces the computed SELECT list */
  columns?: readonly string[];
  /** Emit ORDER BY, pagination and the set operation (default true) */
  includeTail?: boolean;
  pagination?: PaginationStrategy;
}

/**
 * Renders the SELECT statement lines around the FROM blocks.
 *
 * Line order: SELECT, FROM/JOIN, WHERE, GROUP BY, HAVING, ORDER BY,
 * pagination, then an optional set operation.
 */
export class ClauseAssembler {
  /**
   * Selected columns (node then column order), derived expressions, then aggregates.
   * Falls back to `*` when the list is empty.
   */
  static compileSelectList(
    graph: GraphView,
    clauses: ClauseSnapshot,
    exclude: ReadonlySet<string> = new Set()
  ): string[] {
    const parts: string[] = [];
    for (const node of graph.nodes()) {
      if (exclude.has(node.id)) continue;
      for (const column of node.columns) {
        if (node.selected.has(column)) {
          parts.push(qualifyColumn(node.id, column));
        }
      }
    }
    for (const derived of clauses.derivedColumns) {
      parts.push(`${derived.expression} AS ${derived.alias}`);
    }
    for (const aggregate of clauses.aggregates) {
      parts.push(`${aggregate.func}(${aggregate.column}) AS ${aggregate.alias}`);
    }
    return parts.length ? parts : ['*'];
  }

  static compileWhere(clauses: ClauseSnapshot): string | undefined {
    if (!clauses.wherePredicates.length) return undefined;
    return `WHERE ${PredicateCompiler.compileConjunction(clauses.wherePredicates)}`;
  }

  static compileGroupBy(clauses: ClauseSnapshot): string | undefined {
    if (!clauses.groupBy.length) return undefined;
    return `GROUP BY ${clauses.groupBy.join(', ')}`;
  }

  static compileHaving(clauses: ClauseSnapshot): string | undefined {
    if (!clauses.havingPredicates.length) return undefined;
    return `HAVING ${PredicateCompiler.compileConjunction(clauses.havingPredicates)}`;
  }

  static compileOrderBy(clauses: ClauseSnapshot): string | undefined {
    if (!clauses.orderBy.length) return undefined;
    return `ORDER BY ${clauses.orderBy.map(term => `${term.column} ${term.direction}`).join(', ')}`;
  }

  static assembleSelect(
    graph: GraphView,
    clauses: ClauseSnapshot,
    options: SelectAssemblyOptions = {}
  ): string[] {
    const exclude = options.exclude ?? new Set<string>();
    const columns = options.columns?.length
      ? [...options.columns]
      : ClauseAssembler.compileSelectList(graph, clauses, exclude);

    const pagination = options.pagination ?? new StandardLimitOffsetPagination();
    const includeTail = options.includeTail !== false;
    const prefix = includeTail ? pagination.compileSelectPrefix(clauses.limit, clauses.offset) : undefined;

    const lines: string[] = [`SELECT ${prefix ? `${prefix} ` : ''}${columns.join(', ')}`];
    lines.push(...FromClauseBuilder.build(graph, { exclude }));

    const optional = [
      ClauseAssembler.compileWhere(clauses),
      ClauseAssembler.compileGroupBy(clauses),
      ClauseAssembler.compileHaving(clauses)
    ];
    for (const line of optional) {
      if (line) lines.push(line);
    }

    if (!includeTail) {
      return lines;
    }

    const orderBy = ClauseAssembler.compileOrderBy(clauses);
    if (orderBy) lines.push(orderBy);

    lines.push(...pagination.compilePagination(clauses.limit, clauses.offset, orderBy !== undefined));

    if (clauses.setOperation) {
      lines.push(clauses.setOperation.operator, '(', clauses.setOperation.sql, ')');
    }
    return lines;
  }
}
