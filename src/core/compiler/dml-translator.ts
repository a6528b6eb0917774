import type { DmlMode } from '../sql/sql.js';
import type { MappingEdge } from '../graph/graph-types.js';
import { parseColumnRef, qualifyColumn, targetTableName } from '../graph/column-ref.js';
import type { ClauseSnapshot } from '../../query-builder/clause-types.js';
import { ClauseAssembler } from './clause-assembler.js';
import type { GraphView } from './from-clause-builder.js';
import type { PaginationStrategy } from './pagination-strategy.js';

/** Join key assumed on both the target and the source sub-select. */
export const DML_JOIN_KEY = 'id';

export type DmlProblem = 'EmptyTarget' | 'NoMapping';

export type DmlTranslation =
  | { ok: true; sql: string }
  | { ok: false; problem: DmlProblem; sql: string };

export interface DmlTranslatorOptions {
  pagination?: PaginationStrategy;
}

export interface ResolvedMapping {
  sourceRef: string;
  sourceNode: string;
  sourceColumn: string;
  targetColumn: string;
}

const resolveMappings = (edges: readonly MappingEdge[]): ResolvedMapping[] => {
  const resolved: ResolvedMapping[] = [];
  for (const edge of edges) {
    const source = parseColumnRef(edge.sourceColumnRef);
    const target = parseColumnRef(edge.targetColumnRef);
    if (!source || !target) continue;
    resolved.push({
      sourceRef: qualifyColumn(source.nodeId, source.column),
      sourceNode: source.nodeId,
      sourceColumn: source.column,
      targetColumn: target.column
    });
  }
  return resolved;
};

const unique = (items: readonly string[]): string[] => Array.from(new Set(items));

/**
 * Translates the graph into INSERT / UPDATE / DELETE.
 *
 * The DML target is left out of the join graph; the remaining nodes form the
 * value sub-select. Missing target or mappings never throw: the result is a
 * single SQL comment line so callers always have text to show.
 */
export class DmlTranslator {
  static translate(
    mode: DmlMode,
    graph: GraphView,
    clauses: ClauseSnapshot,
    options: DmlTranslatorOptions = {}
  ): DmlTranslation {
    const targetId = graph.targetNodeId;
    if (targetId === undefined || !graph.getNode(targetId)) {
      return {
        ok: false,
        problem: 'EmptyTarget',
        sql: `-- No DML target: mark one node as the ${mode} target.`
      };
    }

    const mappings = resolveMappings(graph.mappingEdges());
    if (!mappings.length) {
      return {
        ok: false,
        problem: 'NoMapping',
        sql: `-- No column mappings for target '${targetId}': map at least one source column.`
      };
    }

    const exclude = new Set([targetId]);
    const table = targetTableName(targetId);

    switch (mode) {
      case 'INSERT':
        return { ok: true, sql: DmlTranslator.compileInsert(table, mappings, graph, clauses, exclude, options) };
      case 'UPDATE':
        if (mappings.every(m => m.targetColumn === DML_JOIN_KEY)) {
          return {
            ok: false,
            problem: 'NoMapping',
            sql: `-- No column mappings for target '${targetId}' besides the ${DML_JOIN_KEY} key: nothing to SET.`
          };
        }
        return { ok: true, sql: DmlTranslator.compileUpdate(table, mappings, graph, clauses, exclude) };
      case 'DELETE':
        return { ok: true, sql: DmlTranslator.compileDelete(table, mappings, graph, clauses, exclude) };
    }
  }

  /**
   * Source column that feeds the `id` key: the one mapped onto `id`, otherwise
   * `id` on the first mapped source node.
   */
  static keySelectItem(mappings: readonly ResolvedMapping[]): string {
    const keyed = mappings.find(m => m.targetColumn === DML_JOIN_KEY);
    if (keyed) {
      return keyed.sourceColumn === DML_JOIN_KEY ? keyed.sourceRef : `${keyed.sourceRef} AS ${DML_JOIN_KEY}`;
    }
    return qualifyColumn(mappings[0].sourceNode, DML_JOIN_KEY);
  }

  private static compileInsert(
    table: string,
    mappings: readonly ResolvedMapping[],
    graph: GraphView,
    clauses: ClauseSnapshot,
    exclude: ReadonlySet<string>,
    options: DmlTranslatorOptions
  ): string {
    const targetColumns = mappings.map(m => m.targetColumn).join(', ');
    const select = ClauseAssembler.assembleSelect(graph, clauses, {
      exclude,
      columns: mappings.map(m => m.sourceRef),
      pagination: options.pagination
    });
    return [`INSERT INTO ${table} (${targetColumns})`, ...select].join('\n');
  }

  private static compileUpdate(
    table: string,
    mappings: readonly ResolvedMapping[],
    graph: GraphView,
    clauses: ClauseSnapshot,
    exclude: ReadonlySet<string>
  ): string {
    const setMappings = mappings.filter(m => m.targetColumn !== DML_JOIN_KEY);
    const sets = setMappings.map(m => `${m.targetColumn}=src.${m.sourceColumn}`);
    const columns = unique([DmlTranslator.keySelectItem(mappings), ...setMappings.map(m => m.sourceRef)]);
    const subselect = ClauseAssembler.assembleSelect(graph, clauses, { exclude, columns, includeTail: false });
    return [
      `UPDATE ${table}`,
      `SET ${sets.join(', ')}`,
      'FROM (',
      ...subselect,
      ') AS src',
      `WHERE ${table}.${DML_JOIN_KEY}=src.${DML_JOIN_KEY}`
    ].join('\n');
  }

  private static compileDelete(
    table: string,
    mappings: readonly ResolvedMapping[],
    graph: GraphView,
    clauses: ClauseSnapshot,
    exclude: ReadonlySet<string>
  ): string {
    const subselect = ClauseAssembler.assembleSelect(graph, clauses, {
      exclude,
      columns: [DmlTranslator.keySelectItem(mappings)],
      includeTail: false
    });
    return [`DELETE FROM ${table}`, `WHERE ${DML_JOIN_KEY} IN (`, ...subselect, ')'].join('\n');
  }
}
