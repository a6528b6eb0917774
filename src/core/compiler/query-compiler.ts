import type { OperationMode } from '../sql/sql.js';
import type { ClauseSnapshot, CteDefinition } from '../../query-builder/clause-types.js';
import { ClauseAssembler } from './clause-assembler.js';
import { CteInliner } from './cte-inliner.js';
import { DmlTranslator, type DmlProblem } from './dml-translator.js';
import type { GraphView } from './from-clause-builder.js';
import { IdentifierRewriter, type LinkedServerMap } from './identifier-rewriter.js';
import { StandardLimitOffsetPagination, type PaginationStrategy } from './pagination-strategy.js';

export interface CompileInput {
  graph: GraphView;
  clauses: ClauseSnapshot;
  mode: OperationMode;
  ctes?: readonly CteDefinition[];
  linkedServers?: LinkedServerMap;
  /** Literal statement kept from an import; used while the graph is empty */
  importedStatement?: string;
  pagination?: PaginationStrategy;
}

export type CompileProblem = DmlProblem | 'EmptyGraph';

export interface CompiledStatement {
  sql: string;
  mode: OperationMode;
  /** False when `sql` is only an explanatory comment */
  complete: boolean;
  problem?: CompileProblem;
}

export const EMPTY_GRAPH_COMMENT = '-- No data sources on the canvas.';

/**
 * Full, non-incremental compilation of the graph and clause state.
 * Same input, same text: nothing here depends on previous output.
 */
export class QueryCompiler {
  static compile(input: CompileInput): CompiledStatement {
    const { graph, clauses, mode } = input;
    const pagination = input.pagination ?? new StandardLimitOffsetPagination();
    const ctes = input.ctes ?? [];

    if (mode !== 'SELECT') {
      const translation = DmlTranslator.translate(mode, graph, clauses, { pagination });
      if (!translation.ok) {
        return { sql: translation.sql, mode, complete: false, problem: translation.problem };
      }
      return { sql: QueryCompiler.finish(translation.sql, input, ctes), mode, complete: true };
    }

    if (!graph.nodes().length) {
      if (input.importedStatement !== undefined) {
        return { sql: CteInliner.inline(input.importedStatement, ctes), mode, complete: true };
      }
      return { sql: EMPTY_GRAPH_COMMENT, mode, complete: false, problem: 'EmptyGraph' };
    }

    const select = ClauseAssembler.assembleSelect(graph, clauses, { pagination }).join('\n');
    return { sql: QueryCompiler.finish(select, input, ctes), mode, complete: true };
  }

  private static finish(sql: string, input: CompileInput, ctes: readonly CteDefinition[]): string {
    const rewritten = new IdentifierRewriter(input.linkedServers).rewrite(sql);
    return CteInliner.inline(rewritten, ctes);
  }
}
