import { GraphModel } from '../core/graph/graph-model.js';
import type { AddNodeOptions, GraphNode, JoinEdge, MappingEdge } from '../core/graph/graph-types.js';
import type { GraphView } from '../core/compiler/from-clause-builder.js';
import type { LinkedServerMap } from '../core/compiler/identifier-rewriter.js';
import { QueryCompiler, type CompiledStatement } from '../core/compiler/query-compiler.js';
import {
  DuplicateCteError,
  ExecutorMissingError,
  InvalidClauseError,
  InvalidJoinError
} from '../core/errors.js';
import type { DbExecutor, QueryResult } from '../core/execution/db-executor.js';
import { importSql } from '../core/parser/sql-importer.js';
import {
  type OperationMode,
  type PredicateClause,
  isJoinKind,
  isOperationMode
} from '../core/sql/sql.js';
import { SyntaxValidator, type ValidationResult } from '../core/validation/syntax-validator.js';
import { ValidationScheduler } from '../core/validation/validation-scheduler.js';
import { ClauseState } from '../query-builder/clause-state.js';
import type {
  Aggregate,
  ClauseSnapshot,
  CteDefinition,
  DerivedColumn,
  OrderTerm,
  Predicate,
  SetOperation
} from '../query-builder/clause-types.js';
import { buildWindowExpression, type WindowFunctionOptions } from '../query-builder/window-function.js';
import { createQueryLoggingExecutor } from './query-logger.js';
import {
  resolveSessionOptions,
  type QuerySessionOptions,
  type ResolvedSessionOptions
} from './session-options.js';

export type ValidationState = 'idle' | 'pending' | 'valid' | 'invalid';

export interface SessionStatus {
  state: ValidationState;
  message: string;
}

export interface SessionSnapshot {
  sql: string;
  status: SessionStatus;
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

const IDLE: SessionStatus = { state: 'idle', message: '' };
const PENDING: SessionStatus = { state: 'pending', message: 'Validation pending.' };

/**
 * Query session tying the graph, the clause state and the CTE list to one
 * generated statement.
 *
 * Every mutation regenerates the whole text (when `autoGenerate` is on) and
 * restarts the validation timer. Mutations that throw leave the session as it
 * was and do not regenerate.
 */
export class QuerySession {
  private readonly graph = new GraphModel();
  private readonly clauseState = new ClauseState();
  private readonly validator = new SyntaxValidator();
  private readonly scheduler: ValidationScheduler;
  private readonly options: ResolvedSessionOptions;
  private readonly executor: DbExecutor | undefined;
  private readonly listeners = new Set<SessionListener>();

  private cteList: CteDefinition[] = [];
  private linked: LinkedServerMap = {};
  private operationMode: OperationMode = 'SELECT';
  private importedStatement: string | undefined;
  private compiled: CompiledStatement;
  private currentStatus: SessionStatus = IDLE;

  constructor(options: QuerySessionOptions = {}) {
    this.options = resolveSessionOptions(options);
    this.executor = this.options.executor
      ? createQueryLoggingExecutor(this.options.executor, this.options.logger)
      : undefined;
    this.scheduler = new ValidationScheduler(this.options.validationDelayMs, () => this.runValidation());
    this.compiled = this.compile();
  }

  get sql(): string {
    return this.compiled.sql;
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get lastCompiled(): CompiledStatement {
    return this.compiled;
  }

  get mode(): OperationMode {
    return this.operationMode;
  }

  get model(): GraphView {
    return this.graph;
  }

  get clauses(): ClauseSnapshot {
    return this.clauseState.snapshot();
  }

  get ctes(): readonly CteDefinition[] {
    return this.cteList;
  }

  get linkedServers(): LinkedServerMap {
    return this.linked;
  }

  onChange(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- graph ---

  addNode(id: string, columns: readonly string[] = [], options: AddNodeOptions = {}): GraphNode {
    return this.mutate(() => this.graph.addNode(id, columns, options));
  }

  setColumns(id: string, columns: readonly string[]): void {
    this.mutate(() => this.graph.setColumns(id, columns));
  }

  selectColumn(id: string, column: string): void {
    this.mutate(() => this.graph.selectColumn(id, column));
  }

  deselectColumn(id: string, column: string): void {
    this.mutate(() => this.graph.deselectColumn(id, column));
  }

  removeNode(id: string): void {
    this.mutate(() => this.graph.removeNode(id));
  }

  renameNode(oldId: string, newId: string): void {
    this.mutate(() => this.graph.renameNode(oldId, newId));
  }

  addJoinEdge(a: string, b: string, joinType: string, condition: string): JoinEdge {
    const kind = joinType.trim().toUpperCase();
    if (!isJoinKind(kind)) {
      throw new InvalidJoinError(`Unsupported join type '${joinType}'.`);
    }
    return this.mutate(() => this.graph.addJoinEdge(a, b, kind, condition));
  }

  removeJoinEdge(edgeId: number): boolean {
    return this.mutate(() => this.graph.removeJoinEdge(edgeId));
  }

  markDmlTarget(id: string): void {
    this.mutate(() => this.graph.setDmlTarget(id));
  }

  clearDmlTarget(): void {
    this.mutate(() => this.graph.clearDmlTarget());
  }

  addMappingEdge(sourceColumnRef: string, targetColumnRef: string): MappingEdge {
    return this.mutate(() => this.graph.addMappingEdge(sourceColumnRef, targetColumnRef));
  }

  removeMappingEdge(edgeId: number): boolean {
    return this.mutate(() => this.graph.removeMappingEdge(edgeId));
  }

  // --- clauses ---

  addPredicate(clause: PredicateClause, column: string, operator: string, value = ''): Predicate {
    return this.mutate(() => this.clauseState.addPredicate(clause, column, operator, value));
  }

  removePredicate(clause: PredicateClause, index: number): boolean {
    return this.mutate(() => this.clauseState.removePredicate(clause, index));
  }

  addGroupBy(column: string): boolean {
    return this.mutate(() => this.clauseState.addGroupBy(column));
  }

  removeGroupBy(column: string): boolean {
    return this.mutate(() => this.clauseState.removeGroupBy(column));
  }

  addAggregate(func: string, column: string, alias: string): Aggregate {
    return this.mutate(() => this.clauseState.addAggregate(func, column, alias));
  }

  removeAggregate(index: number): boolean {
    return this.mutate(() => this.clauseState.removeAggregate(index));
  }

  addOrderBy(column: string, direction?: string): OrderTerm {
    return this.mutate(() => this.clauseState.addOrderBy(column, direction));
  }

  removeOrderBy(index: number): boolean {
    return this.mutate(() => this.clauseState.removeOrderBy(index));
  }

  setLimit(limit: number): void {
    this.mutate(() => this.clauseState.setLimit(limit));
  }

  setOffset(offset: number): void {
    this.mutate(() => this.clauseState.setOffset(offset));
  }

  addDerivedColumn(alias: string, expression: string): DerivedColumn {
    return this.mutate(() => this.clauseState.addDerivedColumn(alias, expression));
  }

  /**
   * Adds a window function (ROW_NUMBER, RANK, ...) as a derived column.
   */
  addWindowFunction(alias: string, options: WindowFunctionOptions): DerivedColumn {
    const expression = buildWindowExpression(options);
    return this.mutate(() => this.clauseState.addDerivedColumn(alias, expression));
  }

  removeDerivedColumn(alias: string): boolean {
    return this.mutate(() => this.clauseState.removeDerivedColumn(alias));
  }

  setSetOperation(operator: string, sql: string): SetOperation {
    return this.mutate(() => this.clauseState.setSetOperation(operator, sql));
  }

  clearSetOperation(): void {
    this.mutate(() => this.clauseState.clearSetOperation());
  }

  // --- CTEs, mode, linked servers ---

  addCte(name: string, body: string): CteDefinition {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new InvalidClauseError('CTE name is required.');
    }
    if (this.cteList.some(cte => cte.name === trimmed)) {
      throw new DuplicateCteError(trimmed);
    }
    const cte: CteDefinition = { name: trimmed, body: body.trim() };
    return this.mutate(() => {
      this.cteList = [...this.cteList, cte];
      return cte;
    });
  }

  removeCte(name: string): boolean {
    return this.mutate(() => {
      const before = this.cteList.length;
      this.cteList = this.cteList.filter(cte => cte.name !== name);
      return this.cteList.length !== before;
    });
  }

  setOperationMode(mode: string): void {
    const normalized = mode.trim().toUpperCase();
    if (!isOperationMode(normalized)) {
      throw new InvalidClauseError(`Unsupported operation mode '${mode}'.`);
    }
    this.mutate(() => {
      this.operationMode = normalized;
    });
  }

  setLinkedServerMap(map: LinkedServerMap): void {
    this.mutate(() => {
      this.linked = { ...map };
    });
  }

  /**
   * Replaces the session content with imported text. Leading CTEs become CTE
   * definitions; the remaining statement is kept as literal text and used as
   * the main statement while the graph is empty.
   */
  importSql(text: string): void {
    const imported = importSql(text);
    const names = new Set<string>();
    for (const cte of imported.ctes) {
      if (names.has(cte.name)) throw new DuplicateCteError(cte.name);
      names.add(cte.name);
    }

    this.mutate(() => {
      this.graph.reset();
      this.clauseState.reset();
      this.cteList = imported.ctes;
      this.importedStatement = imported.statement || undefined;
    });
    this.options.logger?.({ event: 'import', cteCount: imported.ctes.length, statement: imported.statement });
  }

  /**
   * Clears nodes, edges, clause state, CTEs and imported text in one step.
   * Operation mode and linked servers are kept.
   */
  reset(): void {
    this.mutate(() => {
      this.graph.reset();
      this.clauseState.reset();
      this.cteList = [];
      this.importedStatement = undefined;
    });
  }

  // --- generation and validation ---

  /**
   * Rebuilds the statement from the current state and restarts the
   * validation timer.
   */
  regenerate(): CompiledStatement {
    this.compiled = this.compile();
    this.options.logger?.({
      event: 'generate',
      mode: this.compiled.mode,
      sql: this.compiled.sql,
      complete: this.compiled.complete
    });
    this.currentStatus = PENDING;
    this.scheduler.schedule();
    this.emit();
    return this.compiled;
  }

  /**
   * Runs a pending validation immediately.
   */
  flushValidation(): SessionStatus {
    this.scheduler.flush();
    return this.currentStatus;
  }

  /**
   * Validates arbitrary text without touching the session state.
   */
  validate(sql: string = this.sql): ValidationResult {
    return this.validator.validate(sql);
  }

  async run(params?: unknown[]): Promise<QueryResult[]> {
    if (!this.executor) {
      throw new ExecutorMissingError();
    }
    return this.executor.executeSql(this.sql, params);
  }

  async dispose(): Promise<void> {
    this.scheduler.cancel();
    this.listeners.clear();
    await this.executor?.dispose?.();
  }

  private compile(): CompiledStatement {
    return QueryCompiler.compile({
      graph: this.graph,
      clauses: this.clauseState.snapshot(),
      mode: this.operationMode,
      ctes: this.cteList,
      linkedServers: this.linked,
      importedStatement: this.importedStatement,
      pagination: this.options.pagination
    });
  }

  private mutate<T>(change: () => T): T {
    const result = change();
    if (this.options.autoGenerate) {
      this.regenerate();
    }
    return result;
  }

  private runValidation(): void {
    const result = this.validator.validate(this.sql);
    this.currentStatus = { state: result.ok ? 'valid' : 'invalid', message: result.message };
    this.options.logger?.({ event: 'validate', ok: result.ok, message: result.message });
    this.emit();
  }

  private emit(): void {
    const snapshot: SessionSnapshot = { sql: this.sql, status: this.currentStatus };
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
