import type {
  AggregateFunction,
  OrderDirection,
  PredicateOperator,
  SetOperator
} from '../core/sql/sql.js';

/**
 * `(column, operator, value)` filter used by WHERE and HAVING.
 */
export interface Predicate {
  column: string;
  operator: PredicateOperator;
  value: string;
}

export interface Aggregate {
  func: AggregateFunction;
  column: string;
  alias: string;
}

export interface OrderTerm {
  column: string;
  direction: OrderDirection;
}

/**
 * Expression shown in the SELECT list under an alias (derived or window column).
 */
export interface DerivedColumn {
  alias: string;
  expression: string;
}

/**
 * Second query combined with the generated SELECT.
 */
export interface SetOperation {
  operator: SetOperator;
  sql: string;
}

export interface CteDefinition {
  name: string;
  body: string;
}

/**
 * Read-only view of the clause state handed to the compilers.
 */
export interface ClauseSnapshot {
  readonly wherePredicates: readonly Predicate[];
  readonly havingPredicates: readonly Predicate[];
  readonly groupBy: readonly string[];
  readonly aggregates: readonly Aggregate[];
  readonly orderBy: readonly OrderTerm[];
  readonly derivedColumns: readonly DerivedColumn[];
  /** 0 means the clause is omitted */
  readonly limit: number;
  /** 0 means the clause is omitted */
  readonly offset: number;
  readonly setOperation?: SetOperation;
}
