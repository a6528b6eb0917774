/**
 * Types of SQL joins a join edge can carry
 */
export const JOIN_KINDS = {
  /** INNER JOIN type */
  INNER: 'INNER',
  /** LEFT JOIN type */
  LEFT: 'LEFT',
  /** RIGHT JOIN type */
  RIGHT: 'RIGHT',
  /** FULL OUTER JOIN type */
  FULL: 'FULL'
} as const;

/**
 * Type representing any supported join kind
 */
export type JoinKind = (typeof JOIN_KINDS)[keyof typeof JOIN_KINDS];

/**
 * Kinds of data sources that can sit on the canvas
 */
export const NODE_KINDS = {
  TABLE: 'Table',
  CTE: 'CTE',
  SUBQUERY: 'Subquery'
} as const;

export type NodeKind = (typeof NODE_KINDS)[keyof typeof NODE_KINDS];

/**
 * Statement kinds the compiler can emit
 */
export const OPERATION_MODES = {
  SELECT: 'SELECT',
  INSERT: 'INSERT',
  UPDATE: 'UPDATE',
  DELETE: 'DELETE'
} as const;

export type OperationMode = (typeof OPERATION_MODES)[keyof typeof OPERATION_MODES];

/**
 * DML-only subset of the operation modes
 */
export type DmlMode = Exclude<OperationMode, 'SELECT'>;

/**
 * Comparison operators; the value is rendered as a quoted string literal
 */
export const COMPARISON_OPERATORS = ['=', '<', '>', '<=', '>=', '<>', '!=', 'LIKE', 'NOT LIKE'] as const;

/**
 * Membership operators; the value is inserted verbatim inside parentheses
 */
export const MEMBERSHIP_OPERATORS = ['IN', 'NOT IN'] as const;

/**
 * Unary operators; the value is ignored
 */
export const UNARY_OPERATORS = ['IS NULL', 'IS NOT NULL', 'EXISTS'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];
export type MembershipOperator = (typeof MEMBERSHIP_OPERATORS)[number];
export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

/**
 * Type representing any operator a predicate can use
 */
export type PredicateOperator = ComparisonOperator | MembershipOperator | UnaryOperator;

/**
 * Clauses that hold predicates
 */
export type PredicateClause = 'WHERE' | 'HAVING';

/**
 * Aggregate functions offered for grouped queries
 */
export const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'AVG', 'MIN', 'MAX'] as const;

export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

/**
 * Ordering directions
 */
export const ORDER_DIRECTIONS = {
  ASC: 'ASC',
  DESC: 'DESC'
} as const;

export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Set operators that combine the generated SELECT with a second query
 */
export const SET_OPERATORS = ['UNION', 'UNION ALL', 'INTERSECT', 'EXCEPT'] as const;

export type SetOperator = (typeof SET_OPERATORS)[number];

/**
 * Window functions offered by the window-function helper
 */
export const WINDOW_FUNCTIONS = ['ROW_NUMBER', 'RANK', 'DENSE_RANK', 'NTILE', 'LAG', 'LEAD'] as const;

export type WindowFunctionName = (typeof WINDOW_FUNCTIONS)[number];

const includes = <T extends string>(list: readonly T[], value: string): value is T =>
  (list as readonly string[]).includes(value);

export const isComparisonOperator = (op: string): op is ComparisonOperator =>
  includes(COMPARISON_OPERATORS, op);

export const isMembershipOperator = (op: string): op is MembershipOperator =>
  includes(MEMBERSHIP_OPERATORS, op);

export const isUnaryOperator = (op: string): op is UnaryOperator =>
  includes(UNARY_OPERATORS, op);

export const isPredicateOperator = (op: string): op is PredicateOperator =>
  isComparisonOperator(op) || isMembershipOperator(op) || isUnaryOperator(op);

export const isJoinKind = (value: string): value is JoinKind =>
  includes(Object.values(JOIN_KINDS), value);

export const isOperationMode = (value: string): value is OperationMode =>
  includes(Object.values(OPERATION_MODES), value);

export const isSetOperator = (value: string): value is SetOperator =>
  includes(SET_OPERATORS, value);
