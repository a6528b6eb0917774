import {
  AGGREGATE_FUNCTIONS,
  ORDER_DIRECTIONS,
  type AggregateFunction,
  type OrderDirection,
  type PredicateClause,
  type PredicateOperator,
  type SetOperator,
  isPredicateOperator,
  isSetOperator
} from '../core/sql/sql.js';
import { InvalidClauseError } from '../core/errors.js';
import type {
  Aggregate,
  ClauseSnapshot,
  DerivedColumn,
  OrderTerm,
  Predicate,
  SetOperation
} from './clause-types.js';

const normalizeKeyword = (value: string): string => value.trim().replace(/\s+/g, ' ').toUpperCase();

const requireText = (value: string, what: string): string => {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidClauseError(`${what} is required.`);
  }
  return trimmed;
};

const requireCount = (value: number, what: string): number => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidClauseError(`${what} must be a non-negative safe integer (got ${value}).`);
  }
  return value;
};

export const parsePredicateOperator = (operator: string): PredicateOperator => {
  const normalized = normalizeKeyword(operator);
  if (!isPredicateOperator(normalized)) {
    throw new InvalidClauseError(`Unsupported operator '${operator}'.`);
  }
  return normalized;
};

export const parseAggregateFunction = (func: string): AggregateFunction => {
  const normalized = normalizeKeyword(func);
  const match = AGGREGATE_FUNCTIONS.find(name => name === normalized);
  if (!match) {
    throw new InvalidClauseError(`Unsupported aggregate '${func}'.`);
  }
  return match;
};

export const parseOrderDirection = (direction: string): OrderDirection => {
  const normalized = normalizeKeyword(direction);
  if (normalized === ORDER_DIRECTIONS.ASC || normalized === ORDER_DIRECTIONS.DESC) {
    return normalized;
  }
  throw new InvalidClauseError(`Unsupported sort direction '${direction}'.`);
};

export const parseSetOperator = (operator: string): SetOperator => {
  const normalized = normalizeKeyword(operator);
  if (!isSetOperator(normalized)) {
    throw new InvalidClauseError(`Unsupported set operator '${operator}'.`);
  }
  return normalized;
};

const hasBalancedParentheses = (expression: string): boolean => {
  let depth = 0;
  for (const ch of expression) {
    if (ch === '(') depth++;
    if (ch === ')') depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
};

/**
 * Mutable clause state: filters, grouping, aggregates, ordering, pagination,
 * derived columns and an optional set operation.
 *
 * Inputs arrive as free text from dialogs, so keywords are normalized
 * (`not in` becomes `NOT IN`) and rejected when unknown.
 */
export class ClauseState {
  private where: Predicate[] = [];
  private having: Predicate[] = [];
  private groups: string[] = [];
  private aggregates: Aggregate[] = [];
  private orders: OrderTerm[] = [];
  private derived: DerivedColumn[] = [];
  private limitValue = 0;
  private offsetValue = 0;
  private setOp: SetOperation | undefined;

  addPredicate(clause: PredicateClause, column: string, operator: string, value = ''): Predicate {
    const predicate: Predicate = {
      column: requireText(column, 'Filter column'),
      operator: parsePredicateOperator(operator),
      value
    };
    if (clause === 'WHERE') {
      this.where = [...this.where, predicate];
    } else {
      this.having = [...this.having, predicate];
    }
    return predicate;
  }

  removePredicate(clause: PredicateClause, index: number): boolean {
    const list = clause === 'WHERE' ? this.where : this.having;
    if (index < 0 || index >= list.length) return false;
    const next = list.filter((_, i) => i !== index);
    if (clause === 'WHERE') {
      this.where = next;
    } else {
      this.having = next;
    }
    return true;
  }

  /**
   * Appends a GROUP BY column; a column already present is not added twice.
   */
  addGroupBy(column: string): boolean {
    const trimmed = requireText(column, 'Group by column');
    if (this.groups.includes(trimmed)) return false;
    this.groups = [...this.groups, trimmed];
    return true;
  }

  removeGroupBy(column: string): boolean {
    const before = this.groups.length;
    this.groups = this.groups.filter(existing => existing !== column.trim());
    return this.groups.length !== before;
  }

  addAggregate(func: string, column: string, alias: string): Aggregate {
    const aggregate: Aggregate = {
      func: parseAggregateFunction(func),
      column: requireText(column, 'Aggregate column'),
      alias: requireText(alias, 'Aggregate alias')
    };
    this.aggregates = [...this.aggregates, aggregate];
    return aggregate;
  }

  removeAggregate(index: number): boolean {
    if (index < 0 || index >= this.aggregates.length) return false;
    this.aggregates = this.aggregates.filter((_, i) => i !== index);
    return true;
  }

  addOrderBy(column: string, direction: string = ORDER_DIRECTIONS.ASC): OrderTerm {
    const term: OrderTerm = {
      column: requireText(column, 'Sort column'),
      direction: parseOrderDirection(direction)
    };
    this.orders = [...this.orders, term];
    return term;
  }

  removeOrderBy(index: number): boolean {
    if (index < 0 || index >= this.orders.length) return false;
    this.orders = this.orders.filter((_, i) => i !== index);
    return true;
  }

  /**
   * 0 clears the limit; there is no way to express `LIMIT 0`.
   */
  setLimit(limit: number): void {
    this.limitValue = requireCount(limit, 'Limit');
  }

  /**
   * 0 clears the offset.
   */
  setOffset(offset: number): void {
    this.offsetValue = requireCount(offset, 'Offset');
  }

  /**
   * Adds (or replaces, by alias) an expression column.
   */
  addDerivedColumn(alias: string, expression: string): DerivedColumn {
    const column: DerivedColumn = {
      alias: requireText(alias, 'Derived column alias'),
      expression: requireText(expression, 'Derived column expression')
    };
    if (!hasBalancedParentheses(column.expression)) {
      throw new InvalidClauseError(`Unbalanced parentheses in expression '${column.expression}'.`);
    }
    const existing = this.derived.findIndex(d => d.alias === column.alias);
    this.derived = existing === -1
      ? [...this.derived, column]
      : this.derived.map((d, i) => (i === existing ? column : d));
    return column;
  }

  removeDerivedColumn(alias: string): boolean {
    const before = this.derived.length;
    this.derived = this.derived.filter(d => d.alias !== alias);
    return this.derived.length !== before;
  }

  setSetOperation(operator: string, sql: string): SetOperation {
    const second = requireText(sql, 'Second query');
    if (!/^select\b/i.test(second)) {
      throw new InvalidClauseError('The second query must begin with SELECT.');
    }
    this.setOp = { operator: parseSetOperator(operator), sql: second };
    return this.setOp;
  }

  clearSetOperation(): void {
    this.setOp = undefined;
  }

  reset(): void {
    this.where = [];
    this.having = [];
    this.groups = [];
    this.aggregates = [];
    this.orders = [];
    this.derived = [];
    this.limitValue = 0;
    this.offsetValue = 0;
    this.setOp = undefined;
  }

  snapshot(): ClauseSnapshot {
    return {
      wherePredicates: this.where,
      havingPredicates: this.having,
      groupBy: this.groups,
      aggregates: this.aggregates,
      orderBy: this.orders,
      derivedColumns: this.derived,
      limit: this.limitValue,
      offset: this.offsetValue,
      ...(this.setOp ? { setOperation: this.setOp } : {})
    };
  }
}

/**
 * Clause state with nothing set.
 */
export const emptyClauses = (): ClauseSnapshot => new ClauseState().snapshot();
