import { isMembershipOperator, isUnaryOperator } from '../sql/sql.js';
import type { Predicate } from '../../query-builder/clause-types.js';

/**
 * Renders WHERE / HAVING predicates by operator family.
 */
export class PredicateCompiler {
  /**
   * - `IS NULL`, `IS NOT NULL`, `EXISTS` → `col op` (value ignored)
   * - `IN`, `NOT IN` → `col op (value)`, value inserted as written
   * - anything else → `col op 'value'`; the value is not escaped or typed
   */
  static compilePredicate(predicate: Predicate): string {
    const { column, operator, value } = predicate;
    if (isUnaryOperator(operator)) {
      return `${column} ${operator}`;
    }
    if (isMembershipOperator(operator)) {
      return `${column} ${operator} (${value})`;
    }
    return `${column} ${operator} '${value}'`;
  }

  /**
   * @returns predicates joined with AND, or an empty string
   */
  static compileConjunction(predicates: readonly Predicate[]): string {
    return predicates.map(PredicateCompiler.compilePredicate).join(' AND ');
  }
}
