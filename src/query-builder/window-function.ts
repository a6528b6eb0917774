import { WINDOW_FUNCTIONS, type WindowFunctionName } from '../core/sql/sql.js';
import { InvalidClauseError } from '../core/errors.js';

export interface WindowFunctionOptions {
  func: WindowFunctionName;
  /** Raw argument text, e.g. `4` for NTILE or `price, 1` for LAG */
  args?: string;
  partitionBy?: readonly string[];
  orderBy?: readonly string[];
  descending?: boolean;
}

/**
 * Renders a window-function expression such as
 * `ROW_NUMBER() OVER (PARTITION BY a ORDER BY b DESC)`.
 * The result is used as a derived column expression.
 */
export const buildWindowExpression = (options: WindowFunctionOptions): string => {
  if (!WINDOW_FUNCTIONS.includes(options.func)) {
    throw new InvalidClauseError(`Unsupported window function '${String(options.func)}'.`);
  }
  const over: string[] = [];
  const partition = options.partitionBy ?? [];
  const order = options.orderBy ?? [];
  if (partition.length) {
    over.push(`PARTITION BY ${partition.join(', ')}`);
  }
  if (order.length) {
    over.push(`ORDER BY ${order.join(', ')}${options.descending ? ' DESC' : ''}`);
  }
  return `${options.func}(${options.args?.trim() ?? ''}) OVER (${over.join(' ')})`;
};
