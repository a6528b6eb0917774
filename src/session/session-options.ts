import { InvalidClauseError } from '../core/errors.js';
import type { DbExecutor } from '../core/execution/db-executor.js';
import {
  createPaginationStrategy,
  type PaginationStrategy,
  type PaginationStrategyName
} from '../core/compiler/pagination-strategy.js';
import type { SessionLogger } from './query-logger.js';

export const DEFAULT_VALIDATION_DELAY_MS = 500;

/**
 * Options for creating a QuerySession.
 */
export interface QuerySessionOptions {
  /** Regenerate the SQL after every mutation (default true) */
  autoGenerate?: boolean;
  /** Debounce window for syntax validation, in milliseconds */
  validationDelayMs?: number;
  /** Pagination rendering; a strategy instance or a built-in name */
  pagination?: PaginationStrategy | PaginationStrategyName;
  /** Optional logger for generation, validation, import and execution */
  logger?: SessionLogger;
  /** Executor used by `run()` */
  executor?: DbExecutor;
}

export interface ResolvedSessionOptions {
  autoGenerate: boolean;
  validationDelayMs: number;
  pagination: PaginationStrategy;
  logger?: SessionLogger;
  executor?: DbExecutor;
}

export const resolveSessionOptions = (options: QuerySessionOptions = {}): ResolvedSessionOptions => {
  const delay = options.validationDelayMs ?? DEFAULT_VALIDATION_DELAY_MS;
  if (!Number.isFinite(delay) || delay < 0) {
    throw new InvalidClauseError(`Validation delay must be a non-negative number, got ${delay}.`);
  }

  const pagination = typeof options.pagination === 'string' || options.pagination === undefined
    ? createPaginationStrategy(options.pagination ?? 'standard')
    : options.pagination;

  return {
    autoGenerate: options.autoGenerate ?? true,
    validationDelayMs: delay,
    pagination,
    logger: options.logger,
    executor: options.executor
  };
};
