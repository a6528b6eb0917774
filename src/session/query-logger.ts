import type { DbExecutor } from '../core/execution/db-executor.js';
import type { OperationMode } from '../core/sql/sql.js';

/**
 * Represents a single session log entry
 */
export type SessionLogEntry =
  | { event: 'generate'; mode: OperationMode; sql: string; complete: boolean }
  | { event: 'validate'; ok: boolean; message: string }
  | { event: 'import'; cteCount: number; statement: string }
  | { event: 'execute'; sql: string; params?: unknown[] };

/**
 * Function type for session logging callbacks
 * @param entry - The log entry to process
 */
export type SessionLogger = (entry: SessionLogEntry) => void;

/**
 * Creates a wrapped database executor that logs every statement it runs
 * @param executor - Original database executor to wrap
 * @param logger - Optional logger function to receive log entries
 * @returns Wrapped executor that logs statements before execution
 */
export const createQueryLoggingExecutor = (
  executor: DbExecutor,
  logger?: SessionLogger
): DbExecutor => {
  if (!logger) {
    return executor;
  }

  const wrapped: DbExecutor = {
    async executeSql(sql, params) {
      logger({ event: 'execute', sql, params });
      return executor.executeSql(sql, params);
    },
    dispose: executor.dispose?.bind(executor),
  };

  return wrapped;
};
