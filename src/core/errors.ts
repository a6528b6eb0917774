/**
 * Stable error codes raised by graph and clause mutations
 */
export type QueryGraphErrorCode =
  | 'NODE_NOT_FOUND'
  | 'DUPLICATE_NODE'
  | 'COLUMN_NOT_FOUND'
  | 'INVALID_JOIN'
  | 'INVALID_MAPPING'
  | 'INVALID_CLAUSE'
  | 'DUPLICATE_CTE'
  | 'EXECUTOR_MISSING';

/**
 * Base class for every error thrown by the compiler.
 * Mutations that throw leave the model untouched.
 */
export class QueryGraphError extends Error {
  readonly code: QueryGraphErrorCode;

  constructor(code: QueryGraphErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NodeNotFoundError extends QueryGraphError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super('NODE_NOT_FOUND', `Node '${nodeId}' is not on the canvas.`);
    this.nodeId = nodeId;
  }
}

export class DuplicateNodeError extends QueryGraphError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super('DUPLICATE_NODE', `Node '${nodeId}' is already on the canvas.`);
    this.nodeId = nodeId;
  }
}

export class ColumnNotFoundError extends QueryGraphError {
  constructor(nodeId: string, column: string) {
    super('COLUMN_NOT_FOUND', `Column '${column}' does not exist on node '${nodeId}'.`);
  }
}

export class InvalidJoinError extends QueryGraphError {
  constructor(message: string) {
    super('INVALID_JOIN', message);
  }
}

export class InvalidMappingError extends QueryGraphError {
  constructor(message: string) {
    super('INVALID_MAPPING', message);
  }
}

export class InvalidClauseError extends QueryGraphError {
  constructor(message: string) {
    super('INVALID_CLAUSE', message);
  }
}

export class DuplicateCteError extends QueryGraphError {
  constructor(name: string) {
    super('DUPLICATE_CTE', `A CTE named '${name}' already exists.`);
  }
}

export class ExecutorMissingError extends QueryGraphError {
  constructor() {
    super('EXECUTOR_MISSING', 'No executor is configured for this session.');
  }
}

export const isQueryGraphError = (value: unknown): value is QueryGraphError =>
  value instanceof QueryGraphError;
