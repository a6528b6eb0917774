/**
 * Query graph to SQL compiler exports.
 * Provides the graph model, clause state, compiler stages, validation and
 * the session facade.
 */
export * from './core/sql/sql.js';
export * from './core/errors.js';
export * from './core/graph/graph-types.js';
export * from './core/graph/column-ref.js';
export * from './core/graph/graph-model.js';
export * from './query-builder/clause-types.js';
export * from './query-builder/clause-state.js';
export * from './query-builder/window-function.js';
export * from './core/compiler/from-clause-builder.js';
export * from './core/compiler/predicate-compiler.js';
export * from './core/compiler/pagination-strategy.js';
export * from './core/compiler/clause-assembler.js';
export * from './core/compiler/dml-translator.js';
export * from './core/compiler/identifier-rewriter.js';
export * from './core/compiler/cte-inliner.js';
export * from './core/compiler/query-compiler.js';
export * from './core/validation/sql-tokenizer.js';
export * from './core/validation/syntax-validator.js';
export * from './core/validation/validation-scheduler.js';
export * from './core/parser/sql-importer.js';
export * from './core/execution/db-executor.js';
export * from './core/execution/executors/mssql-executor.js';
export * from './session/query-logger.js';
export * from './session/session-options.js';
export * from './session/query-session.js';
