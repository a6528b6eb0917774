import type { ColumnRef } from './graph-types.js';

/**
 * Splits a qualified column reference at its last dot.
 * Returns undefined when there is no node part or no column part.
 */
export const parseColumnRef = (ref: string): ColumnRef | undefined => {
  const trimmed = ref.trim();
  const dot = trimmed.lastIndexOf('.');
  if (dot <= 0 || dot === trimmed.length - 1) return undefined;
  return {
    nodeId: trimmed.slice(0, dot),
    column: trimmed.slice(dot + 1)
  };
};

export const qualifyColumn = (nodeId: string, column: string): string => `${nodeId}.${column}`;

/**
 * Name used for a DML target in the emitted statement: `<database>.<table>`.
 * A three-part id carries a leading connection alias, which is dropped.
 */
export const targetTableName = (nodeId: string): string => {
  const parts = nodeId.split('.');
  return parts.length === 3 ? parts.slice(1).join('.') : nodeId;
};
