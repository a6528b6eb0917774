import type { JoinKind, NodeKind } from '../sql/sql.js';

/**
 * A data source placed on the canvas.
 */
export interface GraphNode {
  /** Unique qualified name, e.g. `alias.database.table` */
  readonly id: string;
  readonly kind: NodeKind;
  /** Ordered column list; empty until schema discovery completes */
  readonly columns: readonly string[];
  /** Columns ticked for the SELECT list */
  readonly selected: ReadonlySet<string>;
  /** SQL text of a Subquery node, rendered as `(<definition>) AS <id>` */
  readonly definition?: string;
}

/**
 * Join between two nodes. Stores ids only.
 */
export interface JoinEdge {
  readonly id: number;
  readonly nodeA: string;
  readonly nodeB: string;
  readonly joinType: JoinKind;
  readonly condition: string;
}

/**
 * Source column to target column connection used by DML modes.
 */
export interface MappingEdge {
  readonly id: number;
  /** `<nodeId>.<column>` on a non-target node */
  readonly sourceColumnRef: string;
  /** `<targetId>.<column>` on the current DML target */
  readonly targetColumnRef: string;
}

export interface AddNodeOptions {
  kind?: NodeKind;
  definition?: string;
}

/**
 * `nodeId.column` split at the last dot.
 */
export interface ColumnRef {
  nodeId: string;
  column: string;
}
