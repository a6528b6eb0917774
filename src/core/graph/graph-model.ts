import { NODE_KINDS, type JoinKind, isJoinKind } from '../sql/sql.js';
import {
  ColumnNotFoundError,
  DuplicateNodeError,
  InvalidJoinError,
  InvalidMappingError,
  NodeNotFoundError
} from '../errors.js';
import type { AddNodeOptions, GraphNode, JoinEdge, MappingEdge } from './graph-types.js';
import { parseColumnRef, qualifyColumn } from './column-ref.js';

interface NodeRecord {
  id: string;
  kind: GraphNode['kind'];
  columns: string[];
  selected: Set<string>;
  definition?: string;
}

const toGraphNode = (record: NodeRecord): GraphNode => ({
  id: record.id,
  kind: record.kind,
  columns: [...record.columns],
  selected: new Set(record.selected),
  ...(record.definition !== undefined ? { definition: record.definition } : {})
});

/**
 * Owns the nodes and edges of a query graph.
 *
 * Nodes live in an id-keyed map (insertion ordered); edges reference node ids,
 * so removing a node is a filter over the edge lists. The DML target is a
 * single optional id, which keeps "at most one target" true by construction.
 * Every mutation validates first and only then writes, so a thrown error
 * leaves the model as it was.
 */
export class GraphModel {
  private readonly nodeMap = new Map<string, NodeRecord>();
  private joins: JoinEdge[] = [];
  private mappings: MappingEdge[] = [];
  private target: string | undefined;
  private nextEdgeId = 1;

  get targetNodeId(): string | undefined {
    return this.target;
  }

  get size(): number {
    return this.nodeMap.size;
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id.trim());
  }

  getNode(id: string): GraphNode | undefined {
    const record = this.nodeMap.get(id.trim());
    return record ? toGraphNode(record) : undefined;
  }

  /**
   * Nodes in insertion order.
   */
  nodes(): GraphNode[] {
    return Array.from(this.nodeMap.values(), toGraphNode);
  }

  nodeIds(): string[] {
    return Array.from(this.nodeMap.keys());
  }

  /**
   * Join edges in insertion order.
   */
  joinEdges(): readonly JoinEdge[] {
    return this.joins;
  }

  /**
   * Mapping edges in creation order.
   */
  mappingEdges(): readonly MappingEdge[] {
    return this.mappings;
  }

  isDmlTarget(id: string): boolean {
    return this.target === id;
  }

  addNode(id: string, columns: readonly string[] = [], options: AddNodeOptions = {}): GraphNode {
    const trimmed = id.trim();
    if (!trimmed) {
      throw new NodeNotFoundError(id);
    }
    if (this.nodeMap.has(trimmed)) {
      throw new DuplicateNodeError(trimmed);
    }
    const record: NodeRecord = {
      id: trimmed,
      kind: options.kind ?? NODE_KINDS.TABLE,
      columns: dedupe(columns),
      selected: new Set(),
      ...(options.definition !== undefined ? { definition: options.definition } : {})
    };
    this.nodeMap.set(trimmed, record);
    return toGraphNode(record);
  }

  /**
   * Replaces a node's column list once discovery has produced it.
   * Selections that no longer exist are dropped.
   */
  setColumns(id: string, columns: readonly string[]): void {
    const record = this.requireNode(id);
    record.columns = dedupe(columns);
    for (const column of [...record.selected]) {
      if (!record.columns.includes(column)) {
        record.selected.delete(column);
      }
    }
  }

  selectColumn(id: string, column: string): void {
    const record = this.requireNode(id);
    if (!record.columns.includes(column)) {
      throw new ColumnNotFoundError(record.id, column);
    }
    record.selected.add(column);
  }

  deselectColumn(id: string, column: string): void {
    const record = this.requireNode(id);
    record.selected.delete(column);
  }

  /**
   * Removes a node together with every join and mapping edge that references it.
   */
  removeNode(nodeId: string): void {
    const { id } = this.requireNode(nodeId);
    this.nodeMap.delete(id);
    this.joins = this.joins.filter(edge => edge.nodeA !== id && edge.nodeB !== id);
    this.mappings = this.mappings.filter(edge => !mappingTouches(edge, id));
    if (this.target === id) {
      this.target = undefined;
    }
  }

  /**
   * Gives a node a new id (alias), keeping its position in insertion order
   * and rewriting every edge, mapping reference and the target field.
   */
  renameNode(currentId: string, newId: string): void {
    const oldId = this.requireNode(currentId).id;
    const next = newId.trim();
    if (next === oldId) return;
    if (!next) {
      throw new NodeNotFoundError(newId);
    }
    if (this.nodeMap.has(next)) {
      throw new DuplicateNodeError(next);
    }

    const entries = Array.from(this.nodeMap.entries());
    this.nodeMap.clear();
    for (const [key, value] of entries) {
      if (key === oldId) {
        value.id = next;
        this.nodeMap.set(next, value);
      } else {
        this.nodeMap.set(key, value);
      }
    }

    const swap = (nodeId: string) => (nodeId === oldId ? next : nodeId);
    this.joins = this.joins.map(edge => ({ ...edge, nodeA: swap(edge.nodeA), nodeB: swap(edge.nodeB) }));
    this.mappings = this.mappings.map(edge => ({
      ...edge,
      sourceColumnRef: renameRef(edge.sourceColumnRef, oldId, next),
      targetColumnRef: renameRef(edge.targetColumnRef, oldId, next)
    }));
    if (this.target === oldId) {
      this.target = next;
    }
  }

  addJoinEdge(nodeA: string, nodeB: string, joinType: JoinKind, condition: string): JoinEdge {
    const a = this.requireNode(nodeA).id;
    const b = this.requireNode(nodeB).id;
    if (a === b) {
      throw new InvalidJoinError(`Cannot join '${a}' to itself.`);
    }
    if (!isJoinKind(joinType)) {
      throw new InvalidJoinError(`Unsupported join type '${String(joinType)}'.`);
    }
    const edge: JoinEdge = {
      id: this.nextEdgeId++,
      nodeA: a,
      nodeB: b,
      joinType,
      condition: condition.trim()
    };
    this.joins = [...this.joins, edge];
    return edge;
  }

  removeJoinEdge(edgeId: number): boolean {
    const before = this.joins.length;
    this.joins = this.joins.filter(edge => edge.id !== edgeId);
    return this.joins.length !== before;
  }

  /**
   * Makes `id` the single DML target. A previous target is cleared first and
   * its mapping edges are dropped, so mappings never mix two targets.
   */
  setDmlTarget(nodeId: string): void {
    const { id } = this.requireNode(nodeId);
    if (this.target === id) return;
    this.clearDmlTarget();
    this.target = id;
  }

  clearDmlTarget(): void {
    this.target = undefined;
    this.mappings = [];
  }

  addMappingEdge(sourceColumnRef: string, targetColumnRef: string): MappingEdge {
    const target = this.target;
    if (target === undefined) {
      throw new InvalidMappingError('Mark a DML target before mapping columns.');
    }
    const source = parseColumnRef(sourceColumnRef);
    const dest = parseColumnRef(targetColumnRef);
    if (!source || !dest) {
      throw new InvalidMappingError(
        `Column references must look like '<node>.<column>' (got '${sourceColumnRef}' -> '${targetColumnRef}').`
      );
    }
    if (dest.nodeId !== target) {
      throw new InvalidMappingError(`Mapping target '${targetColumnRef}' does not belong to target '${target}'.`);
    }
    if (source.nodeId === target) {
      throw new InvalidMappingError(`Mapping source '${sourceColumnRef}' cannot be the target itself.`);
    }
    this.requireNode(source.nodeId);

    const edge: MappingEdge = {
      id: this.nextEdgeId++,
      sourceColumnRef: qualifyColumn(source.nodeId, source.column),
      targetColumnRef: qualifyColumn(dest.nodeId, dest.column)
    };
    this.mappings = [...this.mappings, edge];
    return edge;
  }

  removeMappingEdge(edgeId: number): boolean {
    const before = this.mappings.length;
    this.mappings = this.mappings.filter(edge => edge.id !== edgeId);
    return this.mappings.length !== before;
  }

  /**
   * Clears nodes, edges and the target in one step.
   */
  reset(): void {
    this.nodeMap.clear();
    this.joins = [];
    this.mappings = [];
    this.target = undefined;
    this.nextEdgeId = 1;
  }

  private requireNode(id: string): NodeRecord {
    const record = this.nodeMap.get(id.trim());
    if (!record) {
      throw new NodeNotFoundError(id);
    }
    return record;
  }
}

const dedupe = (columns: readonly string[]): string[] => {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of columns) {
    const column = raw.trim();
    if (!column || seen.has(column)) continue;
    seen.add(column);
    out.push(column);
  }
  return out;
};

const mappingTouches = (edge: MappingEdge, nodeId: string): boolean =>
  parseColumnRef(edge.sourceColumnRef)?.nodeId === nodeId ||
  parseColumnRef(edge.targetColumnRef)?.nodeId === nodeId;

const renameRef = (ref: string, oldId: string, newId: string): string => {
  const parsed = parseColumnRef(ref);
  return parsed && parsed.nodeId === oldId ? qualifyColumn(newId, parsed.column) : ref;
};
