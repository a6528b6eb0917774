import { NODE_KINDS, type JoinKind } from '../sql/sql.js';
import type { GraphNode, JoinEdge } from '../graph/graph-types.js';
import type { GraphModel } from '../graph/graph-model.js';

/**
 * The parts of the graph the compilers read.
 */
export type GraphView = Pick<GraphModel, 'nodes' | 'joinEdges' | 'mappingEdges' | 'targetNodeId' | 'getNode'>;

export interface JoinStep {
  edgeId: number;
  nodeId: string;
  source: string;
  joinType: JoinKind;
  condition: string;
}

/**
 * One connected component of the join graph, linearized by BFS.
 */
export interface FromBlock {
  rootId: string;
  rootSource: string;
  joins: JoinStep[];
}

export interface FromClauseOptions {
  /** Node ids left out of the traversal, along with their edges */
  exclude?: ReadonlySet<string>;
}

/**
 * Text used for a node inside FROM / JOIN.
 */
export const renderSource = (node: GraphNode): string =>
  node.kind === NODE_KINDS.SUBQUERY && node.definition
    ? `(${node.definition}) AS ${node.id}`
    : node.id;

/**
 * Builds FROM / JOIN text from the join graph.
 * Nodes are visited in insertion order; each unvisited node roots a FIFO BFS.
 * Incident edges are tried in edge-insertion order and an edge produces a JOIN
 * line only when it discovers a new node. Every connected component becomes its
 * own FROM block, and blocks are emitted one after another with nothing
 * combining them.
 */
export class FromClauseBuilder {
  static traverse(graph: GraphView, options: FromClauseOptions = {}): FromBlock[] {
    const exclude = options.exclude ?? new Set<string>();
    const nodes = graph.nodes().filter(node => !exclude.has(node.id));
    const byId = new Map(nodes.map(node => [node.id, node] as const));
    const adjacency = FromClauseBuilder.adjacency(graph.joinEdges(), byId);

    const visited = new Set<string>();
    const blocks: FromBlock[] = [];

    for (const start of nodes) {
      if (visited.has(start.id)) continue;
      visited.add(start.id);
      const block: FromBlock = { rootId: start.id, rootSource: renderSource(start), joins: [] };
      const queue = [start.id];

      while (queue.length) {
        const current = queue.shift();
        if (current === undefined) break;
        for (const edge of adjacency.get(current) ?? []) {
          const neighbor = edge.nodeA === current ? edge.nodeB : edge.nodeA;
          if (visited.has(neighbor)) continue;
          const node = byId.get(neighbor);
          if (!node) continue;
          visited.add(neighbor);
          block.joins.push({
            edgeId: edge.id,
            nodeId: neighbor,
            source: renderSource(node),
            joinType: edge.joinType,
            condition: edge.condition
          });
          queue.push(neighbor);
        }
      }

      blocks.push(block);
    }

    return blocks;
  }

  /**
   * Renders blocks as lines: `FROM <root>` then `<type> JOIN <node> ON <cond>`.
   */
  static render(blocks: readonly FromBlock[]): string[] {
    const lines: string[] = [];
    for (const block of blocks) {
      lines.push(`FROM ${block.rootSource}`);
      for (const join of block.joins) {
        lines.push(`${join.joinType} JOIN ${join.source} ON ${join.condition}`);
      }
    }
    return lines;
  }

  static build(graph: GraphView, options: FromClauseOptions = {}): string[] {
    return FromClauseBuilder.render(FromClauseBuilder.traverse(graph, options));
  }

  private static adjacency(
    edges: readonly JoinEdge[],
    nodes: ReadonlyMap<string, GraphNode>
  ): Map<string, JoinEdge[]> {
    const adjacency = new Map<string, JoinEdge[]>();
    for (const edge of edges) {
      if (!nodes.has(edge.nodeA) || !nodes.has(edge.nodeB)) continue;
      for (const end of [edge.nodeA, edge.nodeB]) {
        const list = adjacency.get(end) ?? [];
        list.push(edge);
        adjacency.set(end, list);
      }
    }
    return adjacency;
  }
}
