import { describe, it, expect } from 'vitest';
import { GraphModel } from '../../src/core/graph/graph-model.js';
import { FromClauseBuilder } from '../../src/core/compiler/from-clause-builder.js';

describe('FromClauseBuilder', () => {
  it('emits a single FROM line for a lone node', () => {
    const graph = new GraphModel();
    graph.addNode('orders');
    expect(FromClauseBuilder.build(graph)).toEqual(['FROM orders']);
  });

  it('joins every node of a tree exactly once, breadth first', () => {
    const graph = new GraphModel();
    graph.addNode('A');
    graph.addNode('B');
    graph.addNode('C');
    graph.addNode('D');
    graph.addJoinEdge('B', 'D', 'LEFT', 'B.id=D.bid');
    graph.addJoinEdge('A', 'B', 'INNER', 'A.id=B.aid');
    graph.addJoinEdge('A', 'C', 'INNER', 'A.id=C.aid');

    expect(FromClauseBuilder.build(graph)).toEqual([
      'FROM A',
      'INNER JOIN B ON A.id=B.aid',
      'INNER JOIN C ON A.id=C.aid',
      'LEFT JOIN D ON B.id=D.bid'
    ]);
  });

  it('skips edges that close a cycle', () => {
    const graph = new GraphModel();
    graph.addNode('A');
    graph.addNode('B');
    graph.addNode('C');
    graph.addJoinEdge('A', 'B', 'INNER', 'A.id=B.aid');
    graph.addJoinEdge('B', 'C', 'INNER', 'B.id=C.bid');
    graph.addJoinEdge('C', 'A', 'INNER', 'C.aid=A.id');

    const [block] = FromClauseBuilder.traverse(graph);
    expect(block.rootId).toBe('A');
    expect(block.joins.map(step => step.nodeId)).toEqual(['B', 'C']);
    expect(block.joins.map(step => step.condition)).toEqual(['A.id=B.aid', 'C.aid=A.id']);
  });

  it('keeps the join type as stored when the edge is walked backwards', () => {
    const graph = new GraphModel();
    graph.addNode('A');
    graph.addNode('B');
    graph.addJoinEdge('B', 'A', 'RIGHT', 'A.id=B.aid');

    expect(FromClauseBuilder.build(graph)).toEqual(['FROM A', 'RIGHT JOIN B ON A.id=B.aid']);
  });

  it('emits one FROM block per connected component', () => {
    const graph = new GraphModel();
    graph.addNode('A');
    graph.addNode('X');
    graph.addNode('B');
    graph.addJoinEdge('A', 'B', 'FULL', 'A.k=B.k');

    expect(FromClauseBuilder.build(graph)).toEqual(['FROM A', 'FULL JOIN B ON A.k=B.k', 'FROM X']);
  });

  it('leaves excluded nodes and their edges out', () => {
    const graph = new GraphModel();
    graph.addNode('T');
    graph.addNode('S');
    graph.addJoinEdge('T', 'S', 'INNER', 'T.id=S.tid');

    expect(FromClauseBuilder.build(graph, { exclude: new Set(['T']) })).toEqual(['FROM S']);
  });

  it('renders subquery nodes with their definition', () => {
    const graph = new GraphModel();
    graph.addNode('recent', ['id'], { kind: 'Subquery', definition: 'SELECT id FROM orders WHERE total > 10' });
    graph.addNode('cte_totals', ['id'], { kind: 'CTE' });
    graph.addJoinEdge('recent', 'cte_totals', 'INNER', 'recent.id=cte_totals.id');

    expect(FromClauseBuilder.build(graph)).toEqual([
      'FROM (SELECT id FROM orders WHERE total > 10) AS recent',
      'INNER JOIN cte_totals ON recent.id=cte_totals.id'
    ]);
  });
});
