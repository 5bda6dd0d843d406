import { describe, it, expect } from 'vitest';
import { EmailGraph } from '../email-graph';
import { EmptyGraphError } from '../errors';
import { hubCandidates, minimumSpanningForest } from '../spanning-tree';

describe('minimumSpanningForest', () => {
  it('spans two nodes with their single link', () => {
    const forest = minimumSpanningForest(EmailGraph.fromRecords([{ sender: 'a', recipient: 'b', weight: 5 }]));

    expect(forest.edges).toEqual([{ source: 'a', target: 'b', weight: 5, cost: 0.2 }]);
    expect(forest.totalCost).toBe(0.2);
    expect(forest.componentCount).toBe(1);
  });

  it('keeps the busiest links of a triangle', () => {
    const forest = minimumSpanningForest(
      EmailGraph.fromRecords([
        { sender: 'a', recipient: 'b', weight: 1 },
        { sender: 'b', recipient: 'c', weight: 2 },
        { sender: 'a', recipient: 'c', weight: 4 },
      ])
    );

    expect(forest.edges.map((e) => [e.source, e.target])).toEqual([
      ['a', 'c'],
      ['b', 'c'],
    ]);
    expect(forest.totalWeight).toBe(6);
    expect(forest.totalCost).toBeCloseTo(0.75);
  });

  it('treats opposite directions as one summed link', () => {
    const forest = minimumSpanningForest(
      EmailGraph.fromRecords([
        { sender: 'a', recipient: 'b', weight: 1 },
        { sender: 'b', recipient: 'a', weight: 3 },
      ])
    );
    expect(forest.edges).toEqual([{ source: 'a', target: 'b', weight: 4, cost: 0.25 }]);
  });

  it('has V - C edges on a disconnected graph', () => {
    const graph = EmailGraph.fromRecords([
      { sender: 'a', recipient: 'b' },
      { sender: 'b', recipient: 'c' },
      { sender: 'd', recipient: 'e' },
      { sender: 'f', recipient: 'f' },
    ]);
    const forest = minimumSpanningForest(graph);

    expect(forest.nodeCount).toBe(6);
    expect(forest.componentCount).toBe(3);
    expect(forest.edges).toHaveLength(graph.nodeCount - forest.componentCount);
  });

  it('returns no edges for a lone self-addressed node', () => {
    const forest = minimumSpanningForest(EmailGraph.fromRecords([{ sender: 'a', recipient: 'a' }]));
    expect(forest.edges).toEqual([]);
    expect(forest.componentCount).toBe(1);
  });

  it('throws on an empty graph', () => {
    expect(() => minimumSpanningForest(new EmailGraph())).toThrow(EmptyGraphError);
  });
});

describe('hubCandidates', () => {
  it('flags the centre of a star', () => {
    const graph = EmailGraph.fromRecords(
      ['s1', 's2', 's3', 's4'].map((recipient) => ({ sender: 'hub', recipient }))
    );
    expect(hubCandidates(minimumSpanningForest(graph))).toEqual([{ id: 'hub', forestDegree: 4, reach: 1 }]);
  });

  it('finds no hub on a chain', () => {
    const graph = EmailGraph.fromRecords([
      { sender: 'a', recipient: 'b' },
      { sender: 'b', recipient: 'c' },
      { sender: 'c', recipient: 'd' },
      { sender: 'd', recipient: 'e' },
    ]);
    // Interior nodes have forest degree 2 of 4 others: reach 0.5
    expect(hubCandidates(minimumSpanningForest(graph), { threshold: 0.6 })).toEqual([]);
    expect(hubCandidates(minimumSpanningForest(graph)).map((h) => h.id)).toEqual(['b', 'c', 'd']);
  });
});
