import { describe, it, expect } from 'vitest';
import { connectedComponents, largestComponent, stronglyConnectedComponents } from '../connectivity';
import { EmailGraph } from '../email-graph';

function sampleGraph(): EmailGraph {
  return EmailGraph.fromRecords([
    { sender: 'a', recipient: 'b' },
    { sender: 'b', recipient: 'a' },
    { sender: 'b', recipient: 'c' },
    { sender: 'd', recipient: 'e' },
    { sender: 'f', recipient: 'f' },
  ]);
}

describe('connectedComponents', () => {
  it('partitions nodes regardless of direction, keeping singletons', () => {
    expect(connectedComponents(sampleGraph())).toEqual([
      { id: 0, members: ['a', 'b', 'c'], size: 3 },
      { id: 1, members: ['d', 'e'], size: 2 },
      { id: 2, members: ['f'], size: 1 },
    ]);
  });

  it('covers every node exactly once', () => {
    const graph = sampleGraph();
    const members = connectedComponents(graph).flatMap((c) => c.members);
    expect(members.sort()).toEqual(graph.nodes().sort());
  });

  it('returns nothing for an empty graph', () => {
    expect(connectedComponents(new EmailGraph())).toEqual([]);
  });

  it('orders members by insertion, not by link order', () => {
    const graph = EmailGraph.fromRecords([
      { sender: 'x', recipient: 'y' },
      { sender: 'z', recipient: 'w' },
      { sender: 'w', recipient: 'x' },
    ]);
    expect(connectedComponents(graph)[0].members).toEqual(['x', 'y', 'z', 'w']);
  });
});

describe('stronglyConnectedComponents', () => {
  it('separates mutual pairs from one-way flow', () => {
    expect(stronglyConnectedComponents(sampleGraph()).map((c) => c.members)).toEqual([
      ['a', 'b'],
      ['c'],
      ['d'],
      ['e'],
      ['f'],
    ]);
  });

  it('finds a directed cycle as one component', () => {
    const graph = EmailGraph.fromRecords([
      { sender: 'a', recipient: 'b' },
      { sender: 'b', recipient: 'c' },
      { sender: 'c', recipient: 'a' },
      { sender: 'c', recipient: 'd' },
    ]);
    expect(stronglyConnectedComponents(graph)).toEqual([
      { id: 0, members: ['a', 'b', 'c'], size: 3 },
      { id: 1, members: ['d'], size: 1 },
    ]);
  });

  it('handles a long chain without recursion', () => {
    const graph = new EmailGraph();
    for (let i = 0; i < 20000; i++) graph.addEdge(`n${i}`, `n${i + 1}`);
    expect(stronglyConnectedComponents(graph)).toHaveLength(20001);
  });
});

describe('largestComponent', () => {
  it('picks the first of the largest', () => {
    expect(largestComponent(connectedComponents(sampleGraph()))?.members).toEqual(['a', 'b', 'c']);
  });

  it('is null with no components', () => {
    expect(largestComponent([])).toBeNull();
  });
});
