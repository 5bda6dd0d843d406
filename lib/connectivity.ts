// Connected Components
// Weak components use union-find over the undirected projection (reachability
// regardless of direction). Strong components use an iterative Tarjan pass
// over the directed edges.
// Time complexity: O(V + E) for both.

import type { EmailGraph } from './email-graph';
import type { Component } from './types';
import { UnionFind } from './union-find';

function toComponents(graph: EmailGraph, groups: number[][]): Component[] {
  return groups
    .map((members) => members.sort((a, b) => a - b))
    .sort((x, y) => x[0] - y[0])
    .map((members, id) => ({
      id,
      members: members.map((index) => graph.idAt(index)),
      size: members.length,
    }));
}

/**
 * Partition of all nodes into weakly connected components. Members and
 * components both follow node insertion order; singletons are kept.
 */
export function connectedComponents(graph: EmailGraph): Component[] {
  const sets = new UnionFind(graph.nodeCount);
  for (const link of graph.undirectedLinks()) {
    sets.union(link.a, link.b);
  }

  const byRoot = new Map<number, number[]>();
  for (let v = 0; v < graph.nodeCount; v++) {
    const root = sets.find(v);
    const group = byRoot.get(root);
    if (group) group.push(v);
    else byRoot.set(root, [v]);
  }
  return toComponents(graph, Array.from(byRoot.values()));
}

/**
 * Maximal sets of addresses that can all reach each other along directed
 * email flow. Mutually mailing groups show up here; broadcast trees do not.
 */
export function stronglyConnectedComponents(graph: EmailGraph): Component[] {
  const n = graph.nodeCount;
  const index = new Int32Array(n).fill(-1);
  const low = new Int32Array(n);
  const onStack = new Uint8Array(n);
  const stack: number[] = [];
  const groups: number[][] = [];
  let counter = 0;

  for (let root = 0; root < n; root++) {
    if (index[root] !== -1) continue;

    // Explicit call stack: node plus its materialised successor list
    const frames: { v: number; successors: number[]; next: number }[] = [];
    const enter = (v: number): void => {
      index[v] = low[v] = counter++;
      stack.push(v);
      onStack[v] = 1;
      frames.push({ v, successors: Array.from(graph.outgoing(v), (e) => e.target), next: 0 });
    };
    enter(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.next < frame.successors.length) {
        const w = frame.successors[frame.next++];
        if (index[w] === -1) {
          enter(w);
        } else if (onStack[w]) {
          low[frame.v] = Math.min(low[frame.v], index[w]);
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) low[parent.v] = Math.min(low[parent.v], low[frame.v]);

      if (low[frame.v] === index[frame.v]) {
        const group: number[] = [];
        let w: number | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack[w] = 0;
          group.push(w);
        } while (w !== frame.v);
        groups.push(group);
      }
    }
  }

  return toComponents(graph, groups);
}

export function largestComponent(components: readonly Component[]): Component | null {
  let best: Component | null = null;
  for (const component of components) {
    if (!best || component.size > best.size) best = component;
  }
  return best;
}
