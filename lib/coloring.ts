// Greedy Vertex Coloring
// Each node takes the smallest colour not already used by a coloured
// neighbour in the undirected projection. The result is a proper colouring
// but not necessarily a minimum one; it is a segmentation heuristic.
// Time complexity: O(V log V + E).

import type { EmailGraph } from './email-graph';
import { EmptyGraphError } from './errors';
import type { ColoringResult, ColoringStrategy } from './types';

type Ordering = (graph: EmailGraph) => number[];

function insertionOrder(graph: EmailGraph): number[] {
  return Array.from({ length: graph.nodeCount }, (_, i) => i);
}

// Descending degree; hubs first tends to keep the colour count low
function largestFirst(graph: EmailGraph): number[] {
  return insertionOrder(graph).sort(
    (a, b) => graph.undirectedDegree(b) - graph.undirectedDegree(a) || a - b
  );
}

// Repeatedly strip a minimum-degree node; colour in reverse removal order
function smallestLast(graph: EmailGraph): number[] {
  const n = graph.nodeCount;
  const degree = Int32Array.from(insertionOrder(graph), (v) => graph.undirectedDegree(v));
  const removed = new Uint8Array(n);
  const removal: number[] = [];

  for (let step = 0; step < n; step++) {
    let pick = -1;
    for (let v = 0; v < n; v++) {
      if (removed[v]) continue;
      if (pick === -1 || degree[v] < degree[pick]) pick = v;
    }
    removed[pick] = 1;
    removal.push(pick);
    for (const { target } of graph.undirectedNeighbors(pick)) {
      if (!removed[target]) degree[target]--;
    }
  }
  return removal.reverse();
}

const ORDERINGS: Record<ColoringStrategy, Ordering> = {
  'largest-first': largestFirst,
  'insertion-order': insertionOrder,
  'smallest-last': smallestLast,
};

export function greedyColoring(
  graph: EmailGraph,
  strategy: ColoringStrategy = 'largest-first'
): ColoringResult {
  if (graph.nodeCount === 0) throw new EmptyGraphError('greedyColoring');

  const color = new Int32Array(graph.nodeCount).fill(-1);
  let colorCount = 0;

  for (const v of ORDERINGS[strategy](graph)) {
    const taken = new Set<number>();
    for (const { target } of graph.undirectedNeighbors(v)) {
      if (color[target] !== -1) taken.add(color[target]);
    }
    let c = 0;
    while (taken.has(c)) c++;
    color[v] = c;
    colorCount = Math.max(colorCount, c + 1);
  }

  const colors: Record<string, number> = Object.fromEntries(
    Array.from(color, (c, v): [string, number] => [graph.idAt(v), c])
  );
  return { colors, colorCount, strategy };
}

/** True when no two adjacent nodes share a colour. */
export function isProperColoring(graph: EmailGraph, colors: Record<string, number>): boolean {
  for (const link of graph.undirectedLinks()) {
    if (colors[graph.idAt(link.a)] === colors[graph.idAt(link.b)]) return false;
  }
  return true;
}

/** Nodes grouped by colour index. */
export function colorClasses(result: ColoringResult): string[][] {
  const classes: string[][] = Array.from({ length: result.colorCount }, () => []);
  for (const [id, c] of Object.entries(result.colors)) {
    classes[c].push(id);
  }
  return classes;
}
