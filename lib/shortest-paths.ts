// Shortest Paths - Dijkstra over the inverse-volume cost transform
//
// Edge cost = 1 / email count, so heavily used links are cheap and shortest
// paths follow the busiest relay chains. Unreachable targets are a normal
// result, not an error.
// Time complexity: O((V + E) log V) per source with a binary heap.

import { costOf, type EmailGraph } from './email-graph';
import { MinPriorityQueue } from './priority-queue';
import type { PathDescription, PathResult, RelayPath } from './types';

export type TraversalMode = 'directed' | 'undirected';

export interface DijkstraTree {
  /** Cost from the source; Infinity when unreachable. */
  dist: Float64Array;
  /** Predecessor index on the chosen shortest path; -1 for none. */
  prev: Int32Array;
  /** Nodes in the order they were settled. */
  settled: number[];
}

function* adjacent(
  graph: EmailGraph,
  index: number,
  mode: TraversalMode
): Generator<{ target: number; weight: number }> {
  if (mode === 'directed') yield* graph.outgoing(index);
  else yield* graph.undirectedNeighbors(index);
}

/**
 * Single-source Dijkstra on node indices. Equal-cost alternatives keep the
 * first predecessor found, and the heap pops equal costs in push order.
 */
export function dijkstraFrom(
  graph: EmailGraph,
  source: number,
  mode: TraversalMode = 'directed'
): DijkstraTree {
  const n = graph.nodeCount;
  const dist = new Float64Array(n).fill(Infinity);
  const prev = new Int32Array(n).fill(-1);
  const done = new Uint8Array(n);
  const settled: number[] = [];

  const queue = new MinPriorityQueue<number>();
  dist[source] = 0;
  queue.push(source, 0);

  while (!queue.isEmpty()) {
    const entry = queue.pop();
    if (!entry) break;
    const v = entry.value;
    if (done[v]) continue;
    done[v] = 1;
    settled.push(v);

    for (const { target, weight } of adjacent(graph, v, mode)) {
      if (done[target]) continue;
      const candidate = dist[v] + costOf(weight);
      if (candidate < dist[target]) {
        dist[target] = candidate;
        prev[target] = v;
        queue.push(target, candidate);
      }
    }
  }

  return { dist, prev, settled };
}

/** Breadth-first hop counts from `source`; -1 marks unreachable nodes. */
export function hopsFrom(graph: EmailGraph, source: number, mode: TraversalMode = 'directed'): Int32Array {
  const hops = new Int32Array(graph.nodeCount).fill(-1);
  hops[source] = 0;
  const queue: number[] = [source];
  for (let head = 0; head < queue.length; head++) {
    const v = queue[head];
    for (const { target } of adjacent(graph, v, mode)) {
      if (hops[target] === -1) {
        hops[target] = hops[v] + 1;
        queue.push(target);
      }
    }
  }
  return hops;
}

function unwind(graph: EmailGraph, prev: Int32Array, target: number): string[] {
  const path: string[] = [];
  for (let v = target; v !== -1; v = prev[v]) {
    path.push(graph.idAt(v));
  }
  return path.reverse();
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Cheapest directed route from `source` to `target`.
 * Throws UnknownNodeError when either endpoint was never inserted.
 */
export function shortestPath(graph: EmailGraph, source: string, target: string): PathResult {
  const s = graph.indexOf(source);
  const t = graph.indexOf(target);

  if (s === t) {
    return { found: true, path: [source], cost: 0, hops: 0 };
  }

  const { dist, prev } = dijkstraFrom(graph, s);
  if (dist[t] === Infinity) {
    return { found: false, path: [], cost: null, hops: null };
  }

  const path = unwind(graph, prev, t);
  return { found: true, path, cost: dist[t], hops: path.length - 1 };
}

/** Cost to every node reachable from `source` (the source itself at 0). */
export function singleSourceCosts(graph: EmailGraph, source: string): Record<string, number> {
  const { dist, settled } = dijkstraFrom(graph, graph.indexOf(source));
  return Object.fromEntries(Array.from(settled, (v): [string, number] => [graph.idAt(v), dist[v]]));
}

/** Hop count to every node reachable from `source`. */
export function hopDistances(graph: EmailGraph, source: string): Record<string, number> {
  const hops = hopsFrom(graph, graph.indexOf(source));
  const entries: Array<[string, number]> = [];
  hops.forEach((h, v) => {
    if (h >= 0) entries.push([graph.idAt(v), h]);
  });
  return Object.fromEntries(entries);
}

export function describePath(graph: EmailGraph, path: readonly string[]): PathDescription {
  if (path.length < 2) {
    return { hopCount: 0, intermediaries: [], edgeWeights: [], totalWeight: 0, averageWeight: 0 };
  }

  const edgeWeights: number[] = [];
  for (let i = 0; i < path.length - 1; i++) {
    const weight = graph.edgeWeight(path[i], path[i + 1]);
    if (weight !== null) edgeWeights.push(weight);
  }
  const totalWeight = edgeWeights.reduce((sum, w) => sum + w, 0);
  const hopCount = path.length - 1;

  return {
    hopCount,
    intermediaries: path.slice(1, -1),
    edgeWeights,
    totalWeight,
    averageWeight: totalWeight / hopCount,
  };
}

/**
 * Cheapest routes from a suspected source to each of its direct recipients.
 * A route longer than one hop means the traffic prefers a relay over the
 * direct link.
 */
export function relayPaths(graph: EmailGraph, source: string, limit = 10): RelayPath[] {
  const s = graph.indexOf(source);
  const { dist, prev } = dijkstraFrom(graph, s);
  const results: RelayPath[] = [];

  for (const { target } of graph.outgoing(s)) {
    if (results.length >= limit) break;
    if (target === s) continue;
    const path = unwind(graph, prev, target);
    results.push({
      recipient: graph.idAt(target),
      path,
      cost: dist[target],
      description: describePath(graph, path),
    });
  }

  return results;
}
