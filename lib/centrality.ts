// Centrality Analysis - betweenness and closeness over the email network
// ═══════════════════════════════════════════════════════════════════════════════
//
// PURPOSE
//   Betweenness flags relays: addresses that sit on many cheapest routes
//   between other addresses. Closeness flags coordinators: addresses with a
//   short average route to everything they can reach.
//
// ALGORITHM
//   Brandes' algorithm with Dijkstra in place of BFS, over the undirected
//   projection and the 1 / volume cost transform.
//   Time complexity: O(V * E log V).  Closeness reuses single-source Dijkstra.
//
// NORMALISATION
//   Betweenness is divided by (V-1)(V-2)/2 unordered pairs, so values are in
//   [0, 1]. Graphs with two nodes or fewer have no intermediaries and score 0.
// ═══════════════════════════════════════════════════════════════════════════════

import { costOf, type EmailGraph } from './email-graph';
import { EmptyGraphError } from './errors';
import { MinPriorityQueue } from './priority-queue';
import { dijkstraFrom } from './shortest-paths';
import type { CentralityScores, CentralityVariant } from './types';

// Path costs are float sums of 1/w terms; two routes are "equally short" when
// they agree to within this relative tolerance.
const COST_EPSILON = 1e-9;

function sameCost(a: number, b: number): boolean {
  return Math.abs(a - b) <= COST_EPSILON * Math.max(1, Math.abs(a), Math.abs(b));
}

// ─── Betweenness (Brandes, weighted, undirected) ─────────────────────────────

function brandesBetweenness(graph: EmailGraph): Float64Array {
  const n = graph.nodeCount;
  const cb = new Float64Array(n);

  for (let s = 0; s < n; s++) {
    const stack: number[] = [];
    const pred: number[][] = Array.from({ length: n }, () => []);
    const sigma = new Float64Array(n);
    const dist = new Float64Array(n).fill(Infinity);
    const delta = new Float64Array(n);
    const done = new Uint8Array(n);

    sigma[s] = 1;
    dist[s] = 0;
    const queue = new MinPriorityQueue<number>();
    queue.push(s, 0);

    while (!queue.isEmpty()) {
      const entry = queue.pop();
      if (!entry) break;
      const v = entry.value;
      if (done[v]) continue;
      done[v] = 1;
      stack.push(v);

      for (const { target: w, weight } of graph.undirectedNeighbors(v)) {
        if (done[w]) continue;
        const alt = dist[v] + costOf(weight);
        if (dist[w] === Infinity || (alt < dist[w] && !sameCost(alt, dist[w]))) {
          // strictly shorter route to w found
          dist[w] = alt;
          sigma[w] = sigma[v];
          pred[w] = [v];
          queue.push(w, alt);
        } else if (sameCost(alt, dist[w])) {
          sigma[w] += sigma[v];
          pred[w].push(v);
        }
      }
    }

    // Back-propagation of dependencies
    while (stack.length > 0) {
      const w = stack.pop();
      if (w === undefined) break;
      for (const v of pred[w]) {
        delta[v] += (sigma[v] / sigma[w]) * (1 + delta[w]);
      }
      if (w !== s) cb[w] += delta[w];
    }
  }

  return cb;
}

function toScores(graph: EmailGraph, values: ArrayLike<number>): CentralityScores {
  // fromEntries defines own keys, so an address like "__proto__" is kept
  return Object.fromEntries(
    Array.from({ length: graph.nodeCount }, (_, i): [string, number] => [graph.idAt(i), values[i]])
  );
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Fraction of cheapest routes between other node pairs that pass through each
 * node, counting split routes fractionally.
 */
export function betweennessCentrality(graph: EmailGraph): CentralityScores {
  const n = graph.nodeCount;
  if (n === 0) throw new EmptyGraphError('betweennessCentrality');

  const raw = brandesBetweenness(graph);
  // Each unordered pair was counted from both ends
  const scale = n > 2 ? 1 / ((n - 1) * (n - 2)) : 0;
  return toScores(
    graph,
    raw.map((value) => value * scale)
  );
}

/**
 * Inverse of the mean route cost to every reachable node. Unreachable nodes
 * are left out of the mean; isolated nodes score 0.
 */
export function closenessCentrality(graph: EmailGraph): CentralityScores {
  const n = graph.nodeCount;
  if (n === 0) throw new EmptyGraphError('closenessCentrality');

  const closeness = new Float64Array(n);
  for (let v = 0; v < n; v++) {
    const { dist, settled } = dijkstraFrom(graph, v, 'undirected');
    let total = 0;
    let reached = 0;
    for (const u of settled) {
      if (u === v) continue;
      total += dist[u];
      reached++;
    }
    closeness[v] = reached > 0 && total > 0 ? reached / total : 0;
  }
  return toScores(graph, closeness);
}

const CENTRALITY: Record<CentralityVariant, (graph: EmailGraph) => CentralityScores> = {
  betweenness: betweennessCentrality,
  closeness: closenessCentrality,
};

export function computeCentrality(graph: EmailGraph, variant: CentralityVariant): CentralityScores {
  return CENTRALITY[variant](graph);
}

/** Highest-scoring nodes, ties by identifier. */
export function topCentralNodes(
  scores: CentralityScores,
  n = 10
): { id: string; value: number }[] {
  return Object.entries(scores)
    .map(([id, value]) => ({ id, value }))
    .sort((a, b) => b.value - a.value || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .slice(0, n);
}
