// Minimum Spanning Forest - Kruskal's algorithm
//
// Runs over the undirected projection using the cost transform (1 / volume),
// so the busiest links form the backbone. A disconnected graph yields one tree
// per component: exactly V - C edges.
// Time complexity: O(E log E) for the sort, near-linear union-find after.

import type { EmailGraph } from './email-graph';
import { EmptyGraphError } from './errors';
import type { HubCandidate, SpanningForest } from './types';
import { UnionFind } from './union-find';

export function minimumSpanningForest(graph: EmailGraph): SpanningForest {
  if (graph.nodeCount === 0) throw new EmptyGraphError('minimumSpanningForest');

  // Stable sort keeps first-seen order among equal costs
  const candidates = graph
    .undirectedLinks()
    .map((link, order) => ({ link, order }))
    .sort((x, y) => x.link.cost - y.link.cost || x.order - y.order);

  const sets = new UnionFind(graph.nodeCount);
  const forest: SpanningForest = {
    edges: [],
    totalCost: 0,
    totalWeight: 0,
    nodeCount: graph.nodeCount,
    componentCount: 0,
  };
  const target = graph.nodeCount - 1;

  for (const { link } of candidates) {
    if (!sets.union(link.a, link.b)) continue; // would close a cycle
    forest.edges.push({
      source: graph.idAt(link.a),
      target: graph.idAt(link.b),
      weight: link.weight,
      cost: link.cost,
    });
    forest.totalCost += link.cost;
    forest.totalWeight += link.weight;
    if (forest.edges.length === target) break;
  }

  forest.componentCount = sets.count;
  return forest;
}

/**
 * Hub-and-spoke detection on the backbone: nodes whose forest degree covers at
 * least `threshold` of the other nodes. Removing such a node splits the tree
 * into that many pieces.
 */
export function hubCandidates(
  forest: SpanningForest,
  options: { threshold?: number; minDegree?: number } = {}
): HubCandidate[] {
  const threshold = options.threshold ?? 0.5;
  const minDegree = options.minDegree ?? 2;
  const others = Math.max(forest.nodeCount - 1, 1);

  const degree = new Map<string, number>();
  for (const edge of forest.edges) {
    degree.set(edge.source, (degree.get(edge.source) ?? 0) + 1);
    degree.set(edge.target, (degree.get(edge.target) ?? 0) + 1);
  }

  return Array.from(degree, ([id, forestDegree]) => ({ id, forestDegree, reach: forestDegree / others }))
    .filter((hub) => hub.forestDegree >= minDegree && hub.reach >= threshold)
    .sort((a, b) => b.forestDegree - a.forestDegree || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}
