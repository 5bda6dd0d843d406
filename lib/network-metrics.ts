// Network Metrics - density, diameter, clustering, degree distribution
//
// All metrics accept disconnected and single-node graphs. A disconnected graph
// reports an infinite diameter together with the largest component's own
// diameter, never a silently truncated number.

import { connectedComponents, largestComponent } from './connectivity';
import type { EmailGraph } from './email-graph';
import { EmptyGraphError } from './errors';
import { dijkstraFrom, hopsFrom } from './shortest-paths';
import type {
  ClusteringResult,
  DegreeBucket,
  DegreeDistribution,
  DiameterMetric,
  DiameterResult,
  NetworkSummary,
} from './types';

/**
 * Distinct directed edges over V·(V−1) possible ones. Self-addressed mail is
 * not counted. 0 when V ≤ 1.
 */
export function networkDensity(graph: EmailGraph): number {
  const n = graph.nodeCount;
  if (n <= 1) return 0;
  let edges = 0;
  for (const edge of graph.edges()) {
    if (edge.sender !== edge.recipient) edges++;
  }
  return edges / (n * (n - 1));
}

/** Mean of in-degree + out-degree (distinct partners). */
export function averageDegree(graph: EmailGraph): number {
  const n = graph.nodeCount;
  return n === 0 ? 0 : (2 * graph.edgeCount) / n;
}

// Longest finite shortest route starting from any of `sources`
function eccentricityMax(graph: EmailGraph, sources: Iterable<number>, metric: DiameterMetric): number {
  let longest = 0;
  for (const s of sources) {
    if (metric === 'hops') {
      for (const h of hopsFrom(graph, s)) {
        if (h > longest) longest = h;
      }
    } else {
      const { dist, settled } = dijkstraFrom(graph, s);
      for (const v of settled) {
        if (dist[v] > longest) longest = dist[v];
      }
    }
  }
  return longest;
}

/**
 * Longest shortest route over all ordered pairs where the second node is
 * reachable from the first along directed email flow.
 */
export function diameter(graph: EmailGraph, metric: DiameterMetric = 'hops'): DiameterResult {
  if (graph.nodeCount === 0) throw new EmptyGraphError('diameter');

  const components = connectedComponents(graph);
  if (components.length === 1) {
    const all = Array.from({ length: graph.nodeCount }, (_, i) => i);
    return { connected: true, value: eccentricityMax(graph, all, metric), metric };
  }

  const largest = largestComponent(components);
  const members = largest ? largest.members.map((id) => graph.indexOf(id)) : [];
  return {
    connected: false,
    value: Infinity,
    metric,
    componentCount: components.length,
    largestComponentDiameter: eccentricityMax(graph, members, metric),
  };
}

function localTriangles(graph: EmailGraph, v: number): { triangles: number; degree: number } {
  const neighbors = Array.from(graph.undirectedNeighbors(v), (e) => e.target);
  let triangles = 0;
  for (let i = 0; i < neighbors.length; i++) {
    for (let j = i + 1; j < neighbors.length; j++) {
      if (graph.areAdjacent(neighbors[i], neighbors[j])) triangles++;
    }
  }
  return { triangles, degree: neighbors.length };
}

/**
 * Local clustering on the undirected projection, averaged over every node
 * (nodes with fewer than two neighbours contribute 0).
 */
export function clusteringCoefficient(graph: EmailGraph): ClusteringResult {
  const n = graph.nodeCount;
  if (n === 0) throw new EmptyGraphError('clusteringCoefficient');

  const entries: Array<[string, number]> = [];
  let sum = 0;
  for (let v = 0; v < n; v++) {
    const { triangles, degree } = localTriangles(graph, v);
    const value = degree < 2 ? 0 : (2 * triangles) / (degree * (degree - 1));
    entries.push([graph.idAt(v), value]);
    sum += value;
  }
  return { average: sum / n, local: Object.fromEntries(entries) };
}

export function triangleCount(graph: EmailGraph): number {
  let total = 0;
  for (let v = 0; v < graph.nodeCount; v++) {
    total += localTriangles(graph, v).triangles;
  }
  return total / 3;
}

function histogram(values: number[]): DegreeBucket[] {
  const counts = new Map<number, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  return Array.from(counts, ([degree, count]) => ({ degree, count })).sort((a, b) => a.degree - b.degree);
}

/** Histograms of total (in + out) degree, unweighted and weighted. */
export function degreeDistribution(graph: EmailGraph): DegreeDistribution {
  const unweighted: number[] = [];
  const weighted: number[] = [];
  for (const id of graph.nodes()) {
    const degree = graph.degree(id, 'all');
    unweighted.push(degree.unweighted);
    weighted.push(degree.weighted);
  }

  const mean = (values: number[]): number =>
    values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
  const max = (values: number[]): number => values.reduce((a, b) => (b > a ? b : a), 0);

  return {
    unweighted: histogram(unweighted),
    weighted: histogram(weighted),
    maxUnweighted: max(unweighted),
    maxWeighted: max(weighted),
    meanUnweighted: mean(unweighted),
    meanWeighted: mean(weighted),
  };
}

export function networkSummary(graph: EmailGraph, metric: DiameterMetric = 'hops'): NetworkSummary {
  return {
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    totalVolume: graph.totalVolume,
    averageDegree: averageDegree(graph),
    density: networkDensity(graph),
    diameter: diameter(graph, metric),
    clustering: clusteringCoefficient(graph).average,
    triangles: triangleCount(graph),
    degreeDistribution: degreeDistribution(graph),
  };
}
