// Core data types for the Email Spam Graph Engine

/** Epoch milliseconds, or anything `new Date()` accepts. */
export type TimestampInput = number | string | Date;

export interface EmailRecord {
  sender: string;
  recipient: string;
  /** Number of emails this record stands for. Defaults to 1. */
  weight?: number;
  timestamp?: TimestampInput;
}

export type Direction = 'out' | 'in';

export interface NodeStats {
  id: string;
  index: number;
  outDegree: number;
  inDegree: number;
  totalSent: number;
  totalReceived: number;
  /** Epoch ms of the earliest timestamped email touching this node, or null. */
  firstActivity: number | null;
  lastActivity: number | null;
}

/** `count` emails sent at the same instant. */
export interface TimestampRun {
  at: number;
  count: number;
}

export interface EdgeView {
  sender: string;
  recipient: string;
  weight: number;
  /** Ascending runs; their counts sum to `weight` whenever the list is non-empty. */
  timestamps: readonly TimestampRun[];
}

export interface Neighbor {
  id: string;
  weight: number;
}

export interface Degree {
  /** Sum of edge weights (email volume). */
  weighted: number;
  /** Count of distinct edges (communication partners). */
  unweighted: number;
}

/** One link of the undirected projection; `a` < `b` by node index. */
export interface UndirectedLink {
  a: number;
  b: number;
  weight: number;
  cost: number;
}

// ─── Algorithm results ───────────────────────────────────────────────────────

export type PathResult =
  | { found: true; path: string[]; cost: number; hops: number }
  | { found: false; path: []; cost: null; hops: null };

export interface PathDescription {
  hopCount: number;
  intermediaries: string[];
  edgeWeights: number[];
  totalWeight: number;
  averageWeight: number;
}

export interface RelayPath {
  recipient: string;
  path: string[];
  cost: number;
  description: PathDescription;
}

export interface ForestEdge {
  source: string;
  target: string;
  weight: number;
  cost: number;
}

export interface SpanningForest {
  edges: ForestEdge[];
  totalCost: number;
  totalWeight: number;
  nodeCount: number;
  componentCount: number;
}

export interface HubCandidate {
  id: string;
  forestDegree: number;
  /** forestDegree / (V - 1) */
  reach: number;
}

export type CentralityVariant = 'betweenness' | 'closeness';

export type CentralityScores = Record<string, number>;

export interface Component {
  id: number;
  members: string[];
  size: number;
}

export type ColoringStrategy = 'largest-first' | 'insertion-order' | 'smallest-last';

export interface ColoringResult {
  colors: Record<string, number>;
  colorCount: number;
  strategy: ColoringStrategy;
}

export type DiameterMetric = 'hops' | 'cost';

export type DiameterResult =
  | { connected: true; value: number; metric: DiameterMetric }
  | {
      connected: false;
      value: number;
      metric: DiameterMetric;
      componentCount: number;
      largestComponentDiameter: number;
    };

export interface ClusteringResult {
  average: number;
  local: Record<string, number>;
}

export interface DegreeBucket {
  degree: number;
  count: number;
}

export interface DegreeDistribution {
  unweighted: DegreeBucket[];
  weighted: DegreeBucket[];
  maxUnweighted: number;
  maxWeighted: number;
  meanUnweighted: number;
  meanWeighted: number;
}

export interface NetworkSummary {
  nodeCount: number;
  edgeCount: number;
  totalVolume: number;
  averageDegree: number;
  density: number;
  diameter: DiameterResult;
  clustering: number;
  triangles: number;
  degreeDistribution: DegreeDistribution;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

export type BurstStrategy = 'coefficient-of-variation' | 'windowed-rate';

export type Verdict = 'legitimate' | 'suspicious' | 'high_risk';

export interface ScoreWeights {
  degreeRatio: number;
  centrality: number;
  burst: number;
}

export interface Thresholds {
  high: number;
  low: number;
}

export interface SenderScore {
  sender: string;
  degreeRatio: number;
  centrality: number;
  burst: number;
  score: number;
  distinctRecipients: number;
  emailsSent: number;
}

export interface ScoreRecord extends SenderScore {
  verdict: Verdict;
  rank: number;
}

export interface ClassificationSummary {
  total: number;
  counts: Record<Verdict, number>;
  percentages: Record<Verdict, number>;
}
