// Email Communication Graph
// Directed weighted multigraph over sender/recipient identities.
//
// Nodes live in a dense arena addressed by integer index; an identifier → index
// map resolves email addresses. Repeated (sender, recipient) records merge into
// one edge carrying the summed weight and the full timestamp sequence.

import { InvalidTimestampError, InvalidWeightError, UnknownNodeError } from './errors';
import type {
  Degree,
  Direction,
  EdgeView,
  EmailRecord,
  Neighbor,
  NodeStats,
  TimestampInput,
  TimestampRun,
  UndirectedLink,
} from './types';

interface NodeSlot {
  id: string;
  outDegree: number;
  inDegree: number;
  totalSent: number;
  totalReceived: number;
  firstActivity: number | null;
  lastActivity: number | null;
}

interface EdgeSlot {
  source: number;
  target: number;
  weight: number;
  // Runs in arrival order; empty for an edge built from untimestamped records
  timestamps: TimestampRun[];
}

export function toEpochMillis(value: TimestampInput): number {
  const millis =
    typeof value === 'number'
      ? value
      : value instanceof Date
        ? value.getTime()
        : Date.parse(value);
  if (!Number.isFinite(millis)) {
    throw new InvalidTimestampError(value);
  }
  return millis;
}

/** Sort runs by instant and fold runs sharing an instant into one. */
export function mergeRuns(runs: Iterable<TimestampRun>): TimestampRun[] {
  const sorted = Array.from(runs, (run) => ({ at: run.at, count: run.count })).sort((a, b) => a.at - b.at);
  const merged: TimestampRun[] = [];
  for (const run of sorted) {
    const last = merged[merged.length - 1];
    if (last && last.at === run.at) last.count += run.count;
    else merged.push(run);
  }
  return merged;
}

/** Runs for a flat list of instants, one email each. */
export function runsOf(instants: Iterable<number>): TimestampRun[] {
  return mergeRuns(Array.from(instants, (at) => ({ at, count: 1 })));
}

/** Traversal cost of an edge: high traffic ⇒ cheap edge. */
export function costOf(weight: number): number {
  if (!(weight > 0)) {
    throw new InvalidWeightError(weight);
  }
  return 1 / weight;
}

export class EmailGraph {
  private readonly slots: NodeSlot[] = [];
  private readonly indexById = new Map<string, number>();
  private readonly outAdj: Map<number, EdgeSlot>[] = [];
  private readonly inAdj: Map<number, EdgeSlot>[] = [];
  private readonly edgeList: EdgeSlot[] = [];
  private volume = 0;

  // Undirected projection, rebuilt lazily after mutation
  private undirectedCache: { adjacency: Map<number, number>[]; links: UndirectedLink[] } | null =
    null;

  static fromRecords(records: Iterable<EmailRecord>): EmailGraph {
    const graph = new EmailGraph();
    for (const record of records) {
      graph.addEdge(record.sender, record.recipient, record.weight ?? 1, record.timestamp);
    }
    return graph;
  }

  // ─── Mutation ──────────────────────────────────────────────────────────────

  /**
   * Record `weight` emails from `sender` to `recipient`. A timestamp, when
   * given, is stored as a run of `weight` emails at that instant.
   *
   * Every record for one sender/recipient pair must agree on carrying a
   * timestamp, so an edge's runs always account for its whole weight.
   */
  addEdge(sender: string, recipient: string, weight = 1, timestamp?: TimestampInput): void {
    if (!Number.isSafeInteger(weight) || weight < 1) {
      throw new InvalidWeightError(weight);
    }
    const stamp = timestamp === undefined ? null : toEpochMillis(timestamp);

    const existing = this.findEdge(sender, recipient);
    if (existing && (existing.timestamps.length > 0) !== (stamp !== null)) {
      throw new InvalidTimestampError(
        timestamp,
        `Emails from "${sender}" to "${recipient}" mix timestamped and untimestamped records`
      );
    }

    const s = this.ensureNode(sender);
    const r = this.ensureNode(recipient);

    let edge = this.outAdj[s].get(r);
    if (!edge) {
      edge = { source: s, target: r, weight: 0, timestamps: [] };
      this.outAdj[s].set(r, edge);
      this.inAdj[r].set(s, edge);
      this.edgeList.push(edge);
      this.slots[s].outDegree++;
      this.slots[r].inDegree++;
    }
    edge.weight += weight;
    this.volume += weight;
    this.slots[s].totalSent += weight;
    this.slots[r].totalReceived += weight;

    if (stamp !== null) {
      const last = edge.timestamps[edge.timestamps.length - 1];
      if (last && last.at === stamp) last.count += weight;
      else edge.timestamps.push({ at: stamp, count: weight });
      this.touch(this.slots[s], stamp);
      this.touch(this.slots[r], stamp);
    }

    this.undirectedCache = null;
  }

  private findEdge(sender: string, recipient: string): EdgeSlot | undefined {
    const s = this.indexById.get(sender);
    const r = this.indexById.get(recipient);
    if (s === undefined || r === undefined) return undefined;
    return this.outAdj[s].get(r);
  }

  private ensureNode(id: string): number {
    const existing = this.indexById.get(id);
    if (existing !== undefined) return existing;
    const index = this.slots.length;
    this.slots.push({
      id,
      outDegree: 0,
      inDegree: 0,
      totalSent: 0,
      totalReceived: 0,
      firstActivity: null,
      lastActivity: null,
    });
    this.outAdj.push(new Map());
    this.inAdj.push(new Map());
    this.indexById.set(id, index);
    return index;
  }

  private touch(slot: NodeSlot, stamp: number): void {
    if (slot.firstActivity === null || stamp < slot.firstActivity) slot.firstActivity = stamp;
    if (slot.lastActivity === null || stamp > slot.lastActivity) slot.lastActivity = stamp;
  }

  // ─── Node queries ──────────────────────────────────────────────────────────

  get nodeCount(): number {
    return this.slots.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  /** Total number of emails across all edges. */
  get totalVolume(): number {
    return this.volume;
  }

  hasNode(id: string): boolean {
    return this.indexById.has(id);
  }

  /** Node identifiers in insertion order. */
  nodes(): string[] {
    return this.slots.map((slot) => slot.id);
  }

  indexOf(id: string): number {
    const index = this.indexById.get(id);
    if (index === undefined) throw new UnknownNodeError(id);
    return index;
  }

  idAt(index: number): string {
    const slot = this.slots[index];
    if (!slot) throw new UnknownNodeError(`#${index}`);
    return slot.id;
  }

  node(id: string): NodeStats {
    const index = this.indexOf(id);
    const slot = this.slots[index];
    return { ...slot, index };
  }

  *neighbors(id: string, direction: Direction = 'out'): Generator<Neighbor> {
    const index = this.indexOf(id);
    const adjacency = direction === 'out' ? this.outAdj[index] : this.inAdj[index];
    for (const [other, edge] of adjacency) {
      yield { id: this.slots[other].id, weight: edge.weight };
    }
  }

  /** Index-level outgoing adjacency used by the traversal algorithms. */
  *outgoing(index: number): Generator<{ target: number; weight: number }> {
    for (const [target, edge] of this.outAdj[index]) {
      yield { target, weight: edge.weight };
    }
  }

  degree(id: string, direction: Direction | 'all' = 'out'): Degree {
    const slot = this.slots[this.indexOf(id)];
    if (direction === 'out') return { weighted: slot.totalSent, unweighted: slot.outDegree };
    if (direction === 'in') return { weighted: slot.totalReceived, unweighted: slot.inDegree };
    return {
      weighted: slot.totalSent + slot.totalReceived,
      unweighted: slot.outDegree + slot.inDegree,
    };
  }

  // ─── Edge queries ──────────────────────────────────────────────────────────

  *edges(): Generator<EdgeView> {
    for (const edge of this.edgeList) {
      yield this.view(edge);
    }
  }

  edge(sender: string, recipient: string): EdgeView | null {
    const edge = this.outAdj[this.indexOf(sender)].get(this.indexOf(recipient));
    return edge ? this.view(edge) : null;
  }

  edgeWeight(sender: string, recipient: string): number | null {
    return this.edge(sender, recipient)?.weight ?? null;
  }

  edgeCost(sender: string, recipient: string): number | null {
    const weight = this.edgeWeight(sender, recipient);
    return weight === null ? null : costOf(weight);
  }

  /** Timestamps of every email sent by `id`, as ascending runs. */
  outgoingTimestamps(id: string): TimestampRun[] {
    const runs: TimestampRun[] = [];
    for (const edge of this.outAdj[this.indexOf(id)].values()) {
      for (const run of edge.timestamps) runs.push(run);
    }
    return mergeRuns(runs);
  }

  private view(edge: EdgeSlot): EdgeView {
    return {
      sender: this.slots[edge.source].id,
      recipient: this.slots[edge.target].id,
      weight: edge.weight,
      timestamps: mergeRuns(edge.timestamps),
    };
  }

  // ─── Undirected projection ─────────────────────────────────────────────────
  // Direction collapsed, weights of u→v and v→u summed, self-loops dropped.

  private undirected(): { adjacency: Map<number, number>[]; links: UndirectedLink[] } {
    if (this.undirectedCache) return this.undirectedCache;

    const adjacency: Map<number, number>[] = this.slots.map(() => new Map<number, number>());
    const linkIndex = new Map<string, UndirectedLink>();
    const links: UndirectedLink[] = [];

    for (const edge of this.edgeList) {
      if (edge.source === edge.target) continue;
      const a = Math.min(edge.source, edge.target);
      const b = Math.max(edge.source, edge.target);
      const key = `${a}:${b}`;
      let link = linkIndex.get(key);
      if (!link) {
        link = { a, b, weight: 0, cost: 0 };
        linkIndex.set(key, link);
        links.push(link);
      }
      link.weight += edge.weight;
      adjacency[a].set(b, link.weight);
      adjacency[b].set(a, link.weight);
    }
    for (const link of links) link.cost = costOf(link.weight);

    this.undirectedCache = { adjacency, links };
    return this.undirectedCache;
  }

  *undirectedNeighbors(index: number): Generator<{ target: number; weight: number }> {
    const adjacency = this.undirected().adjacency[index];
    if (!adjacency) return;
    for (const [target, weight] of adjacency) {
      yield { target, weight };
    }
  }

  undirectedDegree(index: number): number {
    return this.undirected().adjacency[index]?.size ?? 0;
  }

  areAdjacent(a: number, b: number): boolean {
    return this.undirected().adjacency[a]?.has(b) ?? false;
  }

  /** Undirected links in first-seen order. */
  undirectedLinks(): readonly UndirectedLink[] {
    return this.undirected().links;
  }
}
