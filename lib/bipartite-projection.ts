// Bipartite Sender/Recipient Projection
// Read-only view over an EmailGraph: senders on one side, recipients on the
// other. An address that both sends and receives appears once per partition.

import type { EmailGraph } from './email-graph';
import { UnknownNodeError } from './errors';

export type Partition = 'sender' | 'recipient';

export interface PartitionNode {
  id: string;
  partition: Partition;
}

export interface ProjectedPair {
  a: string;
  b: string;
  /** Number of shared neighbours on the opposite side. */
  shared: number;
}

export class BipartiteProjection {
  private readonly senderSide = new Map<string, Map<string, number>>();
  private readonly recipientSide = new Map<string, Map<string, number>>();

  constructor(graph: EmailGraph) {
    for (const edge of graph.edges()) {
      let targets = this.senderSide.get(edge.sender);
      if (!targets) {
        targets = new Map();
        this.senderSide.set(edge.sender, targets);
      }
      targets.set(edge.recipient, edge.weight);

      let sources = this.recipientSide.get(edge.recipient);
      if (!sources) {
        sources = new Map();
        this.recipientSide.set(edge.recipient, sources);
      }
      sources.set(edge.sender, edge.weight);
    }
  }

  senders(): PartitionNode[] {
    return Array.from(this.senderSide.keys(), (id) => ({ id, partition: 'sender' as const }));
  }

  recipients(): PartitionNode[] {
    return Array.from(this.recipientSide.keys(), (id) => ({ id, partition: 'recipient' as const }));
  }

  /** Number of distinct recipients the sender emails; 0 for non-senders. */
  senderDegree(sender: string): number {
    return this.senderSide.get(sender)?.size ?? 0;
  }

  recipientDegree(recipient: string): number {
    return this.recipientSide.get(recipient)?.size ?? 0;
  }

  sharedRecipients(first: string, second: string): string[] {
    const a = this.senderSide.get(first);
    const b = this.senderSide.get(second);
    if (!a) throw new UnknownNodeError(first);
    if (!b) throw new UnknownNodeError(second);
    return Array.from(a.keys()).filter((recipient) => b.has(recipient));
  }

  /**
   * Sender pairs that target at least `minShared` common recipients.
   * Coordinated campaigns show up as senders sharing many targets.
   */
  projectOntoSenders(minShared = 1): ProjectedPair[] {
    return project(this.senderSide, this.recipientSide, minShared);
  }

  /** Recipient pairs reached by at least `minShared` common senders. */
  projectOntoRecipients(minShared = 1): ProjectedPair[] {
    return project(this.recipientSide, this.senderSide, minShared);
  }
}

// Pairs on `side` connected through a shared node on `other`.
// Time complexity: O(Σ d(v)²) over nodes v of the opposite side.
function project(
  side: Map<string, Map<string, number>>,
  other: Map<string, Map<string, number>>,
  minShared: number
): ProjectedPair[] {
  const order = new Map<string, number>();
  let i = 0;
  for (const id of side.keys()) order.set(id, i++);

  const counts = new Map<string, ProjectedPair>();
  for (const members of other.values()) {
    const ids = Array.from(members.keys());
    for (let x = 0; x < ids.length; x++) {
      for (let y = x + 1; y < ids.length; y++) {
        const [a, b] =
          (order.get(ids[x]) ?? 0) < (order.get(ids[y]) ?? 0) ? [ids[x], ids[y]] : [ids[y], ids[x]];
        const key = `${a}\u0000${b}`;
        const pair = counts.get(key);
        if (pair) pair.shared++;
        else counts.set(key, { a, b, shared: 1 });
      }
    }
  }

  return Array.from(counts.values())
    .filter((pair) => pair.shared >= minShared)
    .sort(
      (p, q) =>
        q.shared - p.shared ||
        (order.get(p.a) ?? 0) - (order.get(q.a) ?? 0) ||
        (order.get(p.b) ?? 0) - (order.get(q.b) ?? 0)
    );
}
