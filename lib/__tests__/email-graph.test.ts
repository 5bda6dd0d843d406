import { describe, it, expect } from 'vitest';
import { EmailGraph, costOf, mergeRuns, runsOf, toEpochMillis } from '../email-graph';
import { InvalidTimestampError, InvalidWeightError, UnknownNodeError } from '../errors';

describe('EmailGraph', () => {
  describe('construction', () => {
    it('creates nodes in first-seen order', () => {
      const graph = EmailGraph.fromRecords([
        { sender: 'a@x.test', recipient: 'b@x.test' },
        { sender: 'c@x.test', recipient: 'a@x.test' },
      ]);

      expect(graph.nodes()).toEqual(['a@x.test', 'b@x.test', 'c@x.test']);
      expect(graph.nodeCount).toBe(3);
      expect(graph.edgeCount).toBe(2);
    });

    it('merges repeated sender/recipient records into one edge', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 3);
      graph.addEdge('a', 'b', 4);

      expect(graph.edgeCount).toBe(1);
      expect(graph.edgeWeight('a', 'b')).toBe(7);
      expect(graph.totalVolume).toBe(7);
    });

    it('keeps direction: a→b and b→a are separate edges', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 2);
      graph.addEdge('b', 'a', 5);

      expect(graph.edgeWeight('a', 'b')).toBe(2);
      expect(graph.edgeWeight('b', 'a')).toBe(5);
      expect(graph.edgeCount).toBe(2);
    });

    it('rejects zero, negative and fractional weights', () => {
      const graph = new EmailGraph();
      expect(() => graph.addEdge('a', 'b', 0)).toThrow(InvalidWeightError);
      expect(() => graph.addEdge('a', 'b', -2)).toThrow(InvalidWeightError);
      expect(() => graph.addEdge('a', 'b', 1.5)).toThrow(InvalidWeightError);
      expect(() => graph.addEdge('a', 'b', Number.MAX_SAFE_INTEGER + 1)).toThrow(InvalidWeightError);
      expect(graph.nodeCount).toBe(0);
    });

    it('rejects unparseable timestamps without adding nodes', () => {
      const graph = new EmailGraph();
      expect(() => graph.addEdge('a', 'b', 1, 'not a date')).toThrow(InvalidTimestampError);
      expect(graph.nodeCount).toBe(0);
    });
  });

  describe('timestamps', () => {
    it('stores a run per instant and sorts outgoing runs', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 2, 5000);
      graph.addEdge('a', 'c', 1, 1000);
      graph.addEdge('a', 'b', 1, 5000);
      graph.addEdge('a', 'c', 4, 5000);

      expect(graph.edge('a', 'b')?.timestamps).toEqual([{ at: 5000, count: 3 }]);
      expect(graph.outgoingTimestamps('a')).toEqual([
        { at: 1000, count: 1 },
        { at: 5000, count: 7 },
      ]);
    });

    it('keeps one run for a large record at a single instant', () => {
      const graph = new EmailGraph();
      graph.addEdge('blast', 'x', 300000, 1700000000000);

      expect(graph.edge('blast', 'x')?.weight).toBe(300000);
      expect(graph.outgoingTimestamps('blast')).toEqual([{ at: 1700000000000, count: 300000 }]);
    });

    it('rejects an untimestamped record on a timestamped edge', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 3, 1000);

      expect(() => graph.addEdge('a', 'b', 2)).toThrow(InvalidTimestampError);
      expect(graph.edge('a', 'b')?.weight).toBe(3);
      expect(graph.edge('a', 'b')?.timestamps).toEqual([{ at: 1000, count: 3 }]);
    });

    it('rejects a timestamped record on an untimestamped edge', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 2);

      expect(() => graph.addEdge('a', 'b', 1, 1000)).toThrow(
        'Emails from "a" to "b" mix timestamped and untimestamped records'
      );
      expect(graph.edge('a', 'b')?.weight).toBe(2);
      expect(graph.node('a').firstActivity).toBeNull();
    });

    it('allows timestamped and untimestamped mail on different edges', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 2);
      graph.addEdge('a', 'c', 1, 1000);
      expect(graph.outgoingTimestamps('a')).toEqual([{ at: 1000, count: 1 }]);
    });

    it('tracks first and last activity per node', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 1, '2024-01-01T00:00:10.000Z');
      graph.addEdge('b', 'c', 1, '2024-01-01T00:00:05.000Z');

      const b = graph.node('b');
      expect(b.firstActivity).toBe(Date.UTC(2024, 0, 1, 0, 0, 5));
      expect(b.lastActivity).toBe(Date.UTC(2024, 0, 1, 0, 0, 10));
      expect(graph.node('a').firstActivity).toBe(Date.UTC(2024, 0, 1, 0, 0, 10));
    });

    it('leaves activity null when no timestamp was given', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b');
      expect(graph.node('a').firstActivity).toBeNull();
      expect(graph.outgoingTimestamps('a')).toEqual([]);
    });
  });

  describe('queries', () => {
    const graph = EmailGraph.fromRecords([
      { sender: 'hub', recipient: 'x', weight: 3 },
      { sender: 'hub', recipient: 'y', weight: 1 },
      { sender: 'y', recipient: 'hub', weight: 2 },
    ]);

    it('reports weighted and unweighted degree in each direction', () => {
      expect(graph.degree('hub', 'out')).toEqual({ weighted: 4, unweighted: 2 });
      expect(graph.degree('hub', 'in')).toEqual({ weighted: 2, unweighted: 1 });
      expect(graph.degree('hub', 'all')).toEqual({ weighted: 6, unweighted: 3 });
      expect(graph.degree('x', 'out')).toEqual({ weighted: 0, unweighted: 0 });
    });

    it('yields neighbours lazily in insertion order', () => {
      const iterator = graph.neighbors('hub');
      expect(iterator.next().value).toEqual({ id: 'x', weight: 3 });
      expect(Array.from(graph.neighbors('hub', 'in'))).toEqual([{ id: 'y', weight: 2 }]);
    });

    it('throws UnknownNodeError for addresses never inserted', () => {
      expect(() => graph.degree('ghost')).toThrow(UnknownNodeError);
      expect(() => Array.from(graph.neighbors('ghost'))).toThrow(UnknownNodeError);
      expect(() => graph.node('ghost')).toThrow('Unknown node "ghost"');
    });

    it('returns null for a missing edge between known nodes', () => {
      expect(graph.edge('x', 'y')).toBeNull();
      expect(graph.edgeCost('x', 'y')).toBeNull();
      expect(graph.edgeCost('hub', 'x')).toBeCloseTo(1 / 3);
    });
  });

  describe('undirected projection', () => {
    it('sums both directions and drops self-loops', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b', 2);
      graph.addEdge('b', 'a', 3);
      graph.addEdge('a', 'a', 9);

      const links = graph.undirectedLinks();
      expect(links).toHaveLength(1);
      expect(links[0]).toEqual({ a: 0, b: 1, weight: 5, cost: 0.2 });
      expect(graph.undirectedDegree(0)).toBe(1);
      expect(graph.areAdjacent(1, 0)).toBe(true);
    });

    it('is rebuilt after the graph changes', () => {
      const graph = new EmailGraph();
      graph.addEdge('a', 'b');
      expect(graph.undirectedLinks()).toHaveLength(1);
      graph.addEdge('b', 'c');
      expect(graph.undirectedLinks()).toHaveLength(2);
    });
  });
});

describe('mergeRuns', () => {
  it('sorts runs and folds equal instants without touching the input', () => {
    const input = [
      { at: 20, count: 1 },
      { at: 10, count: 2 },
      { at: 20, count: 3 },
    ];
    expect(mergeRuns(input)).toEqual([
      { at: 10, count: 2 },
      { at: 20, count: 4 },
    ]);
    expect(input[0]).toEqual({ at: 20, count: 1 });
  });

  it('builds runs from single instants', () => {
    expect(runsOf([30, 0, 0])).toEqual([
      { at: 0, count: 2 },
      { at: 30, count: 1 },
    ]);
  });
});

describe('costOf', () => {
  it('inverts the weight', () => {
    expect(costOf(4)).toBe(0.25);
  });

  it('rejects non-positive weights', () => {
    expect(() => costOf(0)).toThrow(InvalidWeightError);
  });
});

describe('toEpochMillis', () => {
  it('accepts numbers, ISO strings and dates', () => {
    expect(toEpochMillis(42)).toBe(42);
    expect(toEpochMillis('1970-01-01T00:00:01.000Z')).toBe(1000);
    expect(toEpochMillis(new Date(2000))).toBe(2000);
  });

  it('rejects NaN', () => {
    expect(() => toEpochMillis(Number.NaN)).toThrow(InvalidTimestampError);
  });
});
