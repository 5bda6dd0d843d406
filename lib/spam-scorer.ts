// Multi-Factor Spam Scoring Engine
// Combines structural, network and temporal signals per sender:
//
//   score = w1 · degreeRatio + w2 · centrality + w3 · burst
//
// Each component is normalised to [0, 1] before weighting and the weights sum
// to 1, so the score stays in [0, 1].

import { computeCentrality } from './centrality';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config';
import type { EmailGraph } from './email-graph';
import { EmptyGraphError } from './errors';
import type { BurstStrategy, CentralityScores, SenderScore, TimestampRun } from './types';

export type ScoringOptions = Partial<
  Pick<EngineConfig, 'weights' | 'centralityVariant' | 'burstStrategy' | 'burstWindowMs'>
>;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

// ─── Components ──────────────────────────────────────────────────────────────

/**
 * STRUCTURAL: few distinct recipients for a large volume is the blasting
 * signature. 1 − distinct / total, clamped.
 */
export function degreeRatio(distinctRecipients: number, emailsSent: number): number {
  if (emailsSent <= 0) return 0;
  return clamp01(1 - distinctRecipients / emailsSent);
}

/**
 * TEMPORAL (coefficient of variation): spread of inter-arrival gaps relative
 * to their mean. Regular senders sit near 0, bursty ones well above 1.
 * A fully simultaneous sequence of k gaps takes √(k−1), the largest value the
 * statistic reaches for k gaps.
 *
 * Works on ascending runs: a run of `count` emails contributes `count − 1`
 * zero gaps, so the cost follows the number of distinct instants rather
 * than the email volume.
 */
export function interArrivalVariation(runs: readonly TimestampRun[]): number {
  let emails = 0;
  for (const run of runs) emails += run.count;
  if (emails < 3 || runs.length === 0) return 0;

  const gapCount = emails - 1;
  const mean = (runs[runs.length - 1].at - runs[0].at) / gapCount;
  if (mean === 0) return Math.sqrt(gapCount - 1);

  let squares = (emails - runs.length) * mean ** 2;
  for (let i = 1; i < runs.length; i++) squares += (runs[i].at - runs[i - 1].at - mean) ** 2;
  return Math.sqrt(squares / gapCount) / mean;
}

/**
 * TEMPORAL (windowed rate): most emails inside any sliding window of
 * `windowMs`. Two-pointer sweep over ascending runs.
 */
export function peakWindowCount(runs: readonly TimestampRun[], windowMs: number): number {
  let best = 0;
  let inWindow = 0;
  let left = 0;
  for (let right = 0; right < runs.length; right++) {
    inWindow += runs[right].count;
    while (runs[right].at - runs[left].at > windowMs) {
      inWindow -= runs[left].count;
      left++;
    }
    if (inWindow > best) best = inWindow;
  }
  return best;
}

const BURST: Record<BurstStrategy, (runs: readonly TimestampRun[], windowMs: number) => number> = {
  'coefficient-of-variation': (runs) => interArrivalVariation(runs),
  'windowed-rate': peakWindowCount,
};

function largest(values: Iterable<number>): number {
  let max = 0;
  for (const value of values) if (value > max) max = value;
  return max;
}

// Divide by the largest observed value; all-zero input stays zero
function normaliseByMax(values: number[]): number[] {
  const max = largest(values);
  return max > 0 ? values.map((value) => clamp01(value / max)) : values.map(() => 0);
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Score every sender (out-degree > 0) in node insertion order.
 * Pass `centrality` to reuse scores already computed for this graph.
 */
export function scoreSenders(
  graph: EmailGraph,
  options: ScoringOptions = {},
  centrality?: CentralityScores
): SenderScore[] {
  if (graph.nodeCount === 0) throw new EmptyGraphError('scoreSenders');

  const weights = options.weights ?? DEFAULT_ENGINE_CONFIG.weights;
  const variant = options.centralityVariant ?? DEFAULT_ENGINE_CONFIG.centralityVariant;
  const burstStrategy = options.burstStrategy ?? DEFAULT_ENGINE_CONFIG.burstStrategy;
  const windowMs = options.burstWindowMs ?? DEFAULT_ENGINE_CONFIG.burstWindowMs;

  const scores = centrality ?? computeCentrality(graph, variant);
  const maxCentrality = largest(Object.values(scores));

  const senders = graph.nodes().filter((id) => graph.degree(id, 'out').unweighted > 0);

  const rawBurst = senders.map((id) => {
    const stamps = graph.outgoingTimestamps(id);
    return stamps.length === 0 ? 0 : BURST[burstStrategy](stamps, windowMs);
  });
  const burst = normaliseByMax(rawBurst);

  return senders.map((sender, i) => {
    const { weighted, unweighted } = graph.degree(sender, 'out');
    const ratio = degreeRatio(unweighted, weighted);
    const raw = Object.hasOwn(scores, sender) ? scores[sender] : 0;
    const central = maxCentrality > 0 ? clamp01(raw / maxCentrality) : 0;
    const score = clamp01(
      weights.degreeRatio * ratio + weights.centrality * central + weights.burst * burst[i]
    );

    return Object.freeze({
      sender,
      degreeRatio: ratio,
      centrality: central,
      burst: burst[i],
      score,
      distinctRecipients: unweighted,
      emailsSent: weighted,
    });
  });
}
