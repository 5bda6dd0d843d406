// Spam Classification
// Ranks sender scores and maps them onto three verdict tiers using two
// thresholds (high > low). Pure functions; nothing is cached between calls.

import { DEFAULT_ENGINE_CONFIG } from './config';
import type { ClassificationSummary, ScoreRecord, SenderScore, Thresholds, Verdict } from './types';

const VERDICTS: readonly Verdict[] = ['high_risk', 'suspicious', 'legitimate'];

export function verdictFor(score: number, thresholds: Thresholds = DEFAULT_ENGINE_CONFIG.thresholds): Verdict {
  if (score >= thresholds.high) return 'high_risk';
  if (score >= thresholds.low) return 'suspicious';
  return 'legitimate';
}

function byScoreThenSender(a: SenderScore, b: SenderScore): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.sender < b.sender ? -1 : a.sender > b.sender ? 1 : 0;
}

/**
 * Sort descending by score (ties by sender identifier) and attach a verdict
 * and 1-based rank to each record.
 */
export function classify(
  scores: readonly SenderScore[],
  thresholds: Thresholds = DEFAULT_ENGINE_CONFIG.thresholds
): ScoreRecord[] {
  return [...scores].sort(byScoreThenSender).map((score, i) =>
    Object.freeze({
      ...score,
      verdict: verdictFor(score.score, thresholds),
      rank: i + 1,
    })
  );
}

/** The `n` highest-scored senders. */
export function topN<T extends SenderScore>(records: readonly T[], n: number): T[] {
  return [...records].sort(byScoreThenSender).slice(0, Math.max(0, n));
}

export function recordsWithVerdict(records: readonly ScoreRecord[], verdict: Verdict): ScoreRecord[] {
  return records.filter((record) => record.verdict === verdict);
}

export function classificationSummary(records: readonly ScoreRecord[]): ClassificationSummary {
  const counts: Record<Verdict, number> = { high_risk: 0, suspicious: 0, legitimate: 0 };
  for (const record of records) counts[record.verdict]++;

  const total = records.length;
  const percentages: Record<Verdict, number> = { high_risk: 0, suspicious: 0, legitimate: 0 };
  for (const verdict of VERDICTS) {
    percentages[verdict] = total > 0 ? (counts[verdict] / total) * 100 : 0;
  }
  return { total, counts, percentages };
}
