// ============================================================
// Signal Ranker
// ============================================================
// Downstream policy over scored candidates: threshold filtering,
// deterministic ranking and a distribution summary. The scoring engine
// never filters; callers choose the policy here.
// ============================================================

import type { CompositeResult, Direction } from '../types/index.js';
import { DEFAULT_FILTER_POLICY } from '../config/filter.js';
import type { FilterPolicy } from '../config/filter.js';

export type { FilterPolicy };

export function minScoreFor(direction: Direction, policy: FilterPolicy = DEFAULT_FILTER_POLICY): number {
  switch (direction) {
    case 'BUY':
      return Math.max(policy.minScore, policy.buyMinScore);
    case 'SELL':
      return Math.max(policy.minScore, policy.sellMinScore);
    default:
      return policy.minScore;
  }
}

export function passesPolicy(result: CompositeResult, policy: FilterPolicy = DEFAULT_FILTER_POLICY): boolean {
  return result.totalScore >= minScoreFor(result.direction, policy);
}

/** Highest score first; ties broken by symbol, then date, so the order is stable. */
export function compareResults(a: CompositeResult, b: CompositeResult): number {
  if (a.totalScore !== b.totalScore) return b.totalScore - a.totalScore;
  if (a.symbol !== b.symbol) return a.symbol < b.symbol ? -1 : 1;
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return 0;
}

export function rankSignals(results: readonly CompositeResult[]): CompositeResult[] {
  return [...results].sort(compareResults);
}

export function filterSignals(
  results: readonly CompositeResult[],
  policy: FilterPolicy = DEFAULT_FILTER_POLICY,
): CompositeResult[] {
  return rankSignals(results.filter((r) => passesPolicy(r, policy)));
}

/**
 * Top `n` ranked results for one direction.
 *
 * @param results   - Scored candidates (any order)
 * @param direction - Direction to keep
 * @param n         - Maximum number of rows
 */
export function topSignals(results: readonly CompositeResult[], direction: Direction, n: number): CompositeResult[] {
  return rankSignals(results.filter((r) => r.direction === direction)).slice(0, Math.max(0, n));
}

export interface DirectionStats {
  count: number;
  averageScore: number | null;
}

export interface ScoreDistribution {
  total: number;
  byDirection: Record<Direction, DirectionStats>;
  atLeast70: number;
  atLeast60: number;
  atLeast50: number;
}

export function summarizeDistribution(results: readonly CompositeResult[]): ScoreDistribution {
  const stats = (direction: Direction): DirectionStats => {
    const scores = results.filter((r) => r.direction === direction).map((r) => r.totalScore);
    return {
      count: scores.length,
      averageScore: scores.length > 0 ? scores.reduce((s, v) => s + v, 0) / scores.length : null,
    };
  };

  return {
    total: results.length,
    byDirection: {
      BUY: stats('BUY'),
      SELL: stats('SELL'),
      PULLBACK: stats('PULLBACK'),
      BOUNCE: stats('BOUNCE'),
    },
    atLeast70: results.filter((r) => r.totalScore >= 70).length,
    atLeast60: results.filter((r) => r.totalScore >= 60).length,
    atLeast50: results.filter((r) => r.totalScore >= 50).length,
  };
}
