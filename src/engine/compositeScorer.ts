// ============================================================
// Composite Scorer
// ============================================================
// Runs the six factor scorers for one candidate and merges them:
//
//   pattern 15 + vsa 25 + trend 20 + S/R 15 + RS 15 + liquidity 10
//
// The direction is classified once up front and handed to every
// direction-dependent scorer. Each factor clamps itself; the total is
// clamped again to 0-100 before the quality tier is read off it.
// ============================================================

import { QUALITY_LABELS, DIRECTIONS } from '../types/index.js';
import type {
  CompositeResult,
  Direction,
  FactorScores,
  QualityLabel,
  SignalCandidate,
  SignalGrade,
  TrendClass,
} from '../types/index.js';
import { SCORING_CONFIG, TOTAL_MAX } from '../config/scoring.js';
import { ACTION_LABELS, DIRECTION_FALLBACK_LABELS } from '../config/labels.js';
import { classifyDirection } from './directionClassifier.js';
import { scorePattern } from '../analyzer/patternScorer.js';
import { deriveVsaInputs, scoreVsa } from '../analyzer/vsaScorer.js';
import { scoreTrendAlignment } from '../analyzer/trendAlignmentScorer.js';
import { scoreSupportResistance } from '../analyzer/supportResistance.js';
import { scoreRelativeStrength } from '../analyzer/relativeStrengthScorer.js';
import { scoreLiquidity } from '../analyzer/liquidityScorer.js';
import { isDowntrend, isUptrend } from '../analyzer/trendClassifier.js';
import { assertOneOf } from '../errors.js';
import { clamp } from '../utils/steps.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('CompositeScorer');

// --------------- Labels ---------------

/** Monotone step function of the total score (80 / 65 / 50 / 35). */
export function qualityLabel(totalScore: number): QualityLabel {
  for (const tier of SCORING_CONFIG.composite.quality) {
    if (totalScore >= tier.min) return tier.label;
  }
  return 'AVOID';
}

/** Letter grade used by the report tables (80 / 70 / 60 / 50). */
export function signalGrade(totalScore: number): SignalGrade {
  for (const tier of SCORING_CONFIG.composite.grade) {
    if (totalScore >= tier.min) return tier.grade;
  }
  return 'F';
}

/**
 * @throws InvalidEnumError when either argument is outside its enum
 */
export function actionLabel(quality: QualityLabel, direction: Direction): string {
  assertOneOf('quality_label', quality, QUALITY_LABELS);
  assertOneOf('direction', direction, DIRECTIONS);
  return ACTION_LABELS[quality]?.[direction] ?? DIRECTION_FALLBACK_LABELS[direction];
}

/** True when the direction trades with the prevailing trend's side. */
export function isTrendAligned(trend: TrendClass, direction: Direction): boolean {
  return (
    (isUptrend(trend) && (direction === 'BUY' || direction === 'PULLBACK')) ||
    (isDowntrend(trend) && (direction === 'SELL' || direction === 'BOUNCE'))
  );
}

// --------------- Aggregation ---------------

export function sumFactors(factors: FactorScores): number {
  return (
    factors.pattern.value +
    factors.vsa.value +
    factors.trend.value +
    factors.supportResistance.value +
    factors.relativeStrength.value +
    factors.liquidity.value
  );
}

/**
 * Merge six factor scores into the final result.
 *
 * @param candidate - Source candidate (symbol, date, trend)
 * @param direction - Direction the factors were scored with
 * @param factors   - The six factor scores
 */
export function aggregate(
  candidate: Pick<SignalCandidate, 'symbol' | 'date' | 'trendClass'>,
  direction: Direction,
  factors: FactorScores,
): CompositeResult {
  const totalScore = clamp(Math.round(sumFactors(factors)), 0, TOTAL_MAX);
  const quality = qualityLabel(totalScore);

  return {
    symbol: candidate.symbol,
    date: candidate.date,
    totalScore,
    qualityLabel: quality,
    grade: signalGrade(totalScore),
    factorScores: factors,
    direction,
    trendClass: candidate.trendClass,
    actionLabel: actionLabel(quality, direction),
    isAligned: isTrendAligned(candidate.trendClass, direction),
  };
}

/**
 * Score one candidate. Pure: identical input always yields an identical
 * result. Inputs must already have NaN/missing values replaced.
 *
 * @throws InvalidEnumError on an invalid trend class or pattern bias
 */
export function scoreCandidate(candidate: SignalCandidate): CompositeResult {
  const direction = classifyDirection(candidate.patternBias, candidate.trendClass);
  const trend = candidate.trendClass;

  const factors: FactorScores = {
    pattern: scorePattern(candidate.patternName, trend),
    vsa: scoreVsa(deriveVsaInputs(candidate.bar, candidate.avgVolume20d, candidate.atr14), direction, trend),
    trend: scoreTrendAlignment(direction, trend),
    supportResistance: scoreSupportResistance(candidate.history, candidate.bar.close, direction),
    relativeStrength: scoreRelativeStrength(
      { rsRating: candidate.rsRating, rsRating5dAgo: candidate.rsRating5dAgo, sectorRs: candidate.sectorRs },
      direction,
    ),
    liquidity: scoreLiquidity({
      tradingValue: candidate.tradingValue,
      volume: candidate.volume,
      avgVolume5d: candidate.avgVolume5d,
      avgVolume20d: candidate.avgVolume20d,
    }),
  };

  const result = aggregate(candidate, direction, factors);

  log.debug(
    `${candidate.symbol} ${candidate.date} [${direction}/${trend}]: ` +
      `pat=${factors.pattern.value} vsa=${factors.vsa.value} trd=${factors.trend.value} ` +
      `sr=${factors.supportResistance.value} rs=${factors.relativeStrength.value} liq=${factors.liquidity.value} ` +
      `-> ${result.totalScore} ${result.qualityLabel} (${result.actionLabel})`,
  );

  return result;
}

/** Score independent candidates; order of the output matches the input. */
export function scoreBatch(candidates: readonly SignalCandidate[]): CompositeResult[] {
  return candidates.map(scoreCandidate);
}
