// ============================================================
// Trend Classifier
// ============================================================
// Trend class from where price sits relative to its SMA20 and SMA50.
// Both moving averages must agree; any disagreement is SIDEWAYS.
// ============================================================

import type { TrendClass } from '../types/index.js';
import { SCORING_CONFIG } from '../config/scoring.js';

export type { TrendClass };

/**
 * @param priceVsSma20 - (close / SMA20 - 1) in percent
 * @param priceVsSma50 - (close / SMA50 - 1) in percent
 */
export function classifyTrend(priceVsSma20: number, priceVsSma50: number): TrendClass {
  const { strongThresholdPct: strong, trendThresholdPct: trend } = SCORING_CONFIG.trend;
  const vs20 = Number.isFinite(priceVsSma20) ? priceVsSma20 : 0;
  const vs50 = Number.isFinite(priceVsSma50) ? priceVsSma50 : 0;

  if (vs20 > strong && vs50 > strong) return 'STRONG_UP';
  if (vs20 > trend && vs50 > trend) return 'UPTREND';
  if (vs20 < -strong && vs50 < -strong) return 'STRONG_DOWN';
  if (vs20 < -trend && vs50 < -trend) return 'DOWNTREND';
  return 'SIDEWAYS';
}

export function isUptrend(trend: TrendClass): boolean {
  return trend === 'STRONG_UP' || trend === 'UPTREND';
}

export function isDowntrend(trend: TrendClass): boolean {
  return trend === 'STRONG_DOWN' || trend === 'DOWNTREND';
}
