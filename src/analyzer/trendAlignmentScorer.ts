// ============================================================
// Trend Alignment Scorer (4-20)
// ============================================================

import type { Direction, TrendClass, TrendScore } from '../types/index.js';
import { FACTOR_MAX } from '../config/scoring.js';
import { TREND_ALIGNMENT_MATRIX, TREND_ALIGNMENT_DEFAULT } from '../config/labels.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('TrendAlignment');

/**
 * Look up (direction, trend) in the alignment matrix.
 * A pair with no entry scores TREND_ALIGNMENT_DEFAULT rather than failing.
 */
export function scoreTrendAlignment(direction: Direction, trend: TrendClass): TrendScore {
  const mapped = TREND_ALIGNMENT_MATRIX[direction]?.[trend];
  const value = mapped ?? TREND_ALIGNMENT_DEFAULT;

  if (mapped === undefined) {
    log.warn(`No trend alignment entry for ${direction}/${trend}, using ${TREND_ALIGNMENT_DEFAULT}`);
  }

  return {
    name: 'trend',
    value,
    maxPossible: FACTOR_MAX.trend,
    breakdown: { direction, trendClass: trend, matched: mapped !== undefined },
  };
}
