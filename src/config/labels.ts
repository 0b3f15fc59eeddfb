// ============================================================
// Lookup Tables: Trend Alignment Matrix & Action Labels
// ============================================================

import type { Direction, QualityLabel, TrendClass } from '../types/index.js';

/** Score for a (direction, trend) pair that has no matrix entry */
export const TREND_ALIGNMENT_DEFAULT = 10;

/**
 * Trend alignment points (4-20) keyed by direction, then trend class.
 * BUY/SELL reward trading with the trend. PULLBACK and BOUNCE are
 * counter-moves inside a trend and peak at a moderate score.
 */
export const TREND_ALIGNMENT_MATRIX: Readonly<Record<Direction, Readonly<Partial<Record<TrendClass, number>>>>> = {
  BUY: { STRONG_UP: 20, UPTREND: 17, SIDEWAYS: 12, DOWNTREND: 7, STRONG_DOWN: 4 },
  SELL: { STRONG_DOWN: 20, DOWNTREND: 17, SIDEWAYS: 12, UPTREND: 7, STRONG_UP: 4 },
  BOUNCE: { STRONG_UP: 6, UPTREND: 8, SIDEWAYS: 10, DOWNTREND: 12, STRONG_DOWN: 10 },
  PULLBACK: { STRONG_DOWN: 6, DOWNTREND: 8, SIDEWAYS: 10, UPTREND: 12, STRONG_UP: 10 },
};

/** 16 entries: every tradeable quality tier crossed with every direction. */
export const ACTION_LABELS: Readonly<Partial<Record<QualityLabel, Readonly<Record<Direction, string>>>>> = {
  EXCELLENT: {
    BUY: 'STRONG BUY',
    SELL: 'STRONG SELL',
    PULLBACK: 'TAKE PROFIT',
    BOUNCE: 'BUY THE BOUNCE',
  },
  GOOD: {
    BUY: 'BUY',
    SELL: 'SELL',
    PULLBACK: 'TRIM POSITION',
    BOUNCE: 'SPECULATIVE BUY',
  },
  MODERATE: {
    BUY: 'WATCH BUY',
    SELL: 'WATCH SELL',
    PULLBACK: 'WATCH PULLBACK',
    BOUNCE: 'WATCH BOUNCE',
  },
  WEAK: {
    BUY: 'WAIT FOR CONFIRMATION',
    SELL: 'WAIT FOR BREAKDOWN',
    PULLBACK: 'HOLD',
    BOUNCE: 'STAND ASIDE',
  },
};

/** Used when a (quality, direction) pair is not in ACTION_LABELS. */
export const DIRECTION_FALLBACK_LABELS: Readonly<Record<Direction, string>> = {
  BUY: 'NO BUY',
  SELL: 'NO SELL',
  PULLBACK: 'NO ACTION',
  BOUNCE: 'NO ACTION',
};
