// ============================================================
// Support / Resistance Scorer (0-15)
// ============================================================
// Levels are computed on the fly from recent bars:
//   - Swing high / low over the last 20 bars (always candidates)
//   - Fibonacci retracements (23.6 / 38.2 / 50 / 61.8 / 78.6 %) of the
//     30-bar range, only when that range is at least 5x the average
//     bar range of the last 14 bars. A tight range makes Fib noise.
//
// proximity (2-12): distance to the nearest level on the trade's side
// rrBonus   (-3..3): reward / risk between the two nearest levels
// ============================================================

import type {
  Bar,
  Direction,
  SupportResistanceLevel,
  SupportResistanceLevels,
  SupportResistanceScore,
} from '../types/index.js';
import { FACTOR_MAX, SCORING_CONFIG } from '../config/scoring.js';
import { isBullishDirection } from '../engine/directionClassifier.js';
import { clamp, stepAtLeast, stepBelow } from '../utils/steps.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('SupportResistance');
const CFG = SCORING_CONFIG.supportResistance;

// --------------- Level Calculation ---------------

/** Mean of (high - low) over the bars; a simplified ATR. */
export function averageRange(bars: readonly Bar[]): number {
  if (bars.length === 0) return 0;
  return bars.reduce((sum, b) => sum + (b.high - b.low), 0) / bars.length;
}

function highest(bars: readonly Bar[]): number {
  return Math.max(...bars.map((b) => b.high));
}

function lowest(bars: readonly Bar[]): number {
  return Math.min(...bars.map((b) => b.low));
}

function formatRatio(ratio: number): string {
  return `Fib ${Number((ratio * 100).toFixed(1))}%`;
}

/**
 * Compute support and resistance candidates around `currentPrice`.
 *
 * @param history      - Bars in ascending date order (the last bar is the current one)
 * @param currentPrice - Reference price, normally the current close
 */
export function calculateLevels(history: readonly Bar[], currentPrice: number): SupportResistanceLevels {
  const empty: SupportResistanceLevels = {
    currentPrice,
    supports: [],
    resistances: [],
    swingHigh: null,
    swingLow: null,
    fibHigh: null,
    fibLow: null,
    fibValid: false,
  };

  if (history.length === 0 || !(currentPrice > 0)) {
    log.debug('calculateLevels: no history or non-positive price');
    return empty;
  }

  const swingBars = history.slice(-CFG.swingLookback);
  const fibBars = history.slice(-CFG.fibLookback);
  const atrBars = history.slice(-CFG.atrLookback);

  const swingHigh = highest(swingBars);
  const swingLow = lowest(swingBars);
  const fibHigh = highest(fibBars);
  const fibLow = lowest(fibBars);
  const fibRange = fibHigh - fibLow;
  const fibValid = fibRange > 0 && fibRange >= averageRange(atrBars) * CFG.fibMinAtrMultiple;

  const supportCeiling = currentPrice * (1 - CFG.levelBuffer);
  const resistanceFloor = currentPrice * (1 + CFG.levelBuffer);
  const supports: SupportResistanceLevel[] = [];
  const resistances: SupportResistanceLevel[] = [];

  const place = (price: number, label: string, type: SupportResistanceLevel['type']): void => {
    const level = { price, label, type, pctDistance: (price / currentPrice - 1) * 100 };
    if (price < supportCeiling) supports.push(level);
    else if (price > resistanceFloor) resistances.push(level);
  };

  // Swing levels only count on their natural side
  if (swingLow < supportCeiling) place(swingLow, 'Swing Low', 'swing');
  if (swingHigh > resistanceFloor) place(swingHigh, 'Swing High', 'swing');

  if (fibValid) {
    for (const ratio of CFG.fibRatios) {
      place(fibLow + fibRange * ratio, formatRatio(ratio), 'fib');
    }
  }

  supports.sort((a, b) => b.price - a.price);
  resistances.sort((a, b) => a.price - b.price);

  return {
    currentPrice,
    supports: supports.slice(0, CFG.maxLevelsPerSide),
    resistances: resistances.slice(0, CFG.maxLevelsPerSide),
    swingHigh,
    swingLow,
    fibHigh,
    fibLow,
    fibValid,
  };
}

// --------------- Sub-scores ---------------

/**
 * Proximity of the nearest level on the trade's side: supports for
 * bullish directions, resistances for bearish ones.
 */
export function proximityScore(levels: SupportResistanceLevels, direction: Direction): number {
  const nearest = isBullishDirection(direction) ? levels.supports[0] : levels.resistances[0];
  if (!nearest) return CFG.proximityNoLevel;
  return stepBelow(Math.abs(nearest.pctDistance), CFG.proximity, CFG.proximityFar);
}

/** Reward / risk between the nearest support and resistance, or null when undefined. */
export function riskRewardRatio(levels: SupportResistanceLevels, direction: Direction): number | null {
  const support = levels.supports[0];
  const resistance = levels.resistances[0];
  if (!support || !resistance) return null;

  const price = levels.currentPrice;
  const bullish = isBullishDirection(direction);
  const risk = bullish ? price - support.price : resistance.price - price;
  const reward = bullish ? resistance.price - price : price - support.price;

  return risk > 0 ? reward / risk : null;
}

export function riskRewardBonus(ratio: number | null): number {
  if (ratio === null) return 0;
  return stepAtLeast(ratio, CFG.rrBonus, CFG.rrPoor);
}

// --------------- Main Scorer ---------------

/**
 * @param history      - Recent bars, ascending, ending with the current bar
 * @param currentPrice - Current close
 * @param direction    - Trade direction
 */
export function scoreSupportResistance(
  history: readonly Bar[],
  currentPrice: number,
  direction: Direction,
): SupportResistanceScore {
  const levels = calculateLevels(history, currentPrice);
  const proximity = proximityScore(levels, direction);
  const rrRatio = riskRewardRatio(levels, direction);
  const rrBonus = riskRewardBonus(rrRatio);
  const value = clamp(proximity + rrBonus, 0, FACTOR_MAX.supportResistance);

  log.debug(
    `scoreSupportResistance [${direction}]: supports=${levels.supports.length} resistances=${levels.resistances.length} ` +
      `fib=${levels.fibValid} proximity=${proximity} rr=${rrRatio?.toFixed(2) ?? '-'} bonus=${rrBonus} -> ${value}/15`,
  );

  return {
    name: 'supportResistance',
    value,
    maxPossible: FACTOR_MAX.supportResistance,
    breakdown: { proximityScore: proximity, rrBonus, rrRatio, levels },
  };
}
