// ============================================================
// VSA Scorer (0-25) - Volume Spread Analysis
// ============================================================
// Reads supply/demand from one bar's volume, range and close:
//
//   volumeScore (0-10)  : vol_ratio = volume / avg_volume_20d
//   spreadScore (0-8)   : spread_ratio = (high - low) / ATR14, with close
//                         position or volume deciding inside each band
//   closeScore  (-2..7) : close position vs the direction's side
//   bonus       (-5..3) : detected VSA signal agrees / disagrees
//
// A disagreeing signal also scales the whole raw total down
// (x0.8, or x0.6 for a full -5 conflict) instead of a flat deduction.
// ============================================================

import type {
  Bar,
  ClosePositionClass,
  Direction,
  SpreadClass,
  TrendClass,
  VolumeClass,
  VsaBias,
  VsaScore,
  VsaSignalName,
} from '../types/index.js';
import { FACTOR_MAX, SCORING_CONFIG } from '../config/scoring.js';
import { impliedBias } from '../engine/directionClassifier.js';
import { isDowntrend, isUptrend } from './trendClassifier.js';
import { clamp, floorScore, safeRatio, stepAtLeast, stepAtMost } from '../utils/steps.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('VsaScorer');
const CFG = SCORING_CONFIG.vsa;

export interface VsaInputs {
  volRatio: number;
  spreadRatio: number;
  closePosition: number;
}

// --------------- Inputs ---------------

/**
 * Derive the three VSA ratios from a bar.
 * A zero-range bar has close position 0.5; a non-positive average
 * volume or ATR gives a neutral ratio of 1.0.
 */
export function deriveVsaInputs(bar: Bar, avgVolume20d: number, atr14: number): VsaInputs {
  const spread = bar.high - bar.low;
  return {
    volRatio: safeRatio(bar.volume, avgVolume20d),
    spreadRatio: safeRatio(spread, atr14),
    closePosition: spread > 0 ? (bar.close - bar.low) / spread : 0.5,
  };
}

// --------------- Classification ---------------

export function classifyVolume(volRatio: number): VolumeClass {
  const t = CFG.volumeClass;
  if (volRatio >= t.veryHigh) return 'VERY_HIGH';
  if (volRatio >= t.high) return 'HIGH';
  if (volRatio >= t.normal) return 'NORMAL';
  if (volRatio >= t.low) return 'LOW';
  return 'VERY_LOW';
}

export function classifySpread(spreadRatio: number): SpreadClass {
  const t = CFG.spreadClass;
  if (spreadRatio >= t.wide) return 'WIDE';
  if (spreadRatio >= t.normal) return 'NORMAL';
  if (spreadRatio >= t.narrow) return 'NARROW';
  return 'VERY_NARROW';
}

export function classifyClose(closePosition: number): ClosePositionClass {
  const t = CFG.closeClass;
  if (closePosition >= t.high) return 'HIGH';
  if (closePosition >= t.middle) return 'MIDDLE';
  return 'LOW';
}

// --------------- Sub-scores ---------------

export function volumeScore(volRatio: number): number {
  return stepAtLeast(volRatio, CFG.volumeScore, 0);
}

/**
 * Spread quality (0-8). Bands use the scoring thresholds (>=1.3 wide,
 * <=0.7 narrow), which differ slightly from the signal classes.
 */
export function spreadScore(spreadRatio: number, closePosition: number, volRatio: number): number {
  const s = CFG.spreadScore;
  const closesHigh = closePosition >= CFG.closeHigh;
  const closesLow = closePosition <= CFG.closeLow;

  if (spreadRatio >= CFG.wideSpread) {
    if (closesHigh) return s.wideCloseHigh; // conviction
    if (closesLow) return s.wideCloseLow;
    return s.wideCloseMiddle;
  }
  if (spreadRatio <= CFG.narrowSpread) {
    return volRatio >= CFG.absorptionVolume ? s.narrowAbsorption : s.narrow;
  }
  if (closesHigh) return s.normalCloseHigh;
  if (closesLow) return s.normalCloseLow;
  return s.normalCloseMiddle;
}

export function closeAlignmentScore(closePosition: number, direction: Direction): number {
  return impliedBias(direction) === 'BULLISH'
    ? stepAtLeast(closePosition, CFG.closeAlignmentBullish, CFG.closeAlignmentFloor)
    : stepAtMost(closePosition, CFG.closeAlignmentBearish, CFG.closeAlignmentFloor);
}

// --------------- Signal Detection ---------------

export interface VsaSignalContext {
  volume: VolumeClass;
  spread: SpreadClass;
  close: ClosePositionClass;
  trend: TrendClass;
}

export interface VsaSignalRule {
  readonly name: VsaSignalName;
  readonly bias: VsaBias;
  readonly matches: (ctx: VsaSignalContext) => boolean;
}

const highVolume = (ctx: VsaSignalContext): boolean => ctx.volume === 'HIGH' || ctx.volume === 'VERY_HIGH';
const lowVolume = (ctx: VsaSignalContext): boolean => ctx.volume === 'LOW' || ctx.volume === 'VERY_LOW';
const narrowSpread = (ctx: VsaSignalContext): boolean => ctx.spread === 'NARROW' || ctx.spread === 'VERY_NARROW';

/**
 * Ordered signal table, first match wins. `upthrust` is shadowed by
 * `supply_coming_in` (same bias) and only documents the textbook pattern.
 */
export const VSA_SIGNAL_RULES: readonly VsaSignalRule[] = [
  {
    name: 'stopping_volume',
    bias: 'BULLISH',
    matches: (ctx) => highVolume(ctx) && narrowSpread(ctx) && ctx.close === 'LOW',
  },
  {
    name: 'demand_coming_in',
    bias: 'BULLISH',
    matches: (ctx) => highVolume(ctx) && ctx.spread === 'WIDE' && ctx.close === 'HIGH',
  },
  {
    name: 'supply_coming_in',
    bias: 'BEARISH',
    matches: (ctx) => highVolume(ctx) && ctx.spread === 'WIDE' && ctx.close === 'LOW',
  },
  {
    name: 'no_supply',
    bias: 'BULLISH',
    matches: (ctx) => lowVolume(ctx) && narrowSpread(ctx) && isDowntrend(ctx.trend),
  },
  {
    name: 'no_demand',
    bias: 'BEARISH',
    matches: (ctx) => lowVolume(ctx) && narrowSpread(ctx) && isUptrend(ctx.trend),
  },
  {
    name: 'upthrust',
    bias: 'BEARISH',
    matches: (ctx) => highVolume(ctx) && ctx.spread === 'WIDE' && ctx.close === 'LOW' && isUptrend(ctx.trend),
  },
  {
    name: 'effort_no_result',
    bias: 'NEUTRAL',
    matches: (ctx) => highVolume(ctx) && narrowSpread(ctx),
  },
];

export function detectVsaSignal(ctx: VsaSignalContext): VsaSignalRule | null {
  return VSA_SIGNAL_RULES.find((rule) => rule.matches(ctx)) ?? null;
}

/** +3 when the signal agrees with the direction, -5 when it opposes, else 0. */
export function alignmentBonus(signalBias: VsaBias | null, direction: Direction): number {
  if (signalBias === null || signalBias === 'NEUTRAL') return 0;
  return signalBias === impliedBias(direction) ? CFG.alignedBonus : CFG.opposedPenalty;
}

export function conflictMultiplier(bonus: number): number {
  if (bonus <= CFG.strongConflictBonus) return CFG.strongConflictMultiplier;
  if (bonus < 0) return CFG.mildConflictMultiplier;
  return 1.0;
}

// --------------- Main Scorer ---------------

/**
 * Score the VSA factor from precomputed ratios.
 *
 * @param inputs    - vol_ratio, spread_ratio and close_position of the bar
 * @param direction - Trade direction from the direction classifier
 * @param trend     - Trend class (for the no_supply / no_demand signals)
 */
export function scoreVsa(inputs: VsaInputs, direction: Direction, trend: TrendClass): VsaScore {
  const { volRatio, spreadRatio, closePosition } = inputs;

  const ctx: VsaSignalContext = {
    volume: classifyVolume(volRatio),
    spread: classifySpread(spreadRatio),
    close: classifyClose(closePosition),
    trend,
  };

  const vol = volumeScore(volRatio);
  const spread = spreadScore(spreadRatio, closePosition, volRatio);
  const close = closeAlignmentScore(closePosition, direction);

  const signal = detectVsaSignal(ctx);
  const bonus = alignmentBonus(signal?.bias ?? null, direction);

  const rawTotal = vol + spread + close + bonus;
  const multiplier = conflictMultiplier(bonus);
  const value = clamp(floorScore(rawTotal * multiplier), 0, FACTOR_MAX.vsa);

  log.debug(
    `scoreVsa [${direction}/${trend}]: vol=${vol} spread=${spread} close=${close} ` +
      `signal=${signal?.name ?? '-'} bonus=${bonus} raw=${rawTotal} x${multiplier} -> ${value}/25`,
  );

  return {
    name: 'vsa',
    value,
    maxPossible: FACTOR_MAX.vsa,
    breakdown: {
      volRatio,
      spreadRatio,
      closePosition,
      volumeClass: ctx.volume,
      spreadClass: ctx.spread,
      closeClass: ctx.close,
      volumeScore: vol,
      spreadScore: spread,
      closeScore: close,
      signal: signal?.name ?? null,
      signalBias: signal?.bias ?? null,
      alignmentBonus: bonus,
      rawTotal,
      conflictMultiplier: multiplier,
    },
  };
}
