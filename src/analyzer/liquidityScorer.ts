// ============================================================
// Liquidity Scorer (0-10)
// ============================================================

import type { LiquidityScore } from '../types/index.js';
import { FACTOR_MAX, SCORING_CONFIG } from '../config/scoring.js';
import { clamp, safeRatio, stepAtLeast } from '../utils/steps.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('LiquidityScorer');
const CFG = SCORING_CONFIG.liquidity;

export interface LiquidityInputs {
  tradingValue: number;
  volume: number;
  avgVolume5d: number;
  avgVolume20d: number;
}

/** Trading value points (0-8); the ladder is in billions. */
export function tradingValueScore(tradingValue: number): number {
  return stepAtLeast(tradingValue / CFG.unit, CFG.tradingValue, 0);
}

/**
 * Volume trend bonus (-2..2). The +2 surge needs both the 5-day and the
 * 20-day ratio elevated; the rest of the ladder reads the 5-day ratio only.
 */
export function volumeTrendBonus(volVs5d: number, volVs20d: number): number {
  if (volVs5d >= CFG.surge.vs5d && volVs20d >= CFG.surge.vs20d) return CFG.surge.bonus;
  return stepAtLeast(volVs5d, CFG.volumeTrend, CFG.volumeTrendFloor);
}

export function scoreLiquidity(inputs: LiquidityInputs): LiquidityScore {
  const volVs5d = safeRatio(inputs.volume, inputs.avgVolume5d);
  const volVs20d = safeRatio(inputs.volume, inputs.avgVolume20d);
  const tvScore = tradingValueScore(inputs.tradingValue);
  const bonus = volumeTrendBonus(volVs5d, volVs20d);
  const value = clamp(tvScore + bonus, 0, FACTOR_MAX.liquidity);

  log.debug(
    `scoreLiquidity: tv=${(inputs.tradingValue / CFG.unit).toFixed(2)}bn -> ${tvScore} ` +
      `vol5d=${volVs5d.toFixed(2)} vol20d=${volVs20d.toFixed(2)} bonus=${bonus} -> ${value}/10`,
  );

  return {
    name: 'liquidity',
    value,
    maxPossible: FACTOR_MAX.liquidity,
    breakdown: {
      tradingValueBn: inputs.tradingValue / CFG.unit,
      tradingValueScore: tvScore,
      volVs5d,
      volVs20d,
      volumeTrendBonus: bonus,
    },
  };
}
