// ============================================================
// Relative Strength Scorer (0-15)
// ============================================================
//   base      (1-10) : RS rating ladder, monotone in the rating
//   momentum  (-1..2): 5-session RS change, net of the sector's own
//                      change when sector RS is available
//   alignment (-2..2): high RS favours bullish directions, low RS
//                      bearish ones (buying RS 15 is catching a knife)
// ============================================================

import type { Direction, MomentumSource, RelativeStrengthScore, SectorRsPair } from '../types/index.js';
import { FACTOR_MAX, SCORING_CONFIG } from '../config/scoring.js';
import { isBullishDirection } from '../engine/directionClassifier.js';
import { clamp, stepAtLeast, stepAtMost } from '../utils/steps.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('RelativeStrength');
const CFG = SCORING_CONFIG.relativeStrength;

export interface RsInputs {
  rsRating: number;
  rsRating5dAgo: number | null;
  sectorRs?: SectorRsPair | undefined;
}

export function rsBaseScore(rsRating: number): number {
  return stepAtLeast(rsRating, CFG.base, CFG.baseFloor);
}

/**
 * RS change over five sessions. Returns null when there is no usable
 * prior rating (missing or zero), in which case momentum scores 0.
 */
export function rsChange(inputs: RsInputs): { change: number | null; source: MomentumSource } {
  const { rsRating, rsRating5dAgo, sectorRs } = inputs;
  if (rsRating5dAgo === null || rsRating5dAgo === 0 || !Number.isFinite(rsRating5dAgo)) {
    return { change: null, source: 'NONE' };
  }

  const absolute = rsRating - rsRating5dAgo;
  if (sectorRs && Number.isFinite(sectorRs.today) && Number.isFinite(sectorRs.fiveDaysAgo)) {
    return { change: absolute - (sectorRs.today - sectorRs.fiveDaysAgo), source: 'SECTOR_RELATIVE' };
  }
  return { change: absolute, source: 'ABSOLUTE' };
}

/**
 * Momentum points from an RS change. Tops out at +2 even though older
 * documentation quoted a -1..+3 range.
 */
export function rsMomentumScore(change: number | null): number {
  if (change === null) return 0;
  return stepAtLeast(change, CFG.momentum, CFG.momentumFloor);
}

export function rsAlignmentScore(rsRating: number, direction: Direction): number {
  return isBullishDirection(direction)
    ? stepAtLeast(rsRating, CFG.alignmentBullish, CFG.alignmentFloor)
    : stepAtMost(rsRating, CFG.alignmentBearish, CFG.alignmentFloor);
}

export function scoreRelativeStrength(inputs: RsInputs, direction: Direction): RelativeStrengthScore {
  const base = rsBaseScore(inputs.rsRating);
  const { change, source } = rsChange(inputs);
  const momentum = rsMomentumScore(change);
  const alignment = rsAlignmentScore(inputs.rsRating, direction);
  const value = clamp(base + momentum + alignment, 0, FACTOR_MAX.relativeStrength);

  log.debug(
    `scoreRelativeStrength [${direction}] rs=${inputs.rsRating}: base=${base} momentum=${momentum} (${source}) ` +
      `alignment=${alignment} -> ${value}/15`,
  );

  return {
    name: 'relativeStrength',
    value,
    maxPossible: FACTOR_MAX.relativeStrength,
    breakdown: { rsRating: inputs.rsRating, base, momentum, alignment, rsChange: change, momentumSource: source },
  };
}
