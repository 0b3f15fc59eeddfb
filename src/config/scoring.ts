// ============================================================
// Scoring Thresholds Configuration
// ============================================================
// Maximum points per factor:
//   pattern 15 | vsa 25 | trend 20 | S/R 15 | RS 15 | liquidity 10
// ============================================================

export const FACTOR_MAX = {
  pattern: 15,
  vsa: 25,
  trend: 20,
  supportResistance: 15,
  relativeStrength: 15,
  liquidity: 10,
} as const;

export const TOTAL_MAX = 100;

export const SCORING_CONFIG = {
  trend: {
    /** price vs SMA20 and SMA50 both above this (%) = STRONG_UP */
    strongThresholdPct: 5,
    /** both above this (%) = UPTREND */
    trendThresholdPct: 2,
  },
  pattern: {
    /** Score for a pattern name that is not in the table */
    unknownScore: 5,
    contextBonus: 1.2,
    sidewaysPenalty: 0.9,
  },
  vsa: {
    volumeScore: [
      { min: 3.0, score: 10 },
      { min: 2.5, score: 9 },
      { min: 2.0, score: 8 },
      { min: 1.5, score: 6 },
      { min: 1.2, score: 4 },
      { min: 1.0, score: 3 },
      { min: 0.7, score: 1 },
    ],
    /** spread_ratio >= wideSpread is a WIDE bar for scoring */
    wideSpread: 1.3,
    /** spread_ratio <= narrowSpread is a NARROW bar for scoring */
    narrowSpread: 0.7,
    /** close_position >= closeHigh counts as closing high */
    closeHigh: 0.7,
    /** close_position <= closeLow counts as closing low */
    closeLow: 0.3,
    /** vol_ratio needed on a narrow bar to read as absorption */
    absorptionVolume: 1.5,
    spreadScore: {
      wideCloseHigh: 8,
      wideCloseLow: 6,
      wideCloseMiddle: 5,
      narrowAbsorption: 6,
      narrow: 2,
      normalCloseHigh: 5,
      normalCloseLow: 4,
      normalCloseMiddle: 3,
    },
    closeAlignmentBullish: [
      { min: 0.7, score: 7 },
      { min: 0.5, score: 4 },
      { min: 0.3, score: 1 },
    ],
    closeAlignmentBearish: [
      { max: 0.3, score: 7 },
      { max: 0.5, score: 4 },
      { max: 0.7, score: 1 },
    ],
    closeAlignmentFloor: -2,
    volumeClass: { veryHigh: 2.5, high: 1.5, normal: 0.7, low: 0.5 },
    spreadClass: { wide: 1.3, normal: 0.7, narrow: 0.5 },
    closeClass: { high: 0.7, middle: 0.3 },
    alignedBonus: 3,
    opposedPenalty: -5,
    /** bonus <= this applies the strong conflict multiplier */
    strongConflictBonus: -4,
    strongConflictMultiplier: 0.6,
    mildConflictMultiplier: 0.8,
  },
  supportResistance: {
    swingLookback: 20,
    fibLookback: 30,
    atrLookback: 14,
    /** Fib range must be at least this many average bar ranges */
    fibMinAtrMultiple: 5,
    /** Levels inside +-0.5% of price are ignored */
    levelBuffer: 0.005,
    fibRatios: [0.236, 0.382, 0.5, 0.618, 0.786],
    maxLevelsPerSide: 3,
    proximity: [
      { below: 2, score: 12 },
      { below: 4, score: 10 },
      { below: 6, score: 7 },
      { below: 10, score: 4 },
    ],
    proximityFar: 2,
    proximityNoLevel: 3,
    rrBonus: [
      { min: 3.0, score: 3 },
      { min: 2.0, score: 2 },
      { min: 1.5, score: 1 },
      { min: 1.0, score: 0 },
    ],
    rrPoor: -3,
  },
  relativeStrength: {
    base: [
      { min: 90, score: 10 },
      { min: 80, score: 9 },
      { min: 70, score: 8 },
      { min: 60, score: 7 },
      { min: 50, score: 5 },
      { min: 40, score: 4 },
      { min: 30, score: 3 },
      { min: 20, score: 2 },
    ],
    baseFloor: 1,
    momentum: [
      { min: 8, score: 2 },
      { min: 4, score: 1 },
      { min: 0, score: 0 },
    ],
    momentumFloor: -1,
    alignmentBullish: [
      { min: 70, score: 2 },
      { min: 50, score: 1 },
      { min: 30, score: 0 },
    ],
    alignmentBearish: [
      { max: 30, score: 2 },
      { max: 50, score: 1 },
      { max: 70, score: 0 },
    ],
    alignmentFloor: -2,
  },
  liquidity: {
    /** Trading value is scored in billions of the quote currency */
    unit: 1e9,
    tradingValue: [
      { min: 50, score: 8 },
      { min: 30, score: 7 },
      { min: 15, score: 6 },
      { min: 8, score: 5 },
      { min: 4, score: 4 },
      { min: 2, score: 2 },
      { min: 1, score: 1 },
    ],
    surge: { vs5d: 1.5, vs20d: 1.3, bonus: 2 },
    volumeTrend: [
      { min: 1.2, score: 1 },
      { min: 0.8, score: 0 },
      { min: 0.5, score: -1 },
    ],
    volumeTrendFloor: -2,
  },
  composite: {
    quality: [
      { min: 80, label: 'EXCELLENT' },
      { min: 65, label: 'GOOD' },
      { min: 50, label: 'MODERATE' },
      { min: 35, label: 'WEAK' },
    ],
    grade: [
      { min: 80, grade: 'A' },
      { min: 70, grade: 'B' },
      { min: 60, grade: 'C' },
      { min: 50, grade: 'D' },
    ],
  },
} as const;
