// ============================================================
// Step-Function Helpers
// ============================================================
// Every factor scorer is a ladder of thresholds checked in order,
// first hit wins. Ladders are plain readonly data in config/scoring.ts
// so each one can be tested on its own.
// ============================================================

/** Matches when `value >= min`. Ladders are ordered by descending `min`. */
export interface AtLeastStep {
  readonly min: number;
  readonly score: number;
}

/** Matches when `value <= max`. Ladders are ordered by ascending `max`. */
export interface AtMostStep {
  readonly max: number;
  readonly score: number;
}

/** Matches when `value < below`. Ladders are ordered by ascending `below`. */
export interface BelowStep {
  readonly below: number;
  readonly score: number;
}

export function stepAtLeast(value: number, ladder: readonly AtLeastStep[], fallback: number): number {
  for (const step of ladder) {
    if (value >= step.min) return step.score;
  }
  return fallback;
}

export function stepAtMost(value: number, ladder: readonly AtMostStep[], fallback: number): number {
  for (const step of ladder) {
    if (value <= step.max) return step.score;
  }
  return fallback;
}

export function stepBelow(value: number, ladder: readonly BelowStep[], fallback: number): number {
  for (const step of ladder) {
    if (value < step.below) return step.score;
  }
  return fallback;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Floor a product of an integer score and a decimal multiplier.
 * The epsilon keeps a product meant to be a whole number from flooring
 * to the integer below it.
 */
export function floorScore(value: number): number {
  return Math.floor(value + 1e-9);
}

/**
 * Ratio of two non-negative quantities, or `fallback` when the
 * denominator is not positive.
 */
export function safeRatio(numerator: number, denominator: number, fallback = 1.0): number {
  return denominator > 0 ? numerator / denominator : fallback;
}
