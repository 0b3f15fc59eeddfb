// ============================================================
// Pattern Scorer (0-15)
// ============================================================
// Candlestick reliability from a static tier table, adjusted for
// where the pattern shows up:
//   x1.2  bullish reversal in a down trend / bearish reversal in an up trend
//   x0.9  any reversal pattern in a SIDEWAYS market
//   x1.0  everything else
// ============================================================

import type { PatternScore, TrendClass } from '../types/index.js';
import { FACTOR_MAX, SCORING_CONFIG } from '../config/scoring.js';
import { PATTERN_SCORES, BULLISH_REVERSAL_PATTERNS, BEARISH_REVERSAL_PATTERNS } from '../config/patterns.js';
import { isDowntrend, isUptrend } from './trendClassifier.js';
import { clamp, floorScore } from '../utils/steps.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('PatternScorer');

/** 'Morning Star' -> 'morning_star'. Empty names normalize to null. */
export function normalizePatternName(name: string | null | undefined): string | null {
  if (name == null) return null;
  const key = name.trim().toLowerCase().replace(/\s+/g, '_');
  return key.length > 0 ? key : null;
}

export function basePatternScore(patternKey: string | null): number {
  if (patternKey === null) return 0;
  return PATTERN_SCORES.get(patternKey) ?? SCORING_CONFIG.pattern.unknownScore;
}

export function isReversalPattern(patternKey: string): boolean {
  return BULLISH_REVERSAL_PATTERNS.has(patternKey) || BEARISH_REVERSAL_PATTERNS.has(patternKey);
}

export function patternContextMultiplier(patternKey: string | null, trend: TrendClass): number {
  if (patternKey === null) return 1.0;
  const { contextBonus, sidewaysPenalty } = SCORING_CONFIG.pattern;

  if (BULLISH_REVERSAL_PATTERNS.has(patternKey) && isDowntrend(trend)) return contextBonus;
  if (BEARISH_REVERSAL_PATTERNS.has(patternKey) && isUptrend(trend)) return contextBonus;
  if (isReversalPattern(patternKey) && trend === 'SIDEWAYS') return sidewaysPenalty;
  return 1.0;
}

/**
 * Score a candlestick pattern in its trend context.
 *
 * @param patternName - Raw pattern name from the detector, or null when none fired
 * @param trend       - Prevailing trend class
 */
export function scorePattern(patternName: string | null, trend: TrendClass): PatternScore {
  const patternKey = normalizePatternName(patternName);
  const baseScore = basePatternScore(patternKey);
  const multiplier = patternContextMultiplier(patternKey, trend);
  const value = clamp(floorScore(baseScore * multiplier), 0, FACTOR_MAX.pattern);

  log.debug(`scorePattern ${patternKey ?? '-'} [${trend}]: base=${baseScore} x${multiplier} -> ${value}/15`);

  return {
    name: 'pattern',
    value,
    maxPossible: FACTOR_MAX.pattern,
    breakdown: { patternKey, baseScore, multiplier },
  };
}
