// ============================================================
// Direction Classifier
// ============================================================
// Trade direction from the pattern's bias and the prevailing trend:
//
//   trend UP    : BULLISH -> BUY,  otherwise -> PULLBACK
//   trend DOWN  : BEARISH -> SELL, otherwise -> BOUNCE
//   SIDEWAYS    : BULLISH -> BUY,  otherwise -> SELL
//
// A null bias takes the "otherwise" branch, so a pattern-less
// candidate in a sideways market reads as SELL.
// ============================================================

import { TREND_CLASSES, PATTERN_BIASES, DIRECTIONS } from '../types/index.js';
import type { Direction, PatternBias, TrendClass } from '../types/index.js';
import { assertOneOf } from '../errors.js';

export type { Direction };

/**
 * @throws InvalidEnumError when `trend` or a non-null `bias` is outside its enum
 */
export function classifyDirection(bias: PatternBias | null, trend: TrendClass): Direction {
  assertOneOf('trend_class', trend, TREND_CLASSES);
  if (bias !== null) assertOneOf('pattern_bias', bias, PATTERN_BIASES);

  switch (trend) {
    case 'STRONG_UP':
    case 'UPTREND':
      return bias === 'BULLISH' ? 'BUY' : 'PULLBACK';
    case 'STRONG_DOWN':
    case 'DOWNTREND':
      return bias === 'BEARISH' ? 'SELL' : 'BOUNCE';
    case 'SIDEWAYS':
      return bias === 'BULLISH' ? 'BUY' : 'SELL';
  }
}

/**
 * Which side of the market a direction leans toward.
 * BUY and BOUNCE expect price to rise; SELL and PULLBACK expect it to fall.
 *
 * @throws InvalidEnumError for a value outside Direction
 */
export function impliedBias(direction: Direction): PatternBias {
  assertOneOf('direction', direction, DIRECTIONS);
  return direction === 'BUY' || direction === 'BOUNCE' ? 'BULLISH' : 'BEARISH';
}

export function isBullishDirection(direction: Direction): boolean {
  return impliedBias(direction) === 'BULLISH';
}
