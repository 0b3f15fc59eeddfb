// ============================================================
// Candlestick Pattern Reliability Table
// ============================================================
// Keys are normalized names (lower case, spaces -> underscores).
// ============================================================

export const PATTERN_SCORES: ReadonlyMap<string, number> = new Map([
  // S-tier: multi-candle, high reliability
  ['morning_star', 15],
  ['evening_star', 15],
  ['three_white_soldiers', 15],
  ['three_black_crows', 15],
  // A-tier: strong reversal
  ['engulfing', 13],
  ['bullish_engulfing', 13],
  ['bearish_engulfing', 13],
  // B-tier: single candle reversal
  ['hammer', 10],
  ['inverted_hammer', 10],
  ['shooting_star', 10],
  // C-tier: moderate reliability
  ['hanging_man', 8],
  ['piercing', 8],
  ['dark_cloud', 8],
  ['dragonfly_doji', 8],
  ['gravestone_doji', 8],
  // D-tier: indecision
  ['doji', 5],
  ['spinning_top', 5],
  // Non-pattern alerts
  ['breakout', 7],
  ['volume_spike', 5],
]);

export const BULLISH_REVERSAL_PATTERNS: ReadonlySet<string> = new Set([
  'morning_star',
  'hammer',
  'bullish_engulfing',
  'inverted_hammer',
  'piercing',
  'dragonfly_doji',
]);

export const BEARISH_REVERSAL_PATTERNS: ReadonlySet<string> = new Set([
  'evening_star',
  'shooting_star',
  'bearish_engulfing',
  'hanging_man',
  'dark_cloud',
  'gravestone_doji',
]);
