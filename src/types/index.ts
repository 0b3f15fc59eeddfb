// ============================================================
// Composite Signal Scorer - Shared TypeScript Types
// ============================================================

// --------------- Enums ---------------

export const TREND_CLASSES = ['STRONG_UP', 'UPTREND', 'SIDEWAYS', 'DOWNTREND', 'STRONG_DOWN'] as const;
export type TrendClass = (typeof TREND_CLASSES)[number];

export const PATTERN_BIASES = ['BULLISH', 'BEARISH'] as const;
export type PatternBias = (typeof PATTERN_BIASES)[number];

export const DIRECTIONS = ['BUY', 'SELL', 'PULLBACK', 'BOUNCE'] as const;
export type Direction = (typeof DIRECTIONS)[number];

export const QUALITY_LABELS = ['EXCELLENT', 'GOOD', 'MODERATE', 'WEAK', 'AVOID'] as const;
export type QualityLabel = (typeof QUALITY_LABELS)[number];

export type SignalGrade = 'A' | 'B' | 'C' | 'D' | 'F';

// --------------- Candidate ---------------

export interface Bar {
  date: string; // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface SectorRsPair {
  today: number;
  fiveDaysAgo: number;
}

/**
 * One (symbol, date) row of features, already cleaned by the caller.
 * `history` is in ascending date order and ends with `bar`.
 */
export interface SignalCandidate {
  symbol: string;
  date: string;
  bar: Bar;
  history: readonly Bar[];
  patternName: string | null;
  patternBias: PatternBias | null;
  trendClass: TrendClass;
  rsRating: number; // 1-99
  rsRating5dAgo: number | null;
  sectorRs?: SectorRsPair;
  tradingValue: number; // raw currency units
  volume: number;
  avgVolume5d: number;
  avgVolume20d: number;
  atr14: number;
  priceVsSma20: number; // percent
  priceVsSma50: number; // percent
}

// --------------- Support / Resistance ---------------

export type LevelType = 'swing' | 'fib';

export interface SupportResistanceLevel {
  price: number;
  label: string;
  pctDistance: number; // signed, relative to current price
  type: LevelType;
}

export interface SupportResistanceLevels {
  currentPrice: number;
  supports: SupportResistanceLevel[];
  resistances: SupportResistanceLevel[];
  swingHigh: number | null;
  swingLow: number | null;
  fibHigh: number | null;
  fibLow: number | null;
  fibValid: boolean;
}

// --------------- VSA ---------------

export type VolumeClass = 'VERY_HIGH' | 'HIGH' | 'NORMAL' | 'LOW' | 'VERY_LOW';
export type SpreadClass = 'WIDE' | 'NORMAL' | 'NARROW' | 'VERY_NARROW';
export type ClosePositionClass = 'HIGH' | 'MIDDLE' | 'LOW';
export type VsaBias = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export type VsaSignalName =
  | 'stopping_volume'
  | 'demand_coming_in'
  | 'supply_coming_in'
  | 'no_supply'
  | 'no_demand'
  | 'upthrust'
  | 'effort_no_result';

// --------------- Factor Scores ---------------

export type FactorName =
  | 'pattern'
  | 'vsa'
  | 'trend'
  | 'supportResistance'
  | 'relativeStrength'
  | 'liquidity';

export interface FactorScore<N extends FactorName, B> {
  readonly name: N;
  readonly value: number; // clamped to [0, maxPossible]
  readonly maxPossible: number;
  readonly breakdown: Readonly<B>;
}

export interface PatternBreakdown {
  patternKey: string | null;
  baseScore: number;
  multiplier: number;
}

export interface VsaBreakdown {
  volRatio: number;
  spreadRatio: number;
  closePosition: number;
  volumeClass: VolumeClass;
  spreadClass: SpreadClass;
  closeClass: ClosePositionClass;
  volumeScore: number;
  spreadScore: number;
  closeScore: number;
  signal: VsaSignalName | null;
  signalBias: VsaBias | null;
  alignmentBonus: number;
  rawTotal: number;
  conflictMultiplier: number;
}

export interface TrendBreakdown {
  direction: Direction;
  trendClass: TrendClass;
  matched: boolean;
}

export interface SupportResistanceBreakdown {
  proximityScore: number;
  rrBonus: number;
  rrRatio: number | null;
  levels: SupportResistanceLevels;
}

export type MomentumSource = 'SECTOR_RELATIVE' | 'ABSOLUTE' | 'NONE';

export interface RelativeStrengthBreakdown {
  rsRating: number;
  base: number;
  momentum: number;
  alignment: number;
  rsChange: number | null;
  momentumSource: MomentumSource;
}

export interface LiquidityBreakdown {
  tradingValueBn: number;
  tradingValueScore: number;
  volVs5d: number;
  volVs20d: number;
  volumeTrendBonus: number;
}

export type PatternScore = FactorScore<'pattern', PatternBreakdown>;
export type VsaScore = FactorScore<'vsa', VsaBreakdown>;
export type TrendScore = FactorScore<'trend', TrendBreakdown>;
export type SupportResistanceScore = FactorScore<'supportResistance', SupportResistanceBreakdown>;
export type RelativeStrengthScore = FactorScore<'relativeStrength', RelativeStrengthBreakdown>;
export type LiquidityScore = FactorScore<'liquidity', LiquidityBreakdown>;

export interface FactorScores {
  readonly pattern: PatternScore;
  readonly vsa: VsaScore;
  readonly trend: TrendScore;
  readonly supportResistance: SupportResistanceScore;
  readonly relativeStrength: RelativeStrengthScore;
  readonly liquidity: LiquidityScore;
}

// --------------- Composite ---------------

export interface CompositeResult {
  readonly symbol: string;
  readonly date: string;
  readonly totalScore: number; // integer 0-100
  readonly qualityLabel: QualityLabel;
  readonly grade: SignalGrade;
  readonly factorScores: FactorScores;
  readonly direction: Direction;
  readonly trendClass: TrendClass;
  readonly actionLabel: string;
  readonly isAligned: boolean;
}
