import type { Bar, CompositeResult, Direction, SignalCandidate } from '../src/types/index.js';
import { scoreCandidate } from '../src/engine/compositeScorer.js';

export function bar(date: string, close: number, range = 1, volume = 1000): Bar {
  return { date, open: close, high: close + range / 2, low: close - range / 2, close, volume };
}

/**
 * A quiet SIDEWAYS candidate with no pattern. Traced total: 41 (SELL, WEAK).
 *   pattern 0 | vsa 10 | trend 12 | S/R 12 | RS 6 | liquidity 1
 */
export function makeCandidate(overrides: Partial<SignalCandidate> = {}): SignalCandidate {
  const current = bar('2024-03-15', 50);
  return {
    symbol: 'AAA',
    date: current.date,
    bar: current,
    history: [current],
    patternName: null,
    patternBias: null,
    trendClass: 'SIDEWAYS',
    rsRating: 50,
    rsRating5dAgo: null,
    tradingValue: 1e9,
    volume: 1000,
    avgVolume5d: 1000,
    avgVolume20d: 1000,
    atr14: 1,
    priceVsSma20: 0,
    priceVsSma50: 0,
    ...overrides,
  };
}

/**
 * Strong BUY setup. Traced total: 87 (EXCELLENT, grade A).
 *   pattern 15 | vsa 25 | trend 17 | S/R 10 | RS 12 | liquidity 8
 */
export function makeStrongBuy(overrides: Partial<SignalCandidate> = {}): SignalCandidate {
  const current: Bar = { date: '2024-03-15', open: 100.5, high: 103, low: 100, close: 102.55, volume: 3_200_000 };
  return makeCandidate({
    symbol: 'BBB',
    bar: current,
    history: [current],
    patternName: 'Morning Star',
    patternBias: 'BULLISH',
    trendClass: 'UPTREND',
    rsRating: 85,
    rsRating5dAgo: 78,
    tradingValue: 20e9,
    volume: 3_200_000,
    avgVolume5d: 2_000_000,
    avgVolume20d: 1_000_000,
    atr14: 2,
    priceVsSma20: 3,
    priceVsSma50: 4,
    ...overrides,
  });
}

/** A scored result with only the ranking fields replaced. */
export function makeResult(
  symbol: string,
  totalScore: number,
  direction: Direction,
  date = '2024-03-15',
): CompositeResult {
  return { ...scoreCandidate(makeCandidate()), symbol, totalScore, direction, date };
}
