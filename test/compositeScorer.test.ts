import { describe, expect, it } from 'vitest';
import {
  actionLabel,
  isTrendAligned,
  qualityLabel,
  scoreBatch,
  scoreCandidate,
  signalGrade,
  sumFactors,
} from '../src/engine/compositeScorer.js';
import { InvalidEnumError } from '../src/errors.js';
import type { TrendClass } from '../src/types/index.js';
import { makeCandidate, makeStrongBuy } from './helpers.js';

describe('labels', () => {
  it.each([
    [100, 'EXCELLENT'],
    [80, 'EXCELLENT'],
    [79, 'GOOD'],
    [65, 'GOOD'],
    [64, 'MODERATE'],
    [50, 'MODERATE'],
    [35, 'WEAK'],
    [34, 'AVOID'],
    [0, 'AVOID'],
  ] as const)('quality of %d is %s', (score, label) => {
    expect(qualityLabel(score)).toBe(label);
  });

  it('grades on its own ladder', () => {
    expect(signalGrade(80)).toBe('A');
    expect(signalGrade(70)).toBe('B');
    expect(signalGrade(65)).toBe('C');
    expect(signalGrade(50)).toBe('D');
    expect(signalGrade(49)).toBe('F');
  });

  it('maps quality and direction to an action', () => {
    expect(actionLabel('EXCELLENT', 'BUY')).toBe('STRONG BUY');
    expect(actionLabel('GOOD', 'BOUNCE')).toBe('SPECULATIVE BUY');
    expect(actionLabel('WEAK', 'SELL')).toBe('WAIT FOR BREAKDOWN');
  });

  it('falls back to a direction-only label for AVOID', () => {
    expect(actionLabel('AVOID', 'BUY')).toBe('NO BUY');
    expect(actionLabel('AVOID', 'SELL')).toBe('NO SELL');
    expect(actionLabel('AVOID', 'BOUNCE')).toBe('NO ACTION');
  });

  it('flags directions that trade with the trend', () => {
    expect(isTrendAligned('UPTREND', 'BUY')).toBe(true);
    expect(isTrendAligned('STRONG_UP', 'PULLBACK')).toBe(true);
    expect(isTrendAligned('DOWNTREND', 'BOUNCE')).toBe(true);
    expect(isTrendAligned('SIDEWAYS', 'SELL')).toBe(false);
    expect(isTrendAligned('UPTREND', 'SELL')).toBe(false);
  });
});

describe('scoreCandidate', () => {
  it('scores a strong BUY setup factor by factor', () => {
    const result = scoreCandidate(makeStrongBuy());
    const f = result.factorScores;

    expect(result.direction).toBe('BUY');
    expect(f.pattern.value).toBe(15);
    expect(f.vsa.value).toBe(25);
    expect(f.vsa.breakdown.signal).toBe('demand_coming_in');
    expect(f.trend.value).toBe(17);
    expect(f.supportResistance.value).toBe(10);
    expect(f.relativeStrength.value).toBe(12);
    expect(f.liquidity.value).toBe(8);
    expect(result.totalScore).toBe(87);
    expect(result.qualityLabel).toBe('EXCELLENT');
    expect(result.grade).toBe('A');
    expect(result.actionLabel).toBe('STRONG BUY');
    expect(result.isAligned).toBe(true);
  });

  it('reads a pattern-less sideways candidate as a weak SELL', () => {
    const result = scoreCandidate(makeCandidate());
    const f = result.factorScores;

    expect(result.direction).toBe('SELL');
    expect([
      f.pattern.value,
      f.vsa.value,
      f.trend.value,
      f.supportResistance.value,
      f.relativeStrength.value,
      f.liquidity.value,
    ]).toEqual([0, 10, 12, 12, 6, 1]);
    expect(result.totalScore).toBe(41);
    expect(result.qualityLabel).toBe('WEAK');
    expect(result.grade).toBe('F');
    expect(result.actionLabel).toBe('WAIT FOR BREAKDOWN');
    expect(result.isAligned).toBe(false);
  });

  it('keeps every factor inside its range and the total equal to their sum', () => {
    const candidates = [
      makeStrongBuy(),
      makeStrongBuy({ patternBias: 'BEARISH', trendClass: 'STRONG_UP' }),
      makeStrongBuy({ trendClass: 'STRONG_DOWN', rsRating: 5 }),
      makeCandidate({ patternName: 'hammer', patternBias: 'BULLISH', trendClass: 'DOWNTREND' }),
      makeCandidate({ tradingValue: 0, volume: 0, avgVolume5d: 0, avgVolume20d: 0, atr14: 0 }),
    ];

    for (const result of scoreBatch(candidates)) {
      for (const factor of Object.values(result.factorScores)) {
        expect(factor.value).toBeGreaterThanOrEqual(0);
        expect(factor.value).toBeLessThanOrEqual(factor.maxPossible);
      }
      expect(result.totalScore).toBe(sumFactors(result.factorScores));
      expect(result.qualityLabel).toBe(qualityLabel(result.totalScore));
    }
  });

  it('is deterministic', () => {
    expect(scoreCandidate(makeStrongBuy())).toEqual(scoreCandidate(makeStrongBuy()));
  });

  it('throws on a trend class outside the enum', () => {
    const trendClass: TrendClass = JSON.parse('"FLAT"');
    expect(() => scoreCandidate(makeCandidate({ trendClass }))).toThrow(InvalidEnumError);
  });
});

describe('scoreBatch', () => {
  it('keeps input order', () => {
    const results = scoreBatch([makeCandidate({ symbol: 'ZZZ' }), makeStrongBuy({ symbol: 'AAA' })]);
    expect(results.map((r) => r.symbol)).toEqual(['ZZZ', 'AAA']);
  });
});
