import { describe, expect, it } from 'vitest';
import {
  basePatternScore,
  normalizePatternName,
  patternContextMultiplier,
  scorePattern,
} from '../src/analyzer/patternScorer.js';
import { TREND_CLASSES } from '../src/types/index.js';

describe('normalizePatternName', () => {
  it('lowercases and joins words with underscores', () => {
    expect(normalizePatternName(' Morning  Star ')).toBe('morning_star');
    expect(normalizePatternName('BULLISH_ENGULFING')).toBe('bullish_engulfing');
  });

  it('returns null for missing or blank names', () => {
    expect(normalizePatternName(null)).toBeNull();
    expect(normalizePatternName('   ')).toBeNull();
  });
});

describe('basePatternScore', () => {
  it('reads the tier table', () => {
    expect(basePatternScore('three_white_soldiers')).toBe(15);
    expect(basePatternScore('bearish_engulfing')).toBe(13);
    expect(basePatternScore('hammer')).toBe(10);
    expect(basePatternScore('dark_cloud')).toBe(8);
    expect(basePatternScore('breakout')).toBe(7);
    expect(basePatternScore('spinning_top')).toBe(5);
  });

  it('gives unknown names the default and no pattern zero', () => {
    expect(basePatternScore('three_inside_up')).toBe(5);
    expect(basePatternScore('constructor')).toBe(5);
    expect(basePatternScore(null)).toBe(0);
  });
});

describe('patternContextMultiplier', () => {
  it('rewards reversals against the trend and discounts them in a range', () => {
    expect(patternContextMultiplier('hammer', 'DOWNTREND')).toBe(1.2);
    expect(patternContextMultiplier('shooting_star', 'STRONG_UP')).toBe(1.2);
    expect(patternContextMultiplier('hammer', 'SIDEWAYS')).toBe(0.9);
    expect(patternContextMultiplier('hammer', 'UPTREND')).toBe(1.0);
    expect(patternContextMultiplier('doji', 'SIDEWAYS')).toBe(1.0);
  });
});

describe('scorePattern', () => {
  it('scores a morning star in an uptrend at the maximum', () => {
    const score = scorePattern('morning_star', 'UPTREND');
    expect(score.value).toBe(15);
    expect(score.maxPossible).toBe(15);
    expect(score.breakdown).toEqual({ patternKey: 'morning_star', baseScore: 15, multiplier: 1.0 });
  });

  it('floors the context-adjusted score', () => {
    expect(scorePattern('hammer', 'DOWNTREND').value).toBe(12);
    expect(scorePattern('hammer', 'SIDEWAYS').value).toBe(9);
    expect(scorePattern('Hanging Man', 'UPTREND').value).toBe(9);
  });

  it('caps a boosted reversal at 15', () => {
    expect(scorePattern('bullish_engulfing', 'STRONG_DOWN').value).toBe(15);
    expect(scorePattern('bullish_engulfing', 'UPTREND').value).toBe(13);
  });

  it('scores a bullish reversal in a strong downtrend at least as high as in an uptrend', () => {
    for (const name of ['hammer', 'piercing', 'dragonfly_doji', 'morning_star']) {
      expect(scorePattern(name, 'STRONG_DOWN').value).toBeGreaterThanOrEqual(scorePattern(name, 'UPTREND').value);
    }
  });

  it('scores no pattern as zero in every trend', () => {
    for (const trend of TREND_CLASSES) {
      expect(scorePattern(null, trend).value).toBe(0);
    }
  });
});
