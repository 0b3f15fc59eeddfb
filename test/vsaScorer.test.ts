import { describe, expect, it } from 'vitest';
import {
  alignmentBonus,
  closeAlignmentScore,
  conflictMultiplier,
  deriveVsaInputs,
  detectVsaSignal,
  scoreVsa,
  spreadScore,
} from '../src/analyzer/vsaScorer.js';

describe('deriveVsaInputs', () => {
  it('computes the three ratios from a bar', () => {
    const inputs = deriveVsaInputs(
      { date: '2024-03-15', open: 10, high: 12, low: 10, close: 11.5, volume: 3000 },
      1000,
      2,
    );
    expect(inputs).toEqual({ volRatio: 3, spreadRatio: 1, closePosition: 0.75 });
  });

  it('uses neutral values for a zero-range bar and missing averages', () => {
    const inputs = deriveVsaInputs({ date: '2024-03-15', open: 10, high: 10, low: 10, close: 10, volume: 500 }, 0, 2);
    expect(inputs).toEqual({ volRatio: 1, spreadRatio: 0, closePosition: 0.5 });
  });
});

describe('spreadScore', () => {
  it('scores wide bars by where they close', () => {
    expect(spreadScore(1.4, 0.8, 1)).toBe(8);
    expect(spreadScore(1.4, 0.2, 1)).toBe(6);
    expect(spreadScore(1.4, 0.5, 1)).toBe(5);
  });

  it('scores narrow bars by volume', () => {
    expect(spreadScore(0.6, 0.5, 1.6)).toBe(6);
    expect(spreadScore(0.6, 0.5, 1.0)).toBe(2);
  });

  it('scores normal bars by where they close', () => {
    expect(spreadScore(1.0, 0.8, 1)).toBe(5);
    expect(spreadScore(1.0, 0.3, 1)).toBe(4);
    expect(spreadScore(1.0, 0.5, 1)).toBe(3);
  });
});

describe('closeAlignmentScore', () => {
  it('mirrors the ladder for bearish directions', () => {
    expect(closeAlignmentScore(0.85, 'BUY')).toBe(7);
    expect(closeAlignmentScore(0.85, 'SELL')).toBe(-2);
    expect(closeAlignmentScore(0.15, 'PULLBACK')).toBe(7);
    expect(closeAlignmentScore(0.15, 'BOUNCE')).toBe(-2);
  });
});

describe('detectVsaSignal', () => {
  it('finds the first matching rule', () => {
    expect(detectVsaSignal({ volume: 'HIGH', spread: 'NARROW', close: 'LOW', trend: 'SIDEWAYS' })?.name).toBe(
      'stopping_volume',
    );
    expect(detectVsaSignal({ volume: 'LOW', spread: 'VERY_NARROW', close: 'MIDDLE', trend: 'DOWNTREND' })?.name).toBe(
      'no_supply',
    );
    expect(detectVsaSignal({ volume: 'VERY_LOW', spread: 'NARROW', close: 'HIGH', trend: 'UPTREND' })?.name).toBe(
      'no_demand',
    );
    expect(detectVsaSignal({ volume: 'HIGH', spread: 'NARROW', close: 'MIDDLE', trend: 'SIDEWAYS' })?.name).toBe(
      'effort_no_result',
    );
  });

  it('reports supply coming in for a wide down bar even in an uptrend', () => {
    const signal = detectVsaSignal({ volume: 'VERY_HIGH', spread: 'WIDE', close: 'LOW', trend: 'STRONG_UP' });
    expect(signal?.name).toBe('supply_coming_in');
    expect(signal?.bias).toBe('BEARISH');
  });

  it('returns null when nothing matches', () => {
    expect(detectVsaSignal({ volume: 'NORMAL', spread: 'NORMAL', close: 'MIDDLE', trend: 'SIDEWAYS' })).toBeNull();
  });
});

describe('alignment and conflict', () => {
  it('rewards agreement and penalises opposition', () => {
    expect(alignmentBonus('BULLISH', 'BUY')).toBe(3);
    expect(alignmentBonus('BULLISH', 'BOUNCE')).toBe(3);
    expect(alignmentBonus('BULLISH', 'SELL')).toBe(-5);
    expect(alignmentBonus('BEARISH', 'PULLBACK')).toBe(3);
    expect(alignmentBonus('NEUTRAL', 'BUY')).toBe(0);
    expect(alignmentBonus(null, 'SELL')).toBe(0);
  });

  it('scales a conflicted total by 0.6 or 0.8', () => {
    expect(conflictMultiplier(-5)).toBe(0.6);
    expect(conflictMultiplier(-3)).toBe(0.8);
    expect(conflictMultiplier(0)).toBe(1.0);
    expect(conflictMultiplier(3)).toBe(1.0);
  });
});

describe('scoreVsa', () => {
  const demandBar = { volRatio: 3.2, spreadRatio: 1.5, closePosition: 0.85 };

  it('caps a confirmed demand bar at 25', () => {
    const score = scoreVsa(demandBar, 'BUY', 'UPTREND');
    expect(score.value).toBe(25);
    expect(score.breakdown).toMatchObject({
      volumeScore: 10,
      spreadScore: 8,
      closeScore: 7,
      signal: 'demand_coming_in',
      signalBias: 'BULLISH',
      alignmentBonus: 3,
      rawTotal: 28,
      conflictMultiplier: 1.0,
    });
  });

  it('scales the same bar down hard for a bearish direction', () => {
    // 10 + 8 - 2 - 5 = 11, x0.6 = 6.6
    expect(scoreVsa(demandBar, 'SELL', 'UPTREND').value).toBe(6);
    expect(scoreVsa(demandBar, 'PULLBACK', 'UPTREND').value).toBe(6);
  });

  it('adds the parts plainly when no signal fires', () => {
    const score = scoreVsa({ volRatio: 1.0, spreadRatio: 1.0, closePosition: 0.5 }, 'BUY', 'SIDEWAYS');
    expect(score.breakdown.signal).toBeNull();
    expect(score.value).toBe(10);
  });

  it('never goes below zero', () => {
    // no_supply against a SELL: 0 + 2 - 2 - 5 = -5, x0.6 = -3
    const score = scoreVsa({ volRatio: 0.2, spreadRatio: 0.6, closePosition: 0.9 }, 'SELL', 'DOWNTREND');
    expect(score.breakdown.signal).toBe('no_supply');
    expect(score.breakdown.rawTotal).toBe(-5);
    expect(score.value).toBe(0);
  });
});
