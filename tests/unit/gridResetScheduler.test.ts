import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GridResetScheduler, GridResetSchedulerOptions } from '../../src/strategies/gridResetScheduler';
import { VolatilityEstimate, VolatilityEstimator } from '../../src/types';
import { resolveGridParameters } from '../../src/utils/config';

function fixedEstimator(estimate: VolatilityEstimate): VolatilityEstimator {
  return { estimate: vi.fn(() => estimate) };
}

const rangeOverrides: GridResetSchedulerOptions = {
  symbol: 'SPY',
  levelCount: 5,
  gridType: 'arithmetic',
  overrides: { upperBound: 120, lowerBound: 80 },
};

describe('GridResetScheduler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('builds a grid on the first trading day', () => {
    const scheduler = new GridResetScheduler(rangeOverrides);
    expect(scheduler.getScheme()).toBeNull();

    const scheme = scheduler.maybeReset('2024-01-02', 100, 50000);

    expect(scheme).not.toBeNull();
    expect(scheme?.levels).toEqual([80, 90, 100, 110, 120]);
    expect(scheduler.getScheme()).toBe(scheme);
  });

  it('returns the same scheme when asked again on the reset day', () => {
    const scheduler = new GridResetScheduler(rangeOverrides);
    const first = scheduler.initialize('2024-01-02', 100, 50000);

    expect(scheduler.maybeReset('2024-01-02', 105, 20000)).toBe(first);
  });

  it('keeps the grid within a month until the reset interval passes', () => {
    const scheduler = new GridResetScheduler({ ...rangeOverrides, params: resolveGridParameters({ resetFrequencyDays: 3 }) });
    const first = scheduler.initialize('2024-01-02', 100, 50000);

    expect(scheduler.maybeReset('2024-01-03', 101, 50000)).toBeNull();
    expect(scheduler.maybeReset('2024-01-03', 101, 50000)).toBeNull();
    expect(scheduler.maybeReset('2024-01-04', 102, 50000)).toBeNull();

    const next = scheduler.maybeReset('2024-01-05', 103, 50000);
    expect(next).not.toBeNull();
    expect(next).not.toBe(first);
    expect(scheduler.getScheme()).toBe(next);
  });

  it('resets when the month changes', () => {
    const scheduler = new GridResetScheduler(rangeOverrides);
    scheduler.initialize('2024-01-30', 100, 50000);

    expect(scheduler.maybeReset('2024-01-31', 100, 50000)).toBeNull();
    expect(scheduler.maybeReset('2024-02-01', 100, 50000)).not.toBeNull();
  });

  it('sizes orders from the capital available at reset', () => {
    const scheduler = new GridResetScheduler(rangeOverrides);

    expect(scheduler.initialize('2024-01-02', 100, 0).orderSizes).toEqual([0, 0, 0, 0, 0]);
  });

  it('builds identical schemes from identical inputs', () => {
    const a = new GridResetScheduler(rangeOverrides).initialize('2024-01-02', 100, 50000);
    const b = new GridResetScheduler(rangeOverrides).initialize('2024-01-02', 100, 50000);

    expect(a).toEqual(b);
  });

  it('takes the range from the estimator without overrides', () => {
    const estimator = fixedEstimator({ volatility: 0.16, upperBound: 120, lowerBound: 80 });
    const scheduler = new GridResetScheduler({ symbol: 'SPY', levelCount: 5, gridType: 'arithmetic', estimator });

    const scheme = scheduler.initialize('2024-01-02', 100, 50000);

    expect(scheme.levels).toEqual([80, 90, 100, 110, 120]);
    expect(estimator.estimate).toHaveBeenCalledWith('SPY', '2024-01-02');
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('skips the estimator when every input is overridden', () => {
    const estimator = fixedEstimator({ volatility: 0.16, upperBound: 120, lowerBound: 80 });
    const scheduler = new GridResetScheduler({
      symbol: 'SPY',
      levelCount: 3,
      gridType: 'volatility',
      overrides: { upperBound: 120, lowerBound: 80, volatility: 0.8 },
      estimator,
    });

    const scheme = scheduler.initialize('2024-01-02', 100, 50000);

    expect(estimator.estimate).not.toHaveBeenCalled();
    expect(scheme.spacing).toBeCloseTo(0.1, 12);
  });

  it('falls back to price multiples when the estimated range is not finite', () => {
    const estimator = fixedEstimator({ volatility: 0.16, upperBound: NaN, lowerBound: NaN });
    const scheduler = new GridResetScheduler({ symbol: 'SPY', levelCount: 3, gridType: 'arithmetic', estimator });

    const scheme = scheduler.initialize('2024-01-02', 100, 50000);

    const expected = [60, 95, 130];
    scheme.levels.forEach((level, i) => expect(level).toBeCloseTo(expected[i], 8));
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back when the estimator throws', () => {
    const estimator: VolatilityEstimator = {
      estimate: () => {
        throw new Error('history unavailable');
      },
    };
    const scheduler = new GridResetScheduler({ symbol: 'SPY', levelCount: 3, gridType: 'arithmetic', estimator });

    const scheme = scheduler.initialize('2024-01-02', 100, 50000);

    const expected = [60, 95, 130];
    scheme.levels.forEach((level, i) => expect(level).toBeCloseTo(expected[i], 8));
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('uses the default volatility for a volatility grid without an estimate', () => {
    const estimator = fixedEstimator({ volatility: NaN, upperBound: 120, lowerBound: 80 });
    const scheduler = new GridResetScheduler({ symbol: 'SPY', levelCount: 3, gridType: 'volatility', estimator });

    const scheme = scheduler.initialize('2024-01-02', 100, 50000);

    const expected = [97.5, 100, 102.5];
    scheme.levels.forEach((level, i) => expect(level).toBeCloseTo(expected[i], 8));
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
