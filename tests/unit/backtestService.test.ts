import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BacktestService, RunBacktestInput } from '../../src/services/backtest/backtestService';
import { PricePoint, PriceProvider } from '../../src/types';
import { BacktestTimeoutError, InvalidGridTypeError, ValidationError } from '../../src/utils/errors';
import { seriesFrom } from '../helpers/series';

const swing = seriesFrom('2024-01-02', [100, 95, 85, 75, 95, 115, 125, 105, 112, 100]);

function fakeProvider(prices: PricePoint[] = swing) {
  return { getPrices: vi.fn(async () => prices) } satisfies PriceProvider;
}

const singleRequest: RunBacktestInput = {
  symbols: ['SWING'],
  initialCapital: 100000,
  startDate: '2024-01-01',
  endDate: '2024-01-15',
  gridLevels: 5,
  gridType: 'arithmetic',
  gridRangeUpper: 120,
  gridRangeLower: 80,
};

describe('BacktestService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('single mode', () => {
    it('runs the first symbol with the requested grid range', async () => {
      const provider = fakeProvider();
      const outcome = await new BacktestService(provider).runBacktest(singleRequest);

      expect(outcome.mode).toBe('single');
      if (outcome.mode !== 'single') return;

      const { result } = outcome;
      expect(result.symbol).toBe('SWING');
      expect(result.scheme.levels).toEqual([80, 90, 100, 110, 120]);
      expect(result.equityCurve[result.equityCurve.length - 1].totalEquity).toBe(108700);
      expect(result.metrics.totalTrades).toBe(12);
    });

    it('fetches estimator history before the start date', async () => {
      const provider = fakeProvider();
      await new BacktestService(provider).runBacktest({ ...singleRequest, symbols: ['SWING', 'OTHER'] });

      expect(provider.getPrices).toHaveBeenCalledTimes(1);
      expect(provider.getPrices).toHaveBeenCalledWith('SWING', '2020-12-07', '2024-01-15');
    });

    it('warns about symbols beyond the first', async () => {
      await new BacktestService(fakeProvider()).runBacktest({ ...singleRequest, symbols: ['SWING', 'OTHER', 'THIRD'] });

      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith('⚠️  Single-asset backtest runs SWING only, ignoring OTHER, THIRD');
    });

    it('stays quiet for a single symbol', async () => {
      await new BacktestService(fakeProvider()).runBacktest(singleRequest);

      expect(console.warn).not.toHaveBeenCalled();
    });
  });

  describe('portfolio mode', () => {
    it('backtests every symbol and combines them', async () => {
      const provider = fakeProvider();
      const outcome = await new BacktestService(provider).runBacktest({
        ...singleRequest,
        mode: 'portfolio',
        symbols: ['AAA', 'BBB'],
      });

      expect(outcome.mode).toBe('portfolio');
      if (outcome.mode !== 'portfolio') return;

      expect(outcome.result.symbols).toEqual(['AAA', 'BBB']);
      expect(outcome.result.assets.map(a => a.initialCapital)).toEqual([50000, 50000]);
      expect(outcome.result.equityCurve).toHaveLength(10);
      expect(provider.getPrices).toHaveBeenCalledTimes(2);
    });
  });

  describe('request validation', () => {
    it('rejects a non-positive capital', async () => {
      const service = new BacktestService(fakeProvider());

      await expect(service.runBacktest({ ...singleRequest, initialCapital: -1 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects malformed dates', async () => {
      const service = new BacktestService(fakeProvider());

      await expect(service.runBacktest({ ...singleRequest, startDate: '2024-13-01' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('rejects an inverted grid range', async () => {
      const service = new BacktestService(fakeProvider());

      await expect(
        service.runBacktest({ ...singleRequest, gridRangeUpper: 80, gridRangeLower: 120 })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects unknown grid types', async () => {
      const provider = fakeProvider();
      const service = new BacktestService(provider);

      await expect(service.runBacktest({ ...singleRequest, gridType: 'fibonacci' })).rejects.toBeInstanceOf(
        InvalidGridTypeError
      );
      expect(provider.getPrices).not.toHaveBeenCalled();
    });
  });

  it('gives up after the timeout', async () => {
    const provider: PriceProvider = { getPrices: () => new Promise<PricePoint[]>(() => {}) };
    const service = new BacktestService(provider, { timeoutMs: 20 });

    await expect(service.runBacktest(singleRequest)).rejects.toBeInstanceOf(BacktestTimeoutError);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
