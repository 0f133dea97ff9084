import { PriceSeries, TradingDate, VolatilityEstimate, VolatilityEstimator } from '../../types';
import { config } from '../../utils/config';
import { daysBetween } from '../../utils/dateUtils';
import { ValidationError } from '../../utils/errors';
import {
  calculateReturns,
  calculateRollingMax,
  calculateRollingMin,
  calculateRollingStd,
} from './technicalIndicators';

export interface EstimatorOptions {
  shortWindow: number;
  longWindow: number;
  shortWeight: number;
  longWeight: number;
  tradingDaysPerYear: number;
}

interface EstimateTable {
  dates: TradingDate[];
  volatility: number[];
  upper: number[];
  lower: number[];
}

export interface GridParameterSuggestion {
  volatility: number;
  gridSpacing: number;
  upperBound: number;
  lowerBound: number;
  levelCount: number;
}

/**
 * Volatility and trading range from a symbol's price history.
 *
 * Volatility is the annualised rolling standard deviation of daily returns
 * over the short window. The range blends the short- and long-window highs
 * and lows: `H = 0.7·max(short) + 0.3·max(long)`, likewise for `L`. Dates
 * without enough history yield NaN.
 */
export class RollingVolatilityEstimator implements VolatilityEstimator {
  private readonly options: EstimatorOptions;
  private readonly tables = new Map<string, EstimateTable>();

  constructor(
    private readonly history: ReadonlyMap<string, PriceSeries>,
    options: Partial<EstimatorOptions> = {}
  ) {
    this.options = {
      ...config.estimator,
      tradingDaysPerYear: config.backtest.tradingDaysPerYear,
      ...options,
    };
  }

  estimate(symbol: string, asOf: TradingDate): VolatilityEstimate {
    const table = this.getTable(symbol);
    const index = this.nearestIndex(table.dates, asOf);

    return {
      volatility: table.volatility[index],
      upperBound: table.upper[index],
      lowerBound: table.lower[index],
    };
  }

  private getTable(symbol: string): EstimateTable {
    const cached = this.tables.get(symbol);
    if (cached) {
      return cached;
    }

    const series = this.history.get(symbol);
    if (!series || series.length === 0) {
      throw new Error(`No price history for ${symbol}`);
    }

    const { shortWindow, longWindow, shortWeight, longWeight, tradingDaysPerYear } = this.options;
    const closes = series.map(p => p.close);
    const rollingStd = calculateRollingStd(calculateReturns(closes), shortWindow);
    const shortHigh = calculateRollingMax(closes, shortWindow);
    const shortLow = calculateRollingMin(closes, shortWindow);
    const longHigh = calculateRollingMax(closes, longWindow);
    const longLow = calculateRollingMin(closes, longWindow);

    const table: EstimateTable = {
      dates: series.map(p => p.date),
      volatility: rollingStd.map(std => std * Math.sqrt(tradingDaysPerYear)),
      upper: closes.map((_, i) => shortWeight * shortHigh[i] + longWeight * longHigh[i]),
      lower: closes.map((_, i) => shortWeight * shortLow[i] + longWeight * longLow[i]),
    };
    this.tables.set(symbol, table);
    return table;
  }

  /**
   * Index of `asOf`, or of the closest date (the earlier one on a tie)
   */
  private nearestIndex(dates: TradingDate[], asOf: TradingDate): number {
    let best = 0;
    let bestDistance = Infinity;
    for (let i = 0; i < dates.length; i++) {
      const distance = Math.abs(daysBetween(dates[i], asOf));
      if (distance < bestDistance) {
        best = i;
        bestDistance = distance;
      }
    }
    return best;
  }
}

/**
 * Suggest grid settings from current estimates, averaged over symbols.
 * The level count is the range width over the grid spacing, within 3..50.
 */
export function suggestGridParameters(estimates: readonly VolatilityEstimate[]): GridParameterSuggestion {
  if (estimates.length === 0) {
    throw new ValidationError('At least one estimate is required to suggest grid parameters');
  }

  const usable = (value: number): number => (isFinite(value) ? value : config.grid.fallbackVolatility);
  const mean = (values: number[]): number => values.reduce((a, b) => a + b, 0) / values.length;

  const volatilities = estimates.map(e => usable(e.volatility));
  const spacings = volatilities.map(v => v / config.grid.volatilityDivisor);
  const ranged = estimates
    .map((e, i) => ({ ...e, spacing: spacings[i] }))
    .filter(e => isFinite(e.upperBound) && isFinite(e.lowerBound));

  const levelCounts = ranged.map(e => {
    const rangePercent = (2 * (e.upperBound - e.lowerBound)) / (e.upperBound + e.lowerBound);
    return Math.round(rangePercent / e.spacing);
  });
  const averageLevels = levelCounts.length > 0 ? Math.round(mean(levelCounts)) : 3;

  return {
    volatility: mean(volatilities),
    gridSpacing: mean(spacings),
    upperBound: ranged.length > 0 ? mean(ranged.map(e => e.upperBound)) : NaN,
    lowerBound: ranged.length > 0 ? mean(ranged.map(e => e.lowerBound)) : NaN,
    levelCount: Math.max(3, Math.min(50, averageLevels)),
  };
}
