import {
  AssetBacktestResult,
  EquityPoint,
  GridParameters,
  PortfolioBacktestResult,
  PriceSeries,
  Trade,
  TradingDate,
  VolatilityEstimator,
} from '../../types';
import { ValidationError } from '../../utils/errors';
import { BacktestEngine, getBacktestEngine } from './backtestEngine';
import { PerformanceAnalyzer, getPerformanceAnalyzer } from './performanceAnalyzer';

export interface PortfolioAsset {
  symbol: string;
  series: PriceSeries;
}

export interface PortfolioOptions {
  assets: PortfolioAsset[];
  initialCapital: number;
  levelCount: number;
  gridType: string;
  startDate?: TradingDate;
  endDate?: TradingDate;
  estimator?: VolatilityEstimator;
  params?: Partial<GridParameters>;
}

/**
 * Sum equity curves over the union of their dates. An asset without a point
 * on a date contributes nothing to it.
 */
export function mergeEquityCurves(curves: ReadonlyArray<readonly EquityPoint[]>): EquityPoint[] {
  const merged = new Map<TradingDate, EquityPoint>();

  for (const curve of curves) {
    for (const point of curve) {
      const entry = merged.get(point.date) ?? { date: point.date, totalEquity: 0, investedCapital: 0, profit: 0 };
      entry.totalEquity += point.totalEquity;
      entry.investedCapital += point.investedCapital;
      entry.profit += point.profit;
      merged.set(point.date, entry);
    }
  }

  return [...merged.values()].sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Trades of every asset in date order; trades on the same date keep their
 * per-asset order.
 */
export function mergeTrades(results: readonly AssetBacktestResult[]): Trade[] {
  return results
    .flatMap(r => r.trades)
    .map((trade, index) => ({ trade, index }))
    .sort((a, b) => a.trade.date.localeCompare(b.trade.date) || a.index - b.index)
    .map(({ trade }) => trade);
}

export class PortfolioAggregator {
  constructor(
    private readonly engine: BacktestEngine = getBacktestEngine(),
    private readonly performanceAnalyzer: PerformanceAnalyzer = getPerformanceAnalyzer()
  ) {}

  /**
   * Backtest each asset with an equal share of the capital and combine the results
   */
  aggregate(options: PortfolioOptions): PortfolioBacktestResult {
    const { assets, initialCapital } = options;
    if (assets.length === 0) {
      throw new ValidationError('A portfolio backtest needs at least one asset');
    }

    const perAssetCapital = initialCapital / assets.length;
    console.log(`📊 Portfolio backtest: ${assets.map(a => a.symbol).join(', ')}, ${perAssetCapital.toFixed(2)} each`);

    const results: AssetBacktestResult[] = [];
    for (const asset of assets) {
      results.push(this.runAsset(asset, perAssetCapital, options));
    }

    return this.combine(results, initialCapital);
  }

  /**
   * Merge per-asset results that were produced elsewhere
   */
  combine(results: AssetBacktestResult[], initialCapital: number): PortfolioBacktestResult {
    const equityCurve = mergeEquityCurves(results.map(r => r.equityCurve));
    const trades = mergeTrades(results);

    const tradedDates = new Set<TradingDate>();
    for (const result of results) {
      for (const point of result.equityCurve) {
        if (!point.carriedForward) {
          tradedDates.add(point.date);
        }
      }
    }

    const metrics = this.performanceAnalyzer.calculateMetrics(equityCurve, initialCapital, tradedDates.size, trades);

    return {
      symbols: results.map(r => r.symbol),
      initialCapital,
      equityCurve,
      trades,
      metrics,
      tradingDays: tradedDates.size,
      assets: results,
    };
  }

  private runAsset(asset: PortfolioAsset, capital: number, options: PortfolioOptions): AssetBacktestResult {
    try {
      return this.engine.simulate({
        series: asset.series,
        symbol: asset.symbol,
        initialCapital: capital,
        levelCount: options.levelCount,
        gridType: options.gridType,
        startDate: options.startDate,
        endDate: options.endDate,
        estimator: options.estimator,
        params: options.params,
      });
    } catch (error) {
      console.error(`❌ Portfolio backtest aborted at ${asset.symbol}:`, error instanceof Error ? error.message : error);
      throw error;
    }
  }
}

// Singleton instance
let portfolioAggregatorInstance: PortfolioAggregator | null = null;

export function getPortfolioAggregator(): PortfolioAggregator {
  if (!portfolioAggregatorInstance) {
    portfolioAggregatorInstance = new PortfolioAggregator();
  }
  return portfolioAggregatorInstance;
}

export function aggregatePortfolio(options: PortfolioOptions): PortfolioBacktestResult {
  return getPortfolioAggregator().aggregate(options);
}
