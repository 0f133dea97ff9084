import {
  AssetBacktestResult,
  AssetEquityPoint,
  GridParameters,
  GridScheme,
  PricePoint,
  PriceSeries,
  Trade,
  TradeSide,
  TradingDate,
  VolatilityEstimator,
} from '../../types';
import { GridResetScheduler } from '../../strategies/gridResetScheduler';
import { findLevelIndex, parseGridType } from '../../strategies/gridScheme';
import { detectCrossing } from '../../strategies/levelCrossing';
import { config, resolveGridParameters } from '../../utils/config';
import { weekdaysAfter } from '../../utils/dateUtils';
import { InsufficientDataError, ValidationError } from '../../utils/errors';
import { CostBasisTracker, cappedProfit, floorToLot, sizeBuyOrder } from '../../utils/orderUtils';
import { PerformanceAnalyzer, getPerformanceAnalyzer } from './performanceAnalyzer';

export interface SimulationOptions {
  series: PriceSeries;
  initialCapital: number;
  levelCount: number;
  gridType: string;
  symbol?: string;
  startDate?: TradingDate;
  endDate?: TradingDate; // Requested end; the curve is carried forward to it
  volatilityOverride?: number;
  gridSpacingOverride?: number;
  boundsOverride?: { upperBound: number; lowerBound: number };
  estimator?: VolatilityEstimator;
  params?: Partial<GridParameters>;
}

/**
 * Cash, shares and trade log of one single-asset run.
 */
class GridPosition {
  cash: number;
  shares = 0;
  readonly trades: Trade[] = [];
  readonly equityCurve: AssetEquityPoint[] = [];
  private readonly levelBuyPrices = new Map<number, number>();
  private readonly costBasis = new CostBasisTracker();

  constructor(
    private readonly symbol: string,
    private readonly initialCapital: number,
    private readonly params: GridParameters
  ) {
    this.cash = initialCapital;
  }

  /** Buy prices belong to the levels of the scheme they were made under. */
  onSchemeReplaced(): void {
    this.levelBuyPrices.clear();
  }

  buy(date: TradingDate, price: number, quantity: number, level: number): Trade | null {
    const amount = quantity * price;
    if (quantity <= 0 || this.cash < amount) {
      return null;
    }

    this.cash -= amount;
    this.shares += quantity;
    this.levelBuyPrices.set(level, price);
    this.costBasis.record(amount, quantity);

    return this.record(date, 'buy', price, quantity, amount, 0, level);
  }

  sell(date: TradingDate, price: number, planned: number, level: number): Trade | null {
    const quantity = Math.min(this.shares, planned);
    if (quantity <= 0) {
      return null;
    }

    const amount = quantity * price;
    const buyPrice = this.levelBuyPrices.get(level);
    const realizedProfit = buyPrice !== undefined
      ? (price - buyPrice) * quantity
      : cappedProfit(price, this.costBasis.averageCost(), quantity, this.params.profitCapRatio);

    this.cash += amount;
    this.shares -= quantity;

    return this.record(date, 'sell', price, quantity, amount, realizedProfit, level);
  }

  /**
   * Sell the whole holding at average cost, capped like any sale without a
   * level record
   */
  closeOut(date: TradingDate, price: number): Trade | null {
    if (this.shares <= 0) {
      return null;
    }

    const quantity = this.shares;
    const amount = quantity * price;
    const realizedProfit = cappedProfit(price, this.costBasis.averageCost(), quantity, this.params.profitCapRatio);

    this.cash += amount;
    this.shares = 0;

    return this.record(date, 'sell', price, quantity, amount, realizedProfit, null, true);
  }

  markToMarket(date: TradingDate, price: number, carriedForward = false): AssetEquityPoint {
    const totalEquity = this.cash + this.shares * price;
    return {
      date,
      totalEquity,
      investedCapital: this.initialCapital - this.cash,
      profit: totalEquity - this.initialCapital,
      cash: this.cash,
      shares: this.shares,
      price,
      carriedForward,
    };
  }

  private record(
    date: TradingDate,
    side: TradeSide,
    price: number,
    quantity: number,
    amount: number,
    realizedProfit: number,
    level: number | null,
    closeOut = false
  ): Trade {
    const trade: Trade = Object.freeze({
      symbol: this.symbol,
      date,
      side,
      price,
      quantity,
      amount,
      realizedProfit,
      level,
      closeOut,
    });
    this.trades.push(trade);

    if (config.logging.verbose) {
      const where = level === null ? 'close-out' : `level ${level + 1}`;
      console.log(
        `${side === 'buy' ? '🟢' : '🔴'} ${this.symbol} ${date} ${side} ${quantity} @ ${price.toFixed(4)} ` +
        `(${where}, amount ${amount.toFixed(2)}, profit ${realizedProfit.toFixed(2)})`
      );
    }
    return trade;
  }
}

export class BacktestEngine {
  constructor(private readonly performanceAnalyzer: PerformanceAnalyzer = getPerformanceAnalyzer()) {}

  /**
   * Run a single-asset grid backtest over a daily price series
   */
  simulate(options: SimulationOptions): AssetBacktestResult {
    const gridType = parseGridType(options.gridType);
    const symbol = options.symbol ?? 'ASSET';
    const { initialCapital, levelCount } = options;
    const params = resolveGridParameters(options.params);

    if (!(initialCapital > 0)) {
      throw new ValidationError(`Initial capital must be positive, got ${initialCapital}`, { initialCapital });
    }

    const series = this.selectSeries(symbol, options.series, options.startDate, options.endDate);
    const first = series[0];

    const scheduler = new GridResetScheduler({
      symbol,
      levelCount,
      gridType,
      overrides: {
        volatility: options.volatilityOverride,
        gridSpacing: options.gridSpacingOverride,
        upperBound: options.boundsOverride?.upperBound,
        lowerBound: options.boundsOverride?.lowerBound,
      },
      estimator: options.estimator,
      params,
    });

    console.log(
      `🚀 Backtesting ${symbol}: ${series.length} days ${first.date} → ${series[series.length - 1].date}, ` +
      `capital ${initialCapital}, ${levelCount} ${gridType} levels`
    );

    // Half of the capital stays in reserve; the rest funds the grid and the opening position
    const initialInvestment = initialCapital * (1 - params.reserveRatio);
    let scheme = scheduler.initialize(first.date, first.close, initialInvestment);

    const position = new GridPosition(symbol, initialCapital, params);
    const initialPositionRatio = this.initialPositionRatio(scheme, first.close, params);
    const openingQuantity = floorToLot((initialInvestment * initialPositionRatio) / first.close, params.lotSize);
    position.buy(first.date, first.close, openingQuantity, scheme.currentLevel);
    position.equityCurve.push(position.markToMarket(first.date, first.close));

    let previousLevel = scheme.currentLevel;

    for (let i = 1; i < series.length; i++) {
      const { date, close: price } = series[i];

      const replacement = scheduler.maybeReset(date, price, position.cash);
      if (replacement) {
        scheme = replacement;
        previousLevel = replacement.currentLevel;
        position.onSchemeReplaced();
      }

      const currentLevel = findLevelIndex(scheme.levels, price);
      const crossing = detectCrossing(previousLevel, currentLevel);

      switch (crossing.kind) {
        case 'up':
          for (const level of crossing.levels) {
            position.sell(date, price, scheme.orderSizes[level], level);
          }
          break;
        case 'down':
          for (const level of crossing.levels) {
            const planned = scheme.orderSizes[level];
            if (planned > 0) {
              position.buy(date, price, sizeBuyOrder(planned, position.cash, price, params.lotSize), level);
            }
          }
          break;
        case 'none':
          break;
      }

      previousLevel = currentLevel;
      position.equityCurve.push(position.markToMarket(date, price));
    }

    const last = series[series.length - 1];
    const finalPositionValue = position.shares * last.close;
    this.carryForward(position, last, options.endDate);

    const curve = position.equityCurve;
    const finalDate = curve[curve.length - 1].date;
    if (position.closeOut(finalDate, last.close)) {
      curve[curve.length - 1] = position.markToMarket(finalDate, last.close, curve[curve.length - 1].carriedForward);
    }

    const metrics = this.performanceAnalyzer.calculateMetrics(curve, initialCapital, series.length, position.trades);

    console.log(
      `✅ ${symbol} backtest complete: final equity ${curve[curve.length - 1].totalEquity.toFixed(2)}, ` +
      `${metrics.totalTrades} trades, annual return ${metrics.annualReturnPercent.toFixed(2)}%`
    );

    return {
      symbol,
      initialCapital,
      equityCurve: curve,
      trades: position.trades,
      metrics,
      tradingDays: series.length,
      scheme,
      initialPositionRatio,
      finalPositionValue,
    };
  }

  /**
   * Opening position as a fraction of the invested half: the lower the
   * first price sits in the grid, the larger the position.
   */
  private initialPositionRatio(scheme: GridScheme, price: number, params: GridParameters): number {
    const low = scheme.levels[0];
    const high = scheme.levels[scheme.levels.length - 1];
    const relative = high > low ? Math.max(0, Math.min(1, (price - low) / (high - low))) : 0;
    return Math.max(params.minInitialPositionRatio, Math.min(params.maxInitialPositionRatio, 1 - relative));
  }

  private selectSeries(
    symbol: string,
    series: PriceSeries,
    startDate?: TradingDate,
    endDate?: TradingDate
  ): PricePoint[] {
    const inRange = series.filter(
      p => (startDate === undefined || p.date >= startDate) && (endDate === undefined || p.date <= endDate)
    );

    if (inRange.length === 0) {
      throw new InsufficientDataError(`No price data for ${symbol} in the requested range`, { symbol, startDate, endDate });
    }
    if (!isFinite(inRange[0].close) || inRange[0].close <= 0) {
      throw new InsufficientDataError(`First price of ${symbol} on ${inRange[0].date} is not usable`, {
        symbol,
        date: inRange[0].date,
      });
    }

    const minDataPoints = config.backtest.minDataPoints;
    if (inRange.length < minDataPoints) {
      throw new InsufficientDataError(
        `Only ${inRange.length} price points for ${symbol}, at least ${minDataPoints} are required`,
        { symbol, points: inRange.length }
      );
    }

    const cleaned: PricePoint[] = [];
    for (const point of inRange) {
      if (isFinite(point.close) && point.close > 0) {
        cleaned.push(point);
      } else {
        const previous = cleaned[cleaned.length - 1];
        console.warn(`⚠️  ${symbol}: unusable price on ${point.date}, carrying ${previous.close} forward`);
        cleaned.push({ date: point.date, close: previous.close });
      }
    }
    return cleaned;
  }

  /**
   * Extend the curve over the weekdays between the last price and the
   * requested end date without trading.
   */
  private carryForward(position: GridPosition, last: PricePoint, endDate?: TradingDate): void {
    if (endDate === undefined || endDate <= last.date) {
      return;
    }

    for (const date of weekdaysAfter(last.date, endDate)) {
      position.equityCurve.push(position.markToMarket(date, last.close, true));
    }
  }
}

// Singleton instance
let backtestEngineInstance: BacktestEngine | null = null;

export function getBacktestEngine(): BacktestEngine {
  if (!backtestEngineInstance) {
    backtestEngineInstance = new BacktestEngine();
  }
  return backtestEngineInstance;
}

export function simulateGridBacktest(options: SimulationOptions): AssetBacktestResult {
  return getBacktestEngine().simulate(options);
}
