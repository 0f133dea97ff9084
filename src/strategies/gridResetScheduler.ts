import {
  GridOverrides,
  GridParameters,
  GridScheme,
  GridType,
  TradingDate,
  VolatilityEstimate,
  VolatilityEstimator,
} from '../types';
import { config, resolveGridParameters } from '../utils/config';
import { monthKey } from '../utils/dateUtils';
import { buildGridScheme } from './gridScheme';

export interface GridResetSchedulerOptions {
  symbol: string;
  levelCount: number;
  gridType: GridType;
  overrides?: GridOverrides;
  estimator?: VolatilityEstimator;
  params?: GridParameters;
}

/**
 * Decides when the active grid is rebuilt and rebuilds it: on the first
 * trading day, when the month changes, and after a fixed number of trading
 * days without a reset. The scheme is replaced as a whole on every reset.
 */
export class GridResetScheduler {
  private readonly options: GridResetSchedulerOptions;
  private readonly params: GridParameters;
  private scheme: GridScheme | null = null;
  private lastResetDay: TradingDate | null = null;
  private lastResetMonth: string | null = null;
  private lastSeenDay: TradingDate | null = null;
  private daysSinceReset = 0;

  constructor(options: GridResetSchedulerOptions) {
    this.options = options;
    this.params = options.params ?? resolveGridParameters();
  }

  getScheme(): GridScheme | null {
    return this.scheme;
  }

  /**
   * Build the first grid of a run unconditionally
   */
  initialize(day: TradingDate, price: number, availableCapital: number): GridScheme {
    this.lastSeenDay = day;
    return this.reset(day, price, availableCapital);
  }

  /**
   * Rebuild the grid when a reset is due for `day`.
   * Returns the new scheme, or null when the active one stays in place.
   */
  maybeReset(day: TradingDate, price: number, availableCapital: number): GridScheme | null {
    // A reset is keyed by its trading day
    if (this.scheme && day === this.lastResetDay) {
      return this.scheme;
    }

    if (day !== this.lastSeenDay) {
      this.lastSeenDay = day;
      if (this.scheme) {
        this.daysSinceReset++;
      }
    }

    const due =
      this.scheme === null ||
      monthKey(day) !== this.lastResetMonth ||
      this.daysSinceReset >= this.params.resetFrequencyDays;

    if (!due) {
      return null;
    }

    return this.reset(day, price, availableCapital);
  }

  private reset(day: TradingDate, price: number, availableCapital: number): GridScheme {
    const { symbol, levelCount, gridType, overrides = {} } = this.options;
    const estimate = this.needsEstimate() ? this.lookupEstimate(day) : null;
    const { upperBound, lowerBound } = this.resolveBounds(day, price, estimate);

    const scheme = buildGridScheme(
      {
        currentPrice: price,
        upperBound,
        lowerBound,
        volatility: this.resolveVolatility(day, estimate),
        levelCount,
        gridType,
        capital: availableCapital,
        gridSpacing: overrides.gridSpacing,
      },
      this.params
    );

    if (config.logging.verbose) {
      console.log(`🔄 ${symbol}: grid reset on ${day} at ${price.toFixed(4)} with ${availableCapital.toFixed(2)} available`);
    }

    this.scheme = scheme;
    this.lastResetDay = day;
    this.lastResetMonth = monthKey(day);
    this.daysSinceReset = 0;
    return scheme;
  }

  private usesVolatility(): boolean {
    return this.options.gridType === 'volatility' && this.options.overrides?.gridSpacing === undefined;
  }

  private needsEstimate(): boolean {
    const overrides = this.options.overrides ?? {};
    const missingBounds = overrides.upperBound === undefined || overrides.lowerBound === undefined;
    const missingVolatility = overrides.volatility === undefined && this.usesVolatility();
    return missingBounds || missingVolatility;
  }

  private lookupEstimate(day: TradingDate): VolatilityEstimate | null {
    const { estimator, symbol } = this.options;
    if (!estimator) {
      return null;
    }

    try {
      return estimator.estimate(symbol, day);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️  ${symbol}: volatility estimate for ${day} failed (${message}), using defaults`);
      return null;
    }
  }

  private resolveBounds(
    day: TradingDate,
    price: number,
    estimate: VolatilityEstimate | null
  ): { upperBound: number; lowerBound: number } {
    const overrides = this.options.overrides ?? {};
    const bothOverridden = overrides.upperBound !== undefined && overrides.lowerBound !== undefined;
    const upperBound = bothOverridden ? overrides.upperBound : estimate?.upperBound;
    const lowerBound = bothOverridden ? overrides.lowerBound : estimate?.lowerBound;

    if (upperBound !== undefined && lowerBound !== undefined && isFinite(upperBound) && isFinite(lowerBound)) {
      return { upperBound, lowerBound };
    }

    console.warn(`⚠️  ${this.options.symbol}: no usable grid range on ${day}, using price multiples`);
    return {
      upperBound: price * this.params.fallbackUpperMultiplier,
      lowerBound: price * this.params.fallbackLowerMultiplier,
    };
  }

  private resolveVolatility(day: TradingDate, estimate: VolatilityEstimate | null): number {
    const volatility = this.options.overrides?.volatility ?? estimate?.volatility;
    if (volatility !== undefined && isFinite(volatility)) {
      return volatility;
    }

    if (this.usesVolatility()) {
      console.warn(`⚠️  ${this.options.symbol}: volatility for ${day} is unavailable, using ${this.params.fallbackVolatility}`);
    }
    return this.params.fallbackVolatility;
  }
}
