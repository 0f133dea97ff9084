import { z } from 'zod';
import {
  AssetBacktestResult,
  PortfolioBacktestResult,
  PricePoint,
  PriceProvider,
  PriceSeries,
  TradingDate,
  VolatilityEstimator,
} from '../../types';
import { RollingVolatilityEstimator } from '../analysis/volatilityEstimator';
import { parseGridType } from '../../strategies/gridScheme';
import { checkDeadline, withTimeout } from '../../utils/async';
import { config } from '../../utils/config';
import { addDays, isIsoDate } from '../../utils/dateUtils';
import { ValidationError } from '../../utils/errors';
import { BacktestEngine, getBacktestEngine } from './backtestEngine';
import { DataProvider, clampDateRange, prepareSeries } from './dataProvider';
import { PortfolioAggregator, getPortfolioAggregator } from './portfolioAggregator';

const isoDate = z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' });

export const runBacktestSchema = z
  .object({
    mode: z.enum(['single', 'portfolio']).default('single'),
    symbols: z.array(z.string().min(1)).min(1),
    initialCapital: z.number().positive(),
    startDate: isoDate,
    endDate: isoDate,
    gridLevels: z.number().int().min(3),
    gridType: z.string(),
    volatility: z.number().finite().positive().optional(),
    gridSpacing: z.number().finite().positive().optional(),
    gridRangeUpper: z.number().finite().positive().optional(),
    gridRangeLower: z.number().finite().positive().optional(),
  })
  .refine(
    r => r.gridRangeUpper === undefined || r.gridRangeLower === undefined || r.gridRangeUpper > r.gridRangeLower,
    { message: 'gridRangeUpper must be above gridRangeLower', path: ['gridRangeUpper'] }
  );

export type RunBacktestInput = z.input<typeof runBacktestSchema>;
export type RunBacktestRequest = z.output<typeof runBacktestSchema>;

export type BacktestOutcome =
  | { mode: 'single'; result: AssetBacktestResult }
  | { mode: 'portfolio'; result: PortfolioBacktestResult };

export interface BacktestServiceOptions {
  estimator?: VolatilityEstimator; // Defaults to a rolling estimator over fetched history
  engine?: BacktestEngine;
  aggregator?: PortfolioAggregator;
  timeoutMs?: number;
}

interface FetchedSymbol {
  symbol: string;
  series: PricePoint[];
  history: PricePoint[];
}

export class BacktestService {
  private readonly dataProvider: DataProvider;
  private readonly engine: BacktestEngine;
  private readonly aggregator: PortfolioAggregator;
  private readonly timeoutMs: number;

  constructor(
    priceProvider: PriceProvider,
    private readonly options: BacktestServiceOptions = {}
  ) {
    this.dataProvider = new DataProvider(priceProvider);
    this.engine = options.engine ?? getBacktestEngine();
    this.aggregator = options.aggregator ?? getPortfolioAggregator();
    this.timeoutMs = options.timeoutMs ?? config.backtest.timeoutMs;
  }

  /**
   * Validate a backtest request and run it within the configured timeout
   */
  async runBacktest(input: unknown): Promise<BacktestOutcome> {
    const parsed = runBacktestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid backtest request', { issues: parsed.error.issues });
    }

    const request = parsed.data;
    parseGridType(request.gridType);

    console.log(`🧪 Backtest request (${request.mode}): ${request.symbols.join(', ')} ${request.startDate} → ${request.endDate}`);

    const context = { mode: request.mode, symbols: request.symbols };
    try {
      return await withTimeout(this.execute(request, Date.now() + this.timeoutMs), this.timeoutMs, context);
    } catch (error) {
      console.error(`❌ Backtest failed for ${request.symbols.join(', ')}:`, error instanceof Error ? error.message : error);
      throw error;
    }
  }

  private async execute(request: RunBacktestRequest, deadline: number): Promise<BacktestOutcome> {
    const { startDate, endDate } = clampDateRange(request.startDate, request.endDate);
    const symbols = request.mode === 'single' ? request.symbols.slice(0, 1) : request.symbols;
    if (request.symbols.length > symbols.length) {
      console.warn(
        `⚠️  Single-asset backtest runs ${symbols.join(', ')} only, ignoring ${request.symbols.slice(1).join(', ')}`
      );
    }

    const fetched: FetchedSymbol[] = [];
    for (const symbol of symbols) {
      checkDeadline(deadline, this.timeoutMs, { symbol });
      fetched.push(await this.fetchSymbol(symbol, startDate, endDate));
    }
    checkDeadline(deadline, this.timeoutMs);

    const estimator = this.options.estimator ?? new RollingVolatilityEstimator(
      new Map<string, PriceSeries>(fetched.map(f => [f.symbol, f.history]))
    );

    if (request.mode === 'single') {
      const [asset] = fetched;
      const { gridRangeUpper, gridRangeLower } = request;
      const result = this.engine.simulate({
        series: asset.series,
        symbol: asset.symbol,
        initialCapital: request.initialCapital,
        levelCount: request.gridLevels,
        gridType: request.gridType,
        startDate,
        endDate,
        volatilityOverride: request.volatility,
        gridSpacingOverride: request.gridSpacing,
        boundsOverride: gridRangeUpper !== undefined && gridRangeLower !== undefined
          ? { upperBound: gridRangeUpper, lowerBound: gridRangeLower }
          : undefined,
        estimator,
      });
      return { mode: 'single', result };
    }

    const result = this.aggregator.aggregate({
      assets: fetched.map(f => ({ symbol: f.symbol, series: f.series })),
      initialCapital: request.initialCapital,
      levelCount: request.gridLevels,
      gridType: request.gridType,
      startDate,
      endDate,
      estimator,
    });
    return { mode: 'portfolio', result };
  }

  /**
   * Fetch the backtest range plus enough earlier history for the estimator's
   * long window
   */
  private async fetchSymbol(symbol: string, startDate: TradingDate, endDate: TradingDate): Promise<FetchedSymbol> {
    const lookbackDays = Math.ceil((config.estimator.longWindow * 7) / 5);
    const historyStart = addDays(startDate, -lookbackDays);
    const data = await this.dataProvider.getHistoricalData(symbol, historyStart, endDate);

    return {
      symbol,
      series: prepareSeries(data.series, startDate, endDate),
      history: data.series,
    };
  }
}
