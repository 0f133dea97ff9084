export type GridType = 'arithmetic' | 'geometric' | 'volatility';

export const GRID_TYPES: readonly GridType[] = ['arithmetic', 'geometric', 'volatility'];

export type TradeSide = 'buy' | 'sell';

export type BacktestMode = 'single' | 'portfolio';

/** Trading date in `YYYY-MM-DD` form. */
export type TradingDate = string;

export interface PricePoint {
  date: TradingDate;
  close: number;
}

export type PriceSeries = readonly PricePoint[];

export interface GridScheme {
  readonly gridType: GridType;
  readonly levels: readonly number[];
  readonly orderSizes: readonly number[];
  readonly currentLevel: number;
  readonly upperBound: number;
  readonly lowerBound: number;
  readonly spacing: number;
}

export interface Trade {
  readonly symbol: string;
  readonly date: TradingDate;
  readonly side: TradeSide;
  readonly price: number;
  readonly quantity: number;
  readonly amount: number;
  readonly realizedProfit: number;
  readonly level: number | null;
  readonly closeOut: boolean;
}

export interface EquityPoint {
  date: TradingDate;
  totalEquity: number;
  investedCapital: number;
  profit: number;
}

export interface AssetEquityPoint extends EquityPoint {
  cash: number;
  shares: number;
  price: number;
  carriedForward: boolean;
}

export interface PerformanceMetrics {
  totalReturn: number;
  totalReturnPercent: number;
  annualReturnPercent: number;
  sharpeRatio: number;
  maxDrawdownPercent: number;
  winRate: number;
  totalTrades: number;
  buyCount: number;
  sellCount: number;
  winCount: number;
  gridProfitPercent: number;
}

export interface BacktestResult<P extends EquityPoint = EquityPoint> {
  equityCurve: P[];
  trades: Trade[];
  metrics: PerformanceMetrics;
  tradingDays: number;
}

export interface AssetBacktestResult extends BacktestResult<AssetEquityPoint> {
  symbol: string;
  initialCapital: number;
  scheme: GridScheme;
  initialPositionRatio: number;
  finalPositionValue: number;
}

export interface PortfolioBacktestResult extends BacktestResult<EquityPoint> {
  symbols: string[];
  initialCapital: number;
  assets: AssetBacktestResult[];
}

export interface VolatilityEstimate {
  volatility: number;
  upperBound: number;
  lowerBound: number;
}

/**
 * External estimator of volatility and trading range for a symbol.
 * Values may be NaN when the history is too short; callers fall back.
 */
export interface VolatilityEstimator {
  estimate(symbol: string, asOf: TradingDate): VolatilityEstimate;
}

/** Supplies a daily closing-price series for a symbol and date range. */
export interface PriceProvider {
  getPrices(symbol: string, startDate: TradingDate, endDate: TradingDate): Promise<PricePoint[]>;
}

export interface GridOverrides {
  volatility?: number;
  gridSpacing?: number;
  upperBound?: number;
  lowerBound?: number;
}

/** Heuristic constants of the grid policy; any subset may be overridden per run. */
export interface GridParameters {
  lotSize: number;
  resetFrequencyDays: number;
  reserveRatio: number;
  minInitialPositionRatio: number;
  maxInitialPositionRatio: number;
  profitCapRatio: number;
  boundWidening: number;
  allocationSlope: number;
  volatilityDivisor: number;
  fallbackVolatility: number;
  fallbackSpacing: number;
  fallbackUpperMultiplier: number;
  fallbackLowerMultiplier: number;
  invalidGridLowerMultiplier: number;
  invalidGridUpperMultiplier: number;
}
