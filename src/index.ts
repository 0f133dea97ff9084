export * from './types';
export { config, resolveGridParameters } from './utils/config';
export {
  AppError,
  BacktestTimeoutError,
  InsufficientDataError,
  InvalidGridTypeError,
  ValidationError,
} from './utils/errors';
export {
  allocateOrderSizes,
  buildGridScheme,
  findLevelIndex,
  parseGridType,
  widenBounds,
} from './strategies/gridScheme';
export type { GridSchemeInput } from './strategies/gridScheme';
export { GridResetScheduler } from './strategies/gridResetScheduler';
export type { GridResetSchedulerOptions } from './strategies/gridResetScheduler';
export { detectCrossing } from './strategies/levelCrossing';
export type { LevelCrossing } from './strategies/levelCrossing';
export { BacktestEngine, getBacktestEngine, simulateGridBacktest } from './services/backtest/backtestEngine';
export type { SimulationOptions } from './services/backtest/backtestEngine';
export { PerformanceAnalyzer, analyzePerformance, getPerformanceAnalyzer } from './services/backtest/performanceAnalyzer';
export {
  PortfolioAggregator,
  aggregatePortfolio,
  getPortfolioAggregator,
  mergeEquityCurves,
} from './services/backtest/portfolioAggregator';
export type { PortfolioAsset, PortfolioOptions } from './services/backtest/portfolioAggregator';
export { DataProvider, clampDateRange, prepareSeries } from './services/backtest/dataProvider';
export { BacktestService, runBacktestSchema } from './services/backtest/backtestService';
export type { BacktestOutcome, RunBacktestInput } from './services/backtest/backtestService';
export { RollingVolatilityEstimator, suggestGridParameters } from './services/analysis/volatilityEstimator';
export type { GridParameterSuggestion } from './services/analysis/volatilityEstimator';
