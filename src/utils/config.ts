import { GridParameters } from '../types';

export const config = {
  grid: {
    lotSize: parseInt(process.env.GRID_LOT_SIZE || '100', 10),
    resetFrequencyDays: parseInt(process.env.GRID_RESET_FREQUENCY_DAYS || '30', 10),
    reserveRatio: parseFloat(process.env.GRID_RESERVE_RATIO || '0.5'),
    minInitialPositionRatio: parseFloat(process.env.GRID_MIN_INITIAL_POSITION || '0.3'),
    maxInitialPositionRatio: parseFloat(process.env.GRID_MAX_INITIAL_POSITION || '0.9'),
    profitCapRatio: parseFloat(process.env.GRID_PROFIT_CAP_RATIO || '0.2'),
    boundWidening: parseFloat(process.env.GRID_BOUND_WIDENING || '0.1'),
    allocationSlope: parseFloat(process.env.GRID_ALLOCATION_SLOPE || '1'),
    volatilityDivisor: parseFloat(process.env.GRID_VOLATILITY_DIVISOR || '8'),
    fallbackVolatility: parseFloat(process.env.GRID_FALLBACK_VOLATILITY || '0.2'),
    fallbackSpacing: parseFloat(process.env.GRID_FALLBACK_SPACING || '0.025'),
    fallbackUpperMultiplier: parseFloat(process.env.GRID_FALLBACK_UPPER || '1.3'),
    fallbackLowerMultiplier: parseFloat(process.env.GRID_FALLBACK_LOWER || '0.6'),
    invalidGridLowerMultiplier: 0.7,
    invalidGridUpperMultiplier: 1.3,
  },
  backtest: {
    minDataPoints: parseInt(process.env.BACKTEST_MIN_DATA_POINTS || '10', 10),
    maxRangeDays: parseInt(process.env.BACKTEST_MAX_RANGE_DAYS || '365', 10),
    timeoutMs: parseInt(process.env.BACKTEST_TIMEOUT_MS || '60000', 10),
    riskFreeRate: parseFloat(process.env.BACKTEST_RISK_FREE_RATE || '0.03'),
    tradingDaysPerYear: 252,
  },
  estimator: {
    shortWindow: parseInt(process.env.ESTIMATOR_SHORT_WINDOW || '200', 10),
    longWindow: parseInt(process.env.ESTIMATOR_LONG_WINDOW || '800', 10),
    shortWeight: 0.7,
    longWeight: 0.3,
  },
  logging: {
    verbose: process.env.BACKTEST_VERBOSE_LOGS === 'true',
  },
};

export function resolveGridParameters(overrides: Partial<GridParameters> = {}): GridParameters {
  return { ...config.grid, ...overrides };
}

// Validate heuristic ranges
if (config.grid.minInitialPositionRatio > config.grid.maxInitialPositionRatio) {
  console.warn('⚠️  GRID_MIN_INITIAL_POSITION exceeds GRID_MAX_INITIAL_POSITION; the clamp will pin to the maximum');
}
