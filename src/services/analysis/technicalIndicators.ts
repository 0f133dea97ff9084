/**
 * Simple returns between consecutive prices (first value is NaN)
 */
export function calculateReturns(prices: number[]): number[] {
  return prices.map((price, i) => (i === 0 ? NaN : price / prices[i - 1] - 1));
}

/**
 * Rolling sample standard deviation; NaN until the window holds `period`
 * valid values
 */
export function calculateRollingStd(values: number[], period: number): number[] {
  const result: number[] = [];
  for (let i = 0; i < values.length; i++) {
    if (i < period - 1) {
      result.push(NaN);
      continue;
    }

    const window = values.slice(i - period + 1, i + 1);
    if (period < 2 || window.some(v => !isFinite(v))) {
      result.push(NaN);
      continue;
    }

    const mean = window.reduce((a, b) => a + b, 0) / period;
    const variance = window.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0) / (period - 1);
    result.push(Math.sqrt(variance));
  }
  return result;
}

/**
 * Calculate rolling maximum
 */
export function calculateRollingMax(values: number[], period: number): number[] {
  return values.map((_, i) => (i < period - 1 ? NaN : Math.max(...values.slice(i - period + 1, i + 1))));
}

/**
 * Calculate rolling minimum
 */
export function calculateRollingMin(values: number[], period: number): number[] {
  return values.map((_, i) => (i < period - 1 ? NaN : Math.min(...values.slice(i - period + 1, i + 1))));
}
