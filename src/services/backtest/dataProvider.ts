import { PricePoint, PriceProvider, TradingDate } from '../../types';
import { config } from '../../utils/config';
import { addDays, daysBetween, isWeekday } from '../../utils/dateUtils';
import { ValidationError } from '../../utils/errors';

export interface BacktestData {
  symbol: string;
  series: PricePoint[];
  startDate: TradingDate;
  endDate: TradingDate;
}

/**
 * Clean a raw closing-price series for the simulator.
 *
 * Unusable prices are dropped, duplicate dates keep their last value, and
 * every weekday between the first and last observation gets a price, carried
 * forward from the previous one where missing. The result is clipped to
 * `[startDate, endDate]`.
 */
export function prepareSeries(raw: readonly PricePoint[], startDate: TradingDate, endDate: TradingDate): PricePoint[] {
  const byDate = new Map<TradingDate, number>();
  for (const point of raw) {
    if (isFinite(point.close) && point.close > 0) {
      byDate.set(point.date, point.close);
    }
  }
  if (byDate.size === 0) {
    return [];
  }

  const dates = [...byDate.keys()].sort();
  const lastDate = dates[dates.length - 1];
  const series: PricePoint[] = [];
  let carried: number | undefined;

  for (let date = dates[0]; date <= lastDate; date = addDays(date, 1)) {
    carried = byDate.get(date) ?? carried;
    if (carried !== undefined && isWeekday(date) && date >= startDate && date <= endDate) {
      series.push({ date, close: carried });
    }
  }

  return series;
}

/**
 * Validate a backtest date range, shortening it to the most recent
 * `maxRangeDays` when it is longer.
 */
export function clampDateRange(
  startDate: TradingDate,
  endDate: TradingDate,
  maxRangeDays: number = config.backtest.maxRangeDays
): { startDate: TradingDate; endDate: TradingDate } {
  if (startDate > endDate) {
    throw new ValidationError('Start date must not be after end date', { startDate, endDate });
  }

  const rangeDays = daysBetween(startDate, endDate);
  if (rangeDays > maxRangeDays) {
    const clampedStart = addDays(endDate, -maxRangeDays);
    console.warn(`⚠️  Backtest range of ${rangeDays} days exceeds ${maxRangeDays}, starting at ${clampedStart} instead`);
    return { startDate: clampedStart, endDate };
  }

  return { startDate, endDate };
}

export class DataProvider {
  constructor(private readonly priceProvider: PriceProvider) {}

  /**
   * Fetch and prepare the daily closing prices of a symbol for backtesting
   */
  async getHistoricalData(symbol: string, startDate: TradingDate, endDate: TradingDate): Promise<BacktestData> {
    let raw: PricePoint[];
    try {
      raw = await this.priceProvider.getPrices(symbol, startDate, endDate);
    } catch (error) {
      console.error(`Error fetching historical data for ${symbol}:`, error);
      throw error;
    }

    const series = prepareSeries(raw, startDate, endDate);
    console.log(`📈 ${symbol}: ${series.length} trading days between ${startDate} and ${endDate}`);

    return { symbol, series, startDate, endDate };
  }
}
