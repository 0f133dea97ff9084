import { PricePoint, TradingDate } from '../../src/types';
import { addDays, isWeekday } from '../../src/utils/dateUtils';

/**
 * `count` consecutive weekdays starting at `start` (or the next weekday)
 */
export function weekdays(start: TradingDate, count: number): TradingDate[] {
  const dates: TradingDate[] = [];
  let current = start;
  while (dates.length < count) {
    if (isWeekday(current)) {
      dates.push(current);
    }
    current = addDays(current, 1);
  }
  return dates;
}

export function seriesFrom(start: TradingDate, closes: number[]): PricePoint[] {
  return weekdays(start, closes.length).map((date, i) => ({ date, close: closes[i] }));
}

export function linearCloses(from: number, to: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => from + ((to - from) * i) / (count - 1));
}
