import { TradingDate } from '../types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 86400000;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && formatDate(parsed) === value;
}

/**
 * Parse a `YYYY-MM-DD` date at UTC midnight
 */
export function parseDate(value: TradingDate): Date {
  return new Date(`${value}T00:00:00Z`);
}

export function formatDate(date: Date): TradingDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(value: TradingDate, days: number): TradingDate {
  return formatDate(new Date(parseDate(value).getTime() + days * MS_PER_DAY));
}

export function daysBetween(start: TradingDate, end: TradingDate): number {
  return Math.round((parseDate(end).getTime() - parseDate(start).getTime()) / MS_PER_DAY);
}

export function isWeekday(value: TradingDate): boolean {
  const day = parseDate(value).getUTCDay();
  return day !== 0 && day !== 6;
}

/** `YYYY-MM` of a trading date. */
export function monthKey(value: TradingDate): string {
  return value.slice(0, 7);
}

/**
 * Weekdays strictly after `start` up to and including `end`
 */
export function weekdaysAfter(start: TradingDate, end: TradingDate): TradingDate[] {
  const dates: TradingDate[] = [];
  let current = addDays(start, 1);
  while (current <= end) {
    if (isWeekday(current)) {
      dates.push(current);
    }
    current = addDays(current, 1);
  }
  return dates;
}
