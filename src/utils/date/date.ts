import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { ValidationError } from '../errors/errors';
import { DateString, MonthKey, YearMonth } from './types';

dayjs.extend(utc);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): DateString {
  return dayjs.utc(date).format('YYYY-MM-DD');
}

/**
 * Parses a strict `YYYY-MM-DD` string as a UTC date.
 * Rejects anything dayjs would roll over, such as `2025-02-30`.
 */
export function parseDate(date: string): Date {
  if (typeof date !== 'string' || !ISO_DATE.test(date)) {
    throw new ValidationError(`Invalid date '${date}'`);
  }
  const parsed = dayjs.utc(date);
  if (!parsed.isValid() || parsed.format('YYYY-MM-DD') !== date) {
    throw new ValidationError(`Invalid date '${date}'`);
  }
  return parsed.toDate();
}

export function today(): DateString {
  return formatDate(new Date());
}

/**
 * Years are limited to four digits, the range `YYYY-MM-DD` keys can hold
 */
export function validateYearMonth(year: number, month: number): void {
  if (!Number.isInteger(year) || year < 1000 || year > 9999) {
    throw new ValidationError(`Invalid year '${year}'`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError(`Invalid month '${month}'`);
  }
}

function startOfMonth(year: number, month: number): dayjs.Dayjs {
  return dayjs.utc(new Date(Date.UTC(year, month - 1, 1)));
}

export function daysInMonth(year: number, month: number): number {
  validateYearMonth(year, month);
  return startOfMonth(year, month).daysInMonth();
}

/**
 * All dates of a month in order, first to last
 */
export function datesOfMonth(year: number, month: number): DateString[] {
  const first = startOfMonth(year, month);
  const count = daysInMonth(year, month);
  return Array.from({ length: count }, (_, i) => first.add(i, 'day').format('YYYY-MM-DD'));
}

export function monthKey(year: number, month: number): MonthKey {
  validateYearMonth(year, month);
  return startOfMonth(year, month).format('YYYY-MM');
}

/**
 * The calendar month before the given one, rolling January back to December
 */
export function previousMonth(year: number, month: number): YearMonth {
  validateYearMonth(year, month);
  const prev = startOfMonth(year, month).subtract(1, 'month');
  return { year: prev.year(), month: prev.month() + 1 };
}

export function isWeekend(date: DateString): boolean {
  const day = dayjs.utc(parseDate(date)).day();
  return day === 0 || day === 6;
}

/** 0 = Sunday ... 6 = Saturday */
export function dayOfWeek(date: DateString): number {
  return dayjs.utc(parseDate(date)).day();
}

export function addDays(date: DateString, days: number): DateString {
  return dayjs.utc(parseDate(date)).add(days, 'day').format('YYYY-MM-DD');
}

/**
 * Whole days from `from` to `to`; negative when `to` is earlier
 */
export function daysBetween(from: DateString, to: DateString): number {
  return dayjs.utc(parseDate(to)).diff(dayjs.utc(parseDate(from)), 'day');
}

export function isSameMonth(date: DateString, year: number, month: number): boolean {
  const parsed = dayjs.utc(parseDate(date));
  return parsed.year() === year && parsed.month() + 1 === month;
}
