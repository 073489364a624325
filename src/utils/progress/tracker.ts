import { ProgressComparison, ProgressRecord } from '../../data/progress/types';
import { monthKey, previousMonth } from '../date/date';
import { ValidationError } from '../errors/errors';
import { KeyValueStore } from '../io/store';
import { isFiniteNumber, roundToCents } from '../math/money';
import { log } from '../logger';

/**
 * Anything carrying a day total; a generated calendar map or a stored day list
 */
export type DayTotals = Record<string, { total: number }> | { total: number }[];

/**
 * Monthly spent/saved history per user
 */
export class ProgressTracker {
  constructor(private readonly history: KeyValueStore<ProgressRecord>) {}

  static key(userId: string, year: number, month: number): string {
    return `${userId}:${monthKey(year, month)}`;
  }

  /**
   * Records a month, replacing any earlier record for it.
   * Spent is the sum of day totals and saved is what is left of income.
   */
  logMonth(
    userId: string,
    year: number,
    month: number,
    calendar: DayTotals,
    income: number,
    country: string,
    region: string,
  ): ProgressRecord {
    if (!isFiniteNumber(income)) {
      throw new ValidationError('income must be a number');
    }
    const days = Array.isArray(calendar) ? calendar : Object.values(calendar);
    const spent = roundToCents(days.reduce((sum, day) => sum + day.total, 0));
    const record: ProgressRecord = {
      user_id: userId,
      month: monthKey(year, month),
      income,
      spent,
      saved: roundToCents(income - spent),
      country,
      region,
    };
    this.history.set(ProgressTracker.key(userId, year, month), record);
    log('Logged month progress', { userId, month: record.month, spent: record.spent, saved: record.saved });
    return record;
  }

  getMonthData(userId: string, year: number, month: number): ProgressRecord | null {
    return this.history.get(ProgressTracker.key(userId, year, month)) ?? null;
  }

  /**
   * Change from the previous calendar month, or null when either month is missing
   */
  compareToLast(userId: string, year: number, month: number): ProgressComparison | null {
    const current = this.getMonthData(userId, year, month);
    const prev = previousMonth(year, month);
    const previous = this.getMonthData(userId, prev.year, prev.month);
    if (!current || !previous) {
      return null;
    }
    return {
      spent_change: roundToCents(current.spent - previous.spent),
      saved_change: roundToCents(current.saved - previous.saved),
    };
  }
}
