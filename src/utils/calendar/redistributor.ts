import { DateString } from '../date/types';
import { parseDate } from '../date/date';
import { ValidationError } from '../errors/errors';
import { isFiniteNumber, roundToCents } from '../math/money';

export type BudgetDay = {
  total: number; // spent or committed
  limit: number; // budget for the day
};

export type BudgetTransfer = {
  from: DateString;
  to: DateString;
  amount: number;
};

export type RedistributionResult<T extends BudgetDay> = {
  calendar: Record<DateString, T>;
  transfers: BudgetTransfer[];
};

/**
 * Validates a `{ date: { total, limit } }` map from a request body
 */
export function parseBudgetDays(raw: unknown): Record<DateString, BudgetDay> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError('Calendar must be an object keyed by date');
  }
  const calendar: Record<DateString, BudgetDay> = {};
  for (const [date, day] of Object.entries(raw)) {
    parseDate(date);
    if (typeof day !== 'object' || day === null) {
      throw new ValidationError(`Day ${date} must be an object`);
    }
    const total: unknown = Reflect.get(day, 'total');
    const limit: unknown = Reflect.get(day, 'limit');
    if (!isFiniteNumber(total) || !isFiniteNumber(limit)) {
      throw new ValidationError(`Day ${date} needs numeric total and limit`);
    }
    calendar[date] = { ...day, total, limit };
  }
  return calendar;
}

/**
 * Covers overspent days with budget left unused on other days.
 *
 * Days are visited in date order. Each overspent day pulls from donors in
 * date order until covered or no donor has room left. Only limits move, so
 * totals and the sum of limits are unchanged. The input is not mutated.
 */
export function redistributeBudget<T extends BudgetDay>(calendar: Record<DateString, T>): RedistributionResult<T> {
  const updated: Record<DateString, T> = {};
  for (const [date, day] of Object.entries(calendar)) {
    updated[date] = { ...day };
  }
  const dates = Object.keys(updated).sort();
  const transfers: BudgetTransfer[] = [];

  for (const to of dates) {
    const receiver = updated[to];
    let need = roundToCents(receiver.total - receiver.limit);
    if (need <= 0) {
      continue;
    }
    for (const from of dates) {
      if (from === to) {
        continue;
      }
      const donor = updated[from];
      const available = roundToCents(donor.limit - donor.total);
      const amount = roundToCents(Math.min(need, available));
      if (amount <= 0) {
        continue;
      }
      donor.limit = roundToCents(donor.limit - amount);
      receiver.limit = roundToCents(receiver.limit + amount);
      need = roundToCents(need - amount);
      transfers.push({ from, to, amount });
      if (need <= 0) {
        break;
      }
    }
  }

  return { calendar: updated, transfers };
}
