import { CalendarDay } from '../../data/calendar/calendarDay';
import { CategoryAmounts, DayUpdates } from '../../data/calendar/types';
import { ValidationError } from '../errors/errors';
import { isFiniteNumber } from '../math/money';

function readUpdateAmounts(value: unknown, field: string): CategoryAmounts | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`${field} must be an object of category amounts`);
  }
  const amounts: CategoryAmounts = {};
  for (const [category, amount] of Object.entries(value)) {
    if (!isFiniteNumber(amount) || amount < 0) {
      throw new ValidationError(`${field}.${category} must be a number >= 0`);
    }
    amounts[category] = amount;
  }
  return amounts;
}

/**
 * Validates a day edit request body
 */
export function parseDayUpdates(body: unknown): DayUpdates {
  if (typeof body !== 'object' || body === null) {
    throw new ValidationError('Day updates must be an object');
  }
  const planned = readUpdateAmounts(Reflect.get(body, 'planned_budget'), 'planned_budget');
  const actual = readUpdateAmounts(Reflect.get(body, 'actual_spent'), 'actual_spent');
  if (!planned && !actual) {
    throw new ValidationError('Day updates need planned_budget or actual_spent');
  }
  return { planned_budget: planned, actual_spent: actual };
}

/**
 * Replaces planned and actual amounts per category.
 * Planned changes go first so statuses compare against the new plan.
 */
export function applyDayUpdates(day: CalendarDay, updates: DayUpdates): CalendarDay {
  for (const [category, amount] of Object.entries(updates.planned_budget ?? {})) {
    day.setPlanned(category, amount);
  }
  for (const [category, amount] of Object.entries(updates.actual_spent ?? {})) {
    day.setActual(category, amount);
  }
  return day;
}

/**
 * Adds an expense to a day's actual spend
 */
export function recordSpend(day: CalendarDay, category: string, amount: number): CalendarDay {
  if (category.trim() === '') {
    throw new ValidationError('Expense category is required');
  }
  if (!isFiniteNumber(amount)) {
    throw new ValidationError(`Expense amount for ${category} must be a number`);
  }
  day.addActual(category, amount);
  return day;
}
