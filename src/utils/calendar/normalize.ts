import { CalendarDay } from '../../data/calendar/calendarDay';
import { CalendarDayData, CategoryAmounts, CategoryStatuses, DayType } from '../../data/calendar/types';
import { parseDate } from '../date/date';
import { ValidationError } from '../errors/errors';
import { isFiniteNumber } from '../math/money';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAmount(value: unknown, field: string, date: string): number {
  if (!isFiniteNumber(value)) {
    throw new ValidationError(`Day ${date}: ${field} must be a number`);
  }
  return value;
}

function readAmounts(value: unknown, field: string, date: string): CategoryAmounts {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ValidationError(`Day ${date}: ${field} must be an object`);
  }
  const amounts: CategoryAmounts = {};
  for (const [category, amount] of Object.entries(value)) {
    amounts[category] = readAmount(amount, `${field}.${category}`, date);
  }
  return amounts;
}

function readStatuses(value: unknown, date: string): CategoryStatuses {
  // Day-level status strings ('active', 'pending') carry no category detail
  if (value === undefined || value === null || typeof value === 'string') {
    return {};
  }
  if (!isRecord(value)) {
    throw new ValidationError(`Day ${date}: status must be an object`);
  }
  const statuses: CategoryStatuses = {};
  for (const [category, status] of Object.entries(value)) {
    if (typeof status !== 'string') {
      throw new ValidationError(`Day ${date}: status.${category} must be a string`);
    }
    statuses[category] = status;
  }
  return statuses;
}

function readDayType(value: unknown, date: string): DayType | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value !== 'weekday' && value !== 'weekend') {
    throw new ValidationError(`Day ${date}: type must be 'weekday' or 'weekend'`);
  }
  return value;
}

/**
 * Saved plans store each category as `{ planned, spent, status }`.
 * Splits them into the three flat maps.
 */
function splitCategoryRows(rows: RawRecord, date: string) {
  const planned: CategoryAmounts = {};
  const actual: CategoryAmounts = {};
  const status: CategoryStatuses = {};
  for (const [category, row] of Object.entries(rows)) {
    if (!isRecord(row)) {
      throw new ValidationError(`Day ${date}: planned_budget.${category} must be an object`);
    }
    planned[category] = readAmount(row.planned ?? 0, `planned_budget.${category}.planned`, date);
    if (row.spent !== undefined && row.spent !== null) {
      actual[category] = readAmount(row.spent, `planned_budget.${category}.spent`, date);
    }
    if (typeof row.status === 'string') {
      status[category] = row.status;
    }
  }
  return { planned, actual, status };
}

/**
 * Converts a stored or submitted day into the canonical shape.
 *
 * Accepts the legacy field names `planned`, `actual` and `day_type`, and
 * per-category `{ planned, spent, status }` rows. Canonical names win when
 * both are present. `type` is derived from the date when absent and `total`
 * is always recomputed.
 */
export function normalizeDay(raw: unknown): CalendarDay {
  if (!isRecord(raw)) {
    throw new ValidationError('Calendar day must be an object');
  }
  if (typeof raw.date !== 'string') {
    throw new ValidationError('Calendar day is missing its date');
  }
  const date = raw.date;
  parseDate(date);

  const plannedSource = raw.planned_budget ?? raw.planned;
  const actualSource = raw.actual_spent ?? raw.actual;
  let planned: CategoryAmounts;
  let actual = readAmounts(actualSource, 'actual_spent', date);
  let status = readStatuses(raw.status, date);

  if (isRecord(plannedSource) && Object.values(plannedSource).some(isRecord)) {
    const split = splitCategoryRows(plannedSource, date);
    planned = split.planned;
    actual = { ...split.actual, ...actual };
    status = { ...split.status, ...status };
  } else {
    planned = readAmounts(plannedSource, 'planned_budget', date);
  }

  return new CalendarDay({
    date,
    type: readDayType(raw.type ?? raw.day_type, date),
    planned_budget: planned,
    actual_spent: actual,
    status,
  });
}

export function normalizeDays(raw: unknown): CalendarDay[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError('Calendar must be a list of days');
  }
  return raw.map((day) => normalizeDay(day));
}

export function serializeDays(days: CalendarDay[]): CalendarDayData[] {
  return days.map((day) => day.serialize());
}
