import { CalendarDay } from '../../data/calendar/calendarDay';
import { CategoryAmounts, MonthlyBudgetPlan } from '../../data/calendar/types';
import { ClusterMode } from '../config/config';
import { datesOfMonth, dayOfWeek, validateYearMonth } from '../date/date';
import { DateString } from '../date/types';
import { ValidationError } from '../errors/errors';
import { isFiniteNumber, sumAmounts } from '../math/money';
import { debug } from '../logger';
import { getBehavior } from './behaviors';

export type GenerateOptions = {
  clusterMode?: ClusterMode;
};

const FRIDAY = 5;
const SATURDAY = 6;

function validateAmounts(amounts: unknown, field: string, allowNegative: boolean): CategoryAmounts {
  if (typeof amounts !== 'object' || amounts === null || Array.isArray(amounts)) {
    throw new ValidationError(`${field} must be an object of category amounts`);
  }
  const validated: CategoryAmounts = {};
  for (const [category, amount] of Object.entries(amounts)) {
    if (!isFiniteNumber(amount)) {
      throw new ValidationError(`${field}.${category} must be a number`);
    }
    if (!allowNegative && amount < 0) {
      throw new ValidationError(`${field}.${category} must be >= 0`);
    }
    validated[category] = amount;
  }
  return validated;
}

/**
 * Checks a plan before any allocation happens.
 * A non-empty flexible map whose weights sum to zero cannot be divided up.
 */
export function validatePlan(plan: MonthlyBudgetPlan): MonthlyBudgetPlan {
  if (!isFiniteNumber(plan.income)) {
    throw new ValidationError('income must be a number');
  }
  const fixedExpenses = validateAmounts(plan.fixed_expenses ?? {}, 'fixed_expenses', true);
  const flexibleCategories = validateAmounts(plan.flexible_categories ?? {}, 'flexible_categories', false);
  if (Object.keys(flexibleCategories).length > 0 && sumAmounts(flexibleCategories) === 0) {
    throw new ValidationError('flexible_categories weights must sum to more than zero');
  }
  return {
    income: plan.income,
    fixed_expenses: fixedExpenses,
    flexible_categories: flexibleCategories,
    region: plan.region ?? 'US-CA',
  };
}

function isClusterDay(date: DateString, idx: number, clusterMode: ClusterMode): boolean {
  if (clusterMode === 'weekday') {
    const weekday = dayOfWeek(date);
    return weekday === FRIDAY || weekday === SATURDAY;
  }
  // Positions 4 and 5 of each week of the sequence, whatever weekday the month starts on
  return idx % 7 === 4 || idx % 7 === 5;
}

/**
 * Builds one budget day per day of the month.
 *
 * Fixed expenses land in full on day 1. What is left of the income is shared
 * between flexible categories by weight and laid out per category behavior:
 * - spread: the daily share on every day
 * - clustered: twice the daily share on cluster days only
 * - fixed: the whole monthly share on day 1
 *
 * A negative remainder yields negative allocations.
 *
 * @param plan - Income, fixed expenses and flexible weights
 * @param year - Four-digit year
 * @param month - 1-12
 * @returns Days keyed by ISO date, in date order
 */
export function generateCalendar(
  plan: MonthlyBudgetPlan,
  year: number,
  month: number,
  options: GenerateOptions = {},
): Record<DateString, CalendarDay> {
  validateYearMonth(year, month);
  const { income, fixed_expenses, flexible_categories } = validatePlan(plan);
  const clusterMode = options.clusterMode ?? 'position';

  const dates = datesOfMonth(year, month);
  const days = dates.map((date) => new CalendarDay({ date }));
  const firstDay = days[0];

  for (const [category, amount] of Object.entries(fixed_expenses)) {
    firstDay.addPlanned(category, amount);
  }

  const remaining = income - sumAmounts(fixed_expenses);
  const totalWeight = sumAmounts(flexible_categories);

  for (const [category, weight] of Object.entries(flexible_categories)) {
    const monthlyShare = (remaining * weight) / totalWeight;
    const dailyAmount = monthlyShare / days.length;
    const behavior = getBehavior(category);

    switch (behavior) {
      case 'spread':
        days.forEach((day) => day.addPlanned(category, dailyAmount));
        break;
      case 'clustered':
        days.forEach((day, idx) => {
          if (isClusterDay(day.date, idx, clusterMode)) {
            day.addPlanned(category, dailyAmount * 2);
          }
        });
        break;
      case 'fixed':
        firstDay.addPlanned(category, monthlyShare);
        break;
    }
  }

  debug('Generated calendar', { year, month, days: days.length, remaining });

  const calendar: Record<DateString, CalendarDay> = {};
  for (const day of days) {
    calendar[day.date] = day;
  }
  return calendar;
}
