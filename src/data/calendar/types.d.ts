import { DateString } from '../../utils/date/types';

export type DayType = 'weekday' | 'weekend';

export type CategoryAmounts = Record<string, number>;

/**
 * Per-category day status. The engine writes 'ok' or 'overspent';
 * stored calendars may carry other values such as 'pending'.
 */
export type CategoryStatuses = Record<string, string>;

export type CalendarDayData = {
  date: DateString;
  type: DayType;
  planned_budget: CategoryAmounts;
  total: number;
  actual_spent: CategoryAmounts;
  status: CategoryStatuses;
};

export type MonthlyBudgetPlan = {
  income: number;
  fixed_expenses: CategoryAmounts;
  flexible_categories: CategoryAmounts; // relative weights
  region?: string;
};

export type SpreadBehavior = 'spread' | 'clustered' | 'fixed';

export type DayUpdates = {
  planned_budget?: CategoryAmounts;
  actual_spent?: CategoryAmounts;
};

/**
 * The minimum the streak check reads from a day
 */
export type StreakDay = {
  date: DateString;
  status?: CategoryStatuses;
};
