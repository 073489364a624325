import { Request } from 'express';
import { BudgetDay, BudgetTransfer, parseBudgetDays, redistributeBudget } from '../../utils/calendar/redistributor';
import { getBodyField } from '../../utils/net/request';
import { DateString } from '../../utils/date/types';

/**
 * Returns the posted calendar with unused budget moved onto overspent days
 *
 * @param request - Body `{ calendar: { "YYYY-MM-DD": { total, limit } } }`
 */
export function redistribute(request: Request): {
  updated_calendar: Record<DateString, BudgetDay>;
  transfers: BudgetTransfer[];
} {
  const calendar = parseBudgetDays(getBodyField(request, 'calendar'));
  const { calendar: updated, transfers } = redistributeBudget(calendar);
  return { updated_calendar: updated, transfers };
}
