import { Request } from 'express';
import { CalendarDayData, MonthlyBudgetPlan } from '../../data/calendar/types';
import { generateCalendar } from '../../utils/calendar/generator';
import { serializeDays } from '../../utils/calendar/normalize';
import { Services } from '../../utils/context/services';
import { NotFoundError, ValidationError } from '../../utils/errors/errors';
import { monthKey } from '../../utils/date/date';
import { getBodyField, getCalendarRequestData } from '../../utils/net/request';
import { log } from '../../utils/logger';

function readPlan(request: Request): MonthlyBudgetPlan {
  const income = getBodyField(request, 'income');
  if (typeof income !== 'number') {
    throw new ValidationError('income must be a number');
  }
  const body = request.body;
  return {
    income,
    fixed_expenses: body.fixed_expenses ?? {},
    flexible_categories: body.flexible_categories ?? {},
    region: typeof body.region === 'string' ? body.region : undefined,
  };
}

/**
 * Generates the month's budget calendar from the posted plan and stores it,
 * replacing any calendar already stored for the month.
 *
 * @param request - Express request with year/month params and a MonthlyBudgetPlan body
 * @returns The generated days in date order
 */
export function generateMonthCalendar(request: Request, services: Services): CalendarDayData[] {
  const { userId, year, month } = getCalendarRequestData(request);
  const plan = readPlan(request);
  const calendar = generateCalendar(plan, year, month, { clusterMode: services.config.clusterMode });
  const days = Object.values(calendar);
  services.calendars.save(userId, year, month, days);
  log('Generated calendar', { userId, month: monthKey(year, month), days: days.length });
  return serializeDays(days);
}

export function getMonthCalendar(request: Request, services: Services): CalendarDayData[] {
  const { userId, year, month } = getCalendarRequestData(request);
  const days = services.calendars.get(userId, year, month);
  if (!days) {
    throw new NotFoundError(`No calendar stored for ${monthKey(year, month)}`);
  }
  return serializeDays(days);
}

export function clearMonthCalendar(request: Request, services: Services): { deleted: boolean } {
  const { userId, year, month } = getCalendarRequestData(request);
  return { deleted: services.calendars.clear(userId, year, month) };
}
