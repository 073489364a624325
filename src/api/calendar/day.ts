import { Request } from 'express';
import { CalendarDayData } from '../../data/calendar/types';
import { applyDayUpdates, parseDayUpdates } from '../../utils/calendar/dayEdits';
import { Services } from '../../utils/context/services';
import { NotFoundError } from '../../utils/errors/errors';
import { getDayRequestData } from '../../utils/net/request';

export function getCalendarDay(request: Request, services: Services): CalendarDayData {
  const { userId, year, month, date } = getDayRequestData(request);
  const day = services.calendars.get(userId, year, month)?.find((d) => d.date === date);
  if (!day) {
    throw new NotFoundError('Day not found');
  }
  return day.serialize();
}

/**
 * Replaces planned and actual amounts on one stored day
 *
 * @param request - Body `{ planned_budget?, actual_spent? }`
 * @returns The day after the edit, with total and statuses recomputed
 */
export function editCalendarDay(request: Request, services: Services): CalendarDayData {
  const { userId, year, month, date } = getDayRequestData(request);
  const updates = parseDayUpdates(request.body);
  return services.calendars.updateDay(userId, year, month, date, (day) => applyDayUpdates(day, updates)).serialize();
}
