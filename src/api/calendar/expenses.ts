import { Request } from 'express';
import { Services } from '../../utils/context/services';
import { monthKey } from '../../utils/date/date';
import { NotFoundError, ValidationError } from '../../utils/errors/errors';
import { exportCalendarCsv, importExpensesCsv } from '../../utils/io/expensesCsv';
import { getCalendarRequestData } from '../../utils/net/request';
import { log } from '../../utils/logger';

/**
 * Imports a CSV of expenses (`date,category,amount`) into the stored month
 */
export function importExpenses(request: Request, services: Services): { imported: number } {
  const { userId, year, month } = getCalendarRequestData(request);
  if (typeof request.body !== 'string' || request.body.trim() === '') {
    throw new ValidationError('Expected a text/csv body');
  }
  const days = services.calendars.get(userId, year, month);
  if (!days) {
    throw new NotFoundError(`No calendar stored for ${monthKey(year, month)}`);
  }
  const { imported } = importExpensesCsv(request.body, days);
  services.calendars.save(userId, year, month, days);
  log('Imported expenses', { userId, month: monthKey(year, month), imported });
  return { imported };
}

export async function exportCalendar(request: Request, services: Services): Promise<string> {
  const { userId, year, month } = getCalendarRequestData(request);
  const days = services.calendars.get(userId, year, month);
  if (!days) {
    throw new NotFoundError(`No calendar stored for ${monthKey(year, month)}`);
  }
  return exportCalendarCsv(days);
}
