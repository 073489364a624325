import { Request } from 'express';
import { datesOfMonth, parseDate, today, validateYearMonth } from '../date/date';
import { DateString } from '../date/types';
import { ApiError, ValidationError } from '../errors/errors';
import { CalendarRequestData, DayRequestData } from './types';

/**
 * Authenticated user id set by the token middleware
 * @throws ApiError 401 when the request was not authenticated
 */
export function getUserId(request: Request): string {
  if (request.userId === undefined || request.userId === '') {
    throw new ApiError('Not authenticated', 401);
  }
  return request.userId;
}

function parseIntegerParam(value: unknown, name: string): number {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new ValidationError(`Invalid ${name} '${value}'`);
  }
  return parseInt(value, 10);
}

/**
 * Extracts user, year and month from `/:year/:month` routes
 */
export function getCalendarRequestData(request: Request): CalendarRequestData {
  const year = parseIntegerParam(request.params.year, 'year');
  const month = parseIntegerParam(request.params.month, 'month');
  validateYearMonth(year, month);
  return { userId: getUserId(request), year, month };
}

/**
 * Extracts user, year, month and day from `/:year/:month/day/:day` routes
 */
export function getDayRequestData(request: Request): DayRequestData {
  const data = getCalendarRequestData(request);
  const day = parseIntegerParam(request.params.day, 'day');
  const dates = datesOfMonth(data.year, data.month);
  if (day < 1 || day > dates.length) {
    throw new ValidationError(`Invalid day '${day}'`);
  }
  return { ...data, day, date: dates[day - 1] };
}

/**
 * Reads an optional string from the query string
 */
export function getQueryString(request: Request, name: string): string | undefined {
  const value = request.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * `today_date` from the body, `date` from the query, or the current date
 */
export function getTodayDate(request: Request): DateString {
  const fromBody: unknown = request.body && typeof request.body === 'object' ? request.body.today_date : undefined;
  const value = typeof fromBody === 'string' ? fromBody : getQueryString(request, 'date');
  if (value === undefined) {
    return today();
  }
  parseDate(value);
  return value;
}

/**
 * Reads a required field from a JSON body
 */
export function getBodyField(request: Request, name: string): unknown {
  const body: unknown = request.body;
  if (typeof body !== 'object' || body === null || !(name in body)) {
    throw new ValidationError(`Request body is missing '${name}'`);
  }
  return Reflect.get(body, name);
}

/**
 * Reads an optional string field from a JSON body
 */
export function getBodyString(request: Request, name: string): string | undefined {
  const body: unknown = request.body;
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' && value !== '' ? value : undefined;
}
