import { Request } from 'express';
import { ProgressComparison, ProgressRecord, ProgressSummary } from '../../data/progress/types';
import { loadChallenges } from '../../utils/challenge/definitions';
import { Services } from '../../utils/context/services';
import { monthKey } from '../../utils/date/date';
import { NotFoundError, ValidationError } from '../../utils/errors/errors';
import { MoneyFormat } from '../../utils/locale/currency';
import { countryOf } from '../../utils/locale/regions';
import { getBodyField, getCalendarRequestData, getQueryString } from '../../utils/net/request';

/**
 * Logs the month's progress from its stored calendar
 *
 * @param request - Body `{ income, region?, country? }`
 */
export function logProgress(request: Request, services: Services): ProgressRecord {
  const { userId, year, month } = getCalendarRequestData(request);
  const income = getBodyField(request, 'income');
  if (typeof income !== 'number') {
    throw new ValidationError('income must be a number');
  }
  const region: string = typeof request.body.region === 'string' ? request.body.region : services.config.defaultRegion;
  const country: string = typeof request.body.country === 'string' ? request.body.country : countryOf(region);

  const days = services.calendars.get(userId, year, month);
  if (!days) {
    throw new NotFoundError(`No calendar stored for ${monthKey(year, month)}`);
  }
  return services.progress.logMonth(userId, year, month, days, income, country, region);
}

export function getProgress(request: Request, services: Services): ProgressRecord {
  const { userId, year, month } = getCalendarRequestData(request);
  const record = services.progress.getMonthData(userId, year, month);
  if (!record) {
    throw new NotFoundError(`No progress logged for ${monthKey(year, month)}`);
  }
  return record;
}

/**
 * Month-over-month change; null when either month has no record
 */
export function compareProgress(request: Request, services: Services): ProgressComparison | null {
  const { userId, year, month } = getCalendarRequestData(request);
  return services.progress.compareToLast(userId, year, month);
}

/**
 * Progress with challenge impact, money formatted for display.
 * `currency` and `locale` query parameters override the country default.
 */
export function getProgressSummary(request: Request, services: Services): ProgressSummary {
  const { userId, year, month } = getCalendarRequestData(request);
  const currency = getQueryString(request, 'currency');
  const locale = getQueryString(request, 'locale');
  let format: MoneyFormat | undefined;
  if (currency || locale) {
    format = {
      currency: currency ?? services.config.defaultCurrency,
      locale: locale ?? services.config.defaultLocale,
    };
  }
  const challenges = loadChallenges(services.challengeDefinitions, userId);
  const summary = services.aggregator.getProgressData(userId, year, month, challenges, format);
  if (!summary) {
    throw new NotFoundError(`No progress logged for ${monthKey(year, month)}`);
  }
  return summary;
}
