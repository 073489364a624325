import { Services } from '../context/services';
import { monthKey } from '../date/date';
import { countryOf } from '../locale/regions';
import { incrementProgressBar, initProgressBar, stopProgressBar } from '../log';
import { log, warn } from '../logger';

export type RollupIncome = {
  income: number;
  region?: string;
  country?: string;
};

export type RollupResult = {
  logged: string[];
  skipped: string[];
};

/**
 * Logs progress for every user with a stored calendar for the month.
 * Users without a known income are skipped.
 *
 * @param incomes - Monthly income (and optionally region/country) per user id
 */
export function rollupMonth(
  services: Services,
  year: number,
  month: number,
  incomes: Record<string, RollupIncome>,
): RollupResult {
  const users = services.calendars.listUsers(year, month);
  const result: RollupResult = { logged: [], skipped: [] };

  initProgressBar(users.length, monthKey(year, month));
  try {
    for (const userId of users) {
      const entry = incomes[userId];
      const days = services.calendars.get(userId, year, month);
      if (!entry || !days) {
        result.skipped.push(userId);
        incrementProgressBar();
        continue;
      }
      const region = entry.region ?? services.config.defaultRegion;
      services.progress.logMonth(userId, year, month, days, entry.income, entry.country ?? countryOf(region), region);
      result.logged.push(userId);
      incrementProgressBar();
    }
  } finally {
    stopProgressBar();
  }

  if (result.skipped.length > 0) {
    warn('Skipped users without income', { month: monthKey(year, month), count: result.skipped.length });
  }
  log('Monthly rollup finished', { month: monthKey(year, month), logged: result.logged.length });
  return result;
}
