import { CalendarDay } from '../../data/calendar/calendarDay';
import { BehaviorProfile, ChallengeDefinition, ChallengeResult } from '../../data/challenge/types';
import { ProgressSummary } from '../../data/progress/types';
import { ChallengeTracker } from '../challenge/tracker';
import { CalendarStore } from '../io/calendarStore';
import { formatCurrency, MoneyFormat, resolveFormat } from '../locale/currency';
import { roundToCents } from '../math/money';
import { ProgressTracker } from './tracker';

/**
 * Planned minus actual for every completed challenge's category, over all days.
 * Days without an amount count as zero on that side.
 */
export function challengeImpact(results: ChallengeResult[], days: CalendarDay[]): number {
  let impact = 0;
  for (const result of results) {
    if (!result.completed) {
      continue;
    }
    for (const day of days) {
      const planned = day.plannedBudget[result.category] ?? 0;
      const actual = day.actualSpent[result.category] ?? 0;
      impact += planned - actual;
    }
  }
  return roundToCents(impact);
}

/**
 * Joins monthly progress with challenge outcomes for the progress screen
 */
export class ProgressAggregator {
  constructor(
    private readonly progress: ProgressTracker,
    private readonly challenges: ChallengeTracker,
    private readonly calendars: CalendarStore,
    private readonly defaultFormat: MoneyFormat,
  ) {}

  /**
   * @param format - Currency and locale; defaults to the record's country
   * @returns null when the month has not been logged
   */
  getProgressData(
    userId: string,
    year: number,
    month: number,
    challenges: ChallengeDefinition[],
    format?: MoneyFormat,
    profile?: BehaviorProfile,
  ): ProgressSummary | null {
    const record = this.progress.getMonthData(userId, year, month);
    if (!record) {
      return null;
    }
    const days = this.calendars.get(userId, year, month) ?? [];
    const results = this.challenges.evaluate(challenges, userId, year, month, profile);
    const { currency, locale } = format ?? resolveFormat(record.country, this.defaultFormat);

    return {
      spent: formatCurrency(record.spent, currency, locale),
      saved: formatCurrency(record.saved, currency, locale),
      challenge_completed: results.filter((result) => result.completed).length,
      challenge_impact_actual: formatCurrency(challengeImpact(results, days), currency, locale),
      challenge_breakdown: results,
    };
  }
}
