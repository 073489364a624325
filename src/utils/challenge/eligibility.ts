import { StreakDay } from '../../data/calendar/types';
import {
  ChallengeLog,
  CooldownRejection,
  EligibilityResult,
  StreakEvaluation,
  StreakReward,
} from '../../data/challenge/types';
import { OVERSPENT } from '../../data/calendar/calendarDay';
import { addDays, daysBetween, parseDate } from '../date/date';
import { DateString } from '../date/types';

export const STREAK_THRESHOLD_DAYS = 30;
export const COOLDOWN_DAYS = 30;
export const STREAK_REWARD: StreakReward = '-20%_annual';

export function isCooldownRejection(result: EligibilityResult): result is CooldownRejection {
  return 'reason' in result;
}

function isOverspent(day: StreakDay): boolean {
  return Object.values(day.status ?? {}).some((value) => value === OVERSPENT);
}

/**
 * Counts compliant days from the start of the calendar up to today.
 * The first overspent day resets the count to zero and ends the walk,
 * so later compliant days are never counted.
 */
export function countStreak(calendar: StreakDay[], todayDate: DateString): number {
  let streak = 0;
  for (const day of calendar) {
    if (day.date > todayDate) {
      break;
    }
    if (isOverspent(day)) {
      streak = 0;
      break;
    }
    streak += 1;
  }
  return streak;
}

/**
 * Decides whether a user can claim the no-overspend reward.
 *
 * A claim less than 30 days ago blocks the check outright. Otherwise the
 * streak must reach 30 days. Pure: identical inputs give identical results.
 *
 * @param calendar - Days in calendar order
 * @param todayDate - `YYYY-MM-DD`
 * @param challengeLog - When the reward was last claimed
 */
export function checkEligibility(
  calendar: StreakDay[],
  todayDate: DateString,
  challengeLog: ChallengeLog = {},
): EligibilityResult {
  parseDate(todayDate);

  const lastClaimed = challengeLog.last_claimed;
  if (lastClaimed && daysBetween(lastClaimed, todayDate) < COOLDOWN_DAYS) {
    return {
      eligible: false,
      reason: `Cooldown active until ${addDays(lastClaimed, COOLDOWN_DAYS)}`,
    };
  }

  const streakDays = countStreak(calendar, todayDate);
  const eligible = streakDays >= STREAK_THRESHOLD_DAYS;
  const evaluation: StreakEvaluation = {
    eligible,
    streak_days: streakDays,
    reward: eligible ? STREAK_REWARD : null,
    activation: 'manual',
    claimable: eligible,
  };
  return evaluation;
}
