import { StreakDay } from '../../data/calendar/types';
import { AutoStreakResult, ChallengeLog } from '../../data/challenge/types';
import { formatDate } from '../date/date';
import { checkEligibility, isCooldownRejection } from './eligibility';

/**
 * Runs the streak check for today and flattens the result for scheduled callers
 */
export function runAutoStreak(
  calendar: StreakDay[],
  userId: string,
  logData: ChallengeLog,
  now: Date = new Date(),
): AutoStreakResult {
  const date = formatDate(now);
  const result = checkEligibility(calendar, date, logData);

  if (isCooldownRejection(result)) {
    return {
      user_id: userId,
      date,
      streak_eligible: false,
      claimable: false,
      reward: null,
      streak_days: 0,
    };
  }

  return {
    user_id: userId,
    date,
    streak_eligible: result.eligible,
    claimable: result.claimable,
    reward: result.reward,
    streak_days: result.streak_days,
  };
}
