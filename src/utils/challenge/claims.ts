import { v4 as uuidv4 } from 'uuid';
import { StreakDay } from '../../data/calendar/types';
import { ChallengeLog, StreakClaim } from '../../data/challenge/types';
import { ConflictError } from '../errors/errors';
import { KeyValueStore } from '../io/store';
import { log } from '../logger';
import { DateString } from '../date/types';
import { checkEligibility, isCooldownRejection } from './eligibility';

/**
 * Claims the streak reward and records the claim date for the cooldown.
 * @throws ConflictError when the streak cannot be claimed today
 */
export function claimStreakReward(
  logs: KeyValueStore<ChallengeLog>,
  calendar: StreakDay[],
  userId: string,
  todayDate: DateString,
): StreakClaim {
  const challengeLog = logs.get(userId) ?? {};
  const result = checkEligibility(calendar, todayDate, challengeLog);

  if (isCooldownRejection(result)) {
    throw new ConflictError(result.reason);
  }
  if (!result.claimable || result.reward === null) {
    throw new ConflictError(`Streak of ${result.streak_days} days is not claimable`);
  }

  logs.set(userId, { ...challengeLog, last_claimed: todayDate });
  log('Streak reward claimed', { userId, streakDays: result.streak_days });

  return {
    claim_id: uuidv4(),
    user_id: userId,
    claimed_at: todayDate,
    reward: result.reward,
    streak_days: result.streak_days,
  };
}
