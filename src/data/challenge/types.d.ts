import { DateString } from '../../utils/date/types';

export type StreakReward = '-20%_annual';

export type ChallengeDefinition = {
  id?: string; // UUID, assigned when stored
  category: string;
  limit: number; // max allowed spend
  duration?: number; // days, defaults to 30
};

export type ResolvedChallenge = {
  id?: string;
  category: string;
  limit: number;
  duration: number;
};

export type ChallengeResult = {
  category: string;
  limit: number;
  spent: number;
  days_observed: number;
  completed: boolean;
};

/**
 * Updated when a streak reward is claimed
 */
export type ChallengeLog = {
  last_claimed?: DateString | null;
};

export type StreakEvaluation = {
  eligible: boolean;
  streak_days: number;
  reward: StreakReward | null;
  activation: 'manual';
  claimable: boolean;
};

export type CooldownRejection = {
  eligible: false;
  reason: string;
};

export type EligibilityResult = StreakEvaluation | CooldownRejection;

export type AutoStreakResult = {
  user_id: string;
  date: DateString;
  streak_eligible: boolean;
  claimable: boolean;
  reward: StreakReward | null;
  streak_days: number;
};

export type StreakClaim = {
  claim_id: string;
  user_id: string;
  claimed_at: DateString;
  reward: StreakReward;
  streak_days: number;
};

/**
 * Tags attached to analytics events for a user
 */
export type BehaviorProfile = {
  region: string;
  cohort: string;
  behavior: string;
};
