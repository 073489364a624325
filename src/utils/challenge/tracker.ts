import { CalendarDay } from '../../data/calendar/calendarDay';
import {
  BehaviorProfile,
  ChallengeDefinition,
  ChallengeResult,
  ResolvedChallenge,
} from '../../data/challenge/types';
import { AnalyticsEngine } from '../analytics/engine';
import { ValidationError } from '../errors/errors';
import { CalendarStore } from '../io/calendarStore';
import { isFiniteNumber, roundToCents } from '../math/money';
import { warn } from '../logger';

export const DEFAULT_CHALLENGE_DURATION = 30;

/**
 * Checks a submitted challenge and fills in the default duration
 */
export function validateChallenge(challenge: ChallengeDefinition): ResolvedChallenge {
  if (typeof challenge.category !== 'string' || challenge.category.trim() === '') {
    throw new ValidationError('Challenge category is required');
  }
  if (!isFiniteNumber(challenge.limit) || challenge.limit < 0) {
    throw new ValidationError(`Challenge limit for ${challenge.category} must be a number >= 0`);
  }
  const duration = challenge.duration ?? DEFAULT_CHALLENGE_DURATION;
  if (!Number.isInteger(duration) || duration <= 0) {
    throw new ValidationError(`Challenge duration for ${challenge.category} must be a positive whole number of days`);
  }
  return { id: challenge.id, category: challenge.category, limit: challenge.limit, duration };
}

/**
 * Scores one challenge against a month of days.
 * Only days that carry an actual amount for the category count as observed.
 */
export function scoreChallenge(challenge: ChallengeDefinition, days: CalendarDay[]): ChallengeResult {
  const { category, limit, duration } = validateChallenge(challenge);
  let spent = 0;
  let daysObserved = 0;
  for (const day of days) {
    const actual = day.actualSpent[category];
    if (actual !== undefined) {
      spent += actual;
      daysObserved += 1;
    }
  }
  spent = roundToCents(spent);
  return {
    category,
    limit,
    spent,
    days_observed: daysObserved,
    completed: spent <= limit && daysObserved >= duration,
  };
}

/**
 * Evaluates spending challenges against a stored month
 */
export class ChallengeTracker {
  constructor(
    private readonly calendars: CalendarStore,
    private readonly analytics?: AnalyticsEngine,
  ) {}

  /**
   * @param challenges - Category limits to check
   * @param profile - When given, every outcome is also tallied in analytics
   */
  evaluate(
    challenges: ChallengeDefinition[],
    userId: string,
    year: number,
    month: number,
    profile?: BehaviorProfile,
  ): ChallengeResult[] {
    const days = this.calendars.get(userId, year, month) ?? [];
    const results = challenges.map((challenge) => scoreChallenge(challenge, days));

    if (profile) {
      for (const result of results) {
        this.logOutcome(userId, profile, result);
      }
    }
    return results;
  }

  // Analytics must never fail the evaluation
  private logOutcome(userId: string, profile: BehaviorProfile, result: ChallengeResult) {
    if (!this.analytics) {
      return;
    }
    try {
      this.analytics.logBehavior(
        userId,
        profile.region,
        profile.cohort,
        profile.behavior,
        result.completed,
        result.completed,
      );
    } catch (error) {
      warn('Failed to log challenge outcome', { userId, category: result.category, error });
    }
  }
}
