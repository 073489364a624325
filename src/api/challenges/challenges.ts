import { Request } from 'express';
import { ChallengeResult, ResolvedChallenge } from '../../data/challenge/types';
import { loadChallenges, parseChallenges, saveChallenges } from '../../utils/challenge/definitions';
import { buildBehaviorProfile } from '../../utils/challenge/profile';
import { Services } from '../../utils/context/services';
import { getBodyField, getBodyString, getCalendarRequestData, getUserId } from '../../utils/net/request';

export function getChallenges(request: Request, services: Services): ResolvedChallenge[] {
  return loadChallenges(services.challengeDefinitions, getUserId(request));
}

/**
 * Replaces the user's challenge list
 *
 * @param request - Body `{ challenges: [{ category, limit, duration? }] }`
 * @returns The stored challenges with ids
 */
export function updateChallenges(request: Request, services: Services): ResolvedChallenge[] {
  const userId = getUserId(request);
  const challenges = parseChallenges(getBodyField(request, 'challenges'));
  return saveChallenges(services.challengeDefinitions, userId, challenges);
}

/**
 * Scores the user's stored challenges against the month without recording anything
 */
export function evaluateChallenges(request: Request, services: Services): ChallengeResult[] {
  const { userId, year, month } = getCalendarRequestData(request);
  const challenges = loadChallenges(services.challengeDefinitions, userId);
  return services.challengeTracker.evaluate(challenges, userId, year, month);
}

/**
 * Scores the user's stored challenges and records the outcomes in analytics,
 * tagged by region, cohort and behavior. Each call adds one tally per challenge.
 */
export function recordChallengeOutcomes(request: Request, services: Services): ChallengeResult[] {
  const { userId, year, month } = getCalendarRequestData(request);
  const challenges = loadChallenges(services.challengeDefinitions, userId);
  const record = services.progress.getMonthData(userId, year, month);
  const profile = buildBehaviorProfile(
    {
      region: getBodyString(request, 'region') ?? record?.region,
      cohort: getBodyString(request, 'cohort'),
      behavior: getBodyString(request, 'behavior'),
      monthlyIncome: record?.income,
    },
    services.config.defaultRegion,
  );
  return services.challengeTracker.evaluate(challenges, userId, year, month, profile);
}
