import { Request } from 'express';
import { AutoStreakResult, EligibilityResult, StreakClaim } from '../../data/challenge/types';
import { runAutoStreak } from '../../utils/challenge/autoStreak';
import { claimStreakReward } from '../../utils/challenge/claims';
import { checkEligibility } from '../../utils/challenge/eligibility';
import { normalizeDays } from '../../utils/calendar/normalize';
import { Services } from '../../utils/context/services';
import { getBodyField, getTodayDate, getUserId } from '../../utils/net/request';

function readCalendar(request: Request) {
  return normalizeDays(getBodyField(request, 'calendar')).map((day) => day.serialize());
}

/**
 * Streak eligibility for the posted calendar, using the user's stored claim log
 */
export function checkStreakEligibility(request: Request, services: Services): EligibilityResult {
  const userId = getUserId(request);
  const calendar = readCalendar(request);
  const todayDate = getTodayDate(request);
  return checkEligibility(calendar, todayDate, services.challengeLogs.get(userId) ?? {});
}

/**
 * Scheduled streak run for today
 */
export function runStreakAuto(request: Request, services: Services): AutoStreakResult {
  const userId = getUserId(request);
  const calendar = readCalendar(request);
  return runAutoStreak(calendar, userId, services.challengeLogs.get(userId) ?? {});
}

export function claimStreak(request: Request, services: Services): StreakClaim {
  const userId = getUserId(request);
  const calendar = readCalendar(request);
  return claimStreakReward(services.challengeLogs, calendar, userId, getTodayDate(request));
}
