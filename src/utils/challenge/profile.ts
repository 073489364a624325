import { BehaviorProfile } from '../../data/challenge/types';
import { classifyIncome, getRegionProfile } from '../locale/regions';

export type ProfileHints = {
  region?: string;
  cohort?: string;
  behavior?: string;
  monthlyIncome?: number;
};

/**
 * Fills in analytics tags from what is known about the user.
 * Cohort falls back to the income class, behavior to the region default.
 */
export function buildBehaviorProfile(hints: ProfileHints, defaultRegion: string): BehaviorProfile {
  const region = hints.region ?? defaultRegion;
  const regionProfile = getRegionProfile(region, defaultRegion);
  let cohort = hints.cohort;
  if (cohort === undefined) {
    cohort = hints.monthlyIncome === undefined ? 'unknown' : classifyIncome(hints.monthlyIncome, region, defaultRegion);
  }
  return {
    region,
    cohort,
    behavior: hints.behavior ?? regionProfile.default_behavior,
  };
}
