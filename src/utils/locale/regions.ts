import countryProfiles from './countryProfiles.json';
import { ValidationError } from '../errors/errors';
import { isFiniteNumber } from '../math/money';
import { warn } from '../logger';

export type IncomeClass = 'low' | 'lower_middle' | 'middle' | 'upper_middle' | 'high';

export type RegionProfile = {
  default_behavior: string;
  class_thresholds: Record<IncomeClass, number>; // annual income
};

const PROFILES: Record<string, RegionProfile> = countryProfiles;

// Ordered from lowest to highest; income below a threshold falls in that class
const CLASS_ORDER: Exclude<IncomeClass, 'high'>[] = ['low', 'lower_middle', 'middle', 'upper_middle'];

export function hasRegionProfile(region: string): boolean {
  return Object.prototype.hasOwnProperty.call(PROFILES, region.toUpperCase());
}

/**
 * Profile for a region such as `US-CA`, or the fallback region's profile
 */
export function getRegionProfile(region: string, fallbackRegion: string = 'US-CA'): RegionProfile {
  const key = region.toUpperCase();
  if (hasRegionProfile(key)) {
    return PROFILES[key];
  }
  warn('Unknown region, using fallback profile', { region, fallbackRegion });
  const fallback = PROFILES[fallbackRegion.toUpperCase()];
  if (!fallback) {
    throw new ValidationError(`Unknown region '${region}'`);
  }
  return fallback;
}

/**
 * Country code of a region tag: `US-CA` -> `US`
 */
export function countryOf(region: string): string {
  return region.split('-')[0].toUpperCase();
}

/**
 * Places a monthly income in the region's income classes
 */
export function classifyIncome(monthlyIncome: number, region: string, fallbackRegion?: string): IncomeClass {
  if (!isFiniteNumber(monthlyIncome) || monthlyIncome < 0) {
    throw new ValidationError('Monthly income must be a number >= 0');
  }
  const { class_thresholds: thresholds } = getRegionProfile(region, fallbackRegion);
  const annualIncome = monthlyIncome * 12;
  for (const incomeClass of CLASS_ORDER) {
    if (annualIncome < thresholds[incomeClass]) {
      return incomeClass;
    }
  }
  return 'high';
}
