import { describe, it, expect, vi } from 'vitest';
import { buildBehaviorProfile } from './profile';
import { warn } from '../logger';

vi.mock('../logger', () => ({
  warn: vi.fn(),
}));

describe('buildBehaviorProfile', () => {
  it('should derive the cohort from income and the behavior from the region', () => {
    expect(buildBehaviorProfile({ monthlyIncome: 6500 }, 'US-CA')).toEqual({
      region: 'US-CA',
      cohort: 'middle',
      behavior: 'balanced',
    });
  });

  it('should keep explicit hints', () => {
    expect(
      buildBehaviorProfile({ region: 'US-TX', cohort: 'students', behavior: 'saver', monthlyIncome: 6500 }, 'US-CA'),
    ).toEqual({ region: 'US-TX', cohort: 'students', behavior: 'saver' });
  });

  it('should mark the cohort unknown without income', () => {
    expect(buildBehaviorProfile({}, 'US-CA').cohort).toBe('unknown');
  });

  it('should fall back to the default region profile for unknown regions', () => {
    const result = buildBehaviorProfile({ region: 'ZZ-XX', monthlyIncome: 2500 }, 'US-CA');

    expect(result).toEqual({ region: 'ZZ-XX', cohort: 'low', behavior: 'balanced' });
    expect(warn).toHaveBeenCalled();
  });
});
