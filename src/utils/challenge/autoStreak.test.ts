import { describe, it, expect } from 'vitest';
import { runAutoStreak } from './autoStreak';
import { makeStreakDays } from '../test/mockData';

const APRIL_30 = new Date(Date.UTC(2025, 3, 30, 12));

describe('runAutoStreak', () => {
  it('should flatten an eligible result', () => {
    expect(runAutoStreak(makeStreakDays('2025-04-01', 30), 'u1', {}, APRIL_30)).toEqual({
      user_id: 'u1',
      date: '2025-04-30',
      streak_eligible: true,
      claimable: true,
      reward: '-20%_annual',
      streak_days: 30,
    });
  });

  it('should report a short streak', () => {
    expect(runAutoStreak(makeStreakDays('2025-04-10', 21), 'u1', {}, APRIL_30)).toMatchObject({
      streak_eligible: false,
      claimable: false,
      reward: null,
      streak_days: 21,
    });
  });

  it('should report zero days during the cooldown', () => {
    expect(runAutoStreak(makeStreakDays('2025-04-01', 30), 'u1', { last_claimed: '2025-04-20' }, APRIL_30)).toEqual({
      user_id: 'u1',
      date: '2025-04-30',
      streak_eligible: false,
      claimable: false,
      reward: null,
      streak_days: 0,
    });
  });
});
