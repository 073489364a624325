import { describe, it, expect, vi, beforeEach } from 'vitest';
import { evaluateChallenges, getChallenges, recordChallengeOutcomes, updateChallenges } from './challenges';
import { createMockRequest, createTestServices, makeDay } from '../../utils/test/mockData';
import { Services } from '../../utils/context/services';

vi.mock('uuid', () => ({
  v4: vi.fn(() => 'challenge-1'),
}));

vi.mock('../../utils/logger', () => ({
  log: vi.fn(),
  warn: vi.fn(),
}));

describe('Challenges API', () => {
  let services: Services;
  const params = { year: '2025', month: '4' };

  beforeEach(() => {
    services = createTestServices();
    services.calendars.save('u1', 2025, 4, [
      makeDay('2025-04-01', { coffee: 5 }, { coffee: 3 }),
      makeDay('2025-04-02', { coffee: 5 }, { coffee: 4 }),
    ]);
  });

  it('should store and list challenges', () => {
    const saved = updateChallenges(
      createMockRequest({ userId: 'u1', body: { challenges: [{ category: 'coffee', limit: 10, duration: 2 }] } }),
      services,
    );

    expect(saved).toEqual([{ id: 'challenge-1', category: 'coffee', limit: 10, duration: 2 }]);
    expect(getChallenges(createMockRequest({ userId: 'u1' }), services)).toEqual(saved);
    expect(getChallenges(createMockRequest({ userId: 'u2' }), services)).toEqual([]);
  });

  it('should reject a body without challenges', () => {
    expect(() => updateChallenges(createMockRequest({ userId: 'u1', body: {} }), services)).toThrow(
      "Request body is missing 'challenges'",
    );
  });

  it('should evaluate stored challenges without tallying them', () => {
    services.challengeDefinitions.set('u1', [{ id: 'c1', category: 'coffee', limit: 10, duration: 2 }]);
    const request = createMockRequest({ userId: 'u1', params });

    evaluateChallenges(request, services);
    const results = evaluateChallenges(request, services);

    expect(results).toEqual([{ category: 'coffee', limit: 10, spent: 7, days_observed: 2, completed: true }]);
    expect(services.analytics.summarize()).toEqual({});
  });

  it('should record outcomes tallied by region and income class', () => {
    services.challengeDefinitions.set('u1', [{ id: 'c1', category: 'coffee', limit: 10, duration: 2 }]);
    services.progress.logMonth('u1', 2025, 4, [{ total: 10 }], 6500, 'US', 'US-TX');

    const results = recordChallengeOutcomes(createMockRequest({ userId: 'u1', params, body: {} }), services);

    expect(results).toEqual([{ category: 'coffee', limit: 10, spent: 7, days_observed: 2, completed: true }]);
    expect(services.analytics.summarize()).toEqual({
      'US-TX': {
        cohorts: { middle: 1 },
        behaviors: { balanced: 1 },
        challenge_success_rate: 1,
        goal_completion_rate: 1,
      },
    });
  });

  it('should take profile tags from the body', () => {
    services.challengeDefinitions.set('u1', [{ id: 'c1', category: 'coffee', limit: 1, duration: 2 }]);

    recordChallengeOutcomes(
      createMockRequest({ userId: 'u1', params, body: { region: 'US-NY', cohort: 'students', behavior: 'saver' } }),
      services,
    );

    expect(services.analytics.summarize()).toEqual({
      'US-NY': {
        cohorts: { students: 1 },
        behaviors: { saver: 1 },
        challenge_success_rate: 0,
        goal_completion_rate: 0,
      },
    });
  });
});
