import { describe, it, expect, vi } from 'vitest';
import { loadChallenges, parseChallenges, saveChallenges } from './definitions';
import { InMemoryStore } from '../io/store';
import { ResolvedChallenge } from '../../data/challenge/types';

vi.mock('uuid', () => ({
  v4: vi.fn(() => 'generated-id'),
}));

describe('parseChallenges', () => {
  it('should validate each entry', () => {
    expect(parseChallenges([{ category: 'coffee', limit: 40, duration: '14' }, { id: 'c1', category: 'taxi', limit: 0 }])).toEqual([
      { id: undefined, category: 'coffee', limit: 40, duration: 14 },
      { id: 'c1', category: 'taxi', limit: 0, duration: 30 },
    ]);
  });

  it('should reject non-lists and non-objects', () => {
    expect(() => parseChallenges({ category: 'coffee' })).toThrow('Challenges must be a list');
    expect(() => parseChallenges(['coffee'])).toThrow('Challenge 1 must be an object');
  });

  it('should reject a missing limit', () => {
    expect(() => parseChallenges([{ category: 'coffee' }])).toThrow('Challenge limit for coffee must be a number >= 0');
  });
});

describe('saveChallenges and loadChallenges', () => {
  it('should store the list and assign ids to new entries', () => {
    const store = new InMemoryStore<ResolvedChallenge[]>();

    const saved = saveChallenges(store, 'u1', [{ category: 'coffee', limit: 40 }, { id: 'c1', category: 'taxi', limit: 0 }]);

    expect(saved).toEqual([
      { id: 'generated-id', category: 'coffee', limit: 40, duration: 30 },
      { id: 'c1', category: 'taxi', limit: 0, duration: 30 },
    ]);
    expect(loadChallenges(store, 'u1')).toEqual(saved);
  });

  it('should load an empty list for a new user', () => {
    expect(loadChallenges(new InMemoryStore<ResolvedChallenge[]>(), 'u2')).toEqual([]);
  });
});
