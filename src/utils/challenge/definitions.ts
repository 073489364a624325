import { v4 as uuidv4 } from 'uuid';
import { ChallengeDefinition, ResolvedChallenge } from '../../data/challenge/types';
import { ValidationError } from '../errors/errors';
import { KeyValueStore } from '../io/store';
import { validateChallenge } from './tracker';

/**
 * Reads challenge definitions from a request body or query
 */
export function parseChallenges(raw: unknown): ChallengeDefinition[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError('Challenges must be a list');
  }
  return raw.map((item, idx) => {
    if (typeof item !== 'object' || item === null) {
      throw new ValidationError(`Challenge ${idx + 1} must be an object`);
    }
    const id: unknown = Reflect.get(item, 'id');
    const duration: unknown = Reflect.get(item, 'duration');
    return validateChallenge({
      id: typeof id === 'string' ? id : undefined,
      category: Reflect.get(item, 'category'),
      limit: Reflect.get(item, 'limit'),
      duration: duration === undefined || duration === null ? undefined : Number(duration),
    });
  });
}

export function loadChallenges(store: KeyValueStore<ResolvedChallenge[]>, userId: string): ResolvedChallenge[] {
  return store.get(userId) ?? [];
}

/**
 * Replaces a user's challenge list, giving new entries an id
 */
export function saveChallenges(
  store: KeyValueStore<ResolvedChallenge[]>,
  userId: string,
  challenges: ChallengeDefinition[],
): ResolvedChallenge[] {
  const resolved = challenges.map((challenge) => {
    const validated = validateChallenge(challenge);
    return { ...validated, id: validated.id || uuidv4() };
  });
  store.set(userId, resolved);
  return resolved;
}
