import { ChallengeLog, ResolvedChallenge } from '../../data/challenge/types';
import { ProgressRecord } from '../../data/progress/types';
import { AnalyticsEngine } from '../analytics/engine';
import { ChallengeTracker } from '../challenge/tracker';
import { EngineConfig } from '../config/config';
import { CalendarStore } from '../io/calendarStore';
import { InMemoryStore, JsonFileStore, KeyValueStore } from '../io/store';
import { ProgressAggregator } from '../progress/aggregator';
import { ProgressTracker } from '../progress/tracker';

/**
 * Everything a request handler needs, built once per process
 */
export type Services = {
  config: EngineConfig;
  calendars: CalendarStore;
  progress: ProgressTracker;
  challengeLogs: KeyValueStore<ChallengeLog>;
  challengeDefinitions: KeyValueStore<ResolvedChallenge[]>;
  analytics: AnalyticsEngine;
  challengeTracker: ChallengeTracker;
  aggregator: ProgressAggregator;
};

function createStore<T>(config: EngineConfig, name: string): KeyValueStore<T> {
  return config.store === 'file' ? new JsonFileStore<T>(config.dataDir, name) : new InMemoryStore<T>();
}

export function createServices(config: EngineConfig): Services {
  const calendars = new CalendarStore(createStore<unknown[]>(config, 'calendars'));
  const progress = new ProgressTracker(createStore<ProgressRecord>(config, 'progress'));
  const analytics = new AnalyticsEngine();
  const challengeTracker = new ChallengeTracker(calendars, analytics);
  const aggregator = new ProgressAggregator(progress, challengeTracker, calendars, {
    currency: config.defaultCurrency,
    locale: config.defaultLocale,
  });

  return {
    config,
    calendars,
    progress,
    challengeLogs: createStore<ChallengeLog>(config, 'challenge-logs'),
    challengeDefinitions: createStore<ResolvedChallenge[]>(config, 'challenges'),
    analytics,
    challengeTracker,
    aggregator,
  };
}
