import { AnalyticsSummary, BehaviorEvent, RegionSummary } from '../../data/analytics/types';
import { roundToCents } from '../math/money';

const TOP_N = 3;

/**
 * Most frequent values, ties kept in first-seen order
 */
function topCounts(values: string[], n: number = TOP_N): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  // Array sort is stable, so equal counts stay in insertion order
  const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, n);
  return Object.fromEntries(ranked);
}

function rate(events: BehaviorEvent[], pick: (event: BehaviorEvent) => boolean): number {
  if (events.length === 0) {
    return 0;
  }
  return roundToCents(events.filter(pick).length / events.length);
}

/**
 * In-memory tally of behavioral events per region.
 * Lives as long as the process; one writer at a time.
 */
export class AnalyticsEngine {
  private data: Map<string, BehaviorEvent[]> = new Map();

  logBehavior(
    userId: string,
    region: string,
    cohort: string,
    behaviorTag: string,
    challengeSuccess: boolean,
    goalCompleted: boolean,
  ): void {
    const events = this.data.get(region) ?? [];
    events.push({ userId, cohort, behaviorTag, challengeSuccess, goalCompleted });
    this.data.set(region, events);
  }

  summarize(): AnalyticsSummary {
    const summary: AnalyticsSummary = {};
    for (const [region, events] of this.data) {
      const regionSummary: RegionSummary = {
        cohorts: topCounts(events.map((e) => e.cohort)),
        behaviors: topCounts(events.map((e) => e.behaviorTag)),
        challenge_success_rate: rate(events, (e) => e.challengeSuccess),
        goal_completion_rate: rate(events, (e) => e.goalCompleted),
      };
      summary[region] = regionSummary;
    }
    return summary;
  }

  reset(): void {
    this.data.clear();
  }
}
