export type BehaviorEvent = {
  userId: string;
  cohort: string;
  behaviorTag: string;
  challengeSuccess: boolean;
  goalCompleted: boolean;
};

export type RegionSummary = {
  cohorts: Record<string, number>; // top 3 by count
  behaviors: Record<string, number>; // top 3 by count
  challenge_success_rate: number;
  goal_completion_rate: number;
};

export type AnalyticsSummary = Record<string, RegionSummary>;
