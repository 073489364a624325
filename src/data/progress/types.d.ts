import { MonthKey } from '../../utils/date/types';
import { ChallengeResult } from '../challenge/types';

export type ProgressRecord = {
  user_id: string;
  month: MonthKey;
  income: number;
  spent: number;
  saved: number;
  country: string;
  region: string;
};

export type ProgressComparison = {
  spent_change: number;
  saved_change: number;
};

export type ProgressSummary = {
  spent: string;
  saved: string;
  challenge_completed: number;
  challenge_impact_actual: string;
  challenge_breakdown: ChallengeResult[];
};
