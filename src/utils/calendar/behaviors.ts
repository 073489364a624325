import { SpreadBehavior } from '../../data/calendar/types';

const BEHAVIOR_TABLE: Record<string, SpreadBehavior> = {
  rent: 'fixed',
  mortgage: 'fixed',
  insurance: 'fixed',
  subscriptions: 'fixed',
  'loan payment': 'fixed',
  'dining out': 'clustered',
  'entertainment events': 'clustered',
  nightlife: 'clustered',
  restaurants: 'clustered',
  shopping: 'clustered',
  coffee: 'spread',
  transport: 'spread',
  groceries: 'spread',
};

/**
 * How a flexible category's budget is laid over the month.
 * Categories missing from the table are spread evenly.
 */
export function getBehavior(category: string): SpreadBehavior {
  return BEHAVIOR_TABLE[category.trim().toLowerCase()] ?? 'spread';
}
