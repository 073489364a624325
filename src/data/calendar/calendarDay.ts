import { isWeekend } from '../../utils/date/date';
import { DateString } from '../../utils/date/types';
import { roundToCents, sumAmounts } from '../../utils/math/money';
import { CalendarDayData, CategoryAmounts, CategoryStatuses, DayType } from './types';

export const OVERSPENT = 'overspent';
export const ON_TRACK = 'ok';

/**
 * One day of a budget calendar.
 *
 * `total` always equals the rounded sum of `plannedBudget` and is recomputed
 * on every planned-budget mutation.
 */
export class CalendarDay {
  date: DateString;
  type: DayType;
  plannedBudget: CategoryAmounts;
  actualSpent: CategoryAmounts;
  status: CategoryStatuses;
  total: number;

  constructor(data: Pick<CalendarDayData, 'date'> & Partial<CalendarDayData>) {
    this.date = data.date;
    this.type = data.type ?? (isWeekend(data.date) ? 'weekend' : 'weekday');
    this.plannedBudget = {};
    for (const [category, amount] of Object.entries(data.planned_budget ?? {})) {
      this.plannedBudget[category] = roundToCents(amount);
    }
    this.actualSpent = {};
    for (const [category, amount] of Object.entries(data.actual_spent ?? {})) {
      this.actualSpent[category] = roundToCents(amount);
    }
    this.status = { ...(data.status ?? {}) };
    this.total = 0;
    this.recomputeTotal();
  }

  /**
   * Adds to the planned amount of a category
   */
  addPlanned(category: string, amount: number) {
    this.plannedBudget[category] = roundToCents((this.plannedBudget[category] ?? 0) + amount);
    this.recomputeTotal();
    this.refreshStatus(category);
  }

  /**
   * Replaces the planned amount of a category
   */
  setPlanned(category: string, amount: number) {
    this.plannedBudget[category] = roundToCents(amount);
    this.recomputeTotal();
    this.refreshStatus(category);
  }

  addActual(category: string, amount: number) {
    this.actualSpent[category] = roundToCents((this.actualSpent[category] ?? 0) + amount);
    this.refreshStatus(category);
  }

  setActual(category: string, amount: number) {
    this.actualSpent[category] = roundToCents(amount);
    this.refreshStatus(category);
  }

  get totalSpent(): number {
    return roundToCents(sumAmounts(this.actualSpent));
  }

  isOverspent(): boolean {
    return Object.values(this.status).some((value) => value === OVERSPENT);
  }

  private recomputeTotal() {
    this.total = roundToCents(sumAmounts(this.plannedBudget));
  }

  // Only categories with recorded spend carry a status
  private refreshStatus(category: string) {
    const actual = this.actualSpent[category];
    if (actual === undefined) {
      return;
    }
    const planned = this.plannedBudget[category] ?? 0;
    this.status[category] = actual > planned ? OVERSPENT : ON_TRACK;
  }

  /**
   * Serializes the day to its stored and wire shape
   */
  serialize(): CalendarDayData {
    return {
      date: this.date,
      type: this.type,
      planned_budget: { ...this.plannedBudget },
      total: this.total,
      actual_spent: { ...this.actualSpent },
      status: { ...this.status },
    };
  }
}
