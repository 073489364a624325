import { describe, it, expect } from 'vitest';
import { CalendarDay, ON_TRACK, OVERSPENT } from './calendarDay';

describe('CalendarDay', () => {
  describe('constructor', () => {
    it('should derive the day type from the date', () => {
      expect(new CalendarDay({ date: '2025-04-05' }).type).toBe('weekend');
      expect(new CalendarDay({ date: '2025-04-07' }).type).toBe('weekday');
    });

    it('should keep an explicit day type', () => {
      expect(new CalendarDay({ date: '2025-04-05', type: 'weekday' }).type).toBe('weekday');
    });

    it('should round amounts and recompute the total', () => {
      const day = new CalendarDay({
        date: '2025-04-01',
        planned_budget: { groceries: 33.3333, rent: 1200 },
        total: 999,
      });

      expect(day.plannedBudget).toEqual({ groceries: 33.33, rent: 1200 });
      expect(day.total).toBe(1233.33);
    });

    it('should copy the given status map', () => {
      const status = { food: 'pending' };
      const day = new CalendarDay({ date: '2025-04-01', status });
      day.status.food = OVERSPENT;

      expect(status.food).toBe('pending');
    });
  });

  describe('planned mutations', () => {
    it('should accumulate planned amounts', () => {
      const day = new CalendarDay({ date: '2025-04-01' });
      day.addPlanned('coffee', 3.333);
      day.addPlanned('coffee', 3.333);

      expect(day.plannedBudget.coffee).toBe(6.66);
      expect(day.total).toBe(6.66);
    });

    it('should replace planned amounts and refresh status for spent categories', () => {
      const day = new CalendarDay({ date: '2025-04-01', planned_budget: { food: 20 }, actual_spent: { food: 15 } });
      day.setPlanned('food', 10);

      expect(day.total).toBe(10);
      expect(day.status.food).toBe(OVERSPENT);
    });

    it('should not mark a status for categories without spend', () => {
      const day = new CalendarDay({ date: '2025-04-01' });
      day.setPlanned('food', 10);

      expect(day.status).toEqual({});
    });
  });

  describe('actual mutations', () => {
    it('should mark overspent when actual exceeds planned', () => {
      const day = new CalendarDay({ date: '2025-04-01', planned_budget: { food: 20 } });
      day.addActual('food', 12);
      expect(day.status.food).toBe(ON_TRACK);

      day.addActual('food', 9);
      expect(day.actualSpent.food).toBe(21);
      expect(day.status.food).toBe(OVERSPENT);
      expect(day.isOverspent()).toBe(true);
    });

    it('should treat spending equal to the plan as on track', () => {
      const day = new CalendarDay({ date: '2025-04-01', planned_budget: { food: 20 } });
      day.setActual('food', 20);

      expect(day.status.food).toBe(ON_TRACK);
      expect(day.isOverspent()).toBe(false);
    });

    it('should treat spend in an unplanned category as overspent', () => {
      const day = new CalendarDay({ date: '2025-04-01' });
      day.setActual('taxi', 5);

      expect(day.status.taxi).toBe(OVERSPENT);
    });

    it('should sum spending across categories', () => {
      const day = new CalendarDay({ date: '2025-04-01', actual_spent: { food: 10.1, coffee: 2.2 } });

      expect(day.totalSpent).toBe(12.3);
    });
  });

  describe('serialize', () => {
    it('should produce the wire shape', () => {
      const day = new CalendarDay({ date: '2025-04-01', planned_budget: { food: 20 } });
      day.setActual('food', 5);

      expect(day.serialize()).toEqual({
        date: '2025-04-01',
        type: 'weekday',
        planned_budget: { food: 20 },
        total: 20,
        actual_spent: { food: 5 },
        status: { food: 'ok' },
      });
    });
  });
});
