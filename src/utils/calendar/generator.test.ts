import { describe, it, expect, vi, beforeEach } from 'vitest';
import { generateCalendar, validatePlan } from './generator';
import { getBehavior } from './behaviors';
import { ValidationError } from '../errors/errors';

vi.mock('../logger', () => ({
  debug: vi.fn(),
}));

const plan = {
  income: 3000,
  fixed_expenses: { rent: 1200, utilities: 200 },
  flexible_categories: { groceries: 500, entertainment: 300 },
};

describe('getBehavior', () => {
  it('should look categories up case-insensitively', () => {
    expect(getBehavior(' Dining Out ')).toBe('clustered');
    expect(getBehavior('rent')).toBe('fixed');
    expect(getBehavior('coffee')).toBe('spread');
  });

  it('should default unknown categories to spread', () => {
    expect(getBehavior('entertainment')).toBe('spread');
    expect(getBehavior('pets')).toBe('spread');
  });
});

describe('validatePlan', () => {
  it('should default the region', () => {
    expect(validatePlan(plan).region).toBe('US-CA');
  });

  it('should reject zero total flexible weight', () => {
    expect(() => validatePlan({ ...plan, flexible_categories: { groceries: 0 } })).toThrow(
      'flexible_categories weights must sum to more than zero',
    );
  });

  it('should reject negative weights', () => {
    expect(() => validatePlan({ ...plan, flexible_categories: { groceries: -1 } })).toThrow(
      'flexible_categories.groceries must be >= 0',
    );
  });

  it('should reject non-numeric income', () => {
    const broken = JSON.parse('{"income":"3000","fixed_expenses":{},"flexible_categories":{}}');
    expect(() => validatePlan(broken)).toThrow(ValidationError);
  });
});

describe('generateCalendar', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should lay fixed expenses on day 1 and spread flexible categories', () => {
    const calendar = generateCalendar(plan, 2025, 4);

    expect(Object.keys(calendar)).toHaveLength(30);
    expect(calendar['2025-04-01'].plannedBudget).toEqual({
      rent: 1200,
      utilities: 200,
      groceries: 33.33,
      entertainment: 20,
    });
    expect(calendar['2025-04-01'].total).toBe(1453.33);
    expect(calendar['2025-04-02'].plannedBudget).toEqual({ groceries: 33.33, entertainment: 20 });
    expect(calendar['2025-04-30'].total).toBe(53.33);
  });

  it('should conserve the income for spread and fixed behaviors', () => {
    const calendar = generateCalendar(plan, 2025, 4);
    const sum = Object.values(calendar).reduce((acc, day) => acc + day.total, 0);

    expect(sum).toBeCloseTo(3000, 0);
  });

  it('should produce one entry per day in leap February', () => {
    const calendar = generateCalendar(plan, 2024, 2);

    expect(Object.keys(calendar)).toHaveLength(29);
    expect(calendar['2024-02-29']).toBeDefined();
  });

  it('should place clustered categories by sequence position', () => {
    const calendar = generateCalendar(
      { income: 3000, fixed_expenses: {}, flexible_categories: { 'dining out': 1 } },
      2025,
      6,
    );
    const clusterDates = Object.values(calendar)
      .filter((day) => day.total > 0)
      .map((day) => day.date);

    expect(clusterDates).toEqual([
      '2025-06-05',
      '2025-06-06',
      '2025-06-12',
      '2025-06-13',
      '2025-06-19',
      '2025-06-20',
      '2025-06-26',
      '2025-06-27',
    ]);
    expect(calendar['2025-06-05'].plannedBudget['dining out']).toBe(200);
    expect(calendar['2025-06-01'].plannedBudget).toEqual({});
  });

  it('should place clustered categories on Fridays and Saturdays in weekday mode', () => {
    const calendar = generateCalendar(
      { income: 3000, fixed_expenses: {}, flexible_categories: { 'dining out': 1 } },
      2025,
      6,
      { clusterMode: 'weekday' },
    );
    const clusterDates = Object.values(calendar)
      .filter((day) => day.total > 0)
      .map((day) => day.date);

    expect(clusterDates).toEqual([
      '2025-06-06',
      '2025-06-07',
      '2025-06-13',
      '2025-06-14',
      '2025-06-20',
      '2025-06-21',
      '2025-06-27',
      '2025-06-28',
    ]);
  });

  it('should put the whole share of a fixed-behavior category on day 1', () => {
    const calendar = generateCalendar(
      { income: 600, fixed_expenses: {}, flexible_categories: { subscriptions: 1, groceries: 1 } },
      2025,
      4,
    );

    expect(calendar['2025-04-01'].plannedBudget).toEqual({ subscriptions: 300, groceries: 10 });
    expect(calendar['2025-04-02'].plannedBudget).toEqual({ groceries: 10 });
  });

  it('should allocate negative amounts when fixed expenses exceed income', () => {
    const calendar = generateCalendar(
      { income: 1000, fixed_expenses: { rent: 1300 }, flexible_categories: { groceries: 1 } },
      2025,
      4,
    );

    expect(calendar['2025-04-01'].total).toBe(1290);
    expect(calendar['2025-04-02'].plannedBudget.groceries).toBe(-10);
  });

  it('should accept empty maps', () => {
    const calendar = generateCalendar({ income: 1000, fixed_expenses: {}, flexible_categories: {} }, 2025, 4);

    expect(Object.values(calendar).every((day) => day.total === 0)).toBe(true);
  });

  it('should reject an invalid month', () => {
    expect(() => generateCalendar(plan, 2025, 13)).toThrow("Invalid month '13'");
  });

  it('should reject a two-digit year', () => {
    expect(() => generateCalendar(plan, 50, 1)).toThrow("Invalid year '50'");
  });
});
