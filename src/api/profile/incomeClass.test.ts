import { describe, it, expect, vi } from 'vitest';
import { getIncomeClass } from './incomeClass';
import { createMockRequest, createTestServices } from '../../utils/test/mockData';
import { ValidationError } from '../../utils/errors/errors';

vi.mock('../../utils/logger', () => ({
  log: vi.fn(),
  warn: vi.fn(),
}));

describe('Income class API', () => {
  const services = createTestServices();

  it('should classify with the default region', () => {
    expect(getIncomeClass(createMockRequest({ query: { income: '6500' } }), services)).toEqual({
      region: 'US-CA',
      income_class: 'middle',
      default_behavior: 'balanced',
    });
  });

  it('should use the requested region', () => {
    expect(getIncomeClass(createMockRequest({ query: { income: '3200', region: 'us-tx' } }), services)).toEqual({
      region: 'US-TX',
      income_class: 'lower_middle',
      default_behavior: 'balanced',
    });
  });

  it('should require a numeric income', () => {
    expect(() => getIncomeClass(createMockRequest({ query: { income: 'abc' } }), services)).toThrow(ValidationError);
    expect(() => getIncomeClass(createMockRequest(), services)).toThrow('income query parameter must be a number');
  });
});
