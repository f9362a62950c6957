import { describe, expect, it } from 'vitest';
import { nextDueDate, nextMonthlyDate } from './recurrence';

describe('nextDueDate', () => {
  it('adds one or two weeks', () => {
    expect(nextDueDate('2026-01-01', 'weekly', 1)).toBe('2026-01-08');
    expect(nextDueDate('2026-01-01', 'biweekly', 1)).toBe('2026-01-15');
    expect(nextDueDate('2026-12-28', 'weekly', 28)).toBe('2027-01-04');
  });

  it('keeps the day of month for monthly entries', () => {
    expect(nextDueDate('2026-01-15', 'monthly', 15)).toBe('2026-02-15');
    expect(nextDueDate('2026-12-31', 'monthly', 31)).toBe('2027-01-31');
  });

  it('adds a year', () => {
    expect(nextDueDate('2026-03-10', 'yearly', 10)).toBe('2027-03-10');
  });
});

describe('nextMonthlyDate', () => {
  it('clamps to the last day of a shorter month and recovers afterwards', () => {
    expect(nextMonthlyDate('2026-01-31', 31)).toBe('2026-02-28');
    expect(nextMonthlyDate('2026-02-28', 31)).toBe('2026-03-31');
    expect(nextMonthlyDate('2026-03-31', 31)).toBe('2026-04-30');
    expect(nextMonthlyDate('2028-01-31', 31)).toBe('2028-02-29');
  });
});
