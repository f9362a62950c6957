/**
 * Due-date arithmetic for recurring transactions. Dates are calendar days (YYYY-MM-DD).
 */

import { addMonths, addWeeks, addYears, format, getDaysInMonth, parseISO, setDate } from 'date-fns';
import type { RecurrenceFrequency } from './types';

export function toDateString(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Same day of month in the following month, clamped to that month's last day.
 */
export function nextMonthlyDate(current: string, dayOfMonth: number): string {
  const nextMonth = addMonths(parseISO(current), 1);
  const day = Math.min(Math.max(dayOfMonth, 1), getDaysInMonth(nextMonth));
  return toDateString(setDate(nextMonth, day));
}

export function nextDueDate(current: string, frequency: RecurrenceFrequency, dayOfMonth: number): string {
  const date = parseISO(current);
  switch (frequency) {
    case 'weekly':
      return toDateString(addWeeks(date, 1));
    case 'biweekly':
      return toDateString(addWeeks(date, 2));
    case 'monthly':
      return nextMonthlyDate(current, dayOfMonth);
    case 'yearly':
      return toDateString(addYears(date, 1));
  }
}
