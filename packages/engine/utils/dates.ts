// Registry dates are calendar dates (YYYY-MM-DD); everything here works on local midnight.

import { differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';

export function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = parseISO(value.slice(0, 10));
  return isValid(parsed) ? parsed : null;
}

/** Whole calendar days from `from` to `to`; negative when `to` is earlier */
export function daysBetween(from: Date, to: Date): number {
  return differenceInCalendarDays(to, from);
}

export function yearsBetween(from: Date, to: Date): number {
  return daysBetween(from, to) / 365.25;
}

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}
