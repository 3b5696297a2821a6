/**
 * Time utilities for consistent date handling.
 * Trading days are UTC calendar dates formatted as yyyy-MM-dd.
 */

import { addDays, differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function getCurrentDate(): Date {
  return new Date();
}

export function utcDateKey(date: Date = getCurrentDate()): string {
  return date.toISOString().slice(0, 10);
}

export function isDateKey(value: string): boolean {
  return DATE_PATTERN.test(value) && isValid(parseISO(value));
}

export function assertDateKey(value: string): string {
  if (!isDateKey(value)) {
    throw new Error(`Invalid date key (expected yyyy-MM-dd): ${value}`);
  }
  return value;
}

export function shiftDateKey(dateKey: string, days: number): string {
  return format(addDays(parseISO(assertDateKey(dateKey)), days), 'yyyy-MM-dd');
}

export function previousDateKey(dateKey: string): string {
  return shiftDateKey(dateKey, -1);
}

export function daysBetween(fromKey: string, toKey: string): number {
  return differenceInCalendarDays(parseISO(assertDateKey(toKey)), parseISO(assertDateKey(fromKey)));
}

export function nowIso(): string {
  return getCurrentDate().toISOString();
}
