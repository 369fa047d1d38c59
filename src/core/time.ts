/**
 * Calendar utilities for as-of alignment and output grids
 */

import {
  addDays,
  differenceInBusinessDays,
  differenceInCalendarDays,
  endOfMonth,
  endOfQuarter,
  endOfYear,
  format,
  isFriday,
  isValid,
  parseISO,
  subDays,
} from 'date-fns';
import type { MetricFrequency } from '@/types/factors';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function parseDate(dateStr: string): Date {
  return parseISO(dateStr);
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parseISO(value));
}

export function getRunId(date: Date, suffix: string): string {
  return `${formatDate(date)}__${suffix.substring(0, 8)}`;
}

/** Calendar days from `from` to `to` (positive when `to` is later). */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/** Weekdays between two dates; exchange holidays are not modelled. */
export function tradingDaysBetween(from: string, to: string): number {
  return differenceInBusinessDays(parseISO(to), parseISO(from));
}

export function shiftDays(dateStr: string, days: number): string {
  return formatDate(days >= 0 ? addDays(parseISO(dateStr), days) : subDays(parseISO(dateStr), -days));
}

export function eachDay(start: string, end: string): string[] {
  const out: string[] = [];
  let cur = parseISO(start);
  const last = parseISO(end);
  while (differenceInCalendarDays(last, cur) >= 0) {
    out.push(formatDate(cur));
    cur = addDays(cur, 1);
  }
  return out;
}

export interface DateWindow {
  start: string;
  end: string;
}

export function backfillWindow(runDate: string, backfillYears: number): DateWindow {
  const lookbackDays = Math.max(1, Math.round(365.25 * backfillYears));
  return { start: shiftDays(runDate, -lookbackDays), end: runDate };
}

function collectPeriodEnds(
  window: DateWindow,
  periodEnd: (date: Date) => Date
): string[] {
  const out: string[] = [];
  const last = parseISO(window.end);
  let cur = periodEnd(parseISO(window.start));
  while (differenceInCalendarDays(last, cur) >= 0) {
    out.push(formatDate(cur));
    cur = periodEnd(addDays(cur, 1));
  }
  return out;
}

/** Observation dates of the output grid for one frequency, ascending. */
export function periodEnds(frequency: MetricFrequency, window: DateWindow): string[] {
  switch (frequency) {
    case 'daily':
      return eachDay(window.start, window.end);
    case 'weekly':
      return eachDay(window.start, window.end).filter((d) => isFriday(parseISO(d)));
    case 'monthly':
      return collectPeriodEnds(window, endOfMonth);
    case 'quarterly':
      return collectPeriodEnds(window, endOfQuarter);
    case 'annual':
      return collectPeriodEnds(window, endOfYear);
    default:
      return [];
  }
}
