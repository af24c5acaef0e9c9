/**
 * Date normalization for date-valued fields.
 *
 * Absolute literals keep the precision they were written with; relative
 * phrases are resolved against an injected clock in UTC.
 */

import { normalizePhrase } from './lexical.js';
import type { NormalizedDate, RelativeDateSpecifier } from '../types/index.js';

/** Source of the reference date for relative phrases */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const YEAR = /^(\d{4})$/;
const YEAR_MONTH = /^(\d{4})[-/](\d{1,2})$/;
const YEAR_MONTH_DAY = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;
const MONTH_YEAR = /^(\d{1,2})-(\d{4})$/;

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return MONTH_LENGTHS[month - 1] ?? 31;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Build a normalized date, or undefined when the calendar date does not exist
 */
export function makeDate(year: number, month?: number, day?: number): NormalizedDate | undefined {
  if (!Number.isInteger(year) || year < 0 || year > 9999) {
    return undefined;
  }
  if (month === undefined) {
    return { value: pad(year, 4), year, precision: 'year' };
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return undefined;
  }
  if (day === undefined) {
    return { value: `${pad(year, 4)}-${pad(month, 2)}`, year, month, precision: 'month' };
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }
  return { value: `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`, year, month, day, precision: 'day' };
}

/**
 * Normalize `YYYY`, `YYYY-MM`, `YYYY-MM-DD`, `YYYY/MM[/DD]` or `MM-YYYY`
 */
export function parseAbsoluteDate(text: string): NormalizedDate | undefined {
  const trimmed = text.trim();

  let match = YEAR.exec(trimmed);
  if (match) {
    return makeDate(Number(match[1]));
  }
  match = YEAR_MONTH.exec(trimmed);
  if (match) {
    return makeDate(Number(match[1]), Number(match[2]));
  }
  match = YEAR_MONTH_DAY.exec(trimmed);
  if (match) {
    return makeDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }
  match = MONTH_YEAR.exec(trimmed);
  if (match) {
    return makeDate(Number(match[2]), Number(match[1]));
  }
  return undefined;
}

/**
 * Resolve a relative phrase such as "last month" or "today - 3".
 *
 * The result has the precision of the phrase's unit: days resolve to a full
 * date, months to YYYY-MM, years to YYYY.
 */
export function resolveRelativeDate(
  phrase: string,
  offset: number,
  specifiers: readonly RelativeDateSpecifier[],
  now: Date
): NormalizedDate | undefined {
  const wanted = normalizePhrase(phrase);
  const specifier = specifiers.find((candidate) => candidate.phrase === wanted);
  if (!specifier) {
    return undefined;
  }

  const delta = specifier.shift - offset;
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();

  switch (specifier.unit) {
    case 'day': {
      const shifted = new Date(Date.UTC(year, month, now.getUTCDate() + delta));
      return makeDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
    }
    case 'month': {
      const shifted = new Date(Date.UTC(year, month + delta, 1));
      return makeDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1);
    }
    case 'year':
      return makeDate(year + delta);
  }
}

// ============================================================================
// Comparison
// ============================================================================

function ordinal(year: number, month: number, day: number): number {
  return year * 10000 + month * 100 + day;
}

/** First day covered by a date of any precision */
export function dateStart(date: NormalizedDate): number {
  return ordinal(date.year, date.month ?? 1, date.day ?? 1);
}

/** Last day covered by a date of any precision */
export function dateEnd(date: NormalizedDate): number {
  const month = date.month ?? 12;
  return ordinal(date.year, month, date.day ?? daysInMonth(date.year, month));
}

/**
 * True when no day lies between the two bounds (`2017->2015`).
 * `2015-06->2015` is not inverted: June 2015 lies within 2015.
 */
export function isInvertedDateRange(lower: NormalizedDate, upper: NormalizedDate): boolean {
  return dateStart(lower) > dateEnd(upper);
}
