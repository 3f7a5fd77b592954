/**
 * @fileoverview Calendar-date primitives.
 *
 * Dates travel through bizcal as ISO `YYYY-MM-DD` strings. They carry no time
 * or zone, sort lexicographically in date order and work as Map/Set keys.
 * `Date` inputs are read by their UTC calendar fields.
 *
 * @module @bizcal/contracts/dates
 */

import { InvalidDateError, InvalidRangeError } from './errors.js';

/**
 * Calendar date in `YYYY-MM-DD` form.
 */
export type IsoDate = string;

/**
 * Anything an operation accepts as a date.
 */
export type DateInput = IsoDate | Date;

/**
 * Options for reading date strings.
 */
export interface DateParseOptions {
  /**
   * Read `01/02/2026` as 1 February (true) or 2 January (false).
   * Only used when the 4-digit year comes last.
   * @default true
   */
  dayFirst?: boolean;
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Builds an ISO date from its fields, rejecting impossible dates such as
 * 2026-02-30 and years past 9999.
 */
export function makeIsoDate(year: number, month: number, day: number): IsoDate {
  // IsoDate years are four digits
  if (year < 0 || year > 9999) {
    throw new InvalidDateError(`Year out of range (0-9999): ${year}`, { input: `${year}-${month}-${day}` });
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  probe.setUTCFullYear(year);
  if (
    !Number.isInteger(year) ||
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new InvalidDateError(`Invalid calendar date: (y=${year}, m=${month}, d=${day})`, {
      input: `${year}-${month}-${day}`,
    });
  }
  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Formats a Date to YYYY-MM-DD using its UTC fields.
 *
 * @example
 * ```typescript
 * formatIsoDate(new Date('2026-01-19T23:30:00Z')); // '2026-01-19'
 * ```
 */
export function formatIsoDate(date: Date): IsoDate {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDateError('Invalid Date object', { input: String(date) });
  }
  return makeIsoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * Parses a date string without ambiguity.
 *
 * Rules:
 * 1. Exactly three numeric components, whatever the separators.
 * 2. The year is the only 4-digit component and comes first or last.
 * 3. Year first reads as Y-M-D.
 * 4. Year last reads as D-M-Y when `dayFirst`, else M-D-Y.
 * 5. Anything else (e.g. `20260131`, `01-02-03`) is rejected.
 *
 * @example
 * ```typescript
 * parseDateString('2026-01-31');                        // '2026-01-31'
 * parseDateString('31/01/2026');                        // '2026-01-31'
 * parseDateString('01/02/2026', { dayFirst: false });   // '2026-01-02'
 * ```
 */
export function parseDateString(input: string, options: DateParseOptions = {}): IsoDate {
  const { dayFirst = true } = options;
  const s = input.trim();

  if (!s) {
    throw new InvalidDateError('Empty date string', { input });
  }

  if (/^\d{8}$/.test(s)) {
    throw new InvalidDateError(
      `Ambiguous date string without separators: "${s}". Use a separator and a 4-digit year (e.g. 2026-01-31 or 31/01/2026)`,
      { input }
    );
  }

  const parts = s.match(/\d+/g) ?? [];
  const [a, b, c] = parts;
  if (parts.length !== 3 || a === undefined || b === undefined || c === undefined) {
    throw new InvalidDateError(
      `Invalid date string: "${s}". Expected exactly 3 numeric components (e.g. 2026-01-31 or 31/01/2026)`,
      { input }
    );
  }

  if (a.length === 4 && c.length === 4) {
    throw new InvalidDateError(`Ambiguous date string (two 4-digit components): "${s}"`, { input });
  }

  if (a.length === 4) {
    return makeIsoDate(Number(a), Number(b), Number(c));
  }

  if (c.length === 4) {
    return dayFirst
      ? makeIsoDate(Number(c), Number(b), Number(a))
      : makeIsoDate(Number(c), Number(a), Number(b));
  }

  throw new InvalidDateError(`Ambiguous date string: "${s}". A 4-digit year must come first or last`, { input });
}

/**
 * Normalizes any DateInput to an ISO date.
 */
export function toIsoDate(input: DateInput, options: DateParseOptions = {}): IsoDate {
  if (input instanceof Date) {
    return formatIsoDate(input);
  }
  const match = ISO_DATE_PATTERN.exec(input);
  if (match) {
    return makeIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }
  return parseDateString(input, options);
}

/**
 * Splits an ISO date into numeric fields.
 */
export function isoDateParts(date: IsoDate): { year: number; month: number; day: number } {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) {
    throw new InvalidDateError(`Not an ISO date: "${date}"`, { input: date });
  }
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

/**
 * Returns the UTC midnight Date for an ISO date.
 */
export function isoToUtcDate(date: IsoDate): Date {
  const { year, month, day } = isoDateParts(date);
  const utc = new Date(Date.UTC(year, month - 1, day));
  utc.setUTCFullYear(year);
  return utc;
}

/**
 * Adds (or subtracts) calendar days.
 *
 * @example
 * ```typescript
 * addDays('2026-01-31', 1);  // '2026-02-01'
 * addDays('2026-03-01', -1); // '2026-02-28'
 * ```
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  const utc = isoToUtcDate(date);
  utc.setUTCDate(utc.getUTCDate() + days);
  return formatIsoDate(utc);
}

/**
 * Number of calendar days from `from` to `to` (negative when `to` is earlier).
 */
export function diffDays(from: IsoDate, to: IsoDate): number {
  return Math.round((isoToUtcDate(to).getTime() - isoToUtcDate(from).getTime()) / MS_PER_DAY);
}

/**
 * Every date from start to end, both included. Empty when start > end.
 */
export function eachDay(start: IsoDate, end: IsoDate): IsoDate[] {
  const days: IsoDate[] = [];
  for (let cur = start; cur <= end; cur = addDays(cur, 1)) {
    days.push(cur);
  }
  return days;
}

/**
 * ISO weekday, Monday = 1 ... Sunday = 7.
 */
export function isoWeekday(date: IsoDate): number {
  const day = isoToUtcDate(date).getUTCDay();
  return day === 0 ? 7 : day;
}

export function isWeekend(date: IsoDate, weekendDays: readonly number[] = [6, 7]): boolean {
  return weekendDays.includes(isoWeekday(date));
}

/**
 * ISO-8601 week-numbering year and week (1..53).
 *
 * @example
 * ```typescript
 * isoWeek('2026-01-01'); // { year: 2026, week: 1 }
 * isoWeek('2027-01-01'); // { year: 2026, week: 53 }
 * ```
 */
export function isoWeek(date: IsoDate): { year: number; week: number } {
  const target = isoToUtcDate(date);
  // Thursday of the same ISO week decides the week-numbering year
  target.setUTCDate(target.getUTCDate() + 4 - isoWeekday(date));
  const year = target.getUTCFullYear();
  const jan1 = Date.UTC(year, 0, 1);
  const week = Math.ceil(((target.getTime() - jan1) / MS_PER_DAY + 1) / 7);
  return { year, week };
}

/**
 * Number of days in a month (month is 1..12).
 */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Throws InvalidRangeError when start > end.
 */
export function assertValidRange(start: IsoDate, end: IsoDate): void {
  if (start > end) {
    throw new InvalidRangeError(`Invalid range: start ${start} is after end ${end}`, { start, end });
  }
}

/**
 * Normalizes both bounds and validates their order.
 */
export function normalizeRange(
  start: DateInput,
  end: DateInput,
  options: DateParseOptions = {}
): [IsoDate, IsoDate] {
  const s = toIsoDate(start, options);
  const e = toIsoDate(end, options);
  assertValidRange(s, e);
  return [s, e];
}
