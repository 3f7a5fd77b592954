/**
 * @fileoverview Periodic date schedules: business-day based and calendar-day
 * based (e.g. last business day of each month, 2nd Monday of each quarter).
 */

import { InvalidScheduleError, eachDay, isoDateParts, isoWeek, isoWeekday, normalizeRange } from '@bizcal/contracts';
import type { CalendarAdapter, DateInput, IsoDate } from '@bizcal/contracts';

/** Week, month, quarter, semester, year. */
export type ScheduleFrequency = 'W' | 'M' | 'Q' | 'S' | 'Y';

/** first / last / all, or the n-th (1-based) date of each period. */
export type ScheduleSelection = 'first' | 'last' | 'all' | number;

const FREQUENCY_ALIASES: Readonly<Record<string, ScheduleFrequency>> = {
  w: 'W',
  week: 'W',
  weekly: 'W',
  m: 'M',
  month: 'M',
  monthly: 'M',
  q: 'Q',
  quarter: 'Q',
  quarterly: 'Q',
  s: 'S',
  semester: 'S',
  semesterly: 'S',
  y: 'Y',
  year: 'Y',
  yearly: 'Y',
};

export interface BusinessScheduleOptions {
  frequency: string;
  which?: ScheduleSelection;
  start: DateInput;
  end: DateInput;
}

export interface CalendarScheduleOptions extends BusinessScheduleOptions {
  /** ISO weekday (1 = Monday). Omit to keep every day. */
  weekday?: number;
}

/**
 * Reads a frequency letter or name, case-insensitively.
 *
 * @throws {InvalidScheduleError}
 */
export function parseFrequency(value: string): ScheduleFrequency {
  const frequency = FREQUENCY_ALIASES[value.trim().toLowerCase()];
  if (frequency === undefined) {
    throw new InvalidScheduleError(
      `Invalid frequency: "${value}". Must be W, M, Q, S or Y (or week, month, quarter, semester, year)`,
      { frequency: value }
    );
  }
  return frequency;
}

/**
 * Reads a selection from text: `first`, `last`, `all` or a positive integer.
 *
 * @throws {InvalidScheduleError}
 */
export function parseSelection(value: string): ScheduleSelection {
  const s = value.trim().toLowerCase();
  if (s === 'first' || s === 'last' || s === 'all') {
    return s;
  }
  if (/^\d+$/.test(s)) {
    return assertSelection(Number(s));
  }
  throw new InvalidScheduleError(`Invalid selection: "${value}". Must be first, last, all or an integer >= 1`, {
    which: value,
  });
}

function assertSelection(which: ScheduleSelection): ScheduleSelection {
  if (typeof which === 'number' && (!Number.isInteger(which) || which < 1)) {
    throw new InvalidScheduleError(`Invalid selection: ${which}. The n-th date must be an integer >= 1`, {
      which: String(which),
    });
  }
  return which;
}

/**
 * Label of the period a date falls in, e.g. `2026-W03`, `2026-01`, `2026-Q1`.
 */
export function periodKey(date: IsoDate, frequency: ScheduleFrequency): string {
  const { year, month } = isoDateParts(date);
  switch (frequency) {
    case 'W': {
      const week = isoWeek(date);
      return `${week.year}-W${String(week.week).padStart(2, '0')}`;
    }
    case 'M':
      return `${year}-${String(month).padStart(2, '0')}`;
    case 'Q':
      return `${year}-Q${Math.ceil(month / 3)}`;
    case 'S':
      return `${year}-S${month <= 6 ? 1 : 2}`;
    case 'Y':
      return String(year);
  }
}

/**
 * Picks from each run of consecutive dates sharing a period key. Periods
 * with fewer than n dates contribute nothing to an n-th selection.
 */
export function selectInGroups(
  dates: readonly IsoDate[],
  frequency: ScheduleFrequency,
  which: ScheduleSelection
): IsoDate[] {
  if (which === 'all') {
    return [...dates];
  }

  const groups: IsoDate[][] = [];
  let currentKey: string | undefined;
  for (const date of dates) {
    const key = periodKey(date, frequency);
    const last = groups[groups.length - 1];
    if (key === currentKey && last !== undefined) {
      last.push(date);
    } else {
      groups.push([date]);
      currentKey = key;
    }
  }

  const picked: IsoDate[] = [];
  for (const group of groups) {
    const index = which === 'first' ? 0 : which === 'last' ? group.length - 1 : which - 1;
    const date = group[index];
    if (date !== undefined) {
      picked.push(date);
    }
  }
  return picked;
}

/**
 * Business days of `adapter` selected per period.
 *
 * @example
 * ```typescript
 * scheduleBusinessDays(xpar, { frequency: 'M', which: 'last', start: '2026-01-01', end: '2026-12-31' });
 * ```
 */
export function scheduleBusinessDays(adapter: CalendarAdapter, options: BusinessScheduleOptions): IsoDate[] {
  const frequency = parseFrequency(options.frequency);
  const which = assertSelection(options.which ?? 'first');
  return selectInGroups(adapter.businessDays(options.start, options.end), frequency, which);
}

/**
 * Calendar days (optionally one weekday only) selected per period. No
 * calendar is consulted.
 */
export function scheduleCalendarDays(options: CalendarScheduleOptions): IsoDate[] {
  const frequency = parseFrequency(options.frequency);
  const which = assertSelection(options.which ?? 'first');
  const { weekday } = options;
  if (weekday !== undefined && (!Number.isInteger(weekday) || weekday < 1 || weekday > 7)) {
    throw new InvalidScheduleError(`Invalid weekday: ${weekday}. Must be 1 (Monday) to 7 (Sunday)`, {
      weekday,
    });
  }
  const [s, e] = normalizeRange(options.start, options.end);
  const days = eachDay(s, e).filter((d) => weekday === undefined || isoWeekday(d) === weekday);
  return selectInGroups(days, frequency, which);
}
