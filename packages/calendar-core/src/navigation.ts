/**
 * @fileoverview Business-day navigation over any CalendarAdapter.
 *
 * Searches are linear and bounded by a horizon so a calendar that never
 * opens again fails instead of looping.
 */

import {
  InvalidOffsetError,
  SearchExhaustedError,
  addDays,
  normalizeRange,
  toIsoDate,
} from '@bizcal/contracts';
import type { CalendarAdapter, DateInput, IsoDate } from '@bizcal/contracts';

/** About ten years of calendar days. */
export const DEFAULT_SEARCH_HORIZON_DAYS = 3660;

export interface NavigationOptions {
  /** Maximum number of candidate days examined per step. */
  horizonDays?: number;
}

/** Which range bounds a count includes. */
export type BoundInclusion = 'both' | 'neither' | 'start' | 'end';

export const BOUND_INCLUSIONS: readonly BoundInclusion[] = ['both', 'neither', 'start', 'end'];

type Direction = 'forward' | 'backward';

function resolveHorizon(options: NavigationOptions): number {
  const horizon = options.horizonDays ?? DEFAULT_SEARCH_HORIZON_DAYS;
  if (!Number.isInteger(horizon) || horizon <= 0) {
    throw new RangeError(`horizonDays must be a positive integer, got ${horizon}`);
  }
  return horizon;
}

function search(adapter: CalendarAdapter, from: IsoDate, direction: Direction, horizonDays: number): IsoDate {
  const step = direction === 'forward' ? 1 : -1;
  let candidate = from;
  for (let i = 0; i < horizonDays; i++) {
    candidate = addDays(candidate, step);
    if (adapter.isBusinessDay(candidate)) {
      return candidate;
    }
  }
  throw new SearchExhaustedError(
    `No business day within ${horizonDays} days ${direction === 'forward' ? 'after' : 'before'} ${from} on ${adapter.name}`,
    { calendar: adapter.name, from, direction, horizonDays }
  );
}

/**
 * Smallest open date strictly after `date`.
 *
 * @throws {SearchExhaustedError} when nothing opens within the horizon
 */
export function nextBusinessDay(adapter: CalendarAdapter, date: DateInput, options: NavigationOptions = {}): IsoDate {
  return search(adapter, toIsoDate(date), 'forward', resolveHorizon(options));
}

/**
 * Largest open date strictly before `date`.
 *
 * @throws {SearchExhaustedError} when nothing opens within the horizon
 */
export function previousBusinessDay(
  adapter: CalendarAdapter,
  date: DateInput,
  options: NavigationOptions = {}
): IsoDate {
  return search(adapter, toIsoDate(date), 'backward', resolveHorizon(options));
}

/**
 * Moves `n` business days from `date`: forward for n > 0, backward for n < 0.
 *
 * With n = 0 an open date is returned unchanged; a closed one has no answer.
 *
 * @example
 * ```typescript
 * offsetBusinessDays(fr, '2026-01-15', 2); // '2026-01-19'
 * ```
 */
export function offsetBusinessDays(
  adapter: CalendarAdapter,
  date: DateInput,
  n: number,
  options: NavigationOptions = {}
): IsoDate {
  const start = toIsoDate(date);
  if (!Number.isInteger(n)) {
    throw new InvalidOffsetError(`Offset must be an integer, got ${n}`, {
      calendar: adapter.name,
      date: start,
      offset: n,
    });
  }
  const horizon = resolveHorizon(options);

  if (n === 0) {
    if (!adapter.isBusinessDay(start)) {
      throw new InvalidOffsetError(`Cannot offset by 0 from ${start}: not a business day on ${adapter.name}`, {
        calendar: adapter.name,
        date: start,
        offset: n,
      });
    }
    return start;
  }

  const direction: Direction = n > 0 ? 'forward' : 'backward';
  let current = start;
  for (let i = 0; i < Math.abs(n); i++) {
    current = search(adapter, current, direction, horizon);
  }
  return current;
}

/**
 * Number of business days between two dates, with the bounds included as
 * requested.
 */
export function countBusinessDays(
  adapter: CalendarAdapter,
  start: DateInput,
  end: DateInput,
  inclusive: BoundInclusion = 'both'
): number {
  if (!BOUND_INCLUSIONS.includes(inclusive)) {
    throw new RangeError(`inclusive must be one of ${BOUND_INCLUSIONS.join(', ')}, got "${inclusive}"`);
  }
  const [s, e] = normalizeRange(start, end);
  const keepStart = inclusive === 'both' || inclusive === 'start';
  const keepEnd = inclusive === 'both' || inclusive === 'end';

  return adapter
    .businessDays(s, e)
    .filter((d) => (d !== s || keepStart) && (d !== e || keepEnd)).length;
}
