/**
 * @fileoverview The calendar adapter contract shared by every calendar source,
 * override and combination.
 *
 * @module @bizcal/contracts/calendar
 */

import { InvalidCombineModeError } from './errors.js';
import type { DateInput, IsoDate } from './dates.js';

/**
 * Provider families that can be looked up by code.
 */
export type CalendarKind = 'exchange' | 'country' | 'rfr';

export const CALENDAR_KINDS: readonly CalendarKind[] = ['exchange', 'country', 'rfr'];

/**
 * Adapter variants. The three source kinds plus the two wrappers.
 */
export type AdapterVariant = CalendarKind | 'override' | 'combined';

/**
 * How a combination merges its constituents.
 * - intersection: open only when every constituent is open
 * - union: open when at least one constituent is open
 */
export type CombineMode = 'intersection' | 'union';

export const COMBINE_MODES: readonly CombineMode[] = ['intersection', 'union'];

/**
 * Identifies a source calendar.
 *
 * @example
 * ```typescript
 * const key: CalendarKey = { kind: 'exchange', code: 'XPAR' };
 * ```
 */
export interface CalendarKey {
  kind: CalendarKind;
  /** MIC code, ISO country code or rate ticker, passed through unchanged */
  code: string;
}

/**
 * Capability set every calendar exposes.
 *
 * Range operations take inclusive bounds and return ascending dates. For every
 * date in a range exactly one of `businessDays` and `holidays` contains it.
 * "Holiday" means any closed day, weekends included.
 */
export interface CalendarAdapter {
  /** Display name, e.g. `exchange:XPAR` */
  readonly name: string;

  readonly variant: AdapterVariant;

  /** ISO weekdays (1 = Monday) closed every week, where the calendar has a fixed weekend. */
  readonly weekendDays?: readonly number[];

  isBusinessDay(date: DateInput): boolean;

  /**
   * @throws {InvalidRangeError} when start is after end
   */
  businessDays(start: DateInput, end: DateInput): IsoDate[];

  /**
   * @throws {InvalidRangeError} when start is after end
   */
  holidays(start: DateInput, end: DateInput): IsoDate[];
}

export function isCalendarKind(value: string): value is CalendarKind {
  return CALENDAR_KINDS.some((kind) => kind === value);
}

export function isCombineMode(value: string): value is CombineMode {
  return COMBINE_MODES.some((mode) => mode === value);
}

/**
 * Validates a combine mode read from user input.
 *
 * @throws {InvalidCombineModeError} for anything but intersection/union
 */
export function parseCombineMode(value: string): CombineMode {
  const mode = value.trim().toLowerCase();
  if (!isCombineMode(mode)) {
    throw new InvalidCombineModeError(`Invalid mode: "${value}". Must be "intersection" or "union"`, {
      mode: value,
    });
  }
  return mode;
}

/**
 * Renders a key as `kind:code`.
 */
export function formatCalendarKey(key: CalendarKey): string {
  return `${key.kind}:${key.code}`;
}
