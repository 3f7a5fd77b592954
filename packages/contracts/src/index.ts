/**
 * @fileoverview Main entry point for @bizcal/contracts.
 *
 * Exports the calendar adapter contract, ISO date helpers and the error
 * taxonomy shared by every bizcal package.
 *
 * @module @bizcal/contracts
 */

// Calendar contract
export type { AdapterVariant, CalendarAdapter, CalendarKey, CalendarKind, CombineMode } from './calendar.js';

export {
  CALENDAR_KINDS,
  COMBINE_MODES,
  isCalendarKind,
  isCombineMode,
  parseCombineMode,
  formatCalendarKey,
} from './calendar.js';

// Dates
export type { DateInput, DateParseOptions, IsoDate } from './dates.js';

export {
  makeIsoDate,
  formatIsoDate,
  parseDateString,
  toIsoDate,
  isoDateParts,
  isoToUtcDate,
  addDays,
  diffDays,
  eachDay,
  isoWeekday,
  isWeekend,
  isoWeek,
  daysInMonth,
  assertValidRange,
  normalizeRange,
} from './dates.js';

// Error classes and guards
export type { CalendarErrorCode } from './errors.js';

export {
  CalendarError,
  UnknownCalendarError,
  InvalidRangeError,
  RangeUnsupportedError,
  EmptyCombinationError,
  SearchExhaustedError,
  InvalidOffsetError,
  InvalidDateError,
  InvalidCombineModeError,
  InvalidScheduleError,
  isCalendarError,
  isUnknownCalendarError,
  isRangeUnsupportedError,
  isSearchExhaustedError,
} from './errors.js';
