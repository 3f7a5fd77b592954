/**
 * @fileoverview Error taxonomy for bizcal.
 *
 * Every failure raised by the calendar packages is a CalendarError carrying:
 * - a machine-readable code (see CalendarErrorCode)
 * - a structured data payload
 * - an ISO timestamp
 *
 * Errors always reach the immediate caller of the failing operation.
 *
 * @module @bizcal/contracts/errors
 */

/**
 * Machine-readable error codes.
 */
export type CalendarErrorCode =
  | 'UNKNOWN_CALENDAR'
  | 'INVALID_RANGE'
  | 'RANGE_UNSUPPORTED'
  | 'EMPTY_COMBINATION'
  | 'SEARCH_EXHAUSTED'
  | 'INVALID_OFFSET'
  | 'INVALID_DATE'
  | 'INVALID_COMBINE_MODE'
  | 'INVALID_SCHEDULE';

/**
 * Base error class for all calendar errors.
 *
 * @invariant code is one of CalendarErrorCode
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new CalendarError('INVALID_RANGE', 'start is after end', { start, end });
 * ```
 */
export class CalendarError extends Error {
  /** Machine-readable error code. */
  readonly code: CalendarErrorCode;

  /** Structured context for debugging. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 creation time. */
  readonly timestamp: string;

  constructor(code: CalendarErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a (kind, code) pair does not name a known calendar.
 *
 * @example
 * ```typescript
 * throw new UnknownCalendarError('Unknown exchange code: "XXXX"', { kind: 'exchange', code: 'XXXX' });
 * ```
 */
export class UnknownCalendarError extends CalendarError {
  constructor(message: string, data: { kind: string; code: string; [key: string]: unknown }) {
    super('UNKNOWN_CALENDAR', message, data);
  }
}

/**
 * Thrown when a range has its start after its end.
 */
export class InvalidRangeError extends CalendarError {
  constructor(message: string, data: { start: string; end: string; [key: string]: unknown }) {
    super('INVALID_RANGE', message, data);
  }
}

/**
 * Thrown when a date lies outside what a provider can answer for.
 *
 * Table-backed calendars raise it outside their published window.
 */
export class RangeUnsupportedError extends CalendarError {
  constructor(
    message: string,
    data: { calendar: string; date: string; validFrom: string; validTo: string; [key: string]: unknown }
  ) {
    super('RANGE_UNSUPPORTED', message, data);
  }
}

/**
 * Thrown when fewer than two calendars are given to a combination.
 */
export class EmptyCombinationError extends CalendarError {
  constructor(message: string, data: { count: number; [key: string]: unknown }) {
    super('EMPTY_COMBINATION', message, data);
  }
}

/**
 * Thrown when a business-day search runs past its horizon.
 */
export class SearchExhaustedError extends CalendarError {
  constructor(
    message: string,
    data: {
      calendar: string;
      from: string;
      direction: 'forward' | 'backward';
      horizonDays: number;
      [key: string]: unknown;
    }
  ) {
    super('SEARCH_EXHAUSTED', message, data);
  }
}

/**
 * Thrown for an offset that has no defined answer, such as zero business
 * days from a closed day.
 */
export class InvalidOffsetError extends CalendarError {
  constructor(message: string, data: { calendar: string; date: string; offset: number; [key: string]: unknown }) {
    super('INVALID_OFFSET', message, data);
  }
}

/**
 * Thrown when a date input cannot be read as a calendar date.
 */
export class InvalidDateError extends CalendarError {
  constructor(message: string, data: { input: string; [key: string]: unknown }) {
    super('INVALID_DATE', message, data);
  }
}

/**
 * Thrown for a combination mode other than intersection or union.
 */
export class InvalidCombineModeError extends CalendarError {
  constructor(message: string, data: { mode: string; [key: string]: unknown }) {
    super('INVALID_COMBINE_MODE', message, data);
  }
}

/**
 * Thrown for a schedule frequency or selection that cannot be read.
 */
export class InvalidScheduleError extends CalendarError {
  constructor(message: string, data: { frequency?: string; which?: string; [key: string]: unknown }) {
    super('INVALID_SCHEDULE', message, data);
  }
}

/**
 * Type guard for any CalendarError.
 *
 * @example
 * ```typescript
 * try {
 *   hub.get('exchange', 'XXXX');
 * } catch (err) {
 *   if (isCalendarError(err)) {
 *     console.error(`${err.code}: ${err.message}`);
 *   }
 * }
 * ```
 */
export function isCalendarError(error: unknown): error is CalendarError {
  return error instanceof CalendarError;
}

export function isUnknownCalendarError(error: unknown): error is UnknownCalendarError {
  return error instanceof UnknownCalendarError;
}

export function isRangeUnsupportedError(error: unknown): error is RangeUnsupportedError {
  return error instanceof RangeUnsupportedError;
}

export function isSearchExhaustedError(error: unknown): error is SearchExhaustedError {
  return error instanceof SearchExhaustedError;
}
