/**
 * In-memory calendars for core tests.
 */

import { RangeUnsupportedError, isWeekend } from '@bizcal/contracts';
import type { IsoDate } from '@bizcal/contracts';
import { BaseCalendarAdapter } from '../src/base.js';

export interface FixedHolidayOptions {
  weekendDays?: number[];
  validFrom?: IsoDate;
  validTo?: IsoDate;
}

/**
 * Weekends plus a fixed list of holidays, optionally limited to a window.
 */
export class FixedHolidayCalendar extends BaseCalendarAdapter {
  readonly variant = 'exchange' as const;

  private readonly closed: Set<IsoDate>;

  constructor(
    readonly name: string,
    holidays: IsoDate[] = [],
    private readonly options: FixedHolidayOptions = {}
  ) {
    super();
    this.closed = new Set(holidays);
  }

  lookups = 0;

  get weekendDays(): readonly number[] {
    return this.options.weekendDays ?? [6, 7];
  }

  protected isOpen(date: IsoDate): boolean {
    this.lookups++;
    this.assertInWindow(date);
    return !this.closed.has(date) && !isWeekend(date, this.options.weekendDays);
  }

  protected override checkRange(start: IsoDate, end: IsoDate): void {
    this.assertInWindow(start);
    this.assertInWindow(end);
  }

  private assertInWindow(date: IsoDate): void {
    const { validFrom = '0001-01-01', validTo = '9999-12-31' } = this.options;
    if (date < validFrom || date > validTo) {
      throw new RangeUnsupportedError(`${date} is outside ${this.name} (${validFrom}..${validTo})`, {
        calendar: this.name,
        date,
        validFrom,
        validTo,
      });
    }
  }
}

/** Closed on 2026-01-01 and 2026-01-19. */
export function calendarA(): FixedHolidayCalendar {
  return new FixedHolidayCalendar('A', ['2026-01-01', '2026-01-19']);
}

/** Closed on 2026-01-01 and 2026-01-06. */
export function calendarB(): FixedHolidayCalendar {
  return new FixedHolidayCalendar('B', ['2026-01-01', '2026-01-06']);
}

/** Closed on 2026-01-02. */
export function calendarC(): FixedHolidayCalendar {
  return new FixedHolidayCalendar('C', ['2026-01-02']);
}

/** Never open. */
export function neverOpen(): FixedHolidayCalendar {
  return new FixedHolidayCalendar('closed', [], { weekendDays: [1, 2, 3, 4, 5, 6, 7] });
}
