/**
 * @fileoverview Table-backed calendars: exchanges and reference-rate fixings.
 */

import { BaseCalendarAdapter } from '@bizcal/calendar-core';
import { RangeUnsupportedError, isWeekend, normalizeRange, toIsoDate } from '@bizcal/contracts';
import type { DateInput, IsoDate } from '@bizcal/contracts';
import type { ExchangeCalendarEntry, HolidayEntry, RfrCalendarEntry } from './tables.js';

interface TabulatedEntry {
  name: string;
  weekendDays: number[];
  validFrom: IsoDate;
  validTo: IsoDate;
  holidays: HolidayEntry[];
}

/**
 * A calendar whose closures come from a pre-computed holiday table.
 *
 * Only `full` holidays close the calendar; `early_close` days stay open.
 * Dates outside `validFrom..validTo` raise RangeUnsupportedError.
 */
export abstract class TabulatedCalendarAdapter extends BaseCalendarAdapter {
  readonly name: string;

  readonly displayName: string;

  readonly validFrom: IsoDate;

  readonly validTo: IsoDate;

  readonly weekendDays: readonly number[];

  private readonly holidayMap = new Map<IsoDate, HolidayEntry>();

  protected constructor(code: string, entry: TabulatedEntry) {
    super();
    this.name = code;
    this.displayName = entry.name;
    this.validFrom = entry.validFrom;
    this.validTo = entry.validTo;
    this.weekendDays = [...entry.weekendDays];
    for (const holiday of entry.holidays) {
      this.holidayMap.set(holiday.date, holiday);
    }
  }

  protected isOpen(date: IsoDate): boolean {
    this.assertSupported(date);
    if (isWeekend(date, this.weekendDays)) {
      return false;
    }
    return this.holidayMap.get(date)?.type !== 'full';
  }

  protected override checkRange(start: IsoDate, end: IsoDate): void {
    this.assertSupported(start);
    this.assertSupported(end);
  }

  /**
   * The table entry for a date, if any (full closure or early close).
   */
  holidayInfo(date: DateInput): HolidayEntry | undefined {
    const d = toIsoDate(date);
    this.assertSupported(d);
    return this.holidayMap.get(d);
  }

  /**
   * Early-close days in a range, ascending.
   */
  earlyCloses(start: DateInput, end: DateInput): IsoDate[] {
    const [s, e] = normalizeRange(start, end);
    this.checkRange(s, e);
    return [...this.holidayMap.values()]
      .filter((h) => h.type === 'early_close' && h.date >= s && h.date <= e)
      .map((h) => h.date)
      .sort();
  }

  private assertSupported(date: IsoDate): void {
    if (date < this.validFrom || date > this.validTo) {
      throw new RangeUnsupportedError(
        `${date} is outside the ${this.name} holiday table (${this.validFrom} to ${this.validTo})`,
        { calendar: this.name, date, validFrom: this.validFrom, validTo: this.validTo }
      );
    }
  }
}

/**
 * Trading calendar of an exchange, keyed by MIC.
 *
 * @example
 * ```typescript
 * const xpar = new ExchangeCalendarAdapter('XPAR', loadExchangeTable().calendars.XPAR);
 * xpar.isBusinessDay('2026-05-01'); // false
 * ```
 */
export class ExchangeCalendarAdapter extends TabulatedCalendarAdapter {
  readonly variant = 'exchange' as const;

  readonly timezone: string;

  constructor(mic: string, entry: ExchangeCalendarEntry) {
    super(mic, entry);
    this.timezone = entry.timezone;
  }
}

/**
 * Fixing calendar of a reference rate. Several tickers share one calendar.
 */
export class RfrCalendarAdapter extends TabulatedCalendarAdapter {
  readonly variant = 'rfr' as const;

  readonly tickers: readonly string[];

  constructor(calendarId: string, entry: RfrCalendarEntry) {
    super(calendarId, entry);
    this.tickers = [...entry.tickers];
  }
}
