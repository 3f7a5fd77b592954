/**
 * @fileoverview National holiday calendars backed by the date-holidays library.
 */

import Holidays from 'date-holidays';
import type { HolidaysTypes } from 'date-holidays';
import { BaseCalendarAdapter } from '@bizcal/calendar-core';
import { RangeUnsupportedError, isWeekend, isoDateParts, toIsoDate } from '@bizcal/contracts';
import type { DateInput, IsoDate } from '@bizcal/contracts';

export const COUNTRY_MIN_YEAR = 1970;
export const COUNTRY_MAX_YEAR = 2100;

export type CountryHolidayType = HolidaysTypes.HolidayType;

export interface CountryCalendarOptions {
  /** Holiday types that close the calendar. Default `['public']`. */
  types?: readonly CountryHolidayType[];
  weekendDays?: readonly number[];
}

/**
 * Lists the country codes date-holidays knows about, upper-case.
 */
export function listCountryCodes(): string[] {
  return Object.keys(new Holidays().getCountries()).sort();
}

/**
 * Weekends plus the public holidays of one country.
 *
 * Holiday sets are computed once per year on first use.
 */
export class CountryCalendarAdapter extends BaseCalendarAdapter {
  readonly name: string;

  readonly variant = 'country' as const;

  readonly validFrom = `${COUNTRY_MIN_YEAR}-01-01`;

  readonly validTo = `${COUNTRY_MAX_YEAR}-12-31`;

  private readonly holidaysLib: Holidays;

  private readonly types: ReadonlySet<string>;

  readonly weekendDays: readonly number[];

  private readonly byYear = new Map<number, Map<IsoDate, string>>();

  constructor(countryCode: string, options: CountryCalendarOptions = {}) {
    super();
    this.name = countryCode;
    this.holidaysLib = new Holidays(countryCode);
    this.types = new Set(options.types ?? ['public']);
    this.weekendDays = options.weekendDays ?? [6, 7];
  }

  protected isOpen(date: IsoDate): boolean {
    if (isWeekend(date, this.weekendDays)) {
      this.assertSupported(date);
      return false;
    }
    return !this.holidaysFor(date).has(date);
  }

  protected override checkRange(start: IsoDate, end: IsoDate): void {
    this.assertSupported(start);
    this.assertSupported(end);
  }

  /**
   * Holiday name for a date, or undefined on a regular day.
   */
  holidayName(date: DateInput): string | undefined {
    const d = toIsoDate(date);
    return this.holidaysFor(d).get(d);
  }

  private holidaysFor(date: IsoDate): Map<IsoDate, string> {
    this.assertSupported(date);
    const { year } = isoDateParts(date);
    let holidays = this.byYear.get(year);
    if (!holidays) {
      holidays = new Map();
      for (const holiday of this.holidaysLib.getHolidays(year)) {
        if (this.types.has(holiday.type)) {
          const day = holiday.date.slice(0, 10);
          // several entries may share a day; keep the first name
          if (!holidays.has(day)) holidays.set(day, holiday.name);
        }
      }
      this.byYear.set(year, holidays);
    }
    return holidays;
  }

  private assertSupported(date: IsoDate): void {
    if (date < this.validFrom || date > this.validTo) {
      throw new RangeUnsupportedError(
        `${date} is outside the years ${COUNTRY_MIN_YEAR}-${COUNTRY_MAX_YEAR} supported for ${this.name}`,
        { calendar: this.name, date, validFrom: this.validFrom, validTo: this.validTo }
      );
    }
  }
}
