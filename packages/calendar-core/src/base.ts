/**
 * Shared adapter behaviour: date normalization, range validation and
 * per-date enumeration of the two range views.
 */

import { eachDay, normalizeRange, toIsoDate } from '@bizcal/contracts';
import type { AdapterVariant, CalendarAdapter, DateInput, IsoDate } from '@bizcal/contracts';

/**
 * Base class for calendar adapters.
 *
 * Subclasses answer one question, `isOpen(date)`, for a normalized ISO date.
 * Both range views are derived from it, so they partition every range.
 *
 * @example
 * ```typescript
 * class EveryDayOpen extends BaseCalendarAdapter {
 *   readonly name = 'always';
 *   readonly variant = 'exchange';
 *   protected isOpen(): boolean {
 *     return true;
 *   }
 * }
 * ```
 */
export abstract class BaseCalendarAdapter implements CalendarAdapter {
  abstract readonly name: string;

  abstract readonly variant: AdapterVariant;

  /**
   * Open (true) or closed (false) on a normalized date.
   */
  protected abstract isOpen(date: IsoDate): boolean;

  /**
   * Hook run on every validated range before enumeration. Adapters with a
   * limited horizon reject the whole range here.
   */
  protected checkRange(_start: IsoDate, _end: IsoDate): void {
    // no limits by default
  }

  isBusinessDay(date: DateInput): boolean {
    return this.isOpen(toIsoDate(date));
  }

  businessDays(start: DateInput, end: DateInput): IsoDate[] {
    return this.enumerate(start, end).filter((date) => this.isOpen(date));
  }

  holidays(start: DateInput, end: DateInput): IsoDate[] {
    return this.enumerate(start, end).filter((date) => !this.isOpen(date));
  }

  toString(): string {
    return this.name;
  }

  private enumerate(start: DateInput, end: DateInput): IsoDate[] {
    const [s, e] = normalizeRange(start, end);
    this.checkRange(s, e);
    return eachDay(s, e);
  }
}
