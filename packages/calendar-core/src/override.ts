/**
 * @fileoverview Override layer: patch a calendar with extra closures and
 * reopened dates without touching the underlying adapter.
 */

import { normalizeRange, toIsoDate } from '@bizcal/contracts';
import type { CalendarAdapter, DateInput, IsoDate } from '@bizcal/contracts';
import { BaseCalendarAdapter } from './base.js';

export interface OverrideOptions {
  /** Display name; defaults to `<base> [+added, -removed]`. */
  name?: string;
}

export interface OverrideSummary {
  addedHolidays: IsoDate[];
  removedHolidays: IsoDate[];
}

/**
 * Wraps a calendar with a set of added holidays and a set of removed ones.
 *
 * A date in both sets stays closed.
 *
 * @example
 * ```typescript
 * const patched = new OverrideCalendarAdapter(xpar, ['2026-01-02'], ['2026-12-26']);
 * patched.isBusinessDay('2026-01-02'); // false
 * ```
 */
export class OverrideCalendarAdapter extends BaseCalendarAdapter {
  readonly name: string;

  readonly variant = 'override' as const;

  readonly base: CalendarAdapter;

  private readonly added: ReadonlySet<IsoDate>;

  private readonly removed: ReadonlySet<IsoDate>;

  constructor(
    base: CalendarAdapter,
    addHolidays: readonly DateInput[] = [],
    removeHolidays: readonly DateInput[] = [],
    options: OverrideOptions = {}
  ) {
    super();
    this.base = base;
    this.added = new Set(addHolidays.map((d) => toIsoDate(d)));
    this.removed = new Set(removeHolidays.map((d) => toIsoDate(d)));
    this.name = options.name ?? `${base.name} [+${this.added.size}, -${this.removed.size}]`;
  }

  // the base answers for every date, overridden or not
  protected isOpen(date: IsoDate): boolean {
    const baseOpen = this.base.isBusinessDay(date);
    if (this.added.has(date)) return false;
    if (this.removed.has(date)) return true;
    return baseOpen;
  }

  override businessDays(start: DateInput, end: DateInput): IsoDate[] {
    const [s, e] = normalizeRange(start, end);
    const open = new Set(this.base.businessDays(s, e));
    for (const date of this.removed) {
      if (date >= s && date <= e) open.add(date);
    }
    for (const date of this.added) {
      open.delete(date);
    }
    return [...open].sort();
  }

  override holidays(start: DateInput, end: DateInput): IsoDate[] {
    const [s, e] = normalizeRange(start, end);
    const closed = new Set(this.base.holidays(s, e));
    for (const date of this.removed) {
      closed.delete(date);
    }
    for (const date of this.added) {
      if (date >= s && date <= e) closed.add(date);
    }
    return [...closed].sort();
  }

  get weekendDays(): readonly number[] | undefined {
    return this.base.weekendDays;
  }

  summary(): OverrideSummary {
    return {
      addedHolidays: [...this.added].sort(),
      removedHolidays: [...this.removed].sort(),
    };
  }
}

/**
 * Convenience factory for {@link OverrideCalendarAdapter}.
 */
export function withOverrides(
  base: CalendarAdapter,
  addHolidays: readonly DateInput[] = [],
  removeHolidays: readonly DateInput[] = [],
  options?: OverrideOptions
): OverrideCalendarAdapter {
  return new OverrideCalendarAdapter(base, addHolidays, removeHolidays, options);
}
