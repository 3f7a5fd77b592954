/**
 * @fileoverview Intersection/union combinator over any number of calendars.
 */

import { EmptyCombinationError, parseCombineMode } from '@bizcal/contracts';
import type { CalendarAdapter, CombineMode, IsoDate } from '@bizcal/contracts';
import { BaseCalendarAdapter } from './base.js';

export interface CombineOptions {
  name?: string;
}

/**
 * A calendar derived from two or more constituents.
 *
 * - intersection: open only when every constituent is open
 * - union: open when at least one constituent is open
 *
 * Every constituent is consulted for every date, so an out-of-range error from
 * any of them surfaces regardless of order.
 */
export class CombinedCalendarAdapter extends BaseCalendarAdapter {
  readonly name: string;

  readonly variant = 'combined' as const;

  readonly mode: CombineMode;

  readonly constituents: readonly CalendarAdapter[];

  constructor(constituents: readonly CalendarAdapter[], mode: string = 'intersection', options: CombineOptions = {}) {
    super();
    this.mode = parseCombineMode(mode);
    if (constituents.length < 2) {
      throw new EmptyCombinationError(
        `A combination needs at least 2 calendars, got ${constituents.length}`,
        { count: constituents.length }
      );
    }
    this.constituents = Object.freeze([...constituents]);
    this.name = options.name ?? `combined[${this.mode}](${this.constituents.map((c) => c.name).join(', ')})`;
  }

  protected isOpen(date: IsoDate): boolean {
    const answers = this.constituents.map((c) => c.isBusinessDay(date));
    return this.mode === 'intersection' ? answers.every(Boolean) : answers.some(Boolean);
  }

  /**
   * Weekdays closed in every week of the combination: closed in any
   * constituent under intersection, in all of them under union. Undefined
   * when a constituent has no fixed weekend.
   */
  get weekendDays(): readonly number[] | undefined {
    const sets: Array<readonly number[]> = [];
    for (const c of this.constituents) {
      if (!c.weekendDays) return undefined;
      sets.push(c.weekendDays);
    }
    return [1, 2, 3, 4, 5, 6, 7].filter((day) =>
      this.mode === 'intersection' ? sets.some((s) => s.includes(day)) : sets.every((s) => s.includes(day))
    );
  }

  /**
   * Constituents with nested combinations of the same mode inlined.
   */
  flatten(): CalendarAdapter[] {
    const flat: CalendarAdapter[] = [];
    for (const c of this.constituents) {
      if (c instanceof CombinedCalendarAdapter && c.mode === this.mode) {
        flat.push(...c.flatten());
      } else {
        flat.push(c);
      }
    }
    return flat;
  }
}

/**
 * Combines calendars by intersection (default) or union.
 *
 * @example
 * ```typescript
 * const both = combine([fr, us]);            // open when both are open
 * const either = combine([fr, us], 'union'); // open when either is open
 * ```
 */
export function combine(
  adapters: readonly CalendarAdapter[],
  mode: string = 'intersection',
  options?: CombineOptions
): CombinedCalendarAdapter {
  return new CombinedCalendarAdapter(adapters, mode, options);
}
