import { diffDays, isWeekend, normalizeRange } from '@bizcal/contracts';
import type { CalendarAdapter, DateInput, IsoDate } from '@bizcal/contracts';

export interface RangeSummary {
  start: IsoDate;
  end: IsoDate;
  totalDays: number;
  businessDays: number;
  offDays: number;
  /** Closed days falling on a weekend day. */
  weekendOffDays: number;
  /** Closed days falling on a weekday. */
  weekdayHolidays: number;
  /** businessDays / totalDays, rounded to 4 decimals. */
  businessRatio: number;
}

/**
 * Day counts for a range on one calendar. Weekend days come from the adapter
 * when it has a fixed weekend, Saturday and Sunday otherwise.
 */
export function summarizeRange(
  adapter: CalendarAdapter,
  start: DateInput,
  end: DateInput,
  weekendDays: readonly number[] = adapter.weekendDays ?? [6, 7]
): RangeSummary {
  const [s, e] = normalizeRange(start, end);
  const totalDays = diffDays(s, e) + 1;
  const closed = adapter.holidays(s, e);
  const weekendOffDays = closed.filter((d) => isWeekend(d, weekendDays)).length;
  const businessDays = totalDays - closed.length;

  return {
    start: s,
    end: e,
    totalDays,
    businessDays,
    offDays: closed.length,
    weekendOffDays,
    weekdayHolidays: closed.length - weekendOffDays,
    businessRatio: Math.round((businessDays / totalDays) * 10000) / 10000,
  };
}
