/**
 * @fileoverview Public API for @bizcal/calendar-core.
 *
 * Source-independent calendar machinery: the adapter base class, overrides,
 * combinations, navigation, schedules and range statistics.
 */

export { BaseCalendarAdapter } from './base.js';

export { OverrideCalendarAdapter, withOverrides } from './override.js';
export type { OverrideOptions, OverrideSummary } from './override.js';

export { CombinedCalendarAdapter, combine } from './combine.js';
export type { CombineOptions } from './combine.js';

export {
  DEFAULT_SEARCH_HORIZON_DAYS,
  BOUND_INCLUSIONS,
  nextBusinessDay,
  previousBusinessDay,
  offsetBusinessDays,
  countBusinessDays,
} from './navigation.js';
export type { NavigationOptions, BoundInclusion } from './navigation.js';

export {
  parseFrequency,
  parseSelection,
  periodKey,
  selectInGroups,
  scheduleBusinessDays,
  scheduleCalendarDays,
} from './schedule.js';
export type {
  ScheduleFrequency,
  ScheduleSelection,
  BusinessScheduleOptions,
  CalendarScheduleOptions,
} from './schedule.js';

export { summarizeRange } from './stats.js';
export type { RangeSummary } from './stats.js';
