/**
 * @fileoverview Public API for @bizcal/calendar-hub.
 */

export { CalendarHub } from './hub.js';
export type { CalendarHubOptions, CalendarRef, DefaultHubOptions } from './hub.js';
