/**
 * @fileoverview Public API for @bizcal/calendar-providers.
 *
 * Source adapters for exchange, country and reference-rate calendars, the
 * bundled holiday tables and the code alias table.
 */

export { normalizeCode, normalizeTicker } from './codes.js';

export {
  holidayEntrySchema,
  exchangeCalendarSchema,
  rfrCalendarSchema,
  exchangeTableSchema,
  rfrTableSchema,
  DEFAULT_EXCHANGE_TABLE,
  DEFAULT_RFR_TABLE,
  parseTable,
  loadExchangeTable,
  loadRfrTable,
} from './tables.js';
export type {
  HolidayEntry,
  HolidayType,
  ExchangeCalendarEntry,
  RfrCalendarEntry,
  ExchangeTable,
  RfrTable,
} from './tables.js';

export { TabulatedCalendarAdapter, ExchangeCalendarAdapter, RfrCalendarAdapter } from './tabulated.js';

export { CountryCalendarAdapter, listCountryCodes, COUNTRY_MIN_YEAR, COUNTRY_MAX_YEAR } from './country.js';
export type { CountryCalendarOptions, CountryHolidayType } from './country.js';

export { AliasTable, DEFAULT_ALIAS_TABLE, normalizeAlias } from './aliases.js';

export { ExchangeSource, RfrSource, CountrySource, createDefaultSources } from './sources.js';
export type { CalendarSource, DefaultSourcesOptions } from './sources.js';
