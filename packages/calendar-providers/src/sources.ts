/**
 * @fileoverview Calendar sources: one per kind, turning codes into adapters.
 */

import { UnknownCalendarError } from '@bizcal/contracts';
import type { CalendarAdapter, CalendarKind } from '@bizcal/contracts';
import { normalizeCode, normalizeTicker } from './codes.js';
import { CountryCalendarAdapter, listCountryCodes } from './country.js';
import type { CountryCalendarOptions } from './country.js';
import { ExchangeCalendarAdapter, RfrCalendarAdapter } from './tabulated.js';
import { loadExchangeTable, loadRfrTable } from './tables.js';
import type { ExchangeTable, RfrTable } from './tables.js';

/**
 * Resolves codes of one calendar kind and constructs their adapters.
 */
export interface CalendarSource {
  readonly kind: CalendarKind;

  /**
   * Canonical code for a user-supplied code, or null when unknown. Codes
   * naming the same calendar resolve to the same canonical code.
   */
  resolveCode(code: string): string | null;

  /**
   * Builds the adapter for a canonical code.
   */
  create(canonicalCode: string): CalendarAdapter;

  /** Codes accepted by resolveCode, sorted. */
  listCodes(): string[];
}

function unknown(kind: CalendarKind, code: string, known?: string[]): UnknownCalendarError {
  const hint = known ? `. Supported: ${known.join(', ')}` : '';
  return new UnknownCalendarError(`Unknown ${kind} code: "${code}"${hint}`, { kind, code });
}

export class ExchangeSource implements CalendarSource {
  readonly kind = 'exchange' as const;

  private readonly table: ExchangeTable;

  constructor(table: ExchangeTable = loadExchangeTable()) {
    this.table = table;
  }

  resolveCode(code: string): string | null {
    const mic = normalizeCode(code);
    return Object.hasOwn(this.table.calendars, mic) ? mic : null;
  }

  create(mic: string): ExchangeCalendarAdapter {
    const entry = this.table.calendars[mic];
    if (!entry) {
      throw unknown(this.kind, mic, this.listCodes());
    }
    return new ExchangeCalendarAdapter(mic, entry);
  }

  listCodes(): string[] {
    return Object.keys(this.table.calendars).sort();
  }
}

/**
 * Reference-rate source. Codes are rate tickers; every ticker of a fixing
 * calendar resolves to that calendar's id, and so do the ids themselves.
 */
export class RfrSource implements CalendarSource {
  readonly kind = 'rfr' as const;

  private readonly table: RfrTable;

  private readonly tickerIndex = new Map<string, string>();

  constructor(table: RfrTable = loadRfrTable()) {
    this.table = table;
    for (const [id, entry] of Object.entries(table.calendars)) {
      this.tickerIndex.set(normalizeTicker(id), id);
      for (const ticker of entry.tickers) {
        this.tickerIndex.set(normalizeTicker(ticker), id);
      }
    }
  }

  resolveCode(code: string): string | null {
    return this.tickerIndex.get(normalizeTicker(code)) ?? null;
  }

  create(calendarId: string): RfrCalendarAdapter {
    const entry = this.table.calendars[calendarId];
    if (!entry) {
      throw unknown(this.kind, calendarId, Object.keys(this.table.calendars).sort());
    }
    return new RfrCalendarAdapter(calendarId, entry);
  }

  listCodes(): string[] {
    return [...this.tickerIndex.keys()].sort();
  }
}

export class CountrySource implements CalendarSource {
  readonly kind = 'country' as const;

  private codes: Set<string> | undefined;

  constructor(private readonly options: CountryCalendarOptions = {}) {}

  resolveCode(code: string): string | null {
    const iso = normalizeCode(code);
    return this.known().has(iso) ? iso : null;
  }

  create(countryCode: string): CountryCalendarAdapter {
    if (!this.known().has(countryCode)) {
      throw unknown(this.kind, countryCode);
    }
    return new CountryCalendarAdapter(countryCode, this.options);
  }

  listCodes(): string[] {
    return [...this.known()].sort();
  }

  private known(): Set<string> {
    this.codes ??= new Set(listCountryCodes());
    return this.codes;
  }
}

export interface DefaultSourcesOptions {
  exchangeTable?: ExchangeTable;
  rfrTable?: RfrTable;
  country?: CountryCalendarOptions;
}

/**
 * Exchange, country and rfr sources over the bundled data.
 */
export function createDefaultSources(options: DefaultSourcesOptions = {}): CalendarSource[] {
  return [
    new ExchangeSource(options.exchangeTable),
    new CountrySource(options.country),
    new RfrSource(options.rfrTable),
  ];
}
