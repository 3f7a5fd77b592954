/**
 * @fileoverview CalendarHub: the registry from (kind, code) to adapters.
 *
 * A hub is an ordinary object built from injected sources. Adapters are
 * created on first lookup and kept for the life of the hub; failed lookups
 * are not cached and not retried.
 */

import {
  DEFAULT_SEARCH_HORIZON_DAYS,
  combine,
  countBusinessDays,
  nextBusinessDay,
  offsetBusinessDays,
  previousBusinessDay,
  withOverrides,
} from '@bizcal/calendar-core';
import type {
  BoundInclusion,
  CombinedCalendarAdapter,
  NavigationOptions,
  OverrideCalendarAdapter,
} from '@bizcal/calendar-core';
import { AliasTable, createDefaultSources } from '@bizcal/calendar-providers';
import type { CalendarSource, DefaultSourcesOptions } from '@bizcal/calendar-providers';
import { CALENDAR_KINDS, UnknownCalendarError, formatCalendarKey, isCalendarError, isCalendarKind } from '@bizcal/contracts';
import type { CalendarAdapter, CalendarKey, CalendarKind, DateInput, IsoDate } from '@bizcal/contracts';
import { createLogger } from '@bizcal/logger';
import type { Logger } from '@bizcal/logger';

export interface CalendarHubOptions {
  /** At most one source per kind. */
  sources: readonly CalendarSource[];
  logger?: Logger;
  /** Friendly names accepted by getByAlias and resolve; none by default. */
  aliases?: AliasTable;
  /** Horizon for the navigation shortcuts. */
  searchHorizonDays?: number;
}

export interface DefaultHubOptions extends Omit<CalendarHubOptions, 'sources'> {
  sources?: DefaultSourcesOptions;
}

/** A calendar reference as callers write it; `kind` is checked at lookup. */
export interface CalendarRef {
  kind: string;
  code: string;
}

/**
 * Registry of calendar adapters.
 *
 * @example
 * ```typescript
 * const hub = CalendarHub.default();
 * const xpar = hub.get('exchange', 'XPAR');
 * const both = hub.combine([{ kind: 'country', code: 'FR' }, { kind: 'country', code: 'US' }]);
 * hub.nextBusinessDay('exchange', 'XNYS', '2026-01-16'); // '2026-01-20'
 * ```
 */
export class CalendarHub {
  private readonly sources = new Map<CalendarKind, CalendarSource>();

  private readonly cache = new Map<string, CalendarAdapter>();

  private readonly logger: Logger;

  private readonly aliasTable: AliasTable;

  private readonly navigation: NavigationOptions;

  constructor(options: CalendarHubOptions) {
    for (const source of options.sources) {
      if (this.sources.has(source.kind)) {
        throw new Error(`Duplicate calendar source for kind "${source.kind}"`);
      }
      this.sources.set(source.kind, source);
    }
    this.logger = (options.logger ?? createLogger({ level: 'error', console: false })).child({ component: 'hub' });
    this.aliasTable = options.aliases ?? new AliasTable();
    this.navigation = { horizonDays: options.searchHorizonDays ?? DEFAULT_SEARCH_HORIZON_DAYS };
  }

  /**
   * A new hub over the bundled exchange, country and rfr sources and the
   * bundled alias table.
   */
  static default(options: DefaultHubOptions = {}): CalendarHub {
    const { sources, aliases, ...rest } = options;
    return new CalendarHub({
      ...rest,
      sources: createDefaultSources(sources),
      aliases: aliases ?? AliasTable.load(),
    });
  }

  /**
   * The adapter for a (kind, code) pair, constructed on first use.
   *
   * @throws {UnknownCalendarError} for an unknown kind or code
   */
  get(kind: string, code: string): CalendarAdapter {
    const source = this.sourceFor(kind, code);
    const canonical = source.resolveCode(code);
    if (canonical === null) {
      this.logger.debug('Calendar lookup failed', { kind, code, error_code: 'UNKNOWN_CALENDAR' });
      throw new UnknownCalendarError(`Unknown ${source.kind} code: "${code}"`, { kind: source.kind, code });
    }

    const key = formatCalendarKey({ kind: source.kind, code: canonical });
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug('Calendar cache hit', { kind, code, calendar: cached.name, cache: 'hit' });
      return cached;
    }

    let adapter: CalendarAdapter;
    try {
      adapter = source.create(canonical);
    } catch (error) {
      this.logger.debug('Calendar construction failed', {
        kind,
        code,
        error_code: isCalendarError(error) ? error.code : undefined,
      });
      throw error;
    }
    this.cache.set(key, adapter);
    this.logger.debug('Calendar constructed', { kind, code, calendar: adapter.name, cache: 'miss' });
    return adapter;
  }

  /**
   * The adapter for a friendly name such as `PARIS`, `UK` or `€STR`.
   *
   * @throws {UnknownCalendarError} when the name is not an alias
   */
  getByAlias(name: string): CalendarAdapter {
    const key = this.aliasTable.resolve(name);
    if (!key) {
      throw new UnknownCalendarError(`Unknown calendar alias: "${name}"`, { kind: 'alias', code: name });
    }
    return this.get(key.kind, key.code);
  }

  /**
   * Parses `kind:code` or an alias into a calendar key.
   *
   * @throws {UnknownCalendarError}
   */
  parseRef(ref: string): CalendarKey {
    const separator = ref.indexOf(':');
    if (separator > 0) {
      const kind = ref.slice(0, separator).trim().toLowerCase();
      const code = ref.slice(separator + 1).trim();
      if (!isCalendarKind(kind)) {
        throw new UnknownCalendarError(
          `Unknown calendar kind: "${kind}". Must be one of ${CALENDAR_KINDS.join(', ')}`,
          { kind, code }
        );
      }
      return { kind, code };
    }
    const key = this.aliasTable.resolve(ref);
    if (!key) {
      throw new UnknownCalendarError(`Unknown calendar: "${ref}". Use kind:code or an alias`, {
        kind: 'alias',
        code: ref,
      });
    }
    return key;
  }

  /**
   * Looks up `kind:code` or an alias.
   */
  resolve(ref: string): CalendarAdapter {
    const { kind, code } = this.parseRef(ref);
    return this.get(kind, code);
  }

  /**
   * Combines several calendars. The result is not cached.
   */
  combine(refs: readonly CalendarRef[], mode: string = 'intersection'): CombinedCalendarAdapter {
    return combine(
      refs.map((ref) => this.get(ref.kind, ref.code)),
      mode
    );
  }

  /**
   * One calendar with holidays added and removed. The result is not cached.
   */
  withOverrides(
    kind: string,
    code: string,
    addHolidays: readonly DateInput[] = [],
    removeHolidays: readonly DateInput[] = []
  ): OverrideCalendarAdapter {
    return withOverrides(this.get(kind, code), addHolidays, removeHolidays);
  }

  isBusinessDay(kind: string, code: string, date: DateInput): boolean {
    return this.get(kind, code).isBusinessDay(date);
  }

  businessDays(kind: string, code: string, start: DateInput, end: DateInput): IsoDate[] {
    return this.get(kind, code).businessDays(start, end);
  }

  holidays(kind: string, code: string, start: DateInput, end: DateInput): IsoDate[] {
    return this.get(kind, code).holidays(start, end);
  }

  addBusinessDays(kind: string, code: string, date: DateInput, n: number): IsoDate {
    return offsetBusinessDays(this.get(kind, code), date, n, this.navigation);
  }

  nextBusinessDay(kind: string, code: string, date: DateInput): IsoDate {
    return nextBusinessDay(this.get(kind, code), date, this.navigation);
  }

  previousBusinessDay(kind: string, code: string, date: DateInput): IsoDate {
    return previousBusinessDay(this.get(kind, code), date, this.navigation);
  }

  countBusinessDays(
    kind: string,
    code: string,
    start: DateInput,
    end: DateInput,
    inclusive: BoundInclusion = 'both'
  ): number {
    return countBusinessDays(this.get(kind, code), start, end, inclusive);
  }

  /** Search horizon used by the navigation shortcuts. */
  get searchHorizonDays(): number {
    return this.navigation.horizonDays ?? DEFAULT_SEARCH_HORIZON_DAYS;
  }

  /** Kinds with a registered source. */
  supportedKinds(): CalendarKind[] {
    return CALENDAR_KINDS.filter((kind) => this.sources.has(kind));
  }

  /**
   * Codes the source for `kind` accepts.
   */
  supportedCodes(kind: string): string[] {
    return this.sourceFor(kind, '').listCodes();
  }

  /** Friendly names accepted by getByAlias and resolve. */
  aliases(): Array<{ alias: string } & CalendarKey> {
    return this.aliasTable.list();
  }

  /** Keys of the adapters built so far, as `kind:code`. */
  cachedKeys(): string[] {
    return [...this.cache.keys()].sort();
  }

  private sourceFor(kind: string, code: string): CalendarSource {
    const normalized = kind.trim().toLowerCase();
    const source = isCalendarKind(normalized) ? this.sources.get(normalized) : undefined;
    if (!source) {
      this.logger.debug('Calendar lookup failed', { kind, code, error_code: 'UNKNOWN_CALENDAR' });
      throw new UnknownCalendarError(
        `Unknown calendar kind: "${kind}". Supported: ${this.supportedKinds().join(', ')}`,
        { kind, code }
      );
    }
    return source;
  }
}
