/**
 * In-process calendar sources for hub tests.
 */

import { PassThrough } from 'node:stream';
import { BaseCalendarAdapter } from '@bizcal/calendar-core';
import type { CalendarSource } from '@bizcal/calendar-providers';
import { UnknownCalendarError, isWeekend } from '@bizcal/contracts';
import type { AdapterVariant, CalendarKind, IsoDate } from '@bizcal/contracts';

export class StubCalendar extends BaseCalendarAdapter {
  constructor(
    readonly name: string,
    readonly variant: AdapterVariant,
    private readonly closed: ReadonlySet<IsoDate>
  ) {
    super();
  }

  protected isOpen(date: IsoDate): boolean {
    return !isWeekend(date) && !this.closed.has(date);
  }
}

/**
 * A source over a fixed code -> holidays table. Codes are matched
 * case-insensitively; `aliases` maps extra codes onto table codes.
 */
export class StubSource implements CalendarSource {
  created: string[] = [];

  constructor(
    readonly kind: CalendarKind,
    private readonly table: Record<string, IsoDate[]>,
    private readonly aliases: Record<string, string> = {}
  ) {}

  resolveCode(code: string): string | null {
    const upper = code.trim().toUpperCase();
    const target = this.aliases[upper] ?? upper;
    return Object.hasOwn(this.table, target) ? target : null;
  }

  create(code: string): StubCalendar {
    const holidays = this.table[code];
    if (!holidays) {
      throw new UnknownCalendarError(`Unknown ${this.kind} code: "${code}"`, { kind: this.kind, code });
    }
    this.created.push(code);
    return new StubCalendar(code, this.kind, new Set(holidays));
  }

  listCodes(): string[] {
    return Object.keys(this.table).sort();
  }
}

export function stubSources(): { exchange: StubSource; country: StubSource; rfr: StubSource } {
  return {
    exchange: new StubSource('exchange', { XTST: ['2026-01-19'], XALT: ['2026-01-06'] }),
    country: new StubSource('country', { AA: ['2026-01-01', '2026-01-19'], BB: ['2026-01-01'] }),
    rfr: new StubSource('rfr', { RATECAL: ['2026-01-02'] }, { 'RATE INDEX': 'RATECAL', RATE: 'RATECAL' }),
  };
}

export function captureStream(): { stream: PassThrough; entries: () => Array<Record<string, unknown>> } {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));
  return {
    stream,
    entries: () =>
      chunks
        .join('')
        .split(/\r?\n/)
        .filter((line) => line.length > 0)
        .map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 50));
}
