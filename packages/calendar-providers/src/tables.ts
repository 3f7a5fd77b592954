/**
 * @fileoverview Holiday table loading and validation.
 *
 * Tables are JSON files under `data/`, read once per load and validated with
 * zod. Every holiday must fall inside its calendar's validity window.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const holidayEntrySchema = z.object({
  date: isoDateSchema,
  name: z.string().min(1),
  type: z.enum(['full', 'early_close']).default('full'),
});

const windowedCalendarSchema = z.object({
  name: z.string().min(1),
  weekendDays: z.array(z.number().int().min(1).max(7)).default([6, 7]),
  validFrom: isoDateSchema,
  validTo: isoDateSchema,
  holidays: z.array(holidayEntrySchema),
});

function checkWindow(entry: z.infer<typeof windowedCalendarSchema>, ctx: z.RefinementCtx): void {
  if (entry.validFrom > entry.validTo) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `validFrom ${entry.validFrom} is after validTo ${entry.validTo}`,
      path: ['validFrom'],
    });
  }
  entry.holidays.forEach((holiday, index) => {
    if (holiday.date < entry.validFrom || holiday.date > entry.validTo) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${holiday.date} is outside ${entry.validFrom}..${entry.validTo}`,
        path: ['holidays', index, 'date'],
      });
    }
  });
}

export const exchangeCalendarSchema = windowedCalendarSchema
  .extend({ timezone: z.string().min(1) })
  .superRefine(checkWindow);

export const rfrCalendarSchema = windowedCalendarSchema
  .extend({ tickers: z.array(z.string().min(1)).min(1) })
  .superRefine(checkWindow);

export const exchangeTableSchema = z.object({
  calendars: z.record(exchangeCalendarSchema),
});

export const rfrTableSchema = z.object({
  calendars: z.record(rfrCalendarSchema),
});

export type HolidayEntry = z.infer<typeof holidayEntrySchema>;
export type HolidayType = HolidayEntry['type'];
export type ExchangeCalendarEntry = z.infer<typeof exchangeCalendarSchema>;
export type RfrCalendarEntry = z.infer<typeof rfrCalendarSchema>;
export type ExchangeTable = z.infer<typeof exchangeTableSchema>;
export type RfrTable = z.infer<typeof rfrTableSchema>;

export const DEFAULT_EXCHANGE_TABLE = new URL('../data/exchange-calendars.json', import.meta.url);
export const DEFAULT_RFR_TABLE = new URL('../data/rfr-calendars.json', import.meta.url);

/**
 * Validates raw table data against a schema.
 *
 * @throws {Error} listing every invalid path
 */
export function parseTable<T extends z.ZodTypeAny>(schema: T, raw: unknown, source: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid calendar table ${source}:\n${errors.join('\n')}`);
  }
  return result.data;
}

function readJson(file: URL | string): unknown {
  return JSON.parse(readFileSync(file, 'utf8'));
}

export function loadExchangeTable(file: URL | string = DEFAULT_EXCHANGE_TABLE): ExchangeTable {
  return parseTable(exchangeTableSchema, readJson(file), String(file));
}

export function loadRfrTable(file: URL | string = DEFAULT_RFR_TABLE): RfrTable {
  return parseTable(rfrTableSchema, readJson(file), String(file));
}
