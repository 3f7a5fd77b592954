/**
 * @fileoverview The `bizcal` command tree.
 *
 * Every command takes one or more calendars written `kind:code` or as an
 * alias. Several calendars are combined with `--mode`; `--add` and `--remove`
 * patch the result.
 */

import { writeFileSync } from 'node:fs';
import { extname } from 'node:path';
import { Command, CommanderError, Option } from 'commander';
import {
  BOUND_INCLUSIONS,
  combine,
  countBusinessDays,
  nextBusinessDay,
  offsetBusinessDays,
  parseSelection,
  previousBusinessDay,
  scheduleBusinessDays,
  scheduleCalendarDays,
  summarizeRange,
  withOverrides,
} from '@bizcal/calendar-core';
import type { BoundInclusion, NavigationOptions } from '@bizcal/calendar-core';
import type { CalendarHub } from '@bizcal/calendar-hub';
import { CALENDAR_KINDS, eachDay, formatIsoDate, isCalendarError, isoDateParts, toIsoDate } from '@bizcal/contracts';
import type { CalendarAdapter, IsoDate } from '@bizcal/contracts';
import type { Logger } from '@bizcal/logger';
import type { Config } from './config/index.js';
import { concatMonths, monthSequence, renderExport, renderMonth } from './render.js';

export interface CliDeps {
  hub: CalendarHub;
  config: Config;
  logger: Logger;
  /** Command output, one line per call. */
  out: (line: string) => void;
  /** Error output, one line per call. */
  err: (line: string) => void;
  writeFile?: (path: string, content: string) => void;
  /** Today's date; defaults to the current UTC date. */
  today?: () => IsoDate;
}

interface CalendarOptions {
  mode: string;
  add?: string;
  remove?: string;
}

interface RangeOptions extends CalendarOptions {
  start: string;
  end: string;
}

interface DateOptions extends CalendarOptions {
  date: string;
}

const MONTHS_PER_ROW = 3;

/**
 * Builds the command tree. Errors are thrown, never printed; see {@link run}.
 */
export function buildProgram(deps: CliDeps): Command {
  const { hub, config, out } = deps;
  const dateOptions = { dayFirst: config.calendar.dayFirst };
  const navigation: NavigationOptions = { horizonDays: config.calendar.searchHorizonDays };
  const parseDate = (value: string): IsoDate => toIsoDate(value, dateOptions);
  const today = deps.today ?? (() => formatIsoDate(new Date()));

  const selectCalendar = (refs: readonly string[], options: CalendarOptions): CalendarAdapter => {
    const adapters = refs.map((ref) => hub.resolve(ref));
    const [only] = adapters;
    const base = adapters.length === 1 && only ? only : combine(adapters, options.mode);
    const add = splitDates(options.add).map(parseDate);
    const remove = splitDates(options.remove).map(parseDate);
    return add.length || remove.length ? withOverrides(base, add, remove) : base;
  };

  const program = new Command();

  program
    .name('bizcal')
    .description('Business-day calendars for exchanges, countries and reference rates')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out(text.trimEnd()),
      writeErr: (text) => deps.err(text.trimEnd()),
    });

  const calendarCommand = (name: string, description: string): Command =>
    program
      .command(name)
      .description(description)
      .argument('<calendars...>', 'calendars as kind:code or alias (e.g. exchange:XPAR, country:FR, SOFR)')
      .addOption(
        new Option('-m, --mode <mode>', 'how several calendars combine')
          .choices(['intersection', 'union'])
          .default(config.calendar.combineMode)
      )
      .option('--add <dates>', 'comma-separated extra holidays')
      .option('--remove <dates>', 'comma-separated holidays to reopen');

  calendarCommand('show', 'print month grids, closed days in brackets')
    .option('-y, --year <year>', 'year to show')
    .option('--month <month>', 'first month to show (1-12)')
    .option('-n, --months <count>', 'number of months', '1')
    .option('--no-color', 'disable colour')
    .action((refs: string[], options: CalendarOptions & { year?: string; month?: string; months: string; color: boolean }) => {
      const adapter = selectCalendar(refs, options);
      const current = isoDateParts(today());
      const year = options.year !== undefined ? parsePositiveInt(options.year, 'year') : current.year;
      const wholeYear = options.year !== undefined && options.month === undefined;
      const month = wholeYear ? 1 : options.month !== undefined ? parseMonth(options.month) : current.month;
      const count = wholeYear ? 12 : parsePositiveInt(options.months, 'months');
      const color = config.output.color && options.color;

      out(adapter.name);
      const grids = monthSequence(year, month, count).map(([y, m]) => renderMonth(adapter, y, m, { color }));
      for (let i = 0; i < grids.length; i += MONTHS_PER_ROW) {
        out('');
        concatMonths(grids.slice(i, i + MONTHS_PER_ROW)).forEach((line) => out(line));
      }
    });

  calendarCommand('holidays', 'list closed days (weekends included)')
    .requiredOption('-s, --start <date>', 'first date')
    .requiredOption('-e, --end <date>', 'last date')
    .action((refs: string[], options: RangeOptions) => {
      selectCalendar(refs, options)
        .holidays(parseDate(options.start), parseDate(options.end))
        .forEach((d) => out(d));
    });

  calendarCommand('business-days', 'list business days')
    .requiredOption('-s, --start <date>', 'first date')
    .requiredOption('-e, --end <date>', 'last date')
    .action((refs: string[], options: RangeOptions) => {
      selectCalendar(refs, options)
        .businessDays(parseDate(options.start), parseDate(options.end))
        .forEach((d) => out(d));
    });

  calendarCommand('check', 'tell whether a date is a business day')
    .requiredOption('-d, --date <date>', 'date to check')
    .action((refs: string[], options: DateOptions) => {
      const date = parseDate(options.date);
      out(`${date} ${selectCalendar(refs, options).isBusinessDay(date) ? 'open' : 'closed'}`);
    });

  calendarCommand('next', 'first business day after a date')
    .requiredOption('-d, --date <date>', 'starting date')
    .action((refs: string[], options: DateOptions) => {
      out(nextBusinessDay(selectCalendar(refs, options), parseDate(options.date), navigation));
    });

  calendarCommand('prev', 'last business day before a date')
    .requiredOption('-d, --date <date>', 'starting date')
    .action((refs: string[], options: DateOptions) => {
      out(previousBusinessDay(selectCalendar(refs, options), parseDate(options.date), navigation));
    });

  calendarCommand('offset', 'move a number of business days from a date')
    .requiredOption('-d, --date <date>', 'starting date')
    .requiredOption('--days <n>', 'business days to move (negative goes back)')
    .action((refs: string[], options: DateOptions & { days: string }) => {
      const days = parseInteger(options.days, 'days');
      out(offsetBusinessDays(selectCalendar(refs, options), parseDate(options.date), days, navigation));
    });

  calendarCommand('count', 'count business days in a range')
    .requiredOption('-s, --start <date>', 'first date')
    .requiredOption('-e, --end <date>', 'last date')
    .addOption(new Option('--inclusive <bounds>', 'bounds to include').choices(BOUND_INCLUSIONS).default('both'))
    .action((refs: string[], options: RangeOptions & { inclusive: BoundInclusion }) => {
      const adapter = selectCalendar(refs, options);
      out(String(countBusinessDays(adapter, parseDate(options.start), parseDate(options.end), options.inclusive)));
    });

  calendarCommand('schedule', 'pick business days per week, month, quarter, semester or year')
    .requiredOption('-s, --start <date>', 'first date')
    .requiredOption('-e, --end <date>', 'last date')
    .requiredOption('-f, --frequency <freq>', 'W, M, Q, S or Y')
    .option('-w, --which <which>', 'first, last, all or n', 'first')
    .action((refs: string[], options: RangeOptions & { frequency: string; which: string }) => {
      scheduleBusinessDays(selectCalendar(refs, options), {
        frequency: options.frequency,
        which: parseSelection(options.which),
        start: parseDate(options.start),
        end: parseDate(options.end),
      }).forEach((d) => out(d));
    });

  calendarCommand('stats', 'summarize a range')
    .requiredOption('-s, --start <date>', 'first date')
    .requiredOption('-e, --end <date>', 'last date')
    .action((refs: string[], options: RangeOptions) => {
      const summary = summarizeRange(selectCalendar(refs, options), parseDate(options.start), parseDate(options.end));
      for (const [key, value] of Object.entries(summary)) {
        out(`${key}: ${value}`);
      }
    });

  calendarCommand('export', 'write every date of a range with its status to a .csv or .json file')
    .requiredOption('-s, --start <date>', 'first date')
    .requiredOption('-e, --end <date>', 'last date')
    .requiredOption('-o, --out <file>', 'output file (.csv or .json)')
    .action((refs: string[], options: RangeOptions & { out: string }) => {
      const ext = extname(options.out).toLowerCase();
      if (ext !== '.csv' && ext !== '.json') {
        throw new CommanderError(1, 'bizcal.exportFormat', `Unsupported export format "${ext}". Use .csv or .json`);
      }
      const adapter = selectCalendar(refs, options);
      const open = new Set(adapter.businessDays(parseDate(options.start), parseDate(options.end)));
      const rows = eachDay(parseDate(options.start), parseDate(options.end)).map((date) => ({
        date,
        businessDay: open.has(date),
      }));
      (deps.writeFile ?? writeUtf8)(options.out, renderExport(rows, ext === '.csv' ? 'csv' : 'json'));
      out(`Wrote ${rows.length} dates to ${options.out}`);
    });

  program
    .command('schedule-days')
    .description('pick calendar days per period, optionally one weekday only (no calendar)')
    .requiredOption('-s, --start <date>', 'first date')
    .requiredOption('-e, --end <date>', 'last date')
    .requiredOption('-f, --frequency <freq>', 'W, M, Q, S or Y')
    .option('--weekday <n>', 'ISO weekday, 1 = Monday')
    .option('-w, --which <which>', 'first, last, all or n', 'first')
    .action((options: { start: string; end: string; frequency: string; which: string; weekday?: string }) => {
      scheduleCalendarDays({
        frequency: options.frequency,
        which: parseSelection(options.which),
        start: parseDate(options.start),
        end: parseDate(options.end),
        ...(options.weekday !== undefined ? { weekday: parseInteger(options.weekday, 'weekday') } : {}),
      }).forEach((d) => out(d));
    });

  program
    .command('list')
    .description('list calendar kinds, the codes of one kind, or aliases')
    .argument('[kind]', `${CALENDAR_KINDS.join(', ')} or aliases`)
    .action((kind: string | undefined) => {
      if (kind === undefined) {
        hub.supportedKinds().forEach((k) => out(k));
      } else if (kind === 'aliases') {
        hub.aliases().forEach((a) => out(`${a.alias} -> ${a.kind}:${a.code}`));
      } else {
        hub.supportedCodes(kind).forEach((code) => out(code));
      }
    });

  return program;
}

/**
 * Runs one command line and returns the exit status. Calendar errors print
 * as `CODE: message`; anything else propagates.
 */
export function run(argv: readonly string[], deps: CliDeps): number {
  const program = buildProgram(deps);
  try {
    program.parse([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (isCalendarError(error)) {
      deps.logger.debug('Command failed', { error_code: error.code, data: error.data });
      deps.err(`${error.code}: ${error.message}`);
      return 1;
    }
    if (error instanceof CommanderError) {
      if (error.code.startsWith('bizcal.')) {
        deps.err(error.message);
      }
      return error.exitCode;
    }
    throw error;
  }
}

function splitDates(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function parseInteger(value: string, name: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new CommanderError(1, 'bizcal.invalidArgument', `${name} must be an integer, got "${value}"`);
  }
  return Number(value);
}

function parsePositiveInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new CommanderError(1, 'bizcal.invalidArgument', `${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

function parseMonth(value: string): number {
  const n = parsePositiveInt(value, 'month');
  if (n > 12) {
    throw new CommanderError(1, 'bizcal.invalidArgument', `month must be 1-12, got "${value}"`);
  }
  return n;
}

function writeUtf8(path: string, content: string): void {
  writeFileSync(path, content, 'utf8');
}
