/**
 * @fileoverview Text rendering of month grids and date lists.
 */

import chalk from 'chalk';
import { daysInMonth, isoWeekday, makeIsoDate } from '@bizcal/contracts';
import type { CalendarAdapter, IsoDate } from '@bizcal/contracts';

/** Width of one rendered month: seven 4-character cells. */
export const MONTH_WIDTH = 28;

const WEEKDAY_HEADER = ' Mo  Tu  We  Th  Fr  Sa  Su';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

export interface RenderOptions {
  color?: boolean;
}

/**
 * Renders one month. Business days print as ` dd `, closed days as `[dd]`.
 *
 * @example
 * ```
 *         January 2026
 *  Mo  Tu  We  Th  Fr  Sa  Su
 *             [01] 02 [03][04]
 * ```
 */
export function renderMonth(
  adapter: CalendarAdapter,
  year: number,
  month: number,
  options: RenderOptions = {}
): string[] {
  const first = makeIsoDate(year, month, 1);
  const last = makeIsoDate(year, month, daysInMonth(year, month));
  const closed = new Set(adapter.holidays(first, last));
  const paintClosed = options.color ? chalk.red : (cell: string) => cell;

  const title = `${MONTH_NAMES[month - 1] ?? String(month)} ${year}`;
  const lines = [
    ' '.repeat(Math.floor((MONTH_WIDTH - title.length) / 2)) + title,
    options.color ? chalk.bold(WEEKDAY_HEADER) : WEEKDAY_HEADER,
  ];

  let row = '    '.repeat(isoWeekday(first) - 1);
  for (let day = 1; day <= daysInMonth(year, month); day++) {
    const date = makeIsoDate(year, month, day);
    const dd = String(day).padStart(2, '0');
    row += closed.has(date) ? paintClosed(`[${dd}]`) : ` ${dd} `;
    if (isoWeekday(date) === 7) {
      lines.push(row.trimEnd());
      row = '';
    }
  }
  if (row) {
    lines.push(row.trimEnd());
  }
  return lines;
}

/**
 * Places month grids side by side.
 */
export function concatMonths(grids: readonly string[][], gap = 2): string[] {
  const height = Math.max(0, ...grids.map((g) => g.length));
  const lines: string[] = [];
  for (let i = 0; i < height; i++) {
    const cells = grids.map((g) => padVisible(g[i] ?? '', MONTH_WIDTH));
    lines.push(cells.join(' '.repeat(gap)).trimEnd());
  }
  return lines;
}

/**
 * Months from (year, month) onwards, `count` of them.
 */
export function monthSequence(year: number, month: number, count: number): Array<[number, number]> {
  const months: Array<[number, number]> = [];
  for (let i = 0; i < count; i++) {
    const index = month - 1 + i;
    months.push([year + Math.floor(index / 12), (index % 12) + 1]);
  }
  return months;
}

/**
 * One `date,business_day` row per day (CSV) or an array of objects (JSON).
 */
export function renderExport(
  rows: ReadonlyArray<{ date: IsoDate; businessDay: boolean }>,
  format: 'csv' | 'json'
): string {
  if (format === 'json') {
    return `${JSON.stringify(rows, null, 2)}\n`;
  }
  return ['date,business_day', ...rows.map((r) => `${r.date},${r.businessDay}`)].join('\n') + '\n';
}

// width ignores ANSI colour codes
function padVisible(text: string, width: number): string {
  const visible = text.replace(/\u001b\[[0-9;]*m/g, '').length;
  return text + ' '.repeat(Math.max(0, width - visible));
}
