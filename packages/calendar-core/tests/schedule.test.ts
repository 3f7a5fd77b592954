/**
 * @fileoverview Tests for periodic schedules and range statistics.
 */

import { describe, it, expect } from 'vitest';
import { InvalidScheduleError } from '@bizcal/contracts';
import {
  parseFrequency,
  parseSelection,
  periodKey,
  scheduleBusinessDays,
  scheduleCalendarDays,
  selectInGroups,
} from '../src/schedule.js';
import { combine } from '../src/combine.js';
import { withOverrides } from '../src/override.js';
import { summarizeRange } from '../src/stats.js';
import { FixedHolidayCalendar, calendarA } from './helpers.js';

describe('parseFrequency', () => {
  it('should accept letters and names in any case', () => {
    expect(parseFrequency('M')).toBe('M');
    expect(parseFrequency('quarter')).toBe('Q');
    expect(parseFrequency('WEEK')).toBe('W');
    expect(parseFrequency(' Semester ')).toBe('S');
    expect(parseFrequency('y')).toBe('Y');
  });

  it('should reject anything else', () => {
    expect(() => parseFrequency('D')).toThrow(InvalidScheduleError);
  });
});

describe('parseSelection', () => {
  it('should read keywords and integers', () => {
    expect(parseSelection('LAST')).toBe('last');
    expect(parseSelection('all')).toBe('all');
    expect(parseSelection('3')).toBe(3);
  });

  it('should reject zero and words', () => {
    expect(() => parseSelection('0')).toThrow(InvalidScheduleError);
    expect(() => parseSelection('second')).toThrow(InvalidScheduleError);
  });
});

describe('periodKey', () => {
  it('should label each period', () => {
    expect(periodKey('2027-01-01', 'W')).toBe('2026-W53');
    expect(periodKey('2026-01-05', 'W')).toBe('2026-W02');
    expect(periodKey('2026-02-14', 'M')).toBe('2026-02');
    expect(periodKey('2026-05-15', 'Q')).toBe('2026-Q2');
    expect(periodKey('2026-08-15', 'S')).toBe('2026-S2');
    expect(periodKey('2026-08-15', 'Y')).toBe('2026');
  });
});

describe('selectInGroups', () => {
  const dates = ['2026-01-30', '2026-02-02', '2026-02-03'];

  it('should skip periods shorter than the n-th selection', () => {
    expect(selectInGroups(dates, 'M', 2)).toEqual(['2026-02-03']);
  });

  it('should return everything for all', () => {
    expect(selectInGroups(dates, 'M', 'all')).toEqual(dates);
  });

  it('should return nothing for no dates', () => {
    expect(selectInGroups([], 'Y', 'first')).toEqual([]);
  });
});

describe('scheduleBusinessDays', () => {
  it('should pick the first business day of each month', () => {
    const a = calendarA();

    expect(scheduleBusinessDays(a, { frequency: 'M', start: '2026-01-01', end: '2026-03-31' })).toEqual([
      '2026-01-02',
      '2026-02-02',
      '2026-03-02',
    ]);
  });

  it('should pick the last business day of each month', () => {
    expect(
      scheduleBusinessDays(calendarA(), { frequency: 'M', which: 'last', start: '2026-01-01', end: '2026-02-28' })
    ).toEqual(['2026-01-30', '2026-02-27']);
  });

  it('should pick the n-th business day', () => {
    expect(
      scheduleBusinessDays(calendarA(), { frequency: 'month', which: 2, start: '2026-01-01', end: '2026-02-28' })
    ).toEqual(['2026-01-05', '2026-02-03']);
  });

  it('should group by ISO week', () => {
    expect(
      scheduleBusinessDays(calendarA(), { frequency: 'W', which: 'last', start: '2026-01-12', end: '2026-01-25' })
    ).toEqual(['2026-01-16', '2026-01-23']);
  });

  it('should skip holidays at the start of a week', () => {
    expect(
      scheduleBusinessDays(calendarA(), { frequency: 'W', which: 'first', start: '2026-01-12', end: '2026-01-25' })
    ).toEqual(['2026-01-12', '2026-01-20']);
  });

  it('should reject a non-positive selection', () => {
    expect(() =>
      scheduleBusinessDays(calendarA(), { frequency: 'M', which: 0, start: '2026-01-01', end: '2026-01-31' })
    ).toThrow(InvalidScheduleError);
  });
});

describe('scheduleCalendarDays', () => {
  it('should pick the n-th weekday of each month', () => {
    expect(
      scheduleCalendarDays({ frequency: 'M', weekday: 1, which: 2, start: '2026-01-01', end: '2026-02-28' })
    ).toEqual(['2026-01-12', '2026-02-09']);
  });

  it('should list every matching weekday', () => {
    expect(
      scheduleCalendarDays({ frequency: 'Q', weekday: 5, which: 'all', start: '2026-01-01', end: '2026-01-31' })
    ).toEqual(['2026-01-02', '2026-01-09', '2026-01-16', '2026-01-23', '2026-01-30']);
  });

  it('should use every day without a weekday', () => {
    expect(scheduleCalendarDays({ frequency: 'Y', which: 'last', start: '2025-12-01', end: '2026-01-10' })).toEqual([
      '2025-12-31',
      '2026-01-10',
    ]);
  });

  it('should reject an invalid weekday', () => {
    expect(() => scheduleCalendarDays({ frequency: 'M', weekday: 8, start: '2026-01-01', end: '2026-01-31' })).toThrow(
      InvalidScheduleError
    );
  });
});

describe('summarizeRange', () => {
  it('should count business and off days', () => {
    expect(summarizeRange(calendarA(), '2026-01-01', '2026-01-11')).toEqual({
      start: '2026-01-01',
      end: '2026-01-11',
      totalDays: 11,
      businessDays: 6,
      offDays: 5,
      weekendOffDays: 4,
      weekdayHolidays: 1,
      businessRatio: 0.5455,
    });
  });

  it("should use the calendar's own weekend", () => {
    const friSat = new FixedHolidayCalendar('G', ['2026-01-08'], { weekendDays: [5, 6] });
    const expected = {
      start: '2026-01-01',
      end: '2026-01-10',
      totalDays: 10,
      businessDays: 5,
      offDays: 5,
      weekendOffDays: 4,
      weekdayHolidays: 1,
      businessRatio: 0.5,
    };

    expect(summarizeRange(friSat, '2026-01-01', '2026-01-10')).toEqual(expected);
    expect(summarizeRange(withOverrides(friSat), '2026-01-01', '2026-01-10')).toEqual(expected);
  });

  it('should derive the weekend of a combination', () => {
    const friSat = new FixedHolidayCalendar('G', [], { weekendDays: [5, 6] });

    expect(combine([friSat, calendarA()]).weekendDays).toEqual([5, 6, 7]);
    expect(combine([friSat, calendarA()], 'union').weekendDays).toEqual([6]);
  });
});
