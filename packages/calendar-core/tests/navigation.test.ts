/**
 * @fileoverview Tests for next/previous/offset navigation and counting.
 */

import { describe, it, expect } from 'vitest';
import { InvalidDateError, InvalidOffsetError, SearchExhaustedError, eachDay } from '@bizcal/contracts';
import { combine } from '../src/combine.js';
import {
  countBusinessDays,
  nextBusinessDay,
  offsetBusinessDays,
  previousBusinessDay,
} from '../src/navigation.js';
import { FixedHolidayCalendar, calendarA, calendarB, neverOpen } from './helpers.js';

describe('nextBusinessDay / previousBusinessDay', () => {
  it('should skip weekends and holidays', () => {
    const a = calendarA();

    expect(nextBusinessDay(a, '2026-01-16')).toBe('2026-01-20');
    expect(previousBusinessDay(a, '2026-01-20')).toBe('2026-01-16');
  });

  it('should move strictly away from an open date', () => {
    const a = calendarA();

    expect(nextBusinessDay(a, '2026-01-07')).toBe('2026-01-08');
    expect(previousBusinessDay(a, '2026-01-07')).toBe('2026-01-06');
  });

  it('should start from a closed date', () => {
    expect(nextBusinessDay(calendarA(), '2026-01-03')).toBe('2026-01-05');
    expect(previousBusinessDay(calendarA(), '2026-01-04')).toBe('2026-01-02');
  });

  it('should return to an open date after next then previous', () => {
    const a = calendarA();
    for (const d of a.businessDays('2026-01-01', '2026-01-31')) {
      expect(previousBusinessDay(a, nextBusinessDay(a, d))).toBe(d);
      expect(nextBusinessDay(a, previousBusinessDay(a, d))).toBe(d);
    }
  });

  it('should find nothing closed between a date and the next business day', () => {
    const a = calendarA();
    const next = nextBusinessDay(a, '2026-01-16');

    expect(a.businessDays('2026-01-17', '2026-01-19')).toEqual([]);
    expect(a.isBusinessDay(next)).toBe(true);
  });

  it('should work over combinations', () => {
    expect(nextBusinessDay(combine([calendarA(), calendarB()]), '2026-01-05')).toBe('2026-01-07');
    expect(nextBusinessDay(combine([calendarA(), calendarB()], 'union'), '2026-01-16')).toBe('2026-01-19');
  });

  it('should stop at the search horizon', () => {
    const a = calendarA();

    expect(() => nextBusinessDay(a, '2026-01-16', { horizonDays: 3 })).toThrow(SearchExhaustedError);
    expect(nextBusinessDay(a, '2026-01-16', { horizonDays: 4 })).toBe('2026-01-20');
  });

  it('should fail on a calendar that never opens', () => {
    try {
      previousBusinessDay(neverOpen(), '2026-01-01', { horizonDays: 30 });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SearchExhaustedError);
      expect(error).toMatchObject({
        code: 'SEARCH_EXHAUSTED',
        data: { calendar: 'closed', from: '2026-01-01', direction: 'backward', horizonDays: 30 },
      });
    }
  });

  it('should reject a horizon that is not a positive integer', () => {
    expect(() => nextBusinessDay(calendarA(), '2026-01-01', { horizonDays: 0 })).toThrow(RangeError);
    expect(() => nextBusinessDay(calendarA(), '2026-01-01', { horizonDays: 2.5 })).toThrow(RangeError);
  });
});

describe('date bounds', () => {
  it('should stop at the last representable date instead of producing a 5-digit year', () => {
    const unbounded = new FixedHolidayCalendar('U');

    expect(() => nextBusinessDay(unbounded, '9999-12-31')).toThrow(InvalidDateError);
    expect(previousBusinessDay(unbounded, '9999-12-31')).toBe('9999-12-30');
  });
});

describe('offsetBusinessDays', () => {
  it('should move forward and backward', () => {
    const a = calendarA();

    expect(offsetBusinessDays(a, '2026-01-15', 2)).toBe('2026-01-20');
    expect(offsetBusinessDays(a, '2026-01-20', -2)).toBe('2026-01-15');
    expect(offsetBusinessDays(a, '2026-01-02', 5)).toBe('2026-01-09');
  });

  it('should match repeated next/previous', () => {
    const a = calendarA();
    let cursor = '2026-01-02';
    for (let n = 1; n <= 10; n++) {
      cursor = nextBusinessDay(a, cursor);
      expect(offsetBusinessDays(a, '2026-01-02', n)).toBe(cursor);
    }
  });

  it('should return an open date for a zero offset', () => {
    expect(offsetBusinessDays(calendarA(), '2026-01-20', 0)).toBe('2026-01-20');
  });

  it('should reject a zero offset from a closed date', () => {
    expect(() => offsetBusinessDays(calendarA(), '2026-01-19', 0)).toThrow(InvalidOffsetError);
  });

  it('should reject a fractional offset', () => {
    expect(() => offsetBusinessDays(calendarA(), '2026-01-20', 1.5)).toThrow(InvalidOffsetError);
  });

  it('should apply the horizon to every step', () => {
    expect(() => offsetBusinessDays(calendarA(), '2026-01-15', 2, { horizonDays: 3 })).toThrow(
      SearchExhaustedError
    );
  });
});

describe('countBusinessDays', () => {
  it('should include both bounds by default', () => {
    expect(countBusinessDays(calendarA(), '2026-01-05', '2026-01-09')).toBe(5);
  });

  it('should drop excluded bounds', () => {
    const a = calendarA();

    expect(countBusinessDays(a, '2026-01-05', '2026-01-09', 'neither')).toBe(3);
    expect(countBusinessDays(a, '2026-01-05', '2026-01-09', 'start')).toBe(4);
    expect(countBusinessDays(a, '2026-01-05', '2026-01-09', 'end')).toBe(4);
  });

  it('should not subtract a closed bound', () => {
    expect(countBusinessDays(calendarA(), '2026-01-03', '2026-01-09', 'neither')).toBe(4);
  });

  it('should count a full month', () => {
    const a = calendarA();
    const open = eachDay('2026-01-01', '2026-01-31').filter((d) => a.isBusinessDay(d));

    expect(countBusinessDays(a, '2026-01-01', '2026-01-31')).toBe(open.length);
    expect(open).toHaveLength(20);
  });
});
