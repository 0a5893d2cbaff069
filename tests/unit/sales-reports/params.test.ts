/**
 * Unit tests for sales report parameter validation and resolution
 */

import { describe, expect, it } from 'vitest';

import {
  resolveTopLimit,
  shiftIsoDate,
  toDateRange,
  validateIsoDate,
  validateSalesReportParams,
  validateWindowDays,
  validateYear,
  yearOfIsoDate,
} from '@/modules/sales-reports/core/params.js';

describe('validateYear', () => {
  it('accepts integer years within bounds', () => {
    expect(validateYear(2014)._unsafeUnwrap()).toBe(2014);
    expect(validateYear(1900).isOk()).toBe(true);
    expect(validateYear(9999).isOk()).toBe(true);
  });

  it('rejects out-of-range and fractional years', () => {
    const error = validateYear(1899)._unsafeUnwrapErr();

    expect(error.type).toBe('ValidationError');
    expect(error.field).toBe('year');
    expect(error.message).toBe(
      "Invalid parameter 'year': expected an integer year between 1900 and 9999, got 1899"
    );
    expect(validateYear(2014.5).isErr()).toBe(true);
    expect(validateYear(10000).isErr()).toBe(true);
  });

  it('names the field it validated', () => {
    expect(validateYear(0, 'toYear')._unsafeUnwrapErr().field).toBe('toYear');
  });
});

describe('validateIsoDate', () => {
  it('accepts real calendar dates', () => {
    expect(validateIsoDate('2014-06-30')._unsafeUnwrap()).toBe('2014-06-30');
    expect(validateIsoDate('2012-02-29').isOk()).toBe(true);
  });

  it('rejects dates that do not exist', () => {
    expect(validateIsoDate('2014-02-30').isErr()).toBe(true);
    expect(validateIsoDate('2013-02-29').isErr()).toBe(true);
    expect(validateIsoDate('2014-13-01').isErr()).toBe(true);
  });

  it('rejects other formats', () => {
    const error = validateIsoDate('2014-6-1')._unsafeUnwrapErr();

    expect(error.field).toBe('referenceDate');
    expect(error.message).toBe(
      "Invalid parameter 'referenceDate': expected a calendar date in YYYY-MM-DD form, got '2014-6-1'"
    );
    expect(validateIsoDate('30/06/2014').isErr()).toBe(true);
    expect(validateIsoDate('2014-06-30T00:00:00Z').isErr()).toBe(true);
  });
});

describe('validateWindowDays', () => {
  it('accepts lengths between 1 and 3660 days', () => {
    expect(validateWindowDays(1).isOk()).toBe(true);
    expect(validateWindowDays(3660).isOk()).toBe(true);
  });

  it('rejects zero, negative, oversized and fractional lengths', () => {
    expect(validateWindowDays(0).isErr()).toBe(true);
    expect(validateWindowDays(-30).isErr()).toBe(true);
    expect(validateWindowDays(3661).isErr()).toBe(true);
    expect(validateWindowDays(1.5).isErr()).toBe(true);
  });
});

describe('validateSalesReportParams', () => {
  it('passes empty input through', () => {
    expect(validateSalesReportParams({})._unsafeUnwrap()).toEqual({});
  });

  it('passes valid input through unchanged', () => {
    const input = { year: 2014, referenceDate: '2014-06-30', windowDays: 7, limit: 3 };

    expect(validateSalesReportParams(input)._unsafeUnwrap()).toEqual(input);
  });

  it('reports the first invalid parameter', () => {
    const error = validateSalesReportParams({ year: 1800, windowDays: 0 })._unsafeUnwrapErr();

    expect(error.field).toBe('year');
  });

  it('rejects a fractional limit', () => {
    const error = validateSalesReportParams({ limit: 2.5 })._unsafeUnwrapErr();

    expect(error.field).toBe('limit');
    expect(error.message).toBe("Invalid parameter 'limit': expected an integer, got 2.5");
  });

  it('accepts out-of-range integer limits, which are clamped later', () => {
    expect(validateSalesReportParams({ limit: 0 }).isOk()).toBe(true);
    expect(validateSalesReportParams({ limit: 1000 }).isOk()).toBe(true);
  });

  it('rejects a reversed year range', () => {
    const error = validateSalesReportParams({ fromYear: 2014, toYear: 2013 })._unsafeUnwrapErr();

    expect(error.field).toBe('fromYear');
    expect(error.message).toBe("Invalid parameter 'fromYear': 2014 is after toYear 2013");
  });

  it('accepts a single-year range', () => {
    expect(validateSalesReportParams({ fromYear: 2013, toYear: 2013 }).isOk()).toBe(true);
  });
});

describe('resolveTopLimit', () => {
  it('falls back to the report default', () => {
    expect(resolveTopLimit(undefined, 5)).toBe(5);
    expect(resolveTopLimit(undefined, 10)).toBe(10);
  });

  it('clamps to between 1 and 100', () => {
    expect(resolveTopLimit(0, 5)).toBe(1);
    expect(resolveTopLimit(-3, 5)).toBe(1);
    expect(resolveTopLimit(500, 5)).toBe(100);
    expect(resolveTopLimit(7, 5)).toBe(7);
  });
});

describe('date helpers', () => {
  it('shifts dates across month and year boundaries', () => {
    expect(shiftIsoDate('2014-03-01', -1)).toBe('2014-02-28');
    expect(shiftIsoDate('2013-12-31', 1)).toBe('2014-01-01');
    expect(shiftIsoDate('2012-02-28', 1)).toBe('2012-02-29');
  });

  it('builds a window that includes the reference date', () => {
    expect(toDateRange('2014-06-30', 30)).toEqual({
      start: '2014-05-31',
      endExclusive: '2014-07-01',
    });
  });

  it('builds a one-day window', () => {
    expect(toDateRange('2014-01-15', 1)).toEqual({
      start: '2014-01-14',
      endExclusive: '2014-01-16',
    });
  });

  it('reads the year of a date', () => {
    expect(yearOfIsoDate('2014-06-20')).toBe(2014);
  });
});
