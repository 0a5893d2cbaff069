/**
 * Parameter validation and resolution for sales reports.
 *
 * Pure functions: no I/O. Validation rejects malformed input before any
 * query runs; resolution fills gaps from configured defaults.
 */

import { err, ok, type Result } from 'neverthrow';

import { isCalendarDate, parseCalendarDate } from '../../../common/types/temporal.js';
import { createValidationError } from './errors.js';
import {
  MAX_TOP_LIMIT,
  MAX_WINDOW_DAYS,
  MAX_YEAR,
  MIN_WINDOW_DAYS,
  MIN_YEAR,
  type DateRange,
  type SalesReportParamsInput,
} from './types.js';

import type { ValidationError } from '../../../common/types/errors.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Validates a calendar year.
 */
export const validateYear = (value: number, field = 'year'): Result<number, ValidationError> => {
  if (!Number.isInteger(value) || value < MIN_YEAR || value > MAX_YEAR) {
    return err(
      createValidationError(
        `Invalid parameter '${field}': expected an integer year between ${String(MIN_YEAR)} and ${String(MAX_YEAR)}, got ${String(value)}`,
        field,
        value
      )
    );
  }
  return ok(value);
};

/**
 * Validates an ISO calendar date (`YYYY-MM-DD`) that actually exists.
 */
export const validateIsoDate = (
  value: string,
  field = 'referenceDate'
): Result<string, ValidationError> => {
  const invalid = () =>
    err(
      createValidationError(
        `Invalid parameter '${field}': expected a calendar date in YYYY-MM-DD form, got '${value}'`,
        field,
        value
      )
    );

  const parts = isCalendarDate(value) ? parseCalendarDate(value) : null;
  if (parts === null || parts.year < MIN_YEAR || parts.year > MAX_YEAR) {
    return invalid();
  }

  return ok(value);
};

/**
 * Validates a window length in days.
 */
export const validateWindowDays = (value: number): Result<number, ValidationError> => {
  if (!Number.isInteger(value) || value < MIN_WINDOW_DAYS || value > MAX_WINDOW_DAYS) {
    return err(
      createValidationError(
        `Invalid parameter 'windowDays': expected an integer between ${String(MIN_WINDOW_DAYS)} and ${String(MAX_WINDOW_DAYS)}, got ${String(value)}`,
        'windowDays',
        value
      )
    );
  }
  return ok(value);
};

/**
 * Validates every supplied parameter. Absent parameters pass through.
 */
export const validateSalesReportParams = (
  input: SalesReportParamsInput
): Result<SalesReportParamsInput, ValidationError> => {
  const checks: Result<unknown, ValidationError>[] = [
    input.year !== undefined ? validateYear(input.year, 'year') : ok(undefined),
    input.fromYear !== undefined ? validateYear(input.fromYear, 'fromYear') : ok(undefined),
    input.toYear !== undefined ? validateYear(input.toYear, 'toYear') : ok(undefined),
    input.referenceDate !== undefined ? validateIsoDate(input.referenceDate) : ok(undefined),
    input.windowDays !== undefined ? validateWindowDays(input.windowDays) : ok(undefined),
  ];

  for (const check of checks) {
    if (check.isErr()) {
      return err(check.error);
    }
  }

  if (input.limit !== undefined && !Number.isInteger(input.limit)) {
    return err(
      createValidationError(
        `Invalid parameter 'limit': expected an integer, got ${String(input.limit)}`,
        'limit',
        input.limit
      )
    );
  }

  if (
    input.fromYear !== undefined &&
    input.toYear !== undefined &&
    input.fromYear > input.toYear
  ) {
    return err(
      createValidationError(
        `Invalid parameter 'fromYear': ${String(input.fromYear)} is after toYear ${String(input.toYear)}`,
        'fromYear',
        input.fromYear
      )
    );
  }

  return ok(input);
};

/**
 * Clamps a top-N limit to [1, MAX_TOP_LIMIT], falling back to the report default.
 */
export const resolveTopLimit = (limit: number | undefined, defaultLimit: number): number => {
  return Math.min(Math.max(1, limit ?? defaultLimit), MAX_TOP_LIMIT);
};

/**
 * Moves an ISO date by a number of days (negative moves back).
 */
export const shiftIsoDate = (isoDate: string, days: number): string => {
  const [year = 0, month = 1, day = 1] = isoDate.split('-').map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * MS_PER_DAY);
  return shifted.toISOString().slice(0, 10);
};

/**
 * The window ending on (and including) the reference date.
 *
 * @example
 * toDateRange('2014-06-30', 30)
 * // { start: '2014-05-31', endExclusive: '2014-07-01' }
 */
export const toDateRange = (referenceDate: string, windowDays: number): DateRange => ({
  start: shiftIsoDate(referenceDate, -windowDays),
  endExclusive: shiftIsoDate(referenceDate, 1),
});

/**
 * Calendar year of an ISO date.
 */
export const yearOfIsoDate = (isoDate: string): number => Number(isoDate.slice(0, 4));
