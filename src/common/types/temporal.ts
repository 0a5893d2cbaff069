/**
 * Calendar dates as `YYYY-MM-DD` strings.
 *
 * Order dates, reference dates and window bounds travel through the system
 * as plain ISO date strings, which compare correctly as text.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Year, month and day of a date string that names a real calendar day.
 * Anything after the date part (a time of day) is ignored.
 */
export interface CalendarDateParts {
  year: number;
  month: number;
  day: number;
}

/**
 * Splits a `YYYY-MM-DD` prefix into its parts, or null when the day does not
 * exist (2014-02-30, 2014-13-01).
 */
export function parseCalendarDate(value: string): CalendarDateParts | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Date.UTC rolls over out-of-range parts (2014-02-30 -> 2014-03-02)
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

/**
 * True when the value is exactly `YYYY-MM-DD` and names a real calendar day.
 */
export function isCalendarDate(value: string): boolean {
  return value.length === 10 && parseCalendarDate(value) !== null;
}
