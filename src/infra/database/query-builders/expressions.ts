/**
 * SQL Expressions - Safe SQL Fragment Construction
 *
 * Date-part and date-range builders shared by the report queries.
 * Column references go through sql.ref so identifiers are always quoted.
 */

import { sql, type RawBuilder } from 'kysely';

/**
 * Calendar year of a timestamp column as an integer.
 *
 * @example
 * ```typescript
 * yearOf('soh.orderdate')
 * // Produces: extract(year from "soh"."orderdate")::int
 * ```
 */
export function yearOf(column: string): RawBuilder<number> {
  return sql<number>`extract(year from ${sql.ref(column)})::int`;
}

/**
 * Calendar month (1-12) of a timestamp column as an integer.
 */
export function monthOf(column: string): RawBuilder<number> {
  return sql<number>`extract(month from ${sql.ref(column)})::int`;
}

/**
 * `column >= date` where date is an ISO `YYYY-MM-DD` string.
 */
export function onOrAfterDate(column: string, isoDate: string): RawBuilder<boolean> {
  return sql<boolean>`${sql.ref(column)} >= ${isoDate}::date`;
}

/**
 * `column < date` where date is an ISO `YYYY-MM-DD` string.
 */
export function beforeDate(column: string, isoDate: string): RawBuilder<boolean> {
  return sql<boolean>`${sql.ref(column)} < ${isoDate}::date`;
}

/**
 * Latest value of a timestamp column as `YYYY-MM-DD` text, null over no rows.
 */
export function latestDateOf(column: string): RawBuilder<string | null> {
  return sql<string | null>`to_char(max(${sql.ref(column)}), 'YYYY-MM-DD')`;
}

/**
 * Average of a numeric column rounded half away from zero to `scale` places.
 *
 * @example
 * ```typescript
 * roundedAverageOf('sod.unitpricediscount', 4)
 * // Produces: round(avg("sod"."unitpricediscount"), 4)
 * ```
 */
export function roundedAverageOf(column: string, scale: number): RawBuilder<string> {
  if (!Number.isInteger(scale) || scale < 0) {
    throw new Error(`Invalid rounding scale: ${String(scale)}`);
  }
  return sql<string>`round(avg(${sql.ref(column)}), ${sql.lit(scale)})`;
}
