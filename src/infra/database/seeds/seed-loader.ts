/**
 * Seed Data Loader
 * Loads a seed JSON file and builds the in-memory sales snapshot
 */

import fs from 'node:fs';

import { Value } from '@sinclair/typebox/value';
import { fromThrowable } from 'neverthrow';

import { parseCalendarDate } from '../../../common/types/temporal.js';
import { buildSalesSnapshot, type SalesSnapshot } from './in-memory-db.js';
import { SalesSeedSchema, type SalesSeed } from './types.js';

const safeJsonParse = fromThrowable(
  (content: string): unknown => JSON.parse(content),
  (error) => (error instanceof Error ? error.message : String(error))
);

/**
 * Validate parsed JSON against the seed schema
 */
export function parseSalesSeed(data: unknown, source = 'seed'): SalesSeed {
  if (!Value.Check(SalesSeedSchema, data)) {
    const errors = [...Value.Errors(SalesSeedSchema, data)];
    const errorMessages = errors
      .slice(0, 10)
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ');
    throw new Error(`Invalid seed data in ${source}: ${errorMessages}`);
  }

  // The schema pattern admits days that do not exist, such as 2014-13-40
  const badDates = data.orders.flatMap((order, index) =>
    parseCalendarDate(order.orderDate) === null
      ? [`/orders/${String(index)}/orderDate: '${order.orderDate}' is not a calendar date`]
      : []
  );
  if (badDates.length > 0) {
    throw new Error(`Invalid seed data in ${source}: ${badDates.slice(0, 10).join(', ')}`);
  }

  return data;
}

/**
 * Load a single seed file and build a snapshot from it
 */
export function loadSalesSeedFile(filePath: string): SalesSnapshot {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Seed file does not exist: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const parseResult = safeJsonParse(content);

  if (parseResult.isErr()) {
    throw new Error(`Failed to parse JSON from ${filePath}: ${parseResult.error}`);
  }

  return buildSalesSnapshot(parseSalesSeed(parseResult.value, filePath));
}
