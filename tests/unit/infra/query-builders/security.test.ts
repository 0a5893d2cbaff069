/**
 * Query Builders Security Tests
 *
 * Verifies that the shared SQL fragments quote identifiers and bind values
 * as parameters, and that a report snapshot accepts only a bounded integer
 * statement timeout.
 */

import { describe, it, expect } from 'vitest';

import {
  beforeDate,
  latestDateOf,
  monthOf,
  onOrAfterDate,
  roundedAverageOf,
  withReadOnlySnapshot,
  yearOf,
} from '@/infra/database/query-builders/index.js';

import { makeRecordingDb } from '../../../fixtures/fakes.js';

// ============================================================================
// Test Setup
// ============================================================================

const { db } = makeRecordingDb<unknown>();

// ============================================================================
// Test Vectors
// ============================================================================

const INJECTION_VECTOR = "'; DROP TABLE sales.salesorderheader; --";

// ============================================================================
// Tests
// ============================================================================

describe('Query Builders Security', () => {
  describe('date parts', () => {
    it('quotes column references', () => {
      expect(yearOf('soh.orderdate').compile(db).sql).toBe(
        'extract(year from "soh"."orderdate")::int'
      );
      expect(monthOf('soh.orderdate').compile(db).sql).toBe(
        'extract(month from "soh"."orderdate")::int'
      );
      expect(latestDateOf('soh.orderdate').compile(db).sql).toBe(
        `to_char(max("soh"."orderdate"), 'YYYY-MM-DD')`
      );
    });

    it('escapes quotes inside identifiers', () => {
      expect(yearOf('soh.order"date').compile(db).sql).toBe(
        'extract(year from "soh"."order""date")::int'
      );
    });
  });

  describe('rounded averages', () => {
    it('inlines only a validated integer scale', () => {
      const compiled = roundedAverageOf('sod.unitpricediscount', 4).compile(db);

      expect(compiled.sql).toBe('round(avg("sod"."unitpricediscount"), 4)');
      expect(compiled.parameters).toEqual([]);
    });

    it('rejects fractional and negative scales', () => {
      expect(() => roundedAverageOf('sod.unitpricediscount', 1.5)).toThrow(
        'Invalid rounding scale: 1.5'
      );
      expect(() => roundedAverageOf('sod.unitpricediscount', -1)).toThrow(
        'Invalid rounding scale: -1'
      );
    });
  });

  describe('date bounds', () => {
    it('binds dates as parameters', () => {
      const compiled = onOrAfterDate('soh.orderdate', INJECTION_VECTOR).compile(db);

      expect(compiled.sql).toBe('"soh"."orderdate" >= $1::date');
      expect(compiled.parameters).toEqual([INJECTION_VECTOR]);
    });

    it('builds an exclusive upper bound', () => {
      const compiled = beforeDate('soh.orderdate', '2014-07-01').compile(db);

      expect(compiled.sql).toBe('"soh"."orderdate" < $1::date');
      expect(compiled.parameters).toEqual(['2014-07-01']);
    });
  });

  describe('withReadOnlySnapshot', () => {
    it('sets the validated timeout inside a read-only transaction', async () => {
      const recording = makeRecordingDb<unknown>();

      const value = await withReadOnlySnapshot(recording.db, 5000, async () => 'done');

      expect(value).toBe('done');
      expect(recording.statements.map((statement) => statement.sql)).toEqual([
        'start transaction isolation level repeatable read',
        'SET TRANSACTION READ ONLY',
        'SET LOCAL statement_timeout = 5000',
        'commit',
      ]);
    });

    it('rejects an unsafe timeout before opening a transaction', async () => {
      const recording = makeRecordingDb<unknown>();
      const run = (timeoutMs: number) =>
        withReadOnlySnapshot(recording.db, timeoutMs, async () => 'done');

      await expect(run(1500.5)).rejects.toThrow(
        'Report statement timeout must be an integer between 1000 and 300000ms, got: 1500.5'
      );
      await expect(run(Number.NaN)).rejects.toThrow('got: NaN');
      await expect(run(999)).rejects.toThrow('got: 999');
      await expect(run(300_001)).rejects.toThrow('got: 300001');
      expect(recording.statements).toEqual([]);
    });
  });
});
