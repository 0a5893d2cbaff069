/**
 * Unit tests for the run sales report use case
 */

import { describe, expect, it } from 'vitest';

import { createSalesSnapshot } from '@/infra/database/seeds/index.js';
import {
  createDatabaseError,
  createTimeoutError,
} from '@/modules/sales-reports/core/errors.js';
import { runSalesReport } from '@/modules/sales-reports/core/usecases/run-sales-report.js';
import { makeInMemorySalesReportRepo } from '@/modules/sales-reports/shell/repo/in-memory-sales-report-repo.js';

import { makeSalesSnapshot } from '../../fixtures/builders.js';
import { makeFakeSalesReportRepo } from '../../fixtures/fakes.js';

import type { SalesReportDefaults } from '@/modules/sales-reports/core/types.js';

const defaults: SalesReportDefaults = { windowDays: 30 };

describe('runSalesReport', () => {
  describe('validation', () => {
    it('fails before querying when a parameter is malformed', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: '2014-06-20' });

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'monthly-sales', params: { year: 20140 } }
      );

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().type).toBe('ValidationError');
      expect(salesReportRepo.calls).toEqual([]);
    });

    it('validates parameters the report does not use', async () => {
      const salesReportRepo = makeFakeSalesReportRepo();

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'sales-by-category', params: { referenceDate: '2014-02-30' } }
      );

      expect(result._unsafeUnwrapErr().type).toBe('ValidationError');
    });

    it('ignores valid parameters the report does not accept', async () => {
      const salesReportRepo = makeFakeSalesReportRepo();

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'sales-by-category', params: { year: 2014, limit: 3 } }
      );

      expect(result._unsafeUnwrap()).toEqual({
        report: 'sales-by-category',
        parameters: {},
        rows: [],
      });
      expect(salesReportRepo.calls).toEqual([{ method: 'getSalesByCategory', args: [] }]);
    });
  });

  describe('year range', () => {
    it('passes open bounds as null', async () => {
      const salesReportRepo = makeFakeSalesReportRepo();

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'sales-by-year', params: { fromYear: 2013 } }
      );

      expect(result._unsafeUnwrap().parameters).toEqual({ fromYear: 2013, toYear: null });
      expect(salesReportRepo.calls).toEqual([
        { method: 'getSalesByYear', args: [{ fromYear: 2013, toYear: null }] },
      ]);
    });
  });

  describe('top-N limits', () => {
    it('defaults to 5 products and 10 customers', async () => {
      const salesReportRepo = makeFakeSalesReportRepo();
      const deps = { salesReportRepo, defaults };

      const products = await runSalesReport(deps, { report: 'top-products-by-quantity' });
      const customers = await runSalesReport(deps, { report: 'top-customers-by-spend' });

      expect(products._unsafeUnwrap().parameters).toEqual({ limit: 5 });
      expect(customers._unsafeUnwrap().parameters).toEqual({ limit: 10 });
      expect(salesReportRepo.calls).toEqual([
        { method: 'getTopProductsByQuantity', args: [5] },
        { method: 'getTopCustomersBySpend', args: [10] },
      ]);
    });

    it('clamps limits into range', async () => {
      const salesReportRepo = makeFakeSalesReportRepo();
      const deps = { salesReportRepo, defaults };

      const high = await runSalesReport(deps, {
        report: 'top-products-by-quantity',
        params: { limit: 500 },
      });
      const low = await runSalesReport(deps, {
        report: 'top-customers-by-spend',
        params: { limit: 0 },
      });

      expect(high._unsafeUnwrap().parameters).toEqual({ limit: 100 });
      expect(low._unsafeUnwrap().parameters).toEqual({ limit: 1 });
    });
  });

  describe('target year resolution', () => {
    it('uses the caller year first', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: '2014-06-20' });

      const result = await runSalesReport(
        { salesReportRepo, defaults: { ...defaults, year: 2012 } },
        { report: 'monthly-sales', params: { year: 2013 } }
      );

      expect(result._unsafeUnwrap().parameters).toEqual({ year: 2013 });
      expect(salesReportRepo.calls).toEqual([{ method: 'getMonthlySales', args: [2013] }]);
    });

    it('uses the configured year when the caller gives none', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: '2014-06-20' });

      const result = await runSalesReport(
        { salesReportRepo, defaults: { ...defaults, year: 2012 } },
        { report: 'monthly-category-sales' }
      );

      expect(result._unsafeUnwrap().parameters).toEqual({ year: 2012 });
      expect(salesReportRepo.calls).toEqual([{ method: 'getMonthlyCategorySales', args: [2012] }]);
    });

    it('falls back to the year of the latest order', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: '2014-06-20' });

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'yearly-product-sales-with-inventory' }
      );

      expect(result._unsafeUnwrap().parameters).toEqual({ year: 2014 });
      expect(salesReportRepo.calls).toEqual([
        { method: 'getLatestOrderDate', args: [] },
        { method: 'getYearlyProductSalesWithInventory', args: [2014] },
      ]);
    });

    it('returns an empty report with a null year when there are no orders', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: null });

      const result = await runSalesReport({ salesReportRepo, defaults }, { report: 'monthly-sales' });

      expect(result._unsafeUnwrap()).toEqual({
        report: 'monthly-sales',
        parameters: { year: null },
        rows: [],
      });
      expect(salesReportRepo.calls).toEqual([{ method: 'getLatestOrderDate', args: [] }]);
    });

    it('propagates a failure to read the latest order date', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({
        failLatestOrderDateWith: createDatabaseError('Failed to fetch latest order date'),
      });

      const result = await runSalesReport({ salesReportRepo, defaults }, { report: 'monthly-sales' });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'DatabaseError',
        message: 'Failed to fetch latest order date',
      });
    });
  });

  describe('recent window resolution', () => {
    it('uses the caller reference date and window', async () => {
      const salesReportRepo = makeFakeSalesReportRepo();

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'recent-product-sales', params: { referenceDate: '2014-06-30', windowDays: 30 } }
      );

      expect(result._unsafeUnwrap().parameters).toEqual({
        referenceDate: '2014-06-30',
        windowDays: 30,
      });
      expect(salesReportRepo.calls).toEqual([
        {
          method: 'getProductSalesInRange',
          args: [{ start: '2014-05-31', endExclusive: '2014-07-01' }],
        },
      ]);
    });

    it('uses configured defaults before the latest order date', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: '2014-06-20' });

      const result = await runSalesReport(
        { salesReportRepo, defaults: { referenceDate: '2014-01-31', windowDays: 7 } },
        { report: 'recent-product-sales' }
      );

      expect(result._unsafeUnwrap().parameters).toEqual({
        referenceDate: '2014-01-31',
        windowDays: 7,
      });
      expect(salesReportRepo.calls).toEqual([
        {
          method: 'getProductSalesInRange',
          args: [{ start: '2014-01-24', endExclusive: '2014-02-01' }],
        },
      ]);
    });

    it('rejects a configured reference date that is not a calendar day', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: '2014-06-20' });

      const result = await runSalesReport(
        { salesReportRepo, defaults: { referenceDate: '2014-02-30', windowDays: 30 } },
        { report: 'recent-product-sales' }
      );

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('ValidationError');
      expect(error.message).toBe(
        "Invalid parameter 'referenceDate': expected a calendar date in YYYY-MM-DD form, got '2014-02-30'"
      );
      expect(salesReportRepo.calls).toEqual([]);
    });

    it('falls back to the latest order date', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: '2014-06-20' });

      await runSalesReport({ salesReportRepo, defaults }, { report: 'recent-product-sales' });

      expect(salesReportRepo.calls).toEqual([
        { method: 'getLatestOrderDate', args: [] },
        {
          method: 'getProductSalesInRange',
          args: [{ start: '2014-05-21', endExclusive: '2014-06-21' }],
        },
      ]);
    });

    it('returns an empty report with a null reference date when there are no orders', async () => {
      const salesReportRepo = makeFakeSalesReportRepo({ latestOrderDate: null });

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'recent-product-sales' }
      );

      expect(result._unsafeUnwrap()).toEqual({
        report: 'recent-product-sales',
        parameters: { referenceDate: null, windowDays: 30 },
        rows: [],
      });
    });
  });

  describe('repository failures', () => {
    it('propagates timeouts unchanged', async () => {
      const timeout = createTimeoutError('Query for sales by year timed out');
      const salesReportRepo = makeFakeSalesReportRepo({ failWithError: timeout });

      const result = await runSalesReport({ salesReportRepo, defaults }, { report: 'sales-by-year' });

      expect(result._unsafeUnwrapErr()).toBe(timeout);
    });
  });

  describe('empty data source', () => {
    it('returns zero rows for every report without failing', async () => {
      const salesReportRepo = makeInMemorySalesReportRepo(createSalesSnapshot());

      const result = await runSalesReport(
        { salesReportRepo, defaults },
        { report: 'customer-sales-by-territory' }
      );

      expect(result._unsafeUnwrap().rows).toEqual([]);
    });
  });

  describe('against a seed snapshot', () => {
    it('resolves defaults from the data', async () => {
      const salesReportRepo = makeInMemorySalesReportRepo(makeSalesSnapshot());

      const result = await runSalesReport({ salesReportRepo, defaults }, { report: 'monthly-sales' });
      const report = result._unsafeUnwrap();

      if (report.report !== 'monthly-sales') {
        throw new Error(`Unexpected report ${report.report}`);
      }
      expect(report.parameters).toEqual({ year: 2014 });
      expect(report.rows.map((row) => [row.month, row.totalSales.toFixed()])).toEqual([
        [1, '150'],
        [6, '50'],
      ]);
    });
  });
});
