/**
 * Unit tests for the run all sales reports use case
 */

import { describe, expect, it } from 'vitest';

import { createDatabaseError } from '@/modules/sales-reports/core/errors.js';
import { SALES_REPORT_IDS } from '@/modules/sales-reports/core/types.js';
import { runAllSalesReports } from '@/modules/sales-reports/core/usecases/run-all-sales-reports.js';
import { makeInMemorySalesReportRepo } from '@/modules/sales-reports/shell/repo/in-memory-sales-report-repo.js';

import { makeSalesSnapshot } from '../../fixtures/builders.js';
import { makeFakeSalesReportRepo } from '../../fixtures/fakes.js';

describe('runAllSalesReports', () => {
  it('returns every report in catalogue order', async () => {
    const salesReportRepo = makeInMemorySalesReportRepo(makeSalesSnapshot());

    const result = await runAllSalesReports({ salesReportRepo, defaults: { windowDays: 30 } });

    const reports = result._unsafeUnwrap();
    expect(reports.map((report) => report.report)).toEqual([...SALES_REPORT_IDS]);
  });

  it('applies the same parameters to every report that accepts them', async () => {
    const salesReportRepo = makeInMemorySalesReportRepo(makeSalesSnapshot());

    const result = await runAllSalesReports(
      { salesReportRepo, defaults: { windowDays: 30 } },
      { year: 2013, limit: 2 }
    );

    const parameters = Object.fromEntries(
      result._unsafeUnwrap().map((report) => [report.report, report.parameters])
    );
    expect(parameters['monthly-sales']).toEqual({ year: 2013 });
    expect(parameters['monthly-category-sales']).toEqual({ year: 2013 });
    expect(parameters['yearly-product-sales-with-inventory']).toEqual({ year: 2013 });
    expect(parameters['top-products-by-quantity']).toEqual({ limit: 2 });
    expect(parameters['top-customers-by-spend']).toEqual({ limit: 2 });
    expect(parameters['sales-by-category']).toEqual({});
  });

  it('fails the whole run when a report fails', async () => {
    const failure = createDatabaseError('Failed to fetch sales by year');
    const salesReportRepo = makeFakeSalesReportRepo({
      latestOrderDate: '2014-06-20',
      failWithError: failure,
    });

    const result = await runAllSalesReports({ salesReportRepo, defaults: { windowDays: 30 } });

    expect(result._unsafeUnwrapErr()).toBe(failure);
  });

  it('fails validation once, before any query', async () => {
    const salesReportRepo = makeFakeSalesReportRepo();

    const result = await runAllSalesReports(
      { salesReportRepo, defaults: { windowDays: 30 } },
      { windowDays: 0 }
    );

    expect(result._unsafeUnwrapErr().type).toBe('ValidationError');
    expect(salesReportRepo.calls).toEqual([]);
  });
});
