/**
 * Unit tests for the sales report catalogue
 */

import { describe, expect, it } from 'vitest';

import {
  SALES_REPORT_CATALOGUE,
  getSalesReportDefinition,
} from '@/modules/sales-reports/core/catalogue.js';
import { SALES_REPORT_IDS, isSalesReportId } from '@/modules/sales-reports/core/types.js';
import { listSalesReports } from '@/modules/sales-reports/core/usecases/list-sales-reports.js';

describe('sales report catalogue', () => {
  it('lists fourteen reports numbered in order', () => {
    expect(SALES_REPORT_CATALOGUE).toHaveLength(14);
    expect(SALES_REPORT_CATALOGUE.map((definition) => definition.number)).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14,
    ]);
    expect(SALES_REPORT_CATALOGUE.map((definition) => definition.id)).toEqual([...SALES_REPORT_IDS]);
  });

  it('describes the parameters each report accepts', () => {
    expect(getSalesReportDefinition('sales-by-year').parameters).toEqual(['fromYear', 'toYear']);
    expect(getSalesReportDefinition('recent-product-sales').parameters).toEqual([
      'referenceDate',
      'windowDays',
    ]);
    expect(getSalesReportDefinition('sales-by-region').parameters).toEqual([]);
  });

  it('describes columns in output order', () => {
    expect(getSalesReportDefinition('customer-sales-by-territory').columns).toEqual([
      { name: 'territory', type: 'string' },
      { name: 'customerId', type: 'integer' },
      { name: 'totalSales', type: 'decimal' },
    ]);
  });

  it('is what the list use case returns', () => {
    expect(listSalesReports()).toBe(SALES_REPORT_CATALOGUE);
  });
});

describe('isSalesReportId', () => {
  it('accepts catalogue identifiers only', () => {
    expect(isSalesReportId('monthly-sales')).toBe(true);
    expect(isSalesReportId('monthly_sales')).toBe(false);
    expect(isSalesReportId('')).toBe(false);
  });
});
