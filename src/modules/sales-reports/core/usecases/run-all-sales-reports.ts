/**
 * Use case: Run the whole sales catalogue.
 */

import { Result } from 'neverthrow';

import { runSalesReport, type RunSalesReportDeps } from './run-sales-report.js';
import {
  SALES_REPORT_IDS,
  type SalesReportParamsInput,
  type SalesReportResult,
} from '../types.js';

import type { SalesReportError } from '../errors.js';

/**
 * Runs every report concurrently with the same caller parameters.
 *
 * Reports share no state and each observes its own snapshot; there is no
 * cross-report consistency. The first error fails the whole run.
 *
 * @returns Results in catalogue order
 */
export const runAllSalesReports = async (
  deps: RunSalesReportDeps,
  params: SalesReportParamsInput = {}
): Promise<Result<SalesReportResult[], SalesReportError>> => {
  const results = await Promise.all(
    SALES_REPORT_IDS.map((report) => runSalesReport(deps, { report, params }))
  );

  return Result.combine(results);
};
