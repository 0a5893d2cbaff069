/**
 * Use case: List the sales report catalogue.
 */

import { SALES_REPORT_CATALOGUE } from '../catalogue.js';

import type { SalesReportDefinition } from '../types.js';

/**
 * Lists every report definition in catalogue order.
 */
export const listSalesReports = (): readonly SalesReportDefinition[] => SALES_REPORT_CATALOGUE;
