/**
 * Sales Reports Module - Public API
 *
 * A fixed catalogue of read-only aggregation reports over the retail sample
 * database, exposed via GraphQL and REST. Backed by PostgreSQL or by an
 * in-memory seed snapshot.
 */

// =============================================================================
// Repository
// =============================================================================
export {
  makeSalesReportRepo,
  type SalesReportRepoOptions,
} from './shell/repo/sales-report-repo.js';
export { makeInMemorySalesReportRepo } from './shell/repo/in-memory-sales-report-repo.js';
export type { SalesReportRepository } from './core/ports.js';

// =============================================================================
// Use Cases
// =============================================================================
export { listSalesReports } from './core/usecases/list-sales-reports.js';
export { runSalesReport, type RunSalesReportDeps } from './core/usecases/run-sales-report.js';
export { runAllSalesReports } from './core/usecases/run-all-sales-reports.js';
export { toReportTable, toReportCell } from './core/table.js';
export { validateSalesReportParams, toDateRange } from './core/params.js';
export { SALES_REPORT_CATALOGUE, getSalesReportDefinition } from './core/catalogue.js';

// =============================================================================
// GraphQL
// =============================================================================
export { SalesReportsSchema } from './shell/graphql/schema.js';
export {
  makeSalesReportsResolvers,
  type MakeSalesReportsResolversDeps,
} from './shell/graphql/resolvers.js';

// =============================================================================
// REST
// =============================================================================
export {
  makeSalesReportsRoutes,
  type MakeSalesReportsRoutesDeps,
} from './shell/rest/routes.js';

// =============================================================================
// Types
// =============================================================================
export type {
  SalesReportId,
  SalesReportRequest,
  SalesReportResult,
  SalesReportResultOf,
  SalesReportParamsInput,
  SalesReportDefaults,
  SalesReportDefinition,
  SalesReportTable,
  ReportCell,
  ReportColumn,
} from './core/types.js';
export {
  SALES_REPORT_IDS,
  isSalesReportId,
  DEFAULT_TOP_PRODUCTS_LIMIT,
  DEFAULT_TOP_CUSTOMERS_LIMIT,
  DEFAULT_WINDOW_DAYS,
  MAX_TOP_LIMIT,
} from './core/types.js';

// =============================================================================
// Errors
// =============================================================================
export type { SalesReportError, SalesReportRepoError } from './core/errors.js';
export { getHttpStatusForError } from './core/errors.js';
