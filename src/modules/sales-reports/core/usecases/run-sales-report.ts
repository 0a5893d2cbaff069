/**
 * Use case: Run one report from the sales catalogue.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  resolveTopLimit,
  toDateRange,
  validateSalesReportParams,
  yearOfIsoDate,
} from '../params.js';
import {
  DEFAULT_TOP_CUSTOMERS_LIMIT,
  DEFAULT_TOP_PRODUCTS_LIMIT,
  type ProductSalesRow,
  type SalesReportDefaults,
  type SalesReportId,
  type SalesReportParametersMap,
  type SalesReportRequest,
  type SalesReportResult,
  type SalesReportResultOf,
  type SalesReportRowsMap,
  type TargetYearParameters,
  type WindowParameters,
} from '../types.js';

import type { SalesReportError, SalesReportRepoError } from '../errors.js';
import type { SalesReportRepository } from '../ports.js';

/**
 * Dependencies for the run sales report use case.
 */
export interface RunSalesReportDeps {
  salesReportRepo: SalesReportRepository;
  defaults: SalesReportDefaults;
}

type ReportOutcome = Promise<Result<SalesReportResult, SalesReportError>>;

type RepoOutcome<T> = Promise<Result<T, SalesReportRepoError>>;

interface Resolved<Parameters, Row> {
  parameters: Parameters;
  rows: Row[];
}

const complete = <K extends SalesReportId>(
  report: K,
  parameters: SalesReportParametersMap[K],
  rows: SalesReportRowsMap[K][]
): SalesReportResultOf<K> => ({ report, parameters, rows });

/**
 * Resolves the target year (caller, then configuration, then the year of the
 * latest order) and runs a year-scoped query on the same snapshot.
 * No orders and no configured year yields an empty report.
 */
const withTargetYear = <Row>(
  deps: RunSalesReportDeps,
  year: number | undefined,
  query: (repo: SalesReportRepository, year: number) => RepoOutcome<Row[]>
): RepoOutcome<Resolved<TargetYearParameters, Row>> =>
  deps.salesReportRepo.withSnapshot<Resolved<TargetYearParameters, Row>>(async (scoped) => {
    let resolved = year ?? deps.defaults.year ?? null;
    if (resolved === null) {
      const latest = await scoped.getLatestOrderDate();
      if (latest.isErr()) {
        return err(latest.error);
      }
      resolved = latest.value !== null ? yearOfIsoDate(latest.value) : null;
    }

    if (resolved === null) {
      return ok({ parameters: { year: null }, rows: [] });
    }

    const target = resolved;
    const rows = await query(scoped, target);
    return rows.map((value) => ({ parameters: { year: target }, rows: value }));
  });

/**
 * Resolves the reference date (caller, then configuration, then the date of
 * the latest order) and runs the window query on the same snapshot.
 */
const withReferenceDate = (
  deps: RunSalesReportDeps,
  referenceDate: string | undefined,
  windowDays: number
): RepoOutcome<Resolved<WindowParameters, ProductSalesRow>> =>
  deps.salesReportRepo.withSnapshot<Resolved<WindowParameters, ProductSalesRow>>(async (scoped) => {
    let resolved = referenceDate ?? deps.defaults.referenceDate ?? null;
    if (resolved === null) {
      const latest = await scoped.getLatestOrderDate();
      if (latest.isErr()) {
        return err(latest.error);
      }
      resolved = latest.value;
    }

    if (resolved === null) {
      return ok({ parameters: { referenceDate: null, windowDays }, rows: [] });
    }

    const reference = resolved;
    const rows = await scoped.getProductSalesInRange(toDateRange(reference, windowDays));
    return rows.map((value) => ({
      parameters: { referenceDate: reference, windowDays },
      rows: value,
    }));
  });

/**
 * Runs one sales report.
 *
 * Validation:
 * - Malformed year, date, window or limit parameters fail with ValidationError
 *   before any query runs
 * - Parameters the report does not accept are ignored
 *
 * An empty result set is a valid zero-row report.
 *
 * @param deps - Repository and parameter defaults
 * @param request - Report identifier and caller parameters
 * @returns The rows with the parameters actually used, or an error
 */
export const runSalesReport = async (
  deps: RunSalesReportDeps,
  request: SalesReportRequest
): ReportOutcome => {
  const validated = validateSalesReportParams(request.params ?? {});
  if (validated.isErr()) {
    return err(validated.error);
  }

  // Configured defaults stand in for caller parameters and are held to the same rules
  const defaults = deps.defaults;
  const validatedDefaults = validateSalesReportParams({
    year: defaults.year,
    referenceDate: defaults.referenceDate,
    windowDays: defaults.windowDays,
  });
  if (validatedDefaults.isErr()) {
    return err(validatedDefaults.error);
  }

  const params = validated.value;
  const repo = deps.salesReportRepo;

  switch (request.report) {
    case 'sales-by-year': {
      const range = { fromYear: params.fromYear ?? null, toYear: params.toYear ?? null };
      const rows = await repo.getSalesByYear(range);
      return rows.map((value) => complete('sales-by-year', range, value));
    }

    case 'sales-by-category': {
      const rows = await repo.getSalesByCategory();
      return rows.map((value) => complete('sales-by-category', {}, value));
    }

    case 'sales-by-subcategory': {
      const rows = await repo.getSalesBySubcategory();
      return rows.map((value) => complete('sales-by-subcategory', {}, value));
    }

    case 'top-products-by-quantity': {
      const limit = resolveTopLimit(params.limit, DEFAULT_TOP_PRODUCTS_LIMIT);
      const rows = await repo.getTopProductsByQuantity(limit);
      return rows.map((value) => complete('top-products-by-quantity', { limit }, value));
    }

    case 'sales-by-region': {
      const rows = await repo.getSalesByRegion();
      return rows.map((value) => complete('sales-by-region', {}, value));
    }

    case 'sales-by-territory': {
      const rows = await repo.getSalesByTerritory();
      return rows.map((value) => complete('sales-by-territory', {}, value));
    }

    case 'monthly-sales': {
      const outcome = await withTargetYear(deps, params.year, (scoped, year) =>
        scoped.getMonthlySales(year)
      );
      return outcome.map(({ parameters, rows }) => complete('monthly-sales', parameters, rows));
    }

    case 'top-customers-by-spend': {
      const limit = resolveTopLimit(params.limit, DEFAULT_TOP_CUSTOMERS_LIMIT);
      const rows = await repo.getTopCustomersBySpend(limit);
      return rows.map((value) => complete('top-customers-by-spend', { limit }, value));
    }

    case 'product-discount-performance': {
      const rows = await repo.getProductDiscountPerformance();
      return rows.map((value) => complete('product-discount-performance', {}, value));
    }

    case 'product-sales-with-inventory': {
      const rows = await repo.getProductSalesWithInventory();
      return rows.map((value) => complete('product-sales-with-inventory', {}, value));
    }

    case 'recent-product-sales': {
      const windowDays = params.windowDays ?? defaults.windowDays;
      const outcome = await withReferenceDate(deps, params.referenceDate, windowDays);
      return outcome.map(({ parameters, rows }) =>
        complete('recent-product-sales', parameters, rows)
      );
    }

    case 'monthly-category-sales': {
      const outcome = await withTargetYear(deps, params.year, (scoped, year) =>
        scoped.getMonthlyCategorySales(year)
      );
      return outcome.map(({ parameters, rows }) =>
        complete('monthly-category-sales', parameters, rows)
      );
    }

    case 'customer-sales-by-territory': {
      const rows = await repo.getCustomerSalesByTerritory();
      return rows.map((value) => complete('customer-sales-by-territory', {}, value));
    }

    case 'yearly-product-sales-with-inventory': {
      const outcome = await withTargetYear(deps, params.year, (scoped, year) =>
        scoped.getYearlyProductSalesWithInventory(year)
      );
      return outcome.map(({ parameters, rows }) =>
        complete('yearly-product-sales-with-inventory', parameters, rows)
      );
    }
  }
};
