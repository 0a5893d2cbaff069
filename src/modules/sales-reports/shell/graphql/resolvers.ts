/**
 * GraphQL resolvers for Sales Reports module.
 */

import { Decimal } from 'decimal.js';

import { listSalesReports } from '../../core/usecases/list-sales-reports.js';
import { runSalesReport } from '../../core/usecases/run-sales-report.js';

import type { SalesReportRepository } from '../../core/ports.js';
import type {
  SalesReportDefaults,
  SalesReportId,
  SalesReportParamsInput,
} from '../../core/types.js';
import type { IResolvers, MercuriusContext } from 'mercurius';

/**
 * Dependencies for sales report resolvers.
 */
export interface MakeSalesReportsResolversDeps {
  salesReportRepo: SalesReportRepository;
  defaults: SalesReportDefaults;
}

interface YearRangeArgs {
  fromYear?: number | null;
  toYear?: number | null;
}

interface LimitArgs {
  limit?: number | null;
}

interface YearArgs {
  year?: number | null;
}

interface WindowArgs {
  referenceDate?: string | null;
  windowDays?: number | null;
}

type GraphQLValue = string | number | null;

/**
 * Decimals become Float; everything else passes through.
 */
const toGraphQLValue = (value: unknown): GraphQLValue => {
  if (Decimal.isDecimal(value)) {
    return value.toNumber();
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return null;
};

const toGraphQLRow = (row: object): Record<string, GraphQLValue> =>
  Object.fromEntries(
    Object.entries(row).map(([key, value]: [string, unknown]) => [key, toGraphQLValue(value)])
  );

/**
 * Creates GraphQL resolvers for sales report queries.
 *
 * @param deps - Repository and parameter defaults
 * @returns Mercurius-compatible resolvers
 */
export const makeSalesReportsResolvers = (deps: MakeSalesReportsResolversDeps): IResolvers => {
  /**
   * Runs a report; failures are logged and rethrown as `[ErrorType] message`.
   */
  const run = async (
    context: MercuriusContext,
    report: SalesReportId,
    params: SalesReportParamsInput
  ) => {
    const result = await runSalesReport(deps, { report, params });

    if (result.isErr()) {
      const error = result.error;
      context.reply.log.error(
        { err: error, errorType: error.type, report, params },
        `[${error.type}] ${error.message}`
      );
      throw new Error(`[${error.type}] ${error.message}`);
    }

    const rows: readonly object[] = result.value.rows;
    return { parameters: result.value.parameters, rows: rows.map(toGraphQLRow) };
  };

  /** Report with resolved parameters next to its rows */
  const runWithParameters = async (
    context: MercuriusContext,
    report: SalesReportId,
    params: SalesReportParamsInput
  ) => {
    const { parameters, rows } = await run(context, report, params);
    return { ...parameters, rows };
  };

  /** Report without parameters, exposed as a plain list */
  const runRows = async (context: MercuriusContext, report: SalesReportId) => {
    const { rows } = await run(context, report, {});
    return rows;
  };

  return {
    SalesReportColumnType: {
      INTEGER: 'integer',
      DECIMAL: 'decimal',
      STRING: 'string',
    },

    Query: {
      salesReports: () => listSalesReports(),

      salesByYear: async (_parent: unknown, args: YearRangeArgs, context: MercuriusContext) =>
        runWithParameters(context, 'sales-by-year', {
          fromYear: args.fromYear ?? undefined,
          toYear: args.toYear ?? undefined,
        }),

      salesByCategory: async (_parent: unknown, _args: unknown, context: MercuriusContext) =>
        runRows(context, 'sales-by-category'),

      salesBySubcategory: async (_parent: unknown, _args: unknown, context: MercuriusContext) =>
        runRows(context, 'sales-by-subcategory'),

      topProductsByQuantity: async (_parent: unknown, args: LimitArgs, context: MercuriusContext) =>
        runWithParameters(context, 'top-products-by-quantity', {
          limit: args.limit ?? undefined,
        }),

      salesByRegion: async (_parent: unknown, _args: unknown, context: MercuriusContext) =>
        runRows(context, 'sales-by-region'),

      salesByTerritory: async (_parent: unknown, _args: unknown, context: MercuriusContext) =>
        runRows(context, 'sales-by-territory'),

      monthlySales: async (_parent: unknown, args: YearArgs, context: MercuriusContext) =>
        runWithParameters(context, 'monthly-sales', { year: args.year ?? undefined }),

      topCustomersBySpend: async (_parent: unknown, args: LimitArgs, context: MercuriusContext) =>
        runWithParameters(context, 'top-customers-by-spend', {
          limit: args.limit ?? undefined,
        }),

      productDiscountPerformance: async (
        _parent: unknown,
        _args: unknown,
        context: MercuriusContext
      ) => runRows(context, 'product-discount-performance'),

      productSalesWithInventory: async (
        _parent: unknown,
        _args: unknown,
        context: MercuriusContext
      ) => runRows(context, 'product-sales-with-inventory'),

      recentProductSales: async (_parent: unknown, args: WindowArgs, context: MercuriusContext) =>
        runWithParameters(context, 'recent-product-sales', {
          referenceDate: args.referenceDate ?? undefined,
          windowDays: args.windowDays ?? undefined,
        }),

      monthlyCategorySales: async (_parent: unknown, args: YearArgs, context: MercuriusContext) =>
        runWithParameters(context, 'monthly-category-sales', { year: args.year ?? undefined }),

      customerSalesByTerritory: async (
        _parent: unknown,
        _args: unknown,
        context: MercuriusContext
      ) => runRows(context, 'customer-sales-by-territory'),

      yearlyProductSalesWithInventory: async (
        _parent: unknown,
        args: YearArgs,
        context: MercuriusContext
      ) =>
        runWithParameters(context, 'yearly-product-sales-with-inventory', {
          year: args.year ?? undefined,
        }),
    },
  };
};
