/**
 * Kysely repository implementation for sales reports.
 *
 * Each method runs in its own read-only snapshot transaction, unless it is
 * called on the scoped repository handed out by `withSnapshot`, which shares
 * one transaction between calls. Money columns
 * come back from pg as numeric strings and are lifted into Decimal here;
 * bigint aggregates (quantity sums) come back as strings and are converted
 * to numbers.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  DEFAULT_QUERY_TIMEOUT_MS,
  beforeDate,
  latestDateOf,
  monthOf,
  onOrAfterDate,
  roundedAverageOf,
  withReadOnlySnapshot,
  yearOf,
} from '../../../../infra/database/query-builders/index.js';
import {
  createDatabaseError,
  createTimeoutError,
  type SalesReportRepoError,
} from '../../core/errors.js';
import { AVERAGE_DISCOUNT_SCALE } from '../../core/types.js';

import type { SalesDatabase, SalesDbClient } from '../../../../infra/database/client.js';
import type { SalesReportRepository } from '../../core/ports.js';
import type {
  CategorySalesRow,
  CustomerSpendRow,
  DateRange,
  MonthlyCategorySalesRow,
  MonthlySalesRow,
  ProductDiscountRow,
  ProductInventorySalesRow,
  ProductQuantityRow,
  ProductSalesRow,
  RegionSalesRow,
  SubcategorySalesRow,
  TerritoryCustomerSalesRow,
  TerritorySalesRow,
  YearlyProductInventoryRow,
  YearlySalesRow,
  YearRange,
} from '../../core/types.js';
import type { Transaction } from 'kysely';

type RepoResult<T> = Promise<Result<T, SalesReportRepoError>>;

export interface SalesReportRepoOptions {
  /** Statement timeout applied to every report transaction */
  queryTimeoutMs?: number;
}

/**
 * Checks for PostgreSQL query cancellation (SQLSTATE 57014).
 */
const isStatementTimeout = (error: unknown): boolean => {
  const message = error instanceof Error ? error.message : '';
  return (
    message.includes('statement timeout') ||
    message.includes('57014') ||
    message.includes('canceling statement due to statement timeout')
  );
};

/**
 * Carries a failed Result out of a snapshot so the transaction rolls back.
 */
class SnapshotAborted extends Error {
  constructor(readonly reason: SalesReportRepoError) {
    super(reason.message);
    this.name = 'SnapshotAborted';
  }
}

const toRepoError = (report: string, error: unknown): SalesReportRepoError => {
  if (isStatementTimeout(error)) {
    return createTimeoutError(`Query for ${report} timed out`, error);
  }
  return createDatabaseError(`Failed to fetch ${report}`, error);
};

/**
 * Kysely-based implementation of SalesReportRepository.
 */
class KyselySalesReportRepo implements SalesReportRepository {
  /**
   * @param trx - Open snapshot shared by every call, or null to open one per call
   */
  constructor(
    private readonly db: SalesDbClient,
    private readonly queryTimeoutMs: number,
    private readonly trx: Transaction<SalesDatabase> | null = null
  ) {}

  async withSnapshot<T>(fn: (scoped: SalesReportRepository) => RepoResult<T>): RepoResult<T> {
    if (this.trx !== null) {
      return fn(this);
    }

    try {
      const value = await withReadOnlySnapshot(this.db, this.queryTimeoutMs, async (trx) => {
        const result = await fn(new KyselySalesReportRepo(this.db, this.queryTimeoutMs, trx));
        if (result.isErr()) {
          throw new SnapshotAborted(result.error);
        }
        return result.value;
      });
      return ok(value);
    } catch (error) {
      if (error instanceof SnapshotAborted) {
        return err(error.reason);
      }
      return err(toRepoError('report snapshot', error));
    }
  }

  async getSalesByYear(range: YearRange): RepoResult<YearlySalesRow[]> {
    return this.inSnapshot('sales by year', async (trx) => {
      let query = trx
        .selectFrom('sales.salesorderheader as soh')
        .select((eb) => [
          yearOf('soh.orderdate').as('year'),
          eb.fn.sum<string>('soh.totaldue').as('total_sales'),
        ]);

      if (range.fromYear !== null) {
        query = query.where(yearOf('soh.orderdate'), '>=', range.fromYear);
      }
      if (range.toYear !== null) {
        query = query.where(yearOf('soh.orderdate'), '<=', range.toYear);
      }

      const rows = await query
        .groupBy(yearOf('soh.orderdate'))
        .orderBy('year', 'desc')
        .execute();

      return rows.map((row) => ({
        year: row.year,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getSalesByCategory(): RepoResult<CategorySalesRow[]> {
    return this.inSnapshot('sales by category', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderdetail as sod')
        .innerJoin('production.product as p', 'p.productid', 'sod.productid')
        .innerJoin(
          'production.productsubcategory as ps',
          'ps.productsubcategoryid',
          'p.productsubcategoryid'
        )
        .innerJoin('production.productcategory as pc', 'pc.productcategoryid', 'ps.productcategoryid')
        .select((eb) => ['pc.name as category', eb.fn.sum<string>('sod.linetotal').as('total_sales')])
        .groupBy(['pc.productcategoryid', 'pc.name'])
        .orderBy('total_sales', 'desc')
        .orderBy('pc.name', 'asc')
        .execute();

      return rows.map((row) => ({
        category: row.category,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getSalesBySubcategory(): RepoResult<SubcategorySalesRow[]> {
    return this.inSnapshot('sales by subcategory', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderdetail as sod')
        .innerJoin('production.product as p', 'p.productid', 'sod.productid')
        .innerJoin(
          'production.productsubcategory as ps',
          'ps.productsubcategoryid',
          'p.productsubcategoryid'
        )
        .select((eb) => [
          'ps.name as subcategory',
          eb.fn.sum<string>('sod.linetotal').as('total_sales'),
        ])
        .groupBy(['ps.productsubcategoryid', 'ps.name'])
        .orderBy('total_sales', 'desc')
        .orderBy('ps.name', 'asc')
        .execute();

      return rows.map((row) => ({
        subcategory: row.subcategory,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getTopProductsByQuantity(limit: number): RepoResult<ProductQuantityRow[]> {
    return this.inSnapshot('top products by quantity', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderdetail as sod')
        .innerJoin('production.product as p', 'p.productid', 'sod.productid')
        .select((eb) => [
          'p.productid as product_id',
          'p.name as product_name',
          eb.fn.sum<string>('sod.orderqty').as('quantity_sold'),
        ])
        .groupBy(['p.productid', 'p.name'])
        .orderBy('quantity_sold', 'desc')
        .orderBy('p.productid', 'asc')
        .limit(limit)
        .execute();

      return rows.map((row) => ({
        productId: row.product_id,
        productName: row.product_name,
        quantitySold: Number(row.quantity_sold),
      }));
    });
  }

  async getSalesByRegion(): RepoResult<RegionSalesRow[]> {
    return this.inSnapshot('sales by region', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesterritory as st')
        .innerJoin('person.countryregion as cr', 'cr.countryregioncode', 'st.countryregioncode')
        .select((eb) => ['cr.name as region', eb.fn.sum<string>('st.salesytd').as('total_sales')])
        .groupBy(['cr.countryregioncode', 'cr.name'])
        .orderBy('total_sales', 'desc')
        .orderBy('cr.name', 'asc')
        .execute();

      return rows.map((row) => ({
        region: row.region,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getSalesByTerritory(): RepoResult<TerritorySalesRow[]> {
    return this.inSnapshot('sales by territory', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderheader as soh')
        .innerJoin('sales.salesterritory as st', 'st.territoryid', 'soh.territoryid')
        .select((eb) => ['st.name as territory', eb.fn.sum<string>('soh.totaldue').as('total_sales')])
        .groupBy(['st.territoryid', 'st.name'])
        .orderBy('total_sales', 'desc')
        .orderBy('st.name', 'asc')
        .execute();

      return rows.map((row) => ({
        territory: row.territory,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getMonthlySales(year: number): RepoResult<MonthlySalesRow[]> {
    return this.inSnapshot('monthly sales', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderheader as soh')
        .select((eb) => [
          monthOf('soh.orderdate').as('month'),
          eb.fn.sum<string>('soh.totaldue').as('total_sales'),
        ])
        .where(yearOf('soh.orderdate'), '=', year)
        .groupBy(monthOf('soh.orderdate'))
        .orderBy('month', 'asc')
        .execute();

      return rows.map((row) => ({
        month: row.month,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getTopCustomersBySpend(limit: number): RepoResult<CustomerSpendRow[]> {
    return this.inSnapshot('top customers by spend', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderheader as soh')
        .innerJoin('sales.customer as c', 'c.customerid', 'soh.customerid')
        .select((eb) => [
          'c.customerid as customer_id',
          eb.fn.sum<string>('soh.totaldue').as('total_sales'),
        ])
        .groupBy('c.customerid')
        .orderBy('total_sales', 'desc')
        .orderBy('c.customerid', 'asc')
        .limit(limit)
        .execute();

      return rows.map((row) => ({
        customerId: row.customer_id,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getProductDiscountPerformance(): RepoResult<ProductDiscountRow[]> {
    return this.inSnapshot('product discount performance', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderdetail as sod')
        .innerJoin('production.product as p', 'p.productid', 'sod.productid')
        .select((eb) => [
          'p.name as product_name',
          roundedAverageOf('sod.unitpricediscount', AVERAGE_DISCOUNT_SCALE).as('average_discount'),
          eb.fn.sum<string>('sod.linetotal').as('total_sales'),
        ])
        .groupBy(['p.productid', 'p.name'])
        .orderBy('total_sales', 'desc')
        .orderBy('p.name', 'asc')
        .execute();

      return rows.map((row) => ({
        productName: row.product_name,
        averageDiscount: new Decimal(row.average_discount),
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getProductSalesWithInventory(): RepoResult<ProductInventorySalesRow[]> {
    return this.inSnapshot('product sales with inventory', async (trx) => {
      // Both sides are aggregated per product before the join so that
      // multiple inventory locations do not multiply the sales sum.
      const rows = await trx
        .with('product_sales', (db) =>
          db
            .selectFrom('sales.salesorderdetail as sod')
            .select((eb) => ['sod.productid', eb.fn.sum<string>('sod.linetotal').as('total_sales')])
            .groupBy('sod.productid')
        )
        .with('inventory_levels', (db) =>
          db
            .selectFrom('production.productinventory as pi')
            .select((eb) => ['pi.productid', eb.fn.sum<string>('pi.quantity').as('inventory_level')])
            .groupBy('pi.productid')
        )
        .selectFrom('production.product as p')
        .innerJoin('product_sales as ps', 'ps.productid', 'p.productid')
        .innerJoin('inventory_levels as il', 'il.productid', 'p.productid')
        .select(['p.name as product_name', 'ps.total_sales', 'il.inventory_level'])
        .orderBy('ps.total_sales', 'desc')
        .orderBy('p.name', 'asc')
        .execute();

      return rows.map((row) => ({
        productName: row.product_name,
        totalSales: new Decimal(row.total_sales),
        inventoryLevel: Number(row.inventory_level),
      }));
    });
  }

  async getProductSalesInRange(range: DateRange): RepoResult<ProductSalesRow[]> {
    return this.inSnapshot('product sales in range', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderheader as soh')
        .innerJoin('sales.salesorderdetail as sod', 'sod.salesorderid', 'soh.salesorderid')
        .innerJoin('production.product as p', 'p.productid', 'sod.productid')
        .select((eb) => [
          'p.name as product_name',
          eb.fn.sum<string>('sod.linetotal').as('total_sales'),
        ])
        .where(onOrAfterDate('soh.orderdate', range.start))
        .where(beforeDate('soh.orderdate', range.endExclusive))
        .groupBy(['p.productid', 'p.name'])
        .orderBy('total_sales', 'desc')
        .orderBy('p.name', 'asc')
        .execute();

      return rows.map((row) => ({
        productName: row.product_name,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getMonthlyCategorySales(year: number): RepoResult<MonthlyCategorySalesRow[]> {
    return this.inSnapshot('monthly category sales', async (trx) => {
      // One row per (order, category): an order's total due is counted once
      // per category it has lines in, not once per line.
      const rows = await trx
        .with('order_categories', (db) =>
          db
            .selectFrom('sales.salesorderheader as soh')
            .innerJoin('sales.salesorderdetail as sod', 'sod.salesorderid', 'soh.salesorderid')
            .innerJoin('production.product as p', 'p.productid', 'sod.productid')
            .innerJoin(
              'production.productsubcategory as ps',
              'ps.productsubcategoryid',
              'p.productsubcategoryid'
            )
            .innerJoin(
              'production.productcategory as pc',
              'pc.productcategoryid',
              'ps.productcategoryid'
            )
            .select([
              'soh.salesorderid',
              monthOf('soh.orderdate').as('month'),
              'pc.productcategoryid',
              'pc.name as category',
              'soh.totaldue',
            ])
            .distinct()
            .where(yearOf('soh.orderdate'), '=', year)
        )
        .selectFrom('order_categories as oc')
        .select((eb) => ['oc.month', 'oc.category', eb.fn.sum<string>('oc.totaldue').as('total_sales')])
        .groupBy(['oc.month', 'oc.productcategoryid', 'oc.category'])
        .orderBy('oc.month', 'asc')
        .orderBy('total_sales', 'desc')
        .orderBy('oc.category', 'asc')
        .execute();

      return rows.map((row) => ({
        month: row.month,
        category: row.category,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getCustomerSalesByTerritory(): RepoResult<TerritoryCustomerSalesRow[]> {
    return this.inSnapshot('customer sales by territory', async (trx) => {
      const rows = await trx
        .selectFrom('sales.salesorderheader as soh')
        .innerJoin('sales.customer as c', 'c.customerid', 'soh.customerid')
        .innerJoin('sales.salesterritory as st', 'st.territoryid', 'soh.territoryid')
        .select((eb) => [
          'st.name as territory',
          'c.customerid as customer_id',
          eb.fn.sum<string>('soh.totaldue').as('total_sales'),
        ])
        .groupBy(['st.territoryid', 'st.name', 'c.customerid'])
        .orderBy('total_sales', 'desc')
        .orderBy('st.name', 'asc')
        .orderBy('c.customerid', 'asc')
        .execute();

      return rows.map((row) => ({
        territory: row.territory,
        customerId: row.customer_id,
        totalSales: new Decimal(row.total_sales),
      }));
    });
  }

  async getYearlyProductSalesWithInventory(year: number): RepoResult<YearlyProductInventoryRow[]> {
    return this.inSnapshot('yearly product sales with inventory', async (trx) => {
      const rows = await trx
        .with('yearly_sales', (db) =>
          db
            .selectFrom('sales.salesorderdetail as sod')
            .innerJoin('sales.salesorderheader as soh', 'soh.salesorderid', 'sod.salesorderid')
            .select((eb) => [
              'sod.productid',
              eb.fn.sum<string>('sod.linetotal').as('yearly_sales'),
            ])
            .where(yearOf('soh.orderdate'), '=', year)
            .groupBy('sod.productid')
        )
        .with('inventory_levels', (db) =>
          db
            .selectFrom('production.productinventory as pi')
            .select((eb) => ['pi.productid', eb.fn.sum<string>('pi.quantity').as('inventory_level')])
            .groupBy('pi.productid')
        )
        .selectFrom('production.product as p')
        .innerJoin('yearly_sales as ys', 'ys.productid', 'p.productid')
        .innerJoin('inventory_levels as il', 'il.productid', 'p.productid')
        .select(['p.name as product_name', 'ys.yearly_sales', 'il.inventory_level'])
        .orderBy('ys.yearly_sales', 'desc')
        .orderBy('p.name', 'asc')
        .execute();

      return rows.map((row) => ({
        productName: row.product_name,
        yearlySales: new Decimal(row.yearly_sales),
        inventoryLevel: Number(row.inventory_level),
      }));
    });
  }

  async getLatestOrderDate(): RepoResult<string | null> {
    return this.inSnapshot('latest order date', async (trx) => {
      const row = await trx
        .selectFrom('sales.salesorderheader as soh')
        .select(latestDateOf('soh.orderdate').as('latest_order_date'))
        .executeTakeFirst();

      return row?.latest_order_date ?? null;
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Runs one report query in the shared snapshot, or in a snapshot of its
   * own, and converts failures to errors.
   */
  private async inSnapshot<T>(
    report: string,
    fn: (trx: Transaction<SalesDatabase>) => Promise<T>
  ): RepoResult<T> {
    try {
      const value =
        this.trx !== null
          ? await fn(this.trx)
          : await withReadOnlySnapshot(this.db, this.queryTimeoutMs, fn);
      return ok(value);
    } catch (error) {
      return err(toRepoError(report, error));
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Creates a SalesReportRepository backed by PostgreSQL.
 *
 * @param db - Kysely database client for the sales database
 * @param options - Query timeout
 */
export const makeSalesReportRepo = (
  db: SalesDbClient,
  options: SalesReportRepoOptions = {}
): SalesReportRepository => {
  return new KyselySalesReportRepo(db, options.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS);
};
