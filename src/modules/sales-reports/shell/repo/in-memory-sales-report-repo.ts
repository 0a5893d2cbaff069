/**
 * In-memory repository implementation for sales reports.
 *
 * Aggregates a seed snapshot in process with the same semantics as the
 * PostgreSQL repository: inner joins, per-product pre-aggregation for
 * inventory, one contribution per (order, category) for monthly category
 * sales, and the same deterministic ordering.
 */

import { Decimal } from 'decimal.js';
import { ok, type Result } from 'neverthrow';

import { AVERAGE_DISCOUNT_SCALE } from '../../core/types.js';

import type { SalesReportRepoError } from '../../core/errors.js';
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
import type {
  InMemoryCategory,
  InMemoryOrderLine,
  InMemoryProduct,
  InMemorySubcategory,
  SalesSnapshot,
} from '../../../../infra/database/seeds/index.js';

type RepoResult<T> = Promise<Result<T, SalesReportRepoError>>;

// ============================================================================
// Helpers
// ============================================================================

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const addTo = <K>(totals: Map<K, Decimal>, key: K, amount: Decimal): void => {
  totals.set(key, (totals.get(key) ?? new Decimal(0)).plus(amount));
};

/** Sorts in place by sales descending, then name ascending */
const sortBySalesThenName = <Row>(
  rows: Row[],
  sales: (row: Row) => Decimal,
  name: (row: Row) => string
): Row[] => rows.sort((a, b) => sales(b).comparedTo(sales(a)) || compareText(name(a), name(b)));

/**
 * In-memory implementation of SalesReportRepository.
 */
class InMemorySalesReportRepo implements SalesReportRepository {
  constructor(private readonly snapshot: SalesSnapshot) {}

  async getSalesByYear(range: YearRange): RepoResult<YearlySalesRow[]> {
    const totals = new Map<number, Decimal>();
    for (const order of this.snapshot.orders.values()) {
      if (range.fromYear !== null && order.year < range.fromYear) continue;
      if (range.toYear !== null && order.year > range.toYear) continue;
      addTo(totals, order.year, order.totalDue);
    }

    const rows = [...totals].map(([year, totalSales]) => ({ year, totalSales }));
    return ok(rows.sort((a, b) => b.year - a.year));
  }

  async getSalesByCategory(): RepoResult<CategorySalesRow[]> {
    const totals = new Map<number, Decimal>();
    for (const line of this.snapshot.orderLines) {
      const category = this.categoryOf(line);
      if (category === undefined) continue;
      addTo(totals, category.id, line.lineTotal);
    }

    const rows = [...totals].flatMap(([categoryId, totalSales]) => {
      const category = this.snapshot.categories.get(categoryId);
      return category !== undefined ? [{ category: category.name, totalSales }] : [];
    });
    return ok(sortBySalesThenName(rows, (row) => row.totalSales, (row) => row.category));
  }

  async getSalesBySubcategory(): RepoResult<SubcategorySalesRow[]> {
    const totals = new Map<number, Decimal>();
    for (const line of this.snapshot.orderLines) {
      const subcategory = this.subcategoryOf(line);
      if (subcategory === undefined) continue;
      addTo(totals, subcategory.id, line.lineTotal);
    }

    const rows = [...totals].flatMap(([subcategoryId, totalSales]) => {
      const subcategory = this.snapshot.subcategories.get(subcategoryId);
      return subcategory !== undefined ? [{ subcategory: subcategory.name, totalSales }] : [];
    });
    return ok(sortBySalesThenName(rows, (row) => row.totalSales, (row) => row.subcategory));
  }

  async getTopProductsByQuantity(limit: number): RepoResult<ProductQuantityRow[]> {
    const quantities = new Map<number, number>();
    for (const line of this.snapshot.orderLines) {
      if (!this.snapshot.products.has(line.productId)) continue;
      quantities.set(line.productId, (quantities.get(line.productId) ?? 0) + line.orderQty);
    }

    const rows = [...quantities].flatMap(([productId, quantitySold]) => {
      const product = this.snapshot.products.get(productId);
      return product !== undefined ? [{ productId, productName: product.name, quantitySold }] : [];
    });
    rows.sort((a, b) => b.quantitySold - a.quantitySold || a.productId - b.productId);
    return ok(rows.slice(0, limit));
  }

  async getSalesByRegion(): RepoResult<RegionSalesRow[]> {
    const totals = new Map<string, Decimal>();
    for (const territory of this.snapshot.territories.values()) {
      if (!this.snapshot.countryRegions.has(territory.countryRegionCode)) continue;
      addTo(totals, territory.countryRegionCode, territory.salesYtd);
    }

    const rows = [...totals].flatMap(([code, totalSales]) => {
      const region = this.snapshot.countryRegions.get(code);
      return region !== undefined ? [{ region: region.name, totalSales }] : [];
    });
    return ok(sortBySalesThenName(rows, (row) => row.totalSales, (row) => row.region));
  }

  async getSalesByTerritory(): RepoResult<TerritorySalesRow[]> {
    const totals = new Map<number, Decimal>();
    for (const order of this.snapshot.orders.values()) {
      if (order.territoryId === null || !this.snapshot.territories.has(order.territoryId)) continue;
      addTo(totals, order.territoryId, order.totalDue);
    }

    const rows = [...totals].flatMap(([territoryId, totalSales]) => {
      const territory = this.snapshot.territories.get(territoryId);
      return territory !== undefined ? [{ territory: territory.name, totalSales }] : [];
    });
    return ok(sortBySalesThenName(rows, (row) => row.totalSales, (row) => row.territory));
  }

  async getMonthlySales(year: number): RepoResult<MonthlySalesRow[]> {
    const totals = new Map<number, Decimal>();
    for (const order of this.snapshot.orders.values()) {
      if (order.year !== year) continue;
      addTo(totals, order.month, order.totalDue);
    }

    const rows = [...totals].map(([month, totalSales]) => ({ month, totalSales }));
    return ok(rows.sort((a, b) => a.month - b.month));
  }

  async getTopCustomersBySpend(limit: number): RepoResult<CustomerSpendRow[]> {
    const totals = new Map<number, Decimal>();
    for (const order of this.snapshot.orders.values()) {
      if (!this.snapshot.customers.has(order.customerId)) continue;
      addTo(totals, order.customerId, order.totalDue);
    }

    const rows = [...totals].map(([customerId, totalSales]) => ({ customerId, totalSales }));
    rows.sort((a, b) => b.totalSales.comparedTo(a.totalSales) || a.customerId - b.customerId);
    return ok(rows.slice(0, limit));
  }

  async getProductDiscountPerformance(): RepoResult<ProductDiscountRow[]> {
    const stats = new Map<number, { discountSum: Decimal; lines: number; totalSales: Decimal }>();
    for (const line of this.snapshot.orderLines) {
      if (!this.snapshot.products.has(line.productId)) continue;
      const current = stats.get(line.productId) ?? {
        discountSum: new Decimal(0),
        lines: 0,
        totalSales: new Decimal(0),
      };
      stats.set(line.productId, {
        discountSum: current.discountSum.plus(line.unitPriceDiscount),
        lines: current.lines + 1,
        totalSales: current.totalSales.plus(line.lineTotal),
      });
    }

    const rows = [...stats].flatMap(([productId, stat]) => {
      const product = this.snapshot.products.get(productId);
      if (product === undefined) return [];
      return [
        {
          productName: product.name,
          averageDiscount: stat.discountSum
            .dividedBy(stat.lines)
            .toDecimalPlaces(AVERAGE_DISCOUNT_SCALE, Decimal.ROUND_HALF_UP),
          totalSales: stat.totalSales,
        },
      ];
    });
    return ok(sortBySalesThenName(rows, (row) => row.totalSales, (row) => row.productName));
  }

  async getProductSalesWithInventory(): RepoResult<ProductInventorySalesRow[]> {
    const sales = this.productSales(this.snapshot.orderLines);
    const rows = this.withInventory(sales).map(({ product, sales, inventoryLevel }) => ({
      productName: product.name,
      totalSales: sales,
      inventoryLevel,
    }));
    return ok(sortBySalesThenName(rows, (row) => row.totalSales, (row) => row.productName));
  }

  async getProductSalesInRange(range: DateRange): RepoResult<ProductSalesRow[]> {
    const lines = this.snapshot.orderLines.filter((line) => {
      const order = this.snapshot.orders.get(line.orderId);
      return (
        order !== undefined && order.orderDate >= range.start && order.orderDate < range.endExclusive
      );
    });

    const rows = [...this.productSales(lines)].flatMap(([productId, totalSales]) => {
      const product = this.snapshot.products.get(productId);
      return product !== undefined ? [{ productName: product.name, totalSales }] : [];
    });
    return ok(sortBySalesThenName(rows, (row) => row.totalSales, (row) => row.productName));
  }

  async getMonthlyCategorySales(year: number): RepoResult<MonthlyCategorySalesRow[]> {
    // Distinct (order, category) pairs first
    const orderCategories = new Map<string, { orderId: number; category: InMemoryCategory }>();
    for (const line of this.snapshot.orderLines) {
      const order = this.snapshot.orders.get(line.orderId);
      if (order === undefined || order.year !== year) continue;
      const category = this.categoryOf(line);
      if (category === undefined) continue;
      orderCategories.set(`${String(order.id)}:${String(category.id)}`, {
        orderId: order.id,
        category,
      });
    }

    const totals = new Map<string, MonthlyCategorySalesRow>();
    for (const { orderId, category } of orderCategories.values()) {
      const order = this.snapshot.orders.get(orderId);
      if (order === undefined) continue;
      const key = `${String(order.month)}:${String(category.id)}`;
      const current = totals.get(key);
      totals.set(key, {
        month: order.month,
        category: category.name,
        totalSales: (current?.totalSales ?? new Decimal(0)).plus(order.totalDue),
      });
    }

    const rows = [...totals.values()];
    rows.sort(
      (a, b) =>
        a.month - b.month ||
        b.totalSales.comparedTo(a.totalSales) ||
        compareText(a.category, b.category)
    );
    return ok(rows);
  }

  async getCustomerSalesByTerritory(): RepoResult<TerritoryCustomerSalesRow[]> {
    const totals = new Map<string, TerritoryCustomerSalesRow>();
    for (const order of this.snapshot.orders.values()) {
      if (!this.snapshot.customers.has(order.customerId)) continue;
      const territory =
        order.territoryId !== null ? this.snapshot.territories.get(order.territoryId) : undefined;
      if (territory === undefined) continue;

      const key = `${String(territory.id)}:${String(order.customerId)}`;
      const current = totals.get(key);
      totals.set(key, {
        territory: territory.name,
        customerId: order.customerId,
        totalSales: (current?.totalSales ?? new Decimal(0)).plus(order.totalDue),
      });
    }

    const rows = [...totals.values()];
    rows.sort(
      (a, b) =>
        b.totalSales.comparedTo(a.totalSales) ||
        compareText(a.territory, b.territory) ||
        a.customerId - b.customerId
    );
    return ok(rows);
  }

  async getYearlyProductSalesWithInventory(year: number): RepoResult<YearlyProductInventoryRow[]> {
    const lines = this.snapshot.orderLines.filter(
      (line) => this.snapshot.orders.get(line.orderId)?.year === year
    );

    const rows = this.withInventory(this.productSales(lines)).map(
      ({ product, sales, inventoryLevel }) => ({
        productName: product.name,
        yearlySales: sales,
        inventoryLevel,
      })
    );
    return ok(sortBySalesThenName(rows, (row) => row.yearlySales, (row) => row.productName));
  }

  async getLatestOrderDate(): RepoResult<string | null> {
    let latest: string | null = null;
    for (const order of this.snapshot.orders.values()) {
      if (latest === null || order.orderDate > latest) {
        latest = order.orderDate;
      }
    }
    return ok(latest);
  }

  /** The snapshot never changes, so every call already sees the same data */
  withSnapshot<T>(fn: (scoped: SalesReportRepository) => RepoResult<T>): RepoResult<T> {
    return fn(this);
  }

  // ==========================================================================
  // Joins
  // ==========================================================================

  private subcategoryOf(line: InMemoryOrderLine): InMemorySubcategory | undefined {
    const product = this.snapshot.products.get(line.productId);
    if (product === undefined || product.subcategoryId === null) return undefined;
    return this.snapshot.subcategories.get(product.subcategoryId);
  }

  private categoryOf(line: InMemoryOrderLine): InMemoryCategory | undefined {
    const subcategory = this.subcategoryOf(line);
    if (subcategory === undefined) return undefined;
    return this.snapshot.categories.get(subcategory.categoryId);
  }

  /** Line-total sum per product id */
  private productSales(lines: readonly InMemoryOrderLine[]): Map<number, Decimal> {
    const totals = new Map<number, Decimal>();
    for (const line of lines) {
      addTo(totals, line.productId, line.lineTotal);
    }
    return totals;
  }

  /**
   * Joins per-product sales with inventory summed over locations.
   * Products without inventory rows drop out.
   */
  private withInventory(
    sales: Map<number, Decimal>
  ): { product: InMemoryProduct; sales: Decimal; inventoryLevel: number }[] {
    const levels = new Map<number, number>();
    for (const item of this.snapshot.inventory) {
      levels.set(item.productId, (levels.get(item.productId) ?? 0) + item.quantity);
    }

    return [...sales].flatMap(([productId, total]) => {
      const product = this.snapshot.products.get(productId);
      const inventoryLevel = levels.get(productId);
      if (product === undefined || inventoryLevel === undefined) return [];
      return [{ product, sales: total, inventoryLevel }];
    });
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Creates a SalesReportRepository over an in-memory seed snapshot.
 */
export const makeInMemorySalesReportRepo = (snapshot: SalesSnapshot): SalesReportRepository => {
  return new InMemorySalesReportRepo(snapshot);
};
