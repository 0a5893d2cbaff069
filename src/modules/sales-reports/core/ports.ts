/**
 * Port interfaces for Sales Reports module.
 *
 * Defines the data source contract that the shell layer must implement.
 * Every method is a read-only aggregation over one consistent snapshot.
 * Joins are inner joins: rows with missing references drop out of the
 * dimension being grouped.
 */

import type { SalesReportRepoError } from './errors.js';
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
} from './types.js';
import type { Result } from 'neverthrow';

type RepoResult<T> = Promise<Result<T, SalesReportRepoError>>;

/**
 * Repository interface for sales report data access.
 */
export interface SalesReportRepository {
  /** Sum of order total due per calendar year, year descending. */
  getSalesByYear(range: YearRange): RepoResult<YearlySalesRow[]>;

  /** Sum of line totals per product category, sales descending. */
  getSalesByCategory(): RepoResult<CategorySalesRow[]>;

  /** Sum of line totals per product subcategory, sales descending. */
  getSalesBySubcategory(): RepoResult<SubcategorySalesRow[]>;

  /**
   * Products by quantity sold, quantity descending.
   * Ties are broken by product id ascending before truncation.
   */
  getTopProductsByQuantity(limit: number): RepoResult<ProductQuantityRow[]>;

  /** Sum of territory year-to-date sales per country/region, sales descending. */
  getSalesByRegion(): RepoResult<RegionSalesRow[]>;

  /** Sum of order total due per territory, sales descending. */
  getSalesByTerritory(): RepoResult<TerritorySalesRow[]>;

  /** Sum of order total due per month of the given year, month ascending. */
  getMonthlySales(year: number): RepoResult<MonthlySalesRow[]>;

  /**
   * Customers by total spend, spend descending.
   * Ties are broken by customer id ascending before truncation.
   */
  getTopCustomersBySpend(limit: number): RepoResult<CustomerSpendRow[]>;

  /** Unweighted average discount and line-total sum per product. */
  getProductDiscountPerformance(): RepoResult<ProductDiscountRow[]>;

  /** Line-total sum per product next to inventory summed over locations. */
  getProductSalesWithInventory(): RepoResult<ProductInventorySalesRow[]>;

  /** Line-total sum per product for orders dated within the range. */
  getProductSalesInRange(range: DateRange): RepoResult<ProductSalesRow[]>;

  /**
   * Order total due per (month, category) for the given year.
   * An order counts once per category it has lines in.
   */
  getMonthlyCategorySales(year: number): RepoResult<MonthlyCategorySalesRow[]>;

  /** Sum of order total due per (territory, customer), sales descending. */
  getCustomerSalesByTerritory(): RepoResult<TerritoryCustomerSalesRow[]>;

  /** Line-total sum per product for the given year next to summed inventory. */
  getYearlyProductSalesWithInventory(year: number): RepoResult<YearlyProductInventoryRow[]>;

  /**
   * Date (`YYYY-MM-DD`) of the most recent order, or null when there are none.
   * Used to resolve default years and reference dates.
   */
  getLatestOrderDate(): RepoResult<string | null>;

  /**
   * Runs `fn` against one consistent snapshot: every method called on the
   * scoped repository observes the same data. Reports whose parameters
   * default from the data resolve them and run inside one snapshot.
   */
  withSnapshot<T>(fn: (scoped: SalesReportRepository) => RepoResult<T>): RepoResult<T>;
}
