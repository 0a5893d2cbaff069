/**
 * Domain types for Sales Reports module.
 *
 * A fixed catalogue of read-only aggregation reports over the retail sample
 * database. Every report is a pure function of the data snapshot it runs on.
 * Monetary values are Decimal end to end.
 */

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Rows returned by the best-sellers report when no limit is given */
export const DEFAULT_TOP_PRODUCTS_LIMIT = 5;

/** Rows returned by the top-customers report when no limit is given */
export const DEFAULT_TOP_CUSTOMERS_LIMIT = 10;

/** Upper bound for any top-N limit */
export const MAX_TOP_LIMIT = 100;

/** Default length of the recent-sales window, in days */
export const DEFAULT_WINDOW_DAYS = 30;

/** Accepted window length bounds, in days */
export const MIN_WINDOW_DAYS = 1;
export const MAX_WINDOW_DAYS = 3660;

/** Decimal places of the average discount (half-up), whatever the data source */
export const AVERAGE_DISCOUNT_SCALE = 4;

/** Accepted calendar year bounds */
export const MIN_YEAR = 1900;
export const MAX_YEAR = 9999;

// ─────────────────────────────────────────────────────────────────────────────
// Report Identifiers
// ─────────────────────────────────────────────────────────────────────────────

export const SALES_REPORT_IDS = [
  'sales-by-year',
  'sales-by-category',
  'sales-by-subcategory',
  'top-products-by-quantity',
  'sales-by-region',
  'sales-by-territory',
  'monthly-sales',
  'top-customers-by-spend',
  'product-discount-performance',
  'product-sales-with-inventory',
  'recent-product-sales',
  'monthly-category-sales',
  'customer-sales-by-territory',
  'yearly-product-sales-with-inventory',
] as const;

export type SalesReportId = (typeof SALES_REPORT_IDS)[number];

export const isSalesReportId = (value: string): value is SalesReportId =>
  SALES_REPORT_IDS.some((id) => id === value);

// ─────────────────────────────────────────────────────────────────────────────
// Row Types
// ─────────────────────────────────────────────────────────────────────────────

export interface YearlySalesRow {
  year: number;
  totalSales: Decimal;
}

export interface CategorySalesRow {
  category: string;
  totalSales: Decimal;
}

export interface SubcategorySalesRow {
  subcategory: string;
  totalSales: Decimal;
}

export interface ProductQuantityRow {
  productId: number;
  productName: string;
  quantitySold: number;
}

/** Region sales use each territory's stored year-to-date figure */
export interface RegionSalesRow {
  region: string;
  totalSales: Decimal;
}

export interface TerritorySalesRow {
  territory: string;
  totalSales: Decimal;
}

export interface MonthlySalesRow {
  month: number;
  totalSales: Decimal;
}

export interface CustomerSpendRow {
  customerId: number;
  totalSales: Decimal;
}

/** averageDiscount is the unweighted mean over order lines */
export interface ProductDiscountRow {
  productName: string;
  averageDiscount: Decimal;
  totalSales: Decimal;
}

/** inventoryLevel is the product's on-hand quantity summed over all locations */
export interface ProductInventorySalesRow {
  productName: string;
  totalSales: Decimal;
  inventoryLevel: number;
}

export interface ProductSalesRow {
  productName: string;
  totalSales: Decimal;
}

export interface MonthlyCategorySalesRow {
  month: number;
  category: string;
  totalSales: Decimal;
}

export interface TerritoryCustomerSalesRow {
  territory: string;
  customerId: number;
  totalSales: Decimal;
}

export interface YearlyProductInventoryRow {
  productName: string;
  yearlySales: Decimal;
  inventoryLevel: number;
}

/**
 * Row type produced by each report.
 */
export interface SalesReportRowsMap {
  'sales-by-year': YearlySalesRow;
  'sales-by-category': CategorySalesRow;
  'sales-by-subcategory': SubcategorySalesRow;
  'top-products-by-quantity': ProductQuantityRow;
  'sales-by-region': RegionSalesRow;
  'sales-by-territory': TerritorySalesRow;
  'monthly-sales': MonthlySalesRow;
  'top-customers-by-spend': CustomerSpendRow;
  'product-discount-performance': ProductDiscountRow;
  'product-sales-with-inventory': ProductInventorySalesRow;
  'recent-product-sales': ProductSalesRow;
  'monthly-category-sales': MonthlyCategorySalesRow;
  'customer-sales-by-territory': TerritoryCustomerSalesRow;
  'yearly-product-sales-with-inventory': YearlyProductInventoryRow;
}

export type SalesReportRow = SalesReportRowsMap[SalesReportId];

// ─────────────────────────────────────────────────────────────────────────────
// Parameters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parameters as supplied by a caller, before validation.
 * Reports ignore parameters they do not accept.
 */
export interface SalesReportParamsInput {
  year?: number | undefined;
  fromYear?: number | undefined;
  toYear?: number | undefined;
  referenceDate?: string | undefined;
  windowDays?: number | undefined;
  limit?: number | undefined;
}

/** Inclusive calendar year bounds; null means unbounded */
export interface YearRange {
  fromYear: number | null;
  toYear: number | null;
}

/**
 * Half-open date range [start, endExclusive) of ISO `YYYY-MM-DD` dates.
 */
export interface DateRange {
  start: string;
  endExclusive: string;
}

export type NoParameters = Record<string, never>;

export interface TopLimitParameters {
  limit: number;
}

/** year is null when neither the caller, configuration nor data provide one */
export interface TargetYearParameters {
  year: number | null;
}

/** referenceDate is null when neither the caller, configuration nor data provide one */
export interface WindowParameters {
  referenceDate: string | null;
  windowDays: number;
}

/**
 * Resolved parameters reported back with each result.
 */
export interface SalesReportParametersMap {
  'sales-by-year': YearRange;
  'sales-by-category': NoParameters;
  'sales-by-subcategory': NoParameters;
  'top-products-by-quantity': TopLimitParameters;
  'sales-by-region': NoParameters;
  'sales-by-territory': NoParameters;
  'monthly-sales': TargetYearParameters;
  'top-customers-by-spend': TopLimitParameters;
  'product-discount-performance': NoParameters;
  'product-sales-with-inventory': NoParameters;
  'recent-product-sales': WindowParameters;
  'monthly-category-sales': TargetYearParameters;
  'customer-sales-by-territory': NoParameters;
  'yearly-product-sales-with-inventory': TargetYearParameters;
}

/**
 * Defaults applied when a caller omits a parameter.
 */
export interface SalesReportDefaults {
  year?: number | undefined;
  referenceDate?: string | undefined;
  windowDays: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Requests & Results
// ─────────────────────────────────────────────────────────────────────────────

export interface SalesReportRequest {
  report: SalesReportId;
  params?: SalesReportParamsInput | undefined;
}

export interface SalesReportResultOf<K extends SalesReportId> {
  report: K;
  parameters: SalesReportParametersMap[K];
  rows: SalesReportRowsMap[K][];
}

export type SalesReportResult = { [K in SalesReportId]: SalesReportResultOf<K> }[SalesReportId];

// ─────────────────────────────────────────────────────────────────────────────
// Catalogue
// ─────────────────────────────────────────────────────────────────────────────

export type ReportColumnType = 'integer' | 'decimal' | 'string';

export type ReportParameterName = keyof SalesReportParamsInput;

export interface ReportColumn<Name extends string = string> {
  name: Name;
  type: ReportColumnType;
}

export interface SalesReportDefinitionOf<K extends SalesReportId> {
  id: K;
  /** Position in the catalogue, 1-based */
  number: number;
  title: string;
  description: string;
  /** Business question the report answers */
  note: string;
  parameters: readonly ReportParameterName[];
  columns: readonly ReportColumn<keyof SalesReportRowsMap[K] & string>[];
}

export type SalesReportDefinition = {
  [K in SalesReportId]: SalesReportDefinitionOf<K>;
}[SalesReportId];

// ─────────────────────────────────────────────────────────────────────────────
// Tabular Projection
// ─────────────────────────────────────────────────────────────────────────────

/** Decimals are rendered as plain-notation strings to keep precision */
export type ReportCell = string | number | null;

export interface SalesReportTable {
  report: SalesReportId;
  parameters: Record<string, ReportCell>;
  columns: readonly ReportColumn[];
  rows: Record<string, ReportCell>[];
}
