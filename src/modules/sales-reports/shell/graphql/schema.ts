/**
 * GraphQL schema for Sales Reports module.
 *
 * Monetary values are exposed as Float. Use the REST endpoints for the
 * exact decimal strings.
 */

export const SalesReportsSchema = /* GraphQL */ `
  """
  Data type of a report column.
  """
  enum SalesReportColumnType {
    INTEGER
    DECIMAL
    STRING
  }

  type SalesReportColumn {
    name: String!
    type: SalesReportColumnType!
  }

  """
  A report in the sales catalogue.
  """
  type SalesReportDefinition {
    """
    Stable identifier, e.g. sales-by-year
    """
    id: ID!
    """
    Position in the catalogue (1-14)
    """
    number: Int!
    title: String!
    description: String!
    """
    Business question the report answers
    """
    note: String!
    """
    Names of the parameters the report accepts
    """
    parameters: [String!]!
    columns: [SalesReportColumn!]!
  }

  # ---------------------------------------------------------------------------
  # Rows
  # ---------------------------------------------------------------------------

  type YearlySales {
    year: Int!
    totalSales: Float!
  }

  type CategorySales {
    category: String!
    totalSales: Float!
  }

  type SubcategorySales {
    subcategory: String!
    totalSales: Float!
  }

  type ProductQuantity {
    productId: Int!
    productName: String!
    quantitySold: Int!
  }

  type RegionSales {
    region: String!
    totalSales: Float!
  }

  type TerritorySales {
    territory: String!
    totalSales: Float!
  }

  type MonthlySales {
    month: Int!
    totalSales: Float!
  }

  type CustomerSpend {
    customerId: Int!
    totalSales: Float!
  }

  type ProductDiscount {
    productName: String!
    averageDiscount: Float!
    totalSales: Float!
  }

  type ProductInventorySales {
    productName: String!
    totalSales: Float!
    inventoryLevel: Int!
  }

  type ProductSales {
    productName: String!
    totalSales: Float!
  }

  type MonthlyCategorySales {
    month: Int!
    category: String!
    totalSales: Float!
  }

  type TerritoryCustomerSales {
    territory: String!
    customerId: Int!
    totalSales: Float!
  }

  type YearlyProductInventory {
    productName: String!
    yearlySales: Float!
    inventoryLevel: Int!
  }

  # ---------------------------------------------------------------------------
  # Parameterized reports (resolved parameters + rows)
  # ---------------------------------------------------------------------------

  type SalesByYearReport {
    fromYear: Int
    toYear: Int
    rows: [YearlySales!]!
  }

  type TopProductsReport {
    limit: Int!
    rows: [ProductQuantity!]!
  }

  type TopCustomersReport {
    limit: Int!
    rows: [CustomerSpend!]!
  }

  """
  year is null when no year was given, configured or found in the data.
  """
  type MonthlySalesReport {
    year: Int
    rows: [MonthlySales!]!
  }

  type RecentProductSalesReport {
    referenceDate: Date
    windowDays: Int!
    rows: [ProductSales!]!
  }

  type MonthlyCategorySalesReport {
    year: Int
    rows: [MonthlyCategorySales!]!
  }

  type YearlyProductSalesReport {
    year: Int
    rows: [YearlyProductInventory!]!
  }

  extend type Query {
    """
    The report catalogue.
    """
    salesReports: [SalesReportDefinition!]!

    """
    Total sales per calendar year, most recent first.
    """
    salesByYear(fromYear: Int, toYear: Int): SalesByYearReport!

    salesByCategory: [CategorySales!]!

    salesBySubcategory: [SubcategorySales!]!

    """
    Best-selling products by quantity (default: 5, max: 100).
    """
    topProductsByQuantity(limit: Int): TopProductsReport!

    """
    Territory year-to-date sales summed per country/region.
    """
    salesByRegion: [RegionSales!]!

    salesByTerritory: [TerritorySales!]!

    """
    Sales per month of a year (default: configured year, else latest order year).
    """
    monthlySales(year: Int): MonthlySalesReport!

    """
    Customers by total spend (default: 10, max: 100).
    """
    topCustomersBySpend(limit: Int): TopCustomersReport!

    productDiscountPerformance: [ProductDiscount!]!

    productSalesWithInventory: [ProductInventorySales!]!

    """
    Product sales in the windowDays days up to and including referenceDate.
    """
    recentProductSales(referenceDate: Date, windowDays: Int): RecentProductSalesReport!

    monthlyCategorySales(year: Int): MonthlyCategorySalesReport!

    customerSalesByTerritory: [TerritoryCustomerSales!]!

    yearlyProductSalesWithInventory(year: Int): YearlyProductSalesReport!
  }
`;
