/**
 * The sales report catalogue.
 *
 * Static metadata for every report: what it answers, which parameters it
 * accepts and the columns of its rows, in output order.
 */

import {
  SALES_REPORT_IDS,
  type SalesReportDefinition,
  type SalesReportDefinitionOf,
  type SalesReportId,
} from './types.js';

type Catalogue = { [K in SalesReportId]: SalesReportDefinitionOf<K> };

const CATALOGUE: Catalogue = {
  'sales-by-year': {
    id: 'sales-by-year',
    number: 1,
    title: 'Total sales by year',
    description: 'Sum of order total due per calendar year of the order date.',
    note: 'Overall performance over time, as a baseline for forecasts and targets.',
    parameters: ['fromYear', 'toYear'],
    columns: [
      { name: 'year', type: 'integer' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'sales-by-category': {
    id: 'sales-by-category',
    number: 2,
    title: 'Sales by product category',
    description: 'Sum of order line totals per product category.',
    note: 'Which categories drive the most revenue.',
    parameters: [],
    columns: [
      { name: 'category', type: 'string' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'sales-by-subcategory': {
    id: 'sales-by-subcategory',
    number: 3,
    title: 'Sales by product subcategory',
    description: 'Sum of order line totals per product subcategory.',
    note: 'How subcategories contribute, to refine stocking and promotions.',
    parameters: [],
    columns: [
      { name: 'subcategory', type: 'string' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'top-products-by-quantity': {
    id: 'top-products-by-quantity',
    number: 4,
    title: 'Best-selling products by quantity',
    description:
      'Products ranked by units sold. Ties at the cut-off go to the lower product id.',
    note: 'Where to focus marketing and keep stock available.',
    parameters: ['limit'],
    columns: [
      { name: 'productId', type: 'integer' },
      { name: 'productName', type: 'string' },
      { name: 'quantitySold', type: 'integer' },
    ],
  },
  'sales-by-region': {
    id: 'sales-by-region',
    number: 5,
    title: 'Sales by region',
    description:
      "Sum of each territory's stored year-to-date sales per country/region. Not derived from orders.",
    note: 'Geographic areas that are strong or need attention.',
    parameters: [],
    columns: [
      { name: 'region', type: 'string' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'sales-by-territory': {
    id: 'sales-by-territory',
    number: 6,
    title: 'Sales by territory',
    description: 'Sum of order total due per sales territory. Orders without a territory are excluded.',
    note: 'High-performing territories and those needing more resources.',
    parameters: [],
    columns: [
      { name: 'territory', type: 'string' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'monthly-sales': {
    id: 'monthly-sales',
    number: 7,
    title: 'Monthly sales for a year',
    description: 'Sum of order total due per month of the target year.',
    note: 'Month-over-month trend for marketing and resource planning.',
    parameters: ['year'],
    columns: [
      { name: 'month', type: 'integer' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'top-customers-by-spend': {
    id: 'top-customers-by-spend',
    number: 8,
    title: 'Top customers by total spend',
    description:
      'Customers ranked by sum of order total due. Ties at the cut-off go to the lower customer id.',
    note: 'Customers worth personalised offers and loyalty programmes.',
    parameters: ['limit'],
    columns: [
      { name: 'customerId', type: 'integer' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'product-discount-performance': {
    id: 'product-discount-performance',
    number: 9,
    title: 'Product performance by discount',
    description:
      'Unweighted average unit price discount across order lines and sum of line totals per product.',
    note: 'Products selling well despite deep discounts may support premium pricing.',
    parameters: [],
    columns: [
      { name: 'productName', type: 'string' },
      { name: 'averageDiscount', type: 'decimal' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'product-sales-with-inventory': {
    id: 'product-sales-with-inventory',
    number: 10,
    title: 'Product sales against inventory',
    description:
      'Sum of line totals per product next to on-hand quantity summed over all locations. Products without inventory rows are excluded.',
    note: 'High sellers running low on stock, to guide replenishment.',
    parameters: [],
    columns: [
      { name: 'productName', type: 'string' },
      { name: 'totalSales', type: 'decimal' },
      { name: 'inventoryLevel', type: 'integer' },
    ],
  },
  'recent-product-sales': {
    id: 'recent-product-sales',
    number: 11,
    title: 'Product sales in a recent window',
    description:
      'Sum of line totals per product for orders dated from windowDays before the reference date up to and including it.',
    note: 'Short-term patterns for quick marketing and stock adjustments.',
    parameters: ['referenceDate', 'windowDays'],
    columns: [
      { name: 'productName', type: 'string' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'monthly-category-sales': {
    id: 'monthly-category-sales',
    number: 12,
    title: 'Monthly sales by product category',
    description:
      'Order total due per month and category of the target year. An order counts once for each category it has lines in.',
    note: 'Which categories matter in which months, to plan inventory.',
    parameters: ['year'],
    columns: [
      { name: 'month', type: 'integer' },
      { name: 'category', type: 'string' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'customer-sales-by-territory': {
    id: 'customer-sales-by-territory',
    number: 13,
    title: 'Customer sales by territory',
    description: 'Sum of order total due per territory and customer.',
    note: 'Top customers per territory, for regional sales strategy.',
    parameters: [],
    columns: [
      { name: 'territory', type: 'string' },
      { name: 'customerId', type: 'integer' },
      { name: 'totalSales', type: 'decimal' },
    ],
  },
  'yearly-product-sales-with-inventory': {
    id: 'yearly-product-sales-with-inventory',
    number: 14,
    title: 'Yearly product sales against inventory',
    description:
      'Sum of line totals per product for orders of the target year next to on-hand quantity summed over all locations.',
    note: 'Which in-demand products to prioritise when stocking.',
    parameters: ['year'],
    columns: [
      { name: 'productName', type: 'string' },
      { name: 'yearlySales', type: 'decimal' },
      { name: 'inventoryLevel', type: 'integer' },
    ],
  },
};

/**
 * Returns the definition of a single report.
 */
export const getSalesReportDefinition = <K extends SalesReportId>(
  id: K
): SalesReportDefinitionOf<K> => CATALOGUE[id];

/**
 * All report definitions in catalogue order.
 */
export const SALES_REPORT_CATALOGUE: readonly SalesReportDefinition[] = SALES_REPORT_IDS.map(
  (id) => CATALOGUE[id]
);
