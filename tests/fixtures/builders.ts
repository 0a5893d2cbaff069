/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import { buildSalesSnapshot, type SalesSeed, type SalesSnapshot } from '@/infra/database/seeds/index.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { HealthCheckResult, HealthChecker } from '@/modules/health/index.js';

/**
 * Create a health check result with defaults
 */
export const makeHealthCheckResult = (
  overrides: Partial<HealthCheckResult> = {}
): HealthCheckResult => ({
  name: 'test-check',
  status: 'healthy',
  ...overrides,
});

/**
 * Create a health checker function that returns a fixed result
 */
export const makeHealthChecker = (result: Partial<HealthCheckResult> = {}): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => fullResult;
};

/**
 * Create a health checker that simulates latency
 */
export const makeSlowHealthChecker = (
  delayMs: number,
  result: Partial<HealthCheckResult> = {}
): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => {
    const start = Date.now();
    await new Promise((resolve) => setTimeout(resolve, delayMs));
    return {
      ...fullResult,
      latencyMs: Date.now() - start,
    };
  };
};

/**
 * Create a health checker that throws an error
 */
export const makeFailingHealthChecker = (errorMessage: string): HealthChecker => {
  return async () => {
    throw new Error(errorMessage);
  };
};

/**
 * Per-section overrides for the test configuration
 */
export type TestConfigOverrides = {
  [Section in keyof AppConfig]?: Partial<AppConfig[Section]>;
};

/**
 * Create a test configuration with defaults
 */
export const makeTestConfig = (overrides: TestConfigOverrides = {}): AppConfig => ({
  server: {
    port: 3000,
    host: '0.0.0.0',
    isDevelopment: false,
    isProduction: false,
    isTest: true,
    ...overrides.server,
  },
  logger: {
    level: 'silent',
    pretty: false,
    ...overrides.logger,
  },
  database: {
    source: 'seed',
    url: undefined,
    poolSize: 10,
    queryTimeoutMs: 30_000,
    seedFile: 'seeds/sales-sample.json',
    ...overrides.database,
  },
  reports: {
    defaultYear: undefined,
    referenceDate: undefined,
    windowDays: 30,
    ...overrides.reports,
  },
});

/**
 * Create a seed with no rows in any table
 */
export const makeEmptySalesSeed = (overrides: Partial<SalesSeed> = {}): SalesSeed => ({
  countryRegions: [],
  territories: [],
  customers: [],
  categories: [],
  subcategories: [],
  products: [],
  inventory: [],
  orders: [],
  orderLines: [],
  ...overrides,
});

/**
 * Create a small, fully known sales seed.
 *
 * Orders:
 * - 101: 2013-03-10, customer 1, Northwest, 100.00
 * - 102: 2014-01-15, customer 2, Southwest, 150.00 (two Bikes lines)
 * - 103: 2014-06-20, customer 3, no territory, 50.00
 *
 * Line totals (qty × price × (1 − discount)):
 * - Mountain-100: 80 (2013) + 90 (2014), inventory 5 + 7
 * - Road-200: 60 (2014), inventory 3
 * - Jersey M: 20 (2013) + 38 (2014), no inventory
 * - Orphan Widget: 12 (2014), no subcategory, inventory 10
 *
 * Category "Components" and customer 4 have no sales; territory Atlantis
 * points at an unknown region.
 */
export const makeSalesSeed = (overrides: Partial<SalesSeed> = {}): SalesSeed => ({
  countryRegions: [
    { code: 'US', name: 'United States' },
    { code: 'CA', name: 'Canada' },
  ],
  territories: [
    { id: 1, name: 'Northwest', countryRegionCode: 'US', salesYtd: '1000.50' },
    { id: 2, name: 'Southwest', countryRegionCode: 'US', salesYtd: '2000.25' },
    { id: 3, name: 'Canada', countryRegionCode: 'CA', salesYtd: '1500.00' },
    { id: 4, name: 'Atlantis', countryRegionCode: 'ZZ', salesYtd: '999.00' },
  ],
  customers: [
    { id: 1, territoryId: 1 },
    { id: 2, territoryId: 2 },
    { id: 3, territoryId: 3 },
    { id: 4, territoryId: 1 },
  ],
  categories: [
    { id: 1, name: 'Bikes' },
    { id: 2, name: 'Clothing' },
    { id: 3, name: 'Components' },
  ],
  subcategories: [
    { id: 1, categoryId: 1, name: 'Mountain Bikes' },
    { id: 2, categoryId: 1, name: 'Road Bikes' },
    { id: 3, categoryId: 2, name: 'Jerseys' },
  ],
  products: [
    { id: 1, name: 'Mountain-100', subcategoryId: 1 },
    { id: 2, name: 'Road-200', subcategoryId: 2 },
    { id: 3, name: 'Jersey M', subcategoryId: 3 },
    { id: 4, name: 'Orphan Widget', subcategoryId: null },
  ],
  inventory: [
    { productId: 1, locationId: 1, quantity: 5 },
    { productId: 1, locationId: 2, quantity: 7 },
    { productId: 2, locationId: 1, quantity: 3 },
    { productId: 4, locationId: 1, quantity: 10 },
  ],
  orders: [
    { id: 101, orderDate: '2013-03-10', customerId: 1, territoryId: 1, totalDue: '100.00' },
    { id: 102, orderDate: '2014-01-15T10:30:00', customerId: 2, territoryId: 2, totalDue: '150.00' },
    { id: 103, orderDate: '2014-06-20', customerId: 3, territoryId: null, totalDue: '50.00' },
  ],
  orderLines: [
    { id: 1, orderId: 101, productId: 1, orderQty: 2, unitPrice: '40.00', unitPriceDiscount: '0' },
    { id: 2, orderId: 101, productId: 3, orderQty: 1, unitPrice: '20.00' },
    { id: 3, orderId: 102, productId: 1, orderQty: 1, unitPrice: '100.00', unitPriceDiscount: '0.10' },
    { id: 4, orderId: 102, productId: 2, orderQty: 3, unitPrice: '20.00', unitPriceDiscount: '0' },
    { id: 5, orderId: 103, productId: 3, orderQty: 2, unitPrice: '20.00', unitPriceDiscount: '0.05' },
    { id: 6, orderId: 103, productId: 4, orderQty: 2, unitPrice: 6, lineTotal: '12.00' },
  ],
  ...overrides,
});

/**
 * Create an in-memory snapshot from the known seed
 */
export const makeSalesSnapshot = (overrides: Partial<SalesSeed> = {}): SalesSnapshot =>
  buildSalesSnapshot(makeSalesSeed(overrides));
