/**
 * In-memory sales snapshot built from seed files
 */

export {
  createSalesSnapshot,
  buildSalesSnapshot,
  type SalesSnapshot,
  type InMemoryCountryRegion,
  type InMemoryTerritory,
  type InMemoryCustomer,
  type InMemoryCategory,
  type InMemorySubcategory,
  type InMemoryProduct,
  type InMemoryInventory,
  type InMemoryOrder,
  type InMemoryOrderLine,
} from './in-memory-db.js';
export { loadSalesSeedFile, parseSalesSeed } from './seed-loader.js';
export { SalesSeedSchema, type SalesSeed, type SeedOrder, type SeedOrderLine } from './types.js';
