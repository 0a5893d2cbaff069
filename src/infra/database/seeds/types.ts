/**
 * Seed file format for the in-memory sales snapshot.
 *
 * Mirrors the tables in ../sales/types.ts with camelCase keys. Money values
 * may be JSON numbers or numeric strings; strings are preferred for precision.
 */

import { Type, type Static } from '@sinclair/typebox';

const Money = Type.Union([Type.String({ pattern: '^-?\\d+(\\.\\d+)?$' }), Type.Number()]);
const Id = Type.Integer({ minimum: 1 });

export const SeedCountryRegionSchema = Type.Object({
  code: Type.String({ minLength: 1, maxLength: 3 }),
  name: Type.String({ minLength: 1 }),
});

export const SeedTerritorySchema = Type.Object({
  id: Id,
  name: Type.String({ minLength: 1 }),
  countryRegionCode: Type.String({ minLength: 1, maxLength: 3 }),
  salesYtd: Money,
});

export const SeedCustomerSchema = Type.Object({
  id: Id,
  territoryId: Type.Optional(Type.Union([Id, Type.Null()])),
});

export const SeedCategorySchema = Type.Object({
  id: Id,
  name: Type.String({ minLength: 1 }),
});

export const SeedSubcategorySchema = Type.Object({
  id: Id,
  categoryId: Id,
  name: Type.String({ minLength: 1 }),
});

export const SeedProductSchema = Type.Object({
  id: Id,
  name: Type.String({ minLength: 1 }),
  subcategoryId: Type.Optional(Type.Union([Id, Type.Null()])),
});

export const SeedInventorySchema = Type.Object({
  productId: Id,
  locationId: Id,
  quantity: Type.Integer({ minimum: 0 }),
});

export const SeedOrderSchema = Type.Object({
  id: Id,
  /** YYYY-MM-DD, optionally followed by a time part */
  orderDate: Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}(T.*)?$' }),
  customerId: Id,
  territoryId: Type.Optional(Type.Union([Id, Type.Null()])),
  totalDue: Money,
});

export const SeedOrderLineSchema = Type.Object({
  id: Id,
  orderId: Id,
  productId: Id,
  orderQty: Type.Integer({ minimum: 1 }),
  unitPrice: Money,
  unitPriceDiscount: Type.Optional(Money),
  /** Computed as orderQty × unitPrice × (1 − unitPriceDiscount) when absent */
  lineTotal: Type.Optional(Money),
});

export const SalesSeedSchema = Type.Object({
  countryRegions: Type.Array(SeedCountryRegionSchema),
  territories: Type.Array(SeedTerritorySchema),
  customers: Type.Array(SeedCustomerSchema),
  categories: Type.Array(SeedCategorySchema),
  subcategories: Type.Array(SeedSubcategorySchema),
  products: Type.Array(SeedProductSchema),
  inventory: Type.Array(SeedInventorySchema),
  orders: Type.Array(SeedOrderSchema),
  orderLines: Type.Array(SeedOrderLineSchema),
});

export type SalesSeed = Static<typeof SalesSeedSchema>;
export type SeedOrder = Static<typeof SeedOrderSchema>;
export type SeedOrderLine = Static<typeof SeedOrderLineSchema>;
