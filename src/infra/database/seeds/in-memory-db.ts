/**
 * In-Memory Sales Snapshot
 * Provides an in-memory representation of the sales database
 * populated from seed files for testing and development
 */

import { Decimal } from 'decimal.js';

import type { SalesSeed } from './types.js';

// ========= In-Memory Data Structures =========

export interface InMemoryCountryRegion {
  code: string;
  name: string;
}

export interface InMemoryTerritory {
  id: number;
  name: string;
  countryRegionCode: string;
  salesYtd: Decimal;
}

export interface InMemoryCustomer {
  id: number;
  territoryId: number | null;
}

export interface InMemoryCategory {
  id: number;
  name: string;
}

export interface InMemorySubcategory {
  id: number;
  categoryId: number;
  name: string;
}

export interface InMemoryProduct {
  id: number;
  name: string;
  subcategoryId: number | null;
}

export interface InMemoryInventory {
  productId: number;
  locationId: number;
  quantity: number;
}

export interface InMemoryOrder {
  id: number;
  /** Date part of the order timestamp, YYYY-MM-DD */
  orderDate: string;
  year: number;
  month: number;
  customerId: number;
  territoryId: number | null;
  totalDue: Decimal;
}

export interface InMemoryOrderLine {
  id: number;
  orderId: number;
  productId: number;
  orderQty: number;
  unitPrice: Decimal;
  unitPriceDiscount: Decimal;
  lineTotal: Decimal;
}

/**
 * In-memory sales snapshot.
 * References are not checked on load; queries apply inner-join semantics.
 */
export interface SalesSnapshot {
  countryRegions: Map<string, InMemoryCountryRegion>;
  territories: Map<number, InMemoryTerritory>;
  customers: Map<number, InMemoryCustomer>;
  categories: Map<number, InMemoryCategory>;
  subcategories: Map<number, InMemorySubcategory>;
  products: Map<number, InMemoryProduct>;
  inventory: InMemoryInventory[];
  orders: Map<number, InMemoryOrder>;
  orderLines: InMemoryOrderLine[];
}

/**
 * Create an empty snapshot
 */
export function createSalesSnapshot(): SalesSnapshot {
  return {
    countryRegions: new Map(),
    territories: new Map(),
    customers: new Map(),
    categories: new Map(),
    subcategories: new Map(),
    products: new Map(),
    inventory: [],
    orders: new Map(),
    orderLines: [],
  };
}

/**
 * Build a snapshot from a validated seed
 */
export function buildSalesSnapshot(seed: SalesSeed): SalesSnapshot {
  const snapshot = createSalesSnapshot();

  for (const region of seed.countryRegions) {
    snapshot.countryRegions.set(region.code, { code: region.code, name: region.name });
  }

  for (const territory of seed.territories) {
    snapshot.territories.set(territory.id, {
      id: territory.id,
      name: territory.name,
      countryRegionCode: territory.countryRegionCode,
      salesYtd: new Decimal(territory.salesYtd),
    });
  }

  for (const customer of seed.customers) {
    snapshot.customers.set(customer.id, {
      id: customer.id,
      territoryId: customer.territoryId ?? null,
    });
  }

  for (const category of seed.categories) {
    snapshot.categories.set(category.id, { id: category.id, name: category.name });
  }

  for (const subcategory of seed.subcategories) {
    snapshot.subcategories.set(subcategory.id, {
      id: subcategory.id,
      categoryId: subcategory.categoryId,
      name: subcategory.name,
    });
  }

  for (const product of seed.products) {
    snapshot.products.set(product.id, {
      id: product.id,
      name: product.name,
      subcategoryId: product.subcategoryId ?? null,
    });
  }

  for (const item of seed.inventory) {
    snapshot.inventory.push({
      productId: item.productId,
      locationId: item.locationId,
      quantity: item.quantity,
    });
  }

  for (const order of seed.orders) {
    const orderDate = order.orderDate.slice(0, 10);
    snapshot.orders.set(order.id, {
      id: order.id,
      orderDate,
      year: Number(orderDate.slice(0, 4)),
      month: Number(orderDate.slice(5, 7)),
      customerId: order.customerId,
      territoryId: order.territoryId ?? null,
      totalDue: new Decimal(order.totalDue),
    });
  }

  for (const line of seed.orderLines) {
    const unitPrice = new Decimal(line.unitPrice);
    const unitPriceDiscount = new Decimal(line.unitPriceDiscount ?? 0);
    const lineTotal =
      line.lineTotal !== undefined
        ? new Decimal(line.lineTotal)
        : unitPrice.times(line.orderQty).times(new Decimal(1).minus(unitPriceDiscount));

    snapshot.orderLines.push({
      id: line.id,
      orderId: line.orderId,
      productId: line.productId,
      orderQty: line.orderQty,
      unitPrice,
      unitPriceDiscount,
      lineTotal,
    });
  }

  return snapshot;
}
