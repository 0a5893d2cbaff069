// Ignore naming conventions for database tables

import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// pg returns NUMERIC as string to preserve precision
export type Numeric = ColumnType<string, number | string, number | string>;

// sales.salesorderheader
export interface SalesOrderHeader {
  salesorderid: Generated<number>;
  orderdate: Timestamp;
  customerid: number;
  territoryid: number | null;
  totaldue: Numeric;
}

// sales.salesorderdetail
export interface SalesOrderDetail {
  salesorderid: number;
  salesorderdetailid: Generated<number>;
  productid: number;
  orderqty: number;
  unitprice: Numeric;
  unitpricediscount: Numeric;
  linetotal: Numeric;
}

// sales.customer
export interface Customer {
  customerid: Generated<number>;
  personid: number | null;
  storeid: number | null;
  territoryid: number | null;
}

// sales.salesterritory
export interface SalesTerritory {
  territoryid: Generated<number>;
  name: string;
  countryregioncode: string;
  salesytd: Numeric;
}

// person.countryregion
export interface CountryRegion {
  countryregioncode: string;
  name: string;
}

// production.product
export interface Product {
  productid: Generated<number>;
  name: string;
  productsubcategoryid: number | null;
}

// production.productsubcategory
export interface ProductSubcategory {
  productsubcategoryid: Generated<number>;
  productcategoryid: number;
  name: string;
}

// production.productcategory
export interface ProductCategory {
  productcategoryid: Generated<number>;
  name: string;
}

// production.productinventory
export interface ProductInventory {
  productid: number;
  locationid: number;
  quantity: number;
}

// Database Schema Interface
// Note: PostgreSQL converts unquoted identifiers to lowercase, so table names here must be lowercase
export interface SalesDatabase {
  'sales.salesorderheader': SalesOrderHeader;
  'sales.salesorderdetail': SalesOrderDetail;
  'sales.customer': Customer;
  'sales.salesterritory': SalesTerritory;
  'person.countryregion': CountryRegion;
  'production.product': Product;
  'production.productsubcategory': ProductSubcategory;
  'production.productcategory': ProductCategory;
  'production.productinventory': ProductInventory;
}
