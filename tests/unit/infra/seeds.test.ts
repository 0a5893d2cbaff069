/**
 * Unit tests for the seed loader and in-memory sales snapshot
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import {
  buildSalesSnapshot,
  loadSalesSeedFile,
  parseSalesSeed,
} from '@/infra/database/seeds/index.js';

import { makeEmptySalesSeed, makeSalesSeed } from '../../fixtures/builders.js';

describe('buildSalesSnapshot', () => {
  const snapshot = buildSalesSnapshot(makeSalesSeed());

  it('indexes every table', () => {
    expect(snapshot.countryRegions.size).toBe(2);
    expect(snapshot.territories.size).toBe(4);
    expect(snapshot.customers.size).toBe(4);
    expect(snapshot.categories.size).toBe(3);
    expect(snapshot.subcategories.size).toBe(3);
    expect(snapshot.products.size).toBe(4);
    expect(snapshot.inventory).toHaveLength(4);
    expect(snapshot.orders.size).toBe(3);
    expect(snapshot.orderLines).toHaveLength(6);
  });

  it('keeps the date part of order timestamps', () => {
    const order = snapshot.orders.get(102);

    expect(order?.orderDate).toBe('2014-01-15');
    expect(order?.year).toBe(2014);
    expect(order?.month).toBe(1);
    expect(order?.totalDue.toFixed()).toBe('150');
  });

  it('computes missing line totals from quantity, price and discount', () => {
    const totals = snapshot.orderLines.map((line) => line.lineTotal.toFixed());

    expect(totals).toEqual(['80', '20', '90', '60', '38', '12']);
  });

  it('defaults a missing discount to zero', () => {
    expect(snapshot.orderLines[1]?.unitPriceDiscount.toFixed()).toBe('0');
  });

  it('stores missing references as null', () => {
    expect(snapshot.orders.get(103)?.territoryId).toBeNull();
    expect(snapshot.products.get(4)?.subcategoryId).toBeNull();
  });
});

describe('parseSalesSeed', () => {
  it('accepts a valid seed', () => {
    const seed = makeSalesSeed();

    expect(parseSalesSeed(seed)).toBe(seed);
  });

  it('reports where the seed is invalid', () => {
    const invalid = {
      ...makeEmptySalesSeed(),
      orders: [{ id: 1, orderDate: '15/01/2014', customerId: 1, totalDue: '10.00' }],
    };

    expect(() => parseSalesSeed(invalid, 'orders.json')).toThrow(
      'Invalid seed data in orders.json: /orders/0/orderDate'
    );
  });

  it('rejects order dates that are not real calendar days', () => {
    const seed = makeSalesSeed();
    const invalid = {
      ...seed,
      orders: seed.orders.map((order) =>
        order.id === 102 ? { ...order, orderDate: '2014-13-40T10:30:00' } : order
      ),
    };

    expect(() => parseSalesSeed(invalid, 'orders.json')).toThrow(
      "Invalid seed data in orders.json: /orders/1/orderDate: '2014-13-40T10:30:00' is not a calendar date"
    );
  });

  it('rejects a seed with a missing table', () => {
    const { orderLines: _omitted, ...withoutLines } = makeEmptySalesSeed();

    expect(() => parseSalesSeed(withoutLines)).toThrow('/orderLines');
  });
});

describe('loadSalesSeedFile', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sales-seed-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads a seed file into a snapshot', () => {
    const file = path.join(dir, 'valid.json');
    fs.writeFileSync(file, JSON.stringify(makeSalesSeed()));

    const snapshot = loadSalesSeedFile(file);

    expect(snapshot.orders.size).toBe(3);
  });

  it('fails when the file does not exist', () => {
    const file = path.join(dir, 'missing.json');

    expect(() => loadSalesSeedFile(file)).toThrow(`Seed file does not exist: ${file}`);
  });

  it('fails on malformed JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "orders": [');

    expect(() => loadSalesSeedFile(file)).toThrow(`Failed to parse JSON from ${file}`);
  });

  it('loads the bundled sample seed', () => {
    const snapshot = loadSalesSeedFile(path.join(process.cwd(), 'seeds/sales-sample.json'));

    expect(snapshot.orders.size).toBe(51);
    expect(snapshot.orderLines).toHaveLength(118);
  });
});
