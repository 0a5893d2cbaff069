/**
 * Sales data source wiring
 *
 * Opens either the PostgreSQL sales database or a seed snapshot loaded into
 * memory, and pairs the report repository with the health checker that
 * watches the same source. Both are named after the source, e.g.
 * `postgres:adventureworks` or `seed:sales-sample.json`.
 */

import path from 'node:path';

import { initSalesDatabase, type SalesDbClient } from '../infra/database/client.js';
import { loadSalesSeedFile, type SalesSnapshot } from '../infra/database/seeds/index.js';
import {
  makeSalesDbHealthChecker,
  makeSnapshotHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  makeInMemorySalesReportRepo,
  makeSalesReportRepo,
  type SalesReportRepository,
} from '../modules/sales-reports/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface SalesDataSource {
  /** `<source>:<database or seed file name>`, free of credentials */
  name: string;
  salesReportRepo: SalesReportRepository;
  healthCheckers: HealthChecker[];
  close: () => Promise<void>;
}

/**
 * How each kind of source is opened. Tests replace these with in-process fakes.
 */
export interface SalesDataSourceOpeners {
  openDatabase: (config: AppConfig) => SalesDbClient;
  loadSeed: (seedFile: string) => SalesSnapshot;
}

const defaultOpeners: SalesDataSourceOpeners = {
  openDatabase: initSalesDatabase,
  loadSeed: loadSalesSeedFile,
};

const databaseName = (url: string | undefined): string => {
  if (url === undefined || !URL.canParse(url)) {
    return 'unknown';
  }
  const name = decodeURIComponent(new URL(url).pathname.slice(1));
  return name === '' ? 'default' : name;
};

/**
 * Names the configured source without exposing the connection string.
 */
export const salesDataSourceName = (config: AppConfig): string => {
  const { database } = config;
  return database.source === 'seed'
    ? `seed:${path.basename(database.seedFile)}`
    : `postgres:${databaseName(database.url)}`;
};

/**
 * Opens the configured sales data source.
 */
export const openSalesDataSource = (
  config: AppConfig,
  logger: Logger,
  openers: SalesDataSourceOpeners = defaultOpeners
): SalesDataSource => {
  const name = salesDataSourceName(config);

  if (config.database.source === 'seed') {
    const seedFile = path.resolve(config.database.seedFile);
    const snapshot = openers.loadSeed(seedFile);

    logger.info(
      { seedFile, orders: snapshot.orders.size, orderLines: snapshot.orderLines.length },
      'Loaded sales seed snapshot'
    );

    return {
      name,
      salesReportRepo: makeInMemorySalesReportRepo(snapshot),
      healthCheckers: [makeSnapshotHealthChecker(snapshot, { name })],
      close: () => Promise.resolve(),
    };
  }

  const salesDb = openers.openDatabase(config);
  logger.info(
    { dataSourceName: name, poolSize: config.database.poolSize },
    'Opened sales database pool'
  );

  return {
    name,
    salesReportRepo: makeSalesReportRepo(salesDb, {
      queryTimeoutMs: config.database.queryTimeoutMs,
    }),
    healthCheckers: [makeSalesDbHealthChecker(salesDb, { name })],
    close: () => salesDb.destroy(),
  };
};
