import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { SalesDatabase } from './sales/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type SalesDbClient = Kysely<SalesDatabase>;

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string, poolSize: number): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: poolSize,
      }),
    }),
  });
};

/**
 * Initialize the sales database client
 */
export const initSalesDatabase = (config: AppConfig): SalesDbClient => {
  const { database } = config;

  if (database.url === undefined || database.url === '') {
    throw new Error('Missing configuration for Sales Database (DATABASE_URL)');
  }

  return createClient<SalesDatabase>(database.url, database.poolSize);
};

// Re-export types
export * from './sales/types.js';
