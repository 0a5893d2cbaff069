/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { isCalendarDate } from '../../common/types/temporal.js';
import {
  DEFAULT_QUERY_TIMEOUT_MS,
  MAX_QUERY_TIMEOUT_MS,
  MIN_QUERY_TIMEOUT_MS,
} from '../database/query-builders/snapshot.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Data source
  SALES_DATA_SOURCE: Type.Union([Type.Literal('postgres'), Type.Literal('seed')], {
    default: 'postgres',
  }),
  DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  DATABASE_POOL_SIZE: Type.Integer({ default: 10, minimum: 1, maximum: 100 }),
  QUERY_TIMEOUT_MS: Type.Integer({
    default: DEFAULT_QUERY_TIMEOUT_MS,
    minimum: MIN_QUERY_TIMEOUT_MS,
    maximum: MAX_QUERY_TIMEOUT_MS,
  }),
  SALES_SEED_FILE: Type.String({ default: 'seeds/sales-sample.json' }),

  // Report defaults
  REPORT_DEFAULT_YEAR: Type.Optional(Type.Integer({ minimum: 1900, maximum: 9999 })),
  REPORT_REFERENCE_DATE: Type.Optional(Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' })),
  REPORT_WINDOW_DAYS: Type.Integer({ default: 30, minimum: 1, maximum: 3660 }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Parses an optional numeric variable.
 * Non-numeric input is passed through as NaN so schema validation reports it.
 */
const parseNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseNumber(env['PORT']) ?? 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    SALES_DATA_SOURCE: env['SALES_DATA_SOURCE'] ?? 'postgres',
    DATABASE_URL: env['DATABASE_URL'],
    DATABASE_POOL_SIZE: parseNumber(env['DATABASE_POOL_SIZE']) ?? 10,
    QUERY_TIMEOUT_MS: parseNumber(env['QUERY_TIMEOUT_MS']) ?? DEFAULT_QUERY_TIMEOUT_MS,
    SALES_SEED_FILE: env['SALES_SEED_FILE'] ?? 'seeds/sales-sample.json',
    REPORT_DEFAULT_YEAR: parseNumber(env['REPORT_DEFAULT_YEAR']),
    REPORT_REFERENCE_DATE: env['REPORT_REFERENCE_DATE'],
    REPORT_WINDOW_DAYS: parseNumber(env['REPORT_WINDOW_DAYS']) ?? 30,
  };

  // Drop unset optionals so they validate as absent rather than undefined
  const candidate = Object.fromEntries(
    Object.entries(rawEnv).filter(([, value]) => value !== undefined)
  );

  // Validate against schema
  if (!Value.Check(EnvSchema, candidate)) {
    const errors = [...Value.Errors(EnvSchema, candidate)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (candidate.SALES_DATA_SOURCE === 'postgres' && candidate.DATABASE_URL === undefined) {
    throw new Error(
      'Invalid environment configuration: /DATABASE_URL: Required when SALES_DATA_SOURCE is postgres'
    );
  }

  // The pattern above admits days that do not exist, such as 2014-02-30
  if (
    candidate.REPORT_REFERENCE_DATE !== undefined &&
    !isCalendarDate(candidate.REPORT_REFERENCE_DATE)
  ) {
    throw new Error(
      `Invalid environment configuration: /REPORT_REFERENCE_DATE: '${candidate.REPORT_REFERENCE_DATE}' is not a calendar date`
    );
  }

  return candidate;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    source: env.SALES_DATA_SOURCE,
    url: env.DATABASE_URL,
    poolSize: env.DATABASE_POOL_SIZE,
    /** Statement timeout applied to every report query */
    queryTimeoutMs: env.QUERY_TIMEOUT_MS,
    seedFile: env.SALES_SEED_FILE,
  },
  reports: {
    /** Target year when a caller does not supply one; latest order year otherwise */
    defaultYear: env.REPORT_DEFAULT_YEAR,
    /** Reference date for the recent-sales window; latest order date otherwise */
    referenceDate: env.REPORT_REFERENCE_DATE,
    windowDays: env.REPORT_WINDOW_DAYS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
