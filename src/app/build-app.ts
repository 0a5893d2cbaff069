/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { makeGraphQLPlugin, BaseSchema, CommonGraphQLSchema } from '../infra/graphql/index.js';
import {
  makeHealthRoutes,
  makeHealthResolvers,
  healthSchema,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  makeSalesReportsResolvers,
  makeSalesReportsRoutes,
  SalesReportsSchema,
  type SalesReportDefaults,
  type SalesReportRepository,
} from '../modules/sales-reports/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  healthCheckers?: HealthChecker[];
  /** Data source for every report (PostgreSQL or seed snapshot) */
  salesReportRepo: SalesReportRepository;
  config: AppConfig;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>; // Allow partial for tests/defaults, but runtime needs them
  version?: string | undefined;
}

/**
 * Report parameter defaults taken from configuration
 */
const toReportDefaults = (config: AppConfig): SalesReportDefaults => ({
  year: config.reports.defaultYear,
  referenceDate: config.reports.referenceDate,
  windowDays: config.reports.windowDays,
});

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.salesReportRepo === undefined || deps.config === undefined) {
    throw new Error('Missing required dependencies: salesReportRepo, config');
  }

  const config = deps.config;
  const checkers = deps.healthCheckers ?? [];
  const reportDeps = {
    salesReportRepo: deps.salesReportRepo,
    defaults: toReportDefaults(config),
  };

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Global error handler (set before routes so they inherit it)
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: `Request validation failed: ${error.message}`,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // Register health routes
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers,
    })
  );

  // Register sales report REST routes
  await app.register(makeSalesReportsRoutes(reportDeps));

  // Setup GraphQL
  const healthResolvers = makeHealthResolvers({
    ...(version !== undefined && { version }),
    checkers,
  });
  const salesReportsResolvers = makeSalesReportsResolvers(reportDeps);

  await app.register(
    makeGraphQLPlugin({
      schema: [BaseSchema, CommonGraphQLSchema, healthSchema, SalesReportsSchema],
      resolvers: [healthResolvers, salesReportsResolvers],
      enableGraphiQL: !config.server.isProduction,
    })
  );

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
