/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { openSalesDataSource } from './app/sales-data-source.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import {
  createChildLogger,
  createLogger,
  prettyTransport,
  REDACTED_PATHS,
} from './infra/logger/index.js';

// In production, this would be set via environment variable
const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    name: 'sales-reports-server',
    pretty: config.logger.pretty,
    dataSource: config.database.source,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  // Initialize dependencies
  const dataSource = openSalesDataSource(config, createChildLogger(logger, 'sales-data-source'));

  // Build application - let Fastify create its own logger based on config
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
        ...(config.logger.pretty && { transport: prettyTransport() }),
      },
      disableRequestLogging: false,
    },
    deps: {
      healthCheckers: dataSource.healthCheckers,
      salesReportRepo: dataSource.salesReportRepo,
      config,
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await dataSource.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    await dataSource.close();
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
