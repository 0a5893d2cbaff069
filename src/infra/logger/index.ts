/**
 * Logger factory using Pino
 *
 * Every line carries the service name and the sales data source it is
 * serving from. Connection strings are redacted wherever they are logged.
 */

import pinoLib, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
  type TransportSingleOptions,
} from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /** Bound as `dataSource` on every line when set */
  dataSource?: 'postgres' | 'seed';
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'sales-reports-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/** DATABASE_URL carries the database password */
export const REDACTED_PATHS = ['config.database.url', 'database.url', 'databaseUrl'];

/**
 * pino-pretty transport shared by the service logger and Fastify's request logger
 */
export const prettyTransport = (): TransportSingleOptions => ({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
});

/**
 * Creates a configured Pino logger instance.
 * A destination stream, when given, replaces the pretty transport.
 */
export const createLogger = (
  config: Partial<LoggerConfig> = {},
  destination?: DestinationStream
): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    ...(finalConfig.dataSource !== undefined && {
      base: { pid: process.pid, dataSource: finalConfig.dataSource },
    }),
  };

  if (destination !== undefined) {
    return pinoLib(options, destination);
  }

  if (finalConfig.pretty === true) {
    options.transport = prettyTransport();
  }

  return pinoLib(options);
};

/**
 * Creates a child logger for one component of the service
 */
export const createChildLogger = (
  parent: Logger,
  component: string,
  context: Record<string, unknown> = {}
): Logger => {
  return parent.child({ component, ...context });
};

export { type Logger } from 'pino';
