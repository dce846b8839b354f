/**
 * Logger
 *
 * Pino-based structured logger for all packages. Log lines always go to
 * stderr; stdout is left to the CLI's own output (progress, --json).
 */

import { pino, destination as pinoDestination, type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

const SERVICE_NAME = 'fisheye-equirect';

export type Logger = PinoLogger;

export interface LoggerEnv {
  LOG_LEVEL?: string;
  NODE_ENV?: string;
}

export function buildLoggerOptions(env: LoggerEnv = process.env): LoggerOptions {
  const nodeEnv = env.NODE_ENV ?? 'development';

  return {
    level: env.LOG_LEVEL ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: SERVICE_NAME,
      env: nodeEnv,
    },
    transport: nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: 2,
      },
    } : undefined,
  };
}

/**
 * Root logger for an environment. `destination` replaces stderr outside
 * development, where no pretty transport is involved.
 */
export function createRootLogger(
  env: LoggerEnv = process.env,
  destination?: DestinationStream
): Logger {
  const options = buildLoggerOptions(env);
  if (options.transport) {
    return pino(options);
  }
  return pino(options, destination ?? pinoDestination(2));
}

export const logger = createRootLogger();

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
