import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis.
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `\u2026${str.slice(-size + 1)}`;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;
let env: LoggerEnvConfig | undefined;

function getEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function isTestEnvironment(config: LoggerEnvConfig): boolean {
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

/**
 * Builds transport targets. Console output goes to stderr so that command
 * output on stdout stays machine-readable.
 */
export function buildTransportTargets(config: LoggerEnvConfig): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (config.LOGGER_CONSOLE_ENABLED) {
    if (config.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      targets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (config.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level: 'trace',
      options: {
        destination: path.join(config.LOGGER_LOG_DIRNAME, config.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const config = getEnv();

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // In test mode, use a noop stream to suppress all output and avoid transport workers
  if (isTestEnvironment(config)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets(config);
  if (targets.length === 0) {
    return pino({ ...pinoConfig, enabled: false });
  }

  return pino({ ...pinoConfig, transport: { targets } });
}

/**
 * Returns a cached child logger for a category
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Change the level of the root logger and every cached category logger
 * (the CLI's global --verbose option sets debug).
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  rootLogger.level = level;
  for (const logger of loggerCache.values()) {
    logger.level = level;
  }
}

/**
 * Drop the root logger and cached loggers so the next getLogger call re-reads
 * the environment.
 */
export function resetLoggers(): void {
  rootLogger = undefined;
  env = undefined;
  loggerCache.clear();
}
