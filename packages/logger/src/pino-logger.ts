import os from 'node:os';
import { Writable } from 'node:stream';

import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = PinoLogger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

interface TransportMode {
  console: boolean;
  file: boolean;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

let env: LoggerEnvConfig | undefined;
let rootLogger: Logger | undefined;
let transportMode: TransportMode | undefined;

const loggerCache = new Map<string, Logger>();

function getEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function getTransportMode(): TransportMode {
  if (!transportMode) {
    const current = getEnv();
    transportMode = { console: current.LOGGER_CONSOLE_ENABLED, file: current.LOGGER_FILE_LOG_ENABLED };
  }
  return transportMode;
}

function isTestEnvironment(current: LoggerEnvConfig): boolean {
  // vitest may set these after the env was first read
  return current.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createRootLogger(): Logger {
  const current = getEnv();
  const mode = getTransportMode();
  const isTestEnv = isTestEnvironment(current);

  const pinoConfig: LoggerOptions = {
    base: {
      environment: current.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: current.LOGGER_SERVICE_NAME,
    },
    level: current.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Test runs write to a noop stream so no transport worker threads are spawned
  if (isTestEnv) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  const transportTargets: TransportTarget[] = [];

  if (mode.console) {
    if (current.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      // JSON lines on stderr keep stdout free for command output
      transportTargets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: `./${current.LOGGER_FILE_LOG_DIRNAME}/${current.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length > 0) {
    pinoConfig.transport = { targets: transportTargets };
  }

  return pino(pinoConfig);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child(
    {
      category,
      categoryLabel: formatLabel(category, 25),
    },
    { level: getEnv().LOGGER_LOG_LEVEL }
  );

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * The Proxy looks up the latest underlying pino logger on every property
 * access, so module-level loggers created before `setLoggerTransports(...)`
 * still write to the new transports.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy(getOrCreateCategoryLogger(category), {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime (the CLI silences console logs in JSON mode).
 * Resets cached loggers so the new configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...getTransportMode(), ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Drop cached env and loggers. Used by tests that change LOGGER_* variables.
 */
export function resetLoggers(): void {
  env = undefined;
  transportMode = undefined;
  rootLogger = undefined;
  loggerCache.clear();
}
