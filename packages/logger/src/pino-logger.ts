import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LoggerEnvConfig, type LogLevel, validateLoggerEnv } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

export interface LogMethod {
  (context: object, message?: string): void;
  (message: string): void;
}

/**
 * Category logger. Structured context goes first, the message second.
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  isLevelEnabled(level: LogLevel): boolean;
}

// Cache for loggers
const loggerCache = new Map<string, pino.Logger>();

// Root logger instance
let rootLogger: pino.Logger | undefined;

export interface TransportMode {
  console: boolean;
  file: boolean;
}

// Mutable transport settings so callers can toggle console/file outputs at runtime
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

function isTestEnvironment(): boolean {
  // Check both the validated env and process.env (in case vitest sets it after module load)
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Ensures that the log directory exists; if not, it creates it.
 */
function ensureLogDirExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Transport targets for a transport mode
 */
export function buildTransportTargets(mode: TransportMode, config: LoggerEnvConfig): pino.TransportTargetOptions[] {
  const transportTargets: pino.TransportTargetOptions[] = [];

  if (mode.console) {
    if (config.NODE_ENV === 'development') {
      // In development, use pino-pretty for human-readable logs
      transportTargets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
          messageFormat: '{categoryLabel} | {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      // JSON on stdout for log processors
      transportTargets.push({
        level: 'trace',
        options: { destination: 1 },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: path.join(config.LOGGER_LOG_DIRNAME, config.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return transportTargets;
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): pino.Logger {
  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // In test mode, use a noop stream to completely suppress all output
  // and avoid spawning transport worker threads
  if (isTestEnvironment()) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets(transportMode, env);
  if (targets.length === 0) {
    return pino.pino({ ...pinoConfig, enabled: false });
  }

  if (transportMode.file) {
    ensureLogDirExists(env.LOGGER_LOG_DIRNAME);
  }

  return pino.pino({ ...pinoConfig, transport: { targets } });
}

/**
 * Get or create the underlying pino logger for a category.
 */
function getOrCreateCategoryLogger(category: string): pino.Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  rootLogger ??= createRootLogger();

  const categoryLogger = rootLogger.child(
    {
      category,
      categoryLabel: formatLabel(category, 25),
    },
    { level: env.LOGGER_LOG_LEVEL }
  );

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

function createLogMethod(category: string, level: LogLevel): LogMethod {
  return (contextOrMessage: object | string, message?: string): void => {
    const logger = getOrCreateCategoryLogger(category);
    if (typeof contextOrMessage === 'string') {
      logger[level](contextOrMessage);
    } else {
      logger[level](contextOrMessage, message);
    }
  };
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * Every call looks up the latest underlying pino logger, so loggers created at
 * module load follow `setLoggerTransports(...)`.
 */
export function getLogger(category: string): Logger {
  return {
    trace: createLogMethod(category, 'trace'),
    debug: createLogMethod(category, 'debug'),
    info: createLogMethod(category, 'info'),
    warn: createLogMethod(category, 'warn'),
    error: createLogMethod(category, 'error'),
    isLevelEnabled: (level) => getOrCreateCategoryLogger(category).isLevelEnabled(level),
  };
}

/**
 * Update transport mode at runtime.
 * Resets cached loggers so new configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

export function getLoggerTransports(): TransportMode {
  return { ...transportMode };
}
