export {
  buildTransportTargets,
  formatLabel,
  getLogger,
  getLoggerTransports,
  setLoggerTransports,
  type Logger,
  type LogMethod,
  type TransportMode,
} from './pino-logger.js';
export { LOG_LEVELS, loggerEnvSchema, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
