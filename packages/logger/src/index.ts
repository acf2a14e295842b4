export { getLogger, resetLoggers, setLoggerTransports, type Logger } from './pino-logger.js';
export { LOG_LEVELS, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
