export { getLogger, resetLoggers, setLogLevel, formatLabel, buildTransportTargets, type Logger } from './pino-logger.js';
export { loggerEnvSchema, validateLoggerEnv, LOG_LEVELS, type LoggerEnvConfig } from './env.schema.js';
