export type { Logger, LogLevel, LogConfig } from './logging.js';
export { ConsoleLogger, NoopLogger, createLogger, DEFAULT_LOG_CONFIG, LOG_LEVELS } from './logging.js';
