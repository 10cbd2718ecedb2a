export type { Logger, LogConfig, LogLevel, LogFormat, LogWriter } from './logging.js';
export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  isLogLevel,
  DEFAULT_LOG_CONFIG,
  LOG_LEVELS,
} from './logging.js';
