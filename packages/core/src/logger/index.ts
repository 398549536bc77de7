export {
  ConsoleLogger,
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  logger,
  setDefaultLogLevel,
} from './logger';
export type { LogLevel, Logger } from './logger';
