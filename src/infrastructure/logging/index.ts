export {
  Logger,
  getLogger,
  setGlobalLoggerConfig,
  loggers,
} from './Logger';
export type { LogLevel, LogContext, LogEntry, LoggerConfig } from './Logger';
