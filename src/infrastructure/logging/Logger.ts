/**
 * Structured Logger
 *
 * Levelled, categorised logging for the orchestrator. Text output for terminals,
 * JSON lines for log shippers.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  context?: LogContext;
}

export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  minLevel: LogLevel;
  /** Whether to include timestamps (default: false) */
  includeTimestamp: boolean;
  /** Whether to use colors in console output (default: true) */
  useColors: boolean;
  /** Whether to output as JSON (default: false) */
  jsonOutput: boolean;
  /** Custom log handler */
  customHandler?: (entry: LogEntry) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const CATEGORY_COLORS: Record<string, string> = {
  Pool: '\x1b[35m', // Magenta
  Scheduler: '\x1b[34m', // Blue
  Health: '\x1b[33m', // Yellow
  Engine: '\x1b[32m', // Green
  Batch: '\x1b[36m', // Cyan
  Shutdown: '\x1b[31m', // Red
  Event: '\x1b[90m', // Gray
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  includeTimestamp: false,
  useColors: true,
  jsonOutput: false,
};

/**
 * Global logger configuration, read at log time so loggers created
 * before configuration is loaded still honour it.
 */
let globalConfig: Partial<LoggerConfig> = {};

/**
 * Structured logger with levels and categories.
 */
export class Logger {
  private overrides: Partial<LoggerConfig>;
  private category: string;

  constructor(category: string, config: Partial<LoggerConfig> = {}) {
    this.category = category;
    this.overrides = { ...config };
  }

  private get config(): LoggerConfig {
    return { ...DEFAULT_CONFIG, ...globalConfig, ...this.overrides };
  }

  /**
   * Set the minimum log level for this logger.
   */
  setLevel(level: LogLevel): void {
    this.overrides.minLevel = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const config = this.config;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category: this.category,
      message,
      context,
    };

    if (config.customHandler) {
      config.customHandler(entry);
      return;
    }

    if (config.jsonOutput) {
      this.outputJson(entry);
    } else {
      this.outputText(entry, config);
    }
  }

  private outputJson(entry: LogEntry): void {
    const line = JSON.stringify(entry);
    if (entry.level === 'error') {
      // eslint-disable-next-line no-console
      console.error(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  }

  private outputText(entry: LogEntry, config: LoggerConfig): void {
    const parts: string[] = [];

    if (config.includeTimestamp) {
      const time = entry.timestamp.split('T')[1].split('.')[0];
      parts.push(config.useColors ? `${DIM}${time}${RESET}` : time);
    }

    const levelColor = config.useColors ? LOG_COLORS[entry.level] : '';
    const categoryColor = config.useColors
      ? CATEGORY_COLORS[entry.category.split(':')[0]] || '\x1b[37m'
      : '';

    if (config.useColors) {
      parts.push(`${categoryColor}[${entry.category}]${RESET}`);
    } else {
      parts.push(`[${entry.category}]`);
    }

    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      const contextStr = Object.entries(entry.context)
        .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
        .join(' ');
      parts.push(config.useColors ? `${DIM}(${contextStr})${RESET}` : `(${contextStr})`);
    }

    const output = parts.join(' ');

    switch (entry.level) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(config.useColors ? `${levelColor}${output}${RESET}` : output);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(config.useColors ? `${levelColor}${output}${RESET}` : output);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(output);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Create a child logger with a sub-category.
   */
  child(subCategory: string): Logger {
    return new Logger(`${this.category}:${subCategory}`, this.overrides);
  }
}

/**
 * Set global logger configuration.
 */
export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalConfig = config;
}

/**
 * Get a logger for a category.
 */
export function getLogger(category: string): Logger {
  return new Logger(category);
}

/**
 * Loggers for common categories.
 */
export const loggers = {
  pool: getLogger('Pool'),
  scheduler: getLogger('Scheduler'),
  health: getLogger('Health'),
  engine: getLogger('Engine'),
  batch: getLogger('Batch'),
  event: getLogger('Event'),
};
