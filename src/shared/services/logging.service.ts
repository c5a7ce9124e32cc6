/**
 * Logging Service
 *
 * Structured logging for the capture layer. Output goes to stderr so it
 * never mixes with a test runner's stdout reporter.
 */

/**
 * Log level type (RFC 5424 severities)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
  alert(message: string, error?: Error, context?: Record<string, unknown>): void;
  emergency(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Receives formatted log output. Defaults to console.error.
 */
export type LogWriter = (output: string, entry: LogEntry) => void;

// Log level hierarchy matching RFC 5424 severity levels
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

/**
 * Narrow an arbitrary string (e.g. an env var) to a LogLevel.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const consoleWriter: LogWriter = (output) => {
  console.error(output);
};

/**
 * Logging Service
 *
 * Centralized logging with a configurable minimum level and a bounded
 * history of recent entries.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly loggerName: string;
  private writer: LogWriter = consoleWriter;

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000, loggerName = 'netcapture') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
  }

  /**
   * Replace the output writer (e.g. to route into a reporter)
   */
  setWriter(writer: LogWriter): void {
    this.writer = writer;
  }

  /**
   * Set minimum log level
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log a notice message (normal but significant)
   */
  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  /**
   * Log an alert message (action must be taken immediately)
   */
  alert(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('alert', message, context, error);
  }

  /**
   * Log an emergency message (system is unusable)
   */
  emergency(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('emergency', message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context,
      error,
    };

    this.logEntries.push(entry);

    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    this.writer(this.format(entry), entry);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  /**
   * Render an entry as the multi-line text written to stderr
   */
  private format(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(8);

    let output = `[${timestamp}] ${levelStr} [${this.loggerName}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return output;
  }

  /**
   * Get recent log entries
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minLevelValue = LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LOG_LEVELS[entry.level] >= minLevelValue);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  if (!globalLogger) {
    const envLevel = process.env.NETCAPTURE_LOG_LEVEL;
    globalLogger = new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}
