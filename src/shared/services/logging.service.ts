/**
 * Logging Service
 *
 * Structured logging for the database, loaders, writers and server.
 * Entries go to stderr until an MCP server is attached, then they are
 * forwarded as notifications/message.
 */

import { ErrorSeverity } from '../errors/error-codes.js';

/**
 * Log level type matching MCP specification (RFC 5424)
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

// Severity order matching RFC 5424
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
 * Check whether a string names a known log level
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

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
}

/**
 * MCP Notification sender interface
 */
export interface McpNotificationSender {
  sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void>;
}

/**
 * Logging Service
 *
 * Keeps a bounded history of recent entries so tests and diagnostics can
 * inspect what was logged.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private entries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly loggerName: string;
  private sender: McpNotificationSender | null = null;

  constructor(minLevel: LogLevel = 'info', maxEntries = 500, loggerName = 'neo-approach-db') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
  }

  /**
   * Route entries through an MCP server instead of stderr
   */
  setMcpServer(sender: McpNotificationSender | null): void {
    this.sender = sender;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  getLoggerName(): string {
    return this.loggerName;
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
   * Log at the level that corresponds to an error severity
   */
  logAtSeverity(
    severity: ErrorSeverity,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    this.log(LoggingService.severityToLogLevel(severity), message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) {
      return;
    }

    const entry: LogEntry = { level, message, timestamp: Date.now(), context, error };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    if (this.sender) {
      void this.forward(this.sender, entry);
    } else {
      this.outputToConsole(entry);
    }
  }

  private async forward(sender: McpNotificationSender, entry: LogEntry): Promise<void> {
    const data: Record<string, unknown> = {
      message: entry.message,
      timestamp: new Date(entry.timestamp).toISOString(),
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      data.context = entry.context;
    }

    if (entry.error) {
      data.error = {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      };
    }

    try {
      await sender.sendLoggingMessage({ level: entry.level, logger: this.loggerName, data });
    } catch (error) {
      // Don't route through log() here, it would recurse
      console.error('[LoggingService] Failed to send MCP notification:', error);
      this.outputToConsole(entry);
    }
  }

  /**
   * Write an entry to stderr; stdout carries the MCP protocol
   */
  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    let output = `[${timestamp}] ${entry.level.toUpperCase().padEnd(9)} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }

  /**
   * Get recent log entries, newest last
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    const floor = minLevel ? LOG_LEVELS[minLevel] : 0;
    return this.entries.filter((entry) => LOG_LEVELS[entry.level] >= floor).slice(-count);
  }

  clearLogs(): void {
    this.entries = [];
  }

  static severityToLogLevel(severity: ErrorSeverity): LogLevel {
    switch (severity) {
      case ErrorSeverity.DEBUG:
        return 'debug';
      case ErrorSeverity.INFO:
        return 'info';
      case ErrorSeverity.WARNING:
        return 'warning';
      case ErrorSeverity.ERROR:
        return 'error';
      case ErrorSeverity.CRITICAL:
        return 'critical';
      default:
        return 'info';
    }
  }
}

let globalLogger: LoggingService | null = null;

/**
 * Get or create the process-wide logger. The level comes from LOG_LEVEL.
 */
export function getLogger(): LoggingService {
  if (!globalLogger) {
    const envLevel = process.env.LOG_LEVEL;
    globalLogger = new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return globalLogger;
}

/**
 * Replace the process-wide logger
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}
