/**
 * Structured logging for the image cache
 * Writes formatted lines to stderr and forwards structured entries to an
 * optional sink, using RFC 5424 log levels
 */

/**
 * RFC 5424 log levels
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  NOTICE = "notice",
  WARNING = "warning",
  ERROR = "error",
  CRITICAL = "critical",
  ALERT = "alert",
  EMERGENCY = "emergency",
}

/**
 * Numeric values for log levels (for comparison)
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.NOTICE]: 2,
  [LogLevel.WARNING]: 3,
  [LogLevel.ERROR]: 4,
  [LogLevel.CRITICAL]: 5,
  [LogLevel.ALERT]: 6,
  [LogLevel.EMERGENCY]: 7,
};

/**
 * Context information for log entries
 */
export interface LogContext {
  operation?: string;
  service?: string;
  identifier?: string;
  duration?: number;
  metadata?: Record<string, unknown>;
  timestamp?: Date;
}

/**
 * Performance metrics data
 */
export interface PerformanceMetrics {
  operation: string;
  duration: number;
  startTime: Date;
  endTime: Date;
  success: boolean;
  errorType?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  context: LogContext;
  timestamp: Date;
  data?: Record<string, unknown>;
}

/**
 * Receives every entry that passes the level filter
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  minLevel: LogLevel;
  enableStderr: boolean;
  includeTimestamp: boolean;
  includeContext: boolean;
  maxContextDepth: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  enableStderr: true,
  includeTimestamp: true,
  includeContext: true,
  maxContextDepth: 3,
};

export class Logger {
  private config: LoggerConfig;
  private sink?: LogSink;
  private performanceMetrics: PerformanceMetrics[] = [];
  private readonly maxMetricsHistory = 1000;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Forward structured entries to a sink (pass undefined to detach)
   */
  setSink(sink: LogSink | undefined): void {
    this.sink = sink;
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.minLevel];
  }

  /**
   * Format log entry for stderr output
   */
  formatEntry(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);

    if (entry.logger) {
      parts.push(`[${entry.logger}]`);
    }

    parts.push(entry.message);

    if (this.config.includeContext) {
      const contextParts: string[] = [];

      if (entry.context.operation) {
        contextParts.push(`op=${entry.context.operation}`);
      }

      if (entry.context.service) {
        contextParts.push(`svc=${entry.context.service}`);
      }

      if (entry.context.identifier) {
        contextParts.push(`id=${entry.context.identifier}`);
      }

      if (entry.context.duration !== undefined) {
        contextParts.push(`dur=${entry.context.duration}ms`);
      }

      if (contextParts.length > 0) {
        parts.push(`{${contextParts.join(", ")}}`);
      }
    }

    if (entry.data) {
      const serializedData = this.serializeData(entry.data);
      if (serializedData) {
        parts.push(`data=${serializedData}`);
      }
    }

    return parts.join(" ");
  }

  /**
   * Serialize data for logging with depth control
   */
  private serializeData(data: unknown, depth = 0): string {
    if (depth >= this.config.maxContextDepth) {
      return "[max depth reached]";
    }

    if (data === null || data === undefined) {
      return String(data);
    }

    if (
      typeof data === "string" ||
      typeof data === "number" ||
      typeof data === "boolean"
    ) {
      return String(data);
    }

    if (data instanceof Error) {
      return `Error: ${data.message}`;
    }

    if (data instanceof Date) {
      return data.toISOString();
    }

    if (Buffer.isBuffer(data)) {
      return `[Buffer(${data.length})]`;
    }

    if (Array.isArray(data)) {
      if (data.length === 0) return "[]";
      if (data.length > 5) return `[Array(${data.length})]`;
      return `[${data.map(item => this.serializeData(item, depth + 1)).join(", ")}]`;
    }

    if (typeof data === "object") {
      const entries = Object.entries(data);
      if (entries.length === 0) return "{}";
      if (entries.length > 10) return `{Object(${entries.length} keys)}`;

      const pairs = entries.map(
        ([key, value]) => `${key}: ${this.serializeData(value, depth + 1)}`,
      );

      return `{${pairs.join(", ")}}`;
    }

    return String(data);
  }

  private writeToStderr(entry: LogEntry): void {
    if (!this.config.enableStderr) return;
    console.error(this.formatEntry(entry));
  }

  private forwardToSink(entry: LogEntry): void {
    if (!this.sink) return;

    try {
      this.sink(entry);
    } catch (error) {
      console.error(
        `[LOGGER] Log sink failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Core logging method
   */
  private log(
    level: LogLevel,
    message: string,
    context: LogContext = {},
    logger?: string,
    data?: Record<string, unknown>,
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      message,
      logger,
      context: {
        ...context,
        timestamp: context.timestamp || new Date(),
      },
      timestamp: new Date(),
      data,
    };

    this.writeToStderr(entry);
    this.forwardToSink(entry);
  }

  debug(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.DEBUG, message, context, undefined, data);
  }

  info(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.INFO, message, context, undefined, data);
  }

  notice(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.NOTICE, message, context, undefined, data);
  }

  warning(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.WARNING, message, context, undefined, data);
  }

  error(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.ERROR, message, context, undefined, data);
  }

  critical(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.CRITICAL, message, context, undefined, data);
  }

  /**
   * Record performance metrics
   */
  recordPerformance(metrics: PerformanceMetrics, loggerName?: string): void {
    this.performanceMetrics.push(metrics);

    if (this.performanceMetrics.length > this.maxMetricsHistory) {
      this.performanceMetrics = this.performanceMetrics.slice(
        -this.maxMetricsHistory,
      );
    }

    const message = `Performance: ${metrics.operation} ${metrics.success ? "completed" : "failed"} in ${metrics.duration}ms`;

    this.log(
      LogLevel.DEBUG,
      message,
      {
        operation: metrics.operation,
        duration: metrics.duration,
        metadata: {
          success: metrics.success,
          errorType: metrics.errorType,
          ...metrics.metadata,
        },
      },
      loggerName ?? "performance",
    );
  }

  /**
   * Get performance metrics summary
   */
  getPerformanceMetrics(): {
    total: number;
    successful: number;
    failed: number;
    averageDuration: number;
    recentMetrics: PerformanceMetrics[];
  } {
    const successful = this.performanceMetrics.filter(m => m.success).length;
    const failed = this.performanceMetrics.length - successful;
    const averageDuration =
      this.performanceMetrics.length > 0
        ? this.performanceMetrics.reduce((sum, m) => sum + m.duration, 0) /
          this.performanceMetrics.length
        : 0;

    return {
      total: this.performanceMetrics.length,
      successful,
      failed,
      averageDuration: Math.round(averageDuration * 100) / 100,
      recentMetrics: this.performanceMetrics.slice(-10),
    };
  }

  /**
   * @internal
   */
  _logInternal(
    level: LogLevel,
    message: string,
    context?: LogContext,
    loggerName?: string,
    data?: Record<string, unknown>,
  ): void {
    this.log(level, message, context, loggerName, data);
  }

  child(loggerName: string): ChildLogger {
    return new ChildLogger(this, loggerName);
  }

  startTimer(
    operation: string,
    metadata?: Record<string, unknown>,
    loggerName?: string,
  ): PerformanceTimer {
    return new PerformanceTimer(this, operation, metadata, loggerName);
  }
}

/**
 * Child logger with a predefined logger name
 */
export class ChildLogger {
  constructor(
    private parent: Logger,
    private loggerName: string,
  ) {}

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.parent._logInternal(level, message, context, this.loggerName, data);
  }

  debug(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  info(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.INFO, message, context, data);
  }

  notice(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.NOTICE, message, context, data);
  }

  warning(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.WARNING, message, context, data);
  }

  error(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.ERROR, message, context, data);
  }

  critical(
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.CRITICAL, message, context, data);
  }

  startTimer(
    operation: string,
    metadata?: Record<string, unknown>,
  ): PerformanceTimer {
    return this.parent.startTimer(operation, metadata, this.loggerName);
  }
}

/**
 * Performance timer utility
 */
export class PerformanceTimer {
  private startTime: Date;

  constructor(
    private logger: Logger,
    private operation: string,
    private metadata?: Record<string, unknown>,
    private loggerName?: string,
  ) {
    this.startTime = new Date();
  }

  /**
   * End the timer and record performance metrics
   */
  end(success = true, errorType?: string): PerformanceMetrics {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    const metrics: PerformanceMetrics = {
      operation: this.operation,
      duration,
      startTime: this.startTime,
      endTime,
      success,
      errorType,
      metadata: this.metadata,
    };

    this.logger.recordPerformance(metrics, this.loggerName);
    return metrics;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

export function createLogger(loggerName: string): ChildLogger {
  return logger.child(loggerName);
}

/**
 * Render a caught value for the `data` field of a log entry
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    return code ? { error: error.message, code } : { error: error.message };
  }
  return { error: String(error) };
}
