import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import { randomUUID } from 'crypto';
import { appPaths } from '../config/appPaths';

// ============================================================================
// TypeScript Interfaces
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';
export type LogOutput = 'console' | 'file' | 'both';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Service name (e.g., "pattern-catalog", "tracker-importer") */
  service: string;

  /** Event type/name */
  event: string;

  /** Severity level */
  severity: LogLevel;

  /** ISO timestamp */
  timestamp: string;

  /** Operation correlation ID */
  trace_id?: string;

  /** Additional context-specific fields */
  [key: string]: unknown;
}

export interface LogEntry extends LogContext {
  /** Human-readable log message */
  message: string;

  /** Performance timing data (ms) */
  duration?: number;

  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };

  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** Overall logging level */
  level: LogLevel;

  /** Output format */
  format: LogFormat;

  /** Where entries go */
  output: LogOutput;

  /** Whether to include trace IDs */
  includeTrace: boolean;

  /** Log directory */
  logDir: string;

  /** Log file name */
  logFile: string;

  /** Service-specific log levels */
  serviceLevels?: Record<string, LogLevel>;
}

export interface PerformanceTimer {
  /** Start timestamp */
  startTime: number;

  /** Operation description */
  operation: string;

  /** Trace ID */
  traceId?: string;

  /** Additional context */
  context?: Record<string, unknown>;

  /** End the timer and log duration */
  end(additionalContext?: Record<string, unknown>): number;
}

// ============================================================================
// Environment Configuration
// ============================================================================

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

const parseOutput = (value: string | undefined): LogOutput =>
  value === 'file' || value === 'both' ? value : 'console';

const parseServiceLevels = (env?: string): Record<string, LogLevel> => {
  if (!env) return {};

  const levels: Record<string, LogLevel> = {};
  env.split(',').forEach(pair => {
    const [service, level] = pair.trim().split('=');
    if (service && isLogLevel(level)) {
      levels[service.trim()] = level;
    }
  });
  return levels;
};

const getConfig = (): LoggerConfig => {
  const level = process.env.LOG_LEVEL?.toLowerCase();

  return {
    level: isLogLevel(level) ? level : 'info',
    format: process.env.LOG_FORMAT === 'text' ? 'text' : 'json',
    output: parseOutput(process.env.LOG_OUTPUT),
    includeTrace: process.env.LOG_INCLUDE_TRACE !== 'false',
    logDir: resolve(process.env.LOG_DIR || appPaths.logsDir),
    logFile: process.env.LOG_FILE || 'droidmeta.log',
    serviceLevels: parseServiceLevels(process.env.SERVICE_LOG_LEVELS)
  };
};

// ============================================================================
// Logger Implementation
// ============================================================================

class StructuredLogger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...getConfig(), ...config };
  }

  private get logFilePath(): string {
    return resolve(this.config.logDir, this.config.logFile);
  }

  /**
   * Generate a new trace ID
   */
  generateTraceId(): string {
    return randomUUID().replace(/-/g, '').substring(0, 16);
  }

  /**
   * Create a performance timer for measuring operation duration
   */
  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    const startTime = Date.now();

    return {
      startTime,
      operation,
      traceId,
      context,
      end: (additionalContext?: Record<string, unknown>) => {
        const duration = Date.now() - startTime;

        this.logEntry({
          service: 'performance-monitor',
          event: 'operation_duration',
          severity: 'debug',
          timestamp: new Date().toISOString(),
          trace_id: traceId,
          operation,
          duration,
          message: `Operation ${operation} completed in ${duration}ms`,
          ...context,
          ...additionalContext
        });

        return duration;
      }
    };
  }

  /**
   * Check if a log level should be filtered out
   */
  private shouldLog(service: string, severity: LogLevel): boolean {
    const configLevel = this.config.serviceLevels?.[service] || this.config.level;
    return LOG_LEVELS.indexOf(severity) >= LOG_LEVELS.indexOf(configLevel);
  }

  /**
   * Format log entry based on configuration
   */
  format(entry: LogEntry): string {
    if (this.config.format === 'text') {
      const parts = [
        `[${entry.timestamp}]`,
        `[${entry.severity.toUpperCase()}]`,
        entry.service,
        entry.event,
        entry.message
      ];

      if (entry.trace_id && this.config.includeTrace) {
        parts.push(`[trace:${entry.trace_id}]`);
      }

      if (entry.duration) {
        parts.push(`(${entry.duration}ms)`);
      }

      let formatted = parts.join(' ');

      if (entry.error) {
        formatted += ` Error: ${entry.error.name}: ${entry.error.message}`;
      }

      if (entry.metadata && Object.keys(entry.metadata).length > 0) {
        formatted += ` ${JSON.stringify(entry.metadata)}`;
      }

      return formatted;
    }

    const jsonEntry = { ...entry };

    if (!this.config.includeTrace && jsonEntry.trace_id) {
      delete jsonEntry.trace_id;
    }

    return JSON.stringify(jsonEntry);
  }

  /**
   * Write log entry to the configured destinations
   */
  private write(formattedEntry: string, severity: LogLevel): void {
    if (this.config.output !== 'console') {
      try {
        if (!existsSync(this.config.logDir)) {
          mkdirSync(this.config.logDir, { recursive: true });
        }
        appendFileSync(this.logFilePath, formattedEntry + '\n');
      } catch (error) {
        console.error('Failed to write to log file:', error);
      }
    }

    if (this.config.output === 'file') {
      return;
    }

    if (severity === 'error') {
      console.error(formattedEntry);
    } else if (severity === 'warn') {
      console.warn(formattedEntry);
    } else {
      console.log(formattedEntry);
    }
  }

  /**
   * Internal log method
   */
  logEntry(entry: LogEntry): void {
    if (!this.shouldLog(entry.service, entry.severity)) {
      return;
    }

    this.write(this.format(entry), entry.severity);
  }

  private emit(
    severity: LogLevel,
    service: string,
    event: string,
    message: string,
    traceId?: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    this.logEntry({
      service,
      event,
      severity,
      timestamp: new Date().toISOString(),
      trace_id: this.config.includeTrace ? traceId : undefined,
      message,
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
          ? error.code
          : undefined
      } : undefined
    });
  }

  debug(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', service, event, message, traceId, metadata);
  }

  info(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('info', service, event, message, traceId, metadata);
  }

  warn(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', service, event, message, traceId, metadata);
  }

  error(service: string, event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('error', service, event, message, traceId, metadata, error);
  }

  /**
   * Get current configuration
   */
  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Update configuration
   */
  updateConfig(updates: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...updates };
  }
}

// ============================================================================
// Service-Specific Logger Factory
// ============================================================================

class ServiceLogger {
  constructor(
    private logger: StructuredLogger,
    private serviceName: string
  ) {}

  /**
   * Generate a trace ID for this service
   */
  generateTraceId(): string {
    return this.logger.generateTraceId();
  }

  /**
   * Start a performance timer for this service
   */
  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    return this.logger.startTimer(`${this.serviceName}:${operation}`, traceId, context);
  }

  debug(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.debug(this.serviceName, event, message, traceId, metadata);
  }

  info(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.info(this.serviceName, event, message, traceId, metadata);
  }

  warn(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(this.serviceName, event, message, traceId, metadata);
  }

  error(event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.error(this.serviceName, event, message, error, traceId, metadata);
  }
}

// ============================================================================
// Export Instances
// ============================================================================

const structuredLogger = new StructuredLogger();

export const createServiceLogger = (serviceName: string): ServiceLogger => {
  return new ServiceLogger(structuredLogger, serviceName);
};

export const logger = {
  createServiceLogger,

  startTimer: (operation: string, traceId?: string, context?: Record<string, unknown>) => {
    return structuredLogger.startTimer(operation, traceId, context);
  },

  generateTraceId: () => structuredLogger.generateTraceId(),

  getConfig: () => structuredLogger.getConfig(),
  updateConfig: (updates: Partial<LoggerConfig>) => structuredLogger.updateConfig(updates)
};

export { StructuredLogger, ServiceLogger };
