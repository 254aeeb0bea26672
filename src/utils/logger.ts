/**
 * Structured logging utility.
 *
 * Provides consistent logging across the include-directory pipeline with
 * JSON-formatted output on stderr.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information for debugging
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "CompilerProbe"
   */
  readonly component: string;

  /**
   * Brief description of the logged event.
   * @example "probe_started"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { compiler: "/usr/bin/gcc", language: "c++" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   * Appears in all log entries to identify the source.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /** Function to get current timestamp (injectable for testing). */
  readonly now?: () => Date;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'CompilerProbe', debugMode: true });
 * logger.info('probe_started', { compiler: 'gcc' });
 * logger.error('probe_failed', { exitCode: 1 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly now: () => Date;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, now: this.now });
  }

  /**
   * Logs a debug-level message. Only output when debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, falling back to a marker when its data cannot be
 * represented as JSON (cycles, BigInt).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { timestamp, level, component, event } = entry;
    return JSON.stringify({
      timestamp,
      level,
      component,
      event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Default logger for library callers that don't supply their own.
 */
export const logger = new Logger({ component: 'IncludeDirectories', debugMode: false });
