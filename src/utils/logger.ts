/**
 * Structured logging utility for the header generation pipeline.
 *
 * Every pipeline stage logs JSON lines to stderr under its own component
 * name, so generated header text on stdout stays clean.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information (only with debug mode)
 * - `info`: Stage progress
 * - `warn`: Non-fatal conditions such as ignored attributes or pruned references
 * - `error`: Fatal pipeline failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "specialization"
   */
  readonly component: string;

  /**
   * Short event identifier.
   * @example "instantiation_created"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { entity: "Pair", mangled: "Pair_i32" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Where serialized lines go. Defaults to `process.stderr`.
   */
  readonly sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ir-builder', debugMode: true });
 * logger.warn('attribute_ignored', { entity: 'Config', attribute: 'serde' });
 * const child = logger.child('ordering');
 * child.info('order_computed', { types: 12 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Creates a logger for another component that shares this logger's sink and debug mode.
   *
   * @param component - Component name for the new logger.
   * @returns The derived logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /**
   * Whether debug-level entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
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

  /** Logs an info-level message. */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /** Logs a warning-level message. */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /** Logs an error-level message. */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line + '\n');
  }
}

/**
 * Logger that drops every entry; used where callers do not pass one.
 */
export const silentLogger = new Logger({ component: 'silent', sink: () => undefined });
