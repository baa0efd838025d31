/**
 * Structured logging utility.
 *
 * Emits one JSON object per line so that verification runs, oracle calls and
 * CLI sessions can be grepped and aggregated the same way.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information (oracle programs, raw responses)
 * - `info`: Normal lifecycle events (run started, verdict reached)
 * - `warn`: Recoverable problems (malformed proposal, transport failure)
 * - `error`: Failures that end a run
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
  /** Severity level of the entry. */
  readonly level: LogLevel;
  /**
   * Component that produced the entry.
   * @example "VerificationController"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "verdict_reached"
   */
  readonly event: string;
  /** JSON-serializable context. */
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
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /**
   * Where serialized lines go. Defaults to stderr so that stdout stays free
   * for verdicts and transcripts.
   */
  readonly sink?: LogSink;
  /** Clock used for timestamps (injectable for testing). */
  readonly now?: () => Date;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that writes JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'WolframResolutionOracle', debugMode: true });
 * logger.info('oracle_call', { transport: 'local', kind: 'forall' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? stderrSink;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Returns a logger for another component that shares this logger's sink,
   * clock and debug setting.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      sink: this.sink,
      now: this.now,
    });
  }

  /** Whether debug-level entries are written. */
  isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
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

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values end up here.
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line + '\n');
  }
}

/**
 * A logger that discards everything. Used where a component is constructed
 * without an explicit logger.
 */
export function createSilentLogger(component: string): Logger {
  return new Logger({
    component,
    sink: () => {
      // discarded
    },
  });
}
