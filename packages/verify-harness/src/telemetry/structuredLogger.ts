/**
 * Structured Logging Module
 *
 * Leveled logging with case context carried through child loggers.
 * Features:
 * - Log level filtering
 * - Text and JSON handlers
 * - Context inheritance via child loggers
 *
 * @example
 * ```typescript
 * const logger = createStructuredLogger({ level: 'debug' });
 * const caseLogger = logger.child({ testId: 1, direction: 'write', checksum: 'md5' });
 * caseLogger.debug('Invoking SUT', { args: 12 });
 * ```
 *
 * @module telemetry/structuredLogger
 */

// ============================================================================
// Types
// ============================================================================

/** Log severity levels */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Numeric priority for log levels (lower = more verbose) */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Context attached to every entry of a logger and its children.
 */
export interface CaseLogContext {
  /** Numeric case identifier */
  readonly testId?: number;
  /** Data direction of the case */
  readonly direction?: string;
  /** Checksum algorithm of the case */
  readonly checksum?: string;
  /** Mangle mode label for fault-injection cases */
  readonly mangle?: string;
  /** Additional custom fields */
  readonly [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly context: CaseLogContext;
  readonly data?: Readonly<Record<string, unknown>>;
  readonly error?: {
    readonly name: string;
    readonly message: string;
    readonly stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

export interface StructuredLoggerConfig {
  /** Minimum log level to emit (default: 'info') */
  readonly level?: LogLevel;
  /** Output handler (default: console) */
  readonly handler?: LogHandler;
  readonly context?: CaseLogContext;
  readonly now?: () => string;
}

export interface IStructuredLogger {
  child(context: CaseLogContext): IStructuredLogger;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

// ============================================================================
// Handlers
// ============================================================================

function formatForConsole(entry: LogEntry): string {
  const { timestamp, level, message, context, data, error } = entry;

  const contextParts: string[] = [];
  if (context.testId !== undefined) {
    contextParts.push(`test=${context.testId}`);
  }
  if (context.direction) {
    contextParts.push(`ddir=${context.direction}`);
  }
  if (context.mangle) {
    contextParts.push(`mangle=${context.mangle}`);
  }
  if (context.checksum) {
    contextParts.push(`csum=${context.checksum}`);
  }

  const contextStr = contextParts.length > 0 ? ` [${contextParts.join(" ")}]` : "";
  const dataStr = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  const errorStr = error ? ` (${error.name}: ${error.message})` : "";

  return `${timestamp} ${level.toUpperCase().padEnd(5)}${contextStr} ${message}${dataStr}${errorStr}`;
}

/** Console handler; everything goes to stderr so stdout stays reserved for results */
export const consoleHandler: LogHandler = (entry) => {
  console.error(formatForConsole(entry));
  if (entry.level === "error" && entry.error?.stack) {
    console.error(entry.error.stack);
  }
};

/** JSON handler for machine-readable output */
export const jsonHandler: LogHandler = (entry) => {
  console.error(JSON.stringify(entry));
};

// ============================================================================
// Implementation
// ============================================================================

export class StructuredLogger implements IStructuredLogger {
  private readonly level: LogLevel;
  private readonly levelPriority: number;
  private readonly handler: LogHandler;
  private readonly context: CaseLogContext;
  private readonly now: () => string;

  constructor(config: StructuredLoggerConfig = {}) {
    this.level = config.level ?? "info";
    this.levelPriority = LOG_LEVEL_PRIORITY[this.level];
    this.handler = config.handler ?? consoleHandler;
    this.context = config.context ?? {};
    this.now = config.now ?? (() => new Date().toISOString());
  }

  child(context: CaseLogContext): IStructuredLogger {
    return new StructuredLogger({
      level: this.level,
      handler: this.handler,
      now: this.now,
      context: { ...this.context, ...context },
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < this.levelPriority) {
      return;
    }

    this.handler({
      timestamp: this.now(),
      level,
      message,
      context: this.context,
      data,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
    });
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createStructuredLogger(config?: StructuredLoggerConfig): IStructuredLogger {
  return new StructuredLogger(config);
}

/**
 * Create a no-op logger that discards all messages.
 */
export function createNoopLogger(): IStructuredLogger {
  return new StructuredLogger({
    handler: () => {
      /* noop */
    },
    level: "error",
  });
}

// ============================================================================
// Log Buffer for Testing
// ============================================================================

/**
 * A log handler that buffers entries for test assertions.
 */
export class LogBuffer {
  private readonly entries: LogEntry[] = [];

  readonly handler: LogHandler = (entry) => {
    this.entries.push(entry);
  };

  getEntries(): readonly LogEntry[] {
    return [...this.entries];
  }

  findByMessage(substring: string): readonly LogEntry[] {
    return this.entries.filter((e) => e.message.includes(substring));
  }

  get length(): number {
    return this.entries.length;
  }
}
