/**
 * Structured logging for custody nodes.
 *
 * Each component logs under a module name. A node creates one root logger
 * named after its node id, and components derive theirs with
 * {@link Logger.child}, so entries read `node-a:Replicator`.
 *
 * @module logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
  readonly error?: { message: string; stack?: string };
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Logger for a sub-module, named `<module>:<subModule>` */
  child(subModule: string): Logger;
}

/** Logger configuration */
export interface LoggerOptions {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Module name */
  readonly module?: string;
  /** Custom log handler (default: one console line per entry) */
  readonly handler?: (entry: LogEntry) => void;
  /** Write entries to the console as JSON instead of text */
  readonly json?: boolean;
  /** Enable logging (default: false under NODE_ENV=test) */
  readonly enabled?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

/**
 * Render an entry as one text line.
 */
export function formatLogEntry(entry: LogEntry): string {
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  const error = entry.error ? ` (${entry.error.message})` : '';
  return `${new Date(entry.timestamp).toISOString()} ${entry.level.toUpperCase()} [${entry.module}] ${entry.message}${context}${error}`;
}

function writeToConsole(entry: LogEntry, json: boolean): void {
  const consoleFn =
    entry.level === 'error' ? console.error : entry.level === 'warn' ? console.warn : console.log;
  consoleFn(json ? JSON.stringify(entry) : formatLogEntry(entry));
}

/**
 * Structured logger for ledger components.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'node-a', level: 'debug' });
 * const replicatorLog = log.child('Replicator');
 *
 * replicatorLog.warn('Peer unreachable', { peer: 'http://10.0.0.2:5000' });
 * ```
 */
export class LedgerLogger implements Logger {
  private readonly config: Required<Omit<LoggerOptions, 'handler'>> & Pick<LoggerOptions, 'handler'>;

  constructor(config: LoggerOptions = {}) {
    this.config = {
      level: config.level ?? 'info',
      module: config.module ?? 'custody',
      handler: config.handler,
      json: config.json ?? false,
      enabled: config.enabled ?? process.env.NODE_ENV !== 'test',
    };
  }

  child(subModule: string): LedgerLogger {
    return new LedgerLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.config.enabled) return;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.config.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
      ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }
    writeToConsole(entry, this.config.json);
  }
}

/** Factory function to create a {@link LedgerLogger} */
export function createLogger(options?: LoggerOptions): LedgerLogger {
  return new LedgerLogger(options);
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};

/**
 * Logger setting accepted by components: options for a new logger,
 * a parent logger, or `false` to disable logging.
 */
export type LoggerSetting = LoggerOptions | Logger | false;

/**
 * Resolve a component's logger setting.
 *
 * A parent logger is scoped with `child(module)`; options build a new
 * logger named `module`.
 */
export function resolveLogger(setting: LoggerSetting | undefined, module: string): Logger {
  if (setting === false) {
    return noopLogger;
  }
  if (setting && 'child' in setting) {
    return setting.child(module);
  }
  return createLogger({ ...setting, module });
}
