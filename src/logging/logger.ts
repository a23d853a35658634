export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface Logger {
  trace: (msg: string, ...args: unknown[]) => void;
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
  /** Return a child logger with a namespace/prefix */
  child: (namespace: string) => Logger;
}

class NoopLogger implements Logger {
  trace() {}
  debug() {}
  info() {}
  warn() {}
  error() {}
  child() { return this; }
}

/**
 * The converter is silent unless a consumer installs a logger with setLogger(...).
 * Loggers are resolved per call, so modules may hold on to the result of getLogger.
 */
let currentLogger: Logger = new NoopLogger();

export function setLogger(logger: Logger | null | undefined) {
  currentLogger = logger ?? new NoopLogger();
}

class DeferredLogger implements Logger {
  constructor(private ns?: string) {}
  private target(): Logger { return this.ns ? currentLogger.child(this.ns) : currentLogger; }
  trace(msg: string, ...args: unknown[]) { this.target().trace(msg, ...args); }
  debug(msg: string, ...args: unknown[]) { this.target().debug(msg, ...args); }
  info(msg: string, ...args: unknown[]) { this.target().info(msg, ...args); }
  warn(msg: string, ...args: unknown[]) { this.target().warn(msg, ...args); }
  error(msg: string, ...args: unknown[]) { this.target().error(msg, ...args); }
  child(namespace: string): Logger {
    return new DeferredLogger(this.ns ? `${this.ns}:${namespace}` : namespace);
  }
}

export function getLogger(namespace?: string): Logger {
  return new DeferredLogger(namespace);
}

/** Console-backed logger, installed by the CLI. */
export class ConsoleLogger implements Logger {
  private prefix: string;
  constructor(namespace?: string) {
    this.prefix = namespace ? `[${namespace}]` : '';
  }
  private pre(msg: string) { return this.prefix ? `${this.prefix} ${msg}` : msg; }
  trace(msg: string, ...args: unknown[]) { console.debug(this.pre(msg), ...args); }
  debug(msg: string, ...args: unknown[]) { console.debug(this.pre(msg), ...args); }
  info(msg: string, ...args: unknown[]) { console.info(this.pre(msg), ...args); }
  warn(msg: string, ...args: unknown[]) { console.warn(this.pre(msg), ...args); }
  error(msg: string, ...args: unknown[]) { console.error(this.pre(msg), ...args); }
  child(namespace: string): Logger { return new ConsoleLogger(namespace); }
}

export interface LogEntry {
  level: LogLevel;
  namespace?: string;
  message: string;
  args: unknown[];
}

/** Keeps every entry in memory; handy for asserting on diagnostics. */
export class MemoryLogger implements Logger {
  constructor(readonly entries: LogEntry[] = [], private ns?: string) {}
  private push(level: LogLevel, message: string, args: unknown[]) {
    this.entries.push({ level, namespace: this.ns, message, args });
  }
  trace(msg: string, ...args: unknown[]) { this.push('trace', msg, args); }
  debug(msg: string, ...args: unknown[]) { this.push('debug', msg, args); }
  info(msg: string, ...args: unknown[]) { this.push('info', msg, args); }
  warn(msg: string, ...args: unknown[]) { this.push('warn', msg, args); }
  error(msg: string, ...args: unknown[]) { this.push('error', msg, args); }
  child(namespace: string): Logger { return new MemoryLogger(this.entries, namespace); }
  at(level: LogLevel): LogEntry[] { return this.entries.filter(e => e.level === level); }
}

const levelRank: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

class LevelFilterLogger implements Logger {
  constructor(private inner: Logger, private min: LogLevel) {}
  private allow(level: LogLevel) { return levelRank[level] >= levelRank[this.min]; }
  trace(msg: string, ...args: unknown[]) { if (this.allow('trace')) this.inner.trace(msg, ...args); }
  debug(msg: string, ...args: unknown[]) { if (this.allow('debug')) this.inner.debug(msg, ...args); }
  info(msg: string, ...args: unknown[]) { if (this.allow('info')) this.inner.info(msg, ...args); }
  warn(msg: string, ...args: unknown[]) { if (this.allow('warn')) this.inner.warn(msg, ...args); }
  error(msg: string, ...args: unknown[]) { if (this.allow('error')) this.inner.error(msg, ...args); }
  child(namespace: string): Logger { return new LevelFilterLogger(this.inner.child(namespace), this.min); }
}

/** Wrap an existing logger with a minimum level threshold */
export function withMinLevel(logger: Logger, min: LogLevel): Logger {
  return new LevelFilterLogger(logger, min);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function parseLogLevel(value: string): LogLevel {
  const v = value.trim().toLowerCase();
  if (!isLogLevel(v)) {
    throw new RangeError(`Unknown log level "${value}" (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return v;
}
