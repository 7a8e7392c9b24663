/**
 * Structured Logging System
 *
 * Leveled logging with contextual metadata. Output goes to a pluggable sink,
 * so the logger is passed to whatever needs it instead of living in a global.
 */

import chalk from 'chalk';

/**
 * Log severity levels (compatible with syslog and standard logging frameworks)
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured log entry with contextual metadata
 */
export interface LogEntry {
  timestamp: string; // ISO 8601 format
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Destination for log entries
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Minimal logging surface used across the deployment code
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  fatal(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  minLevel?: LogLevel;
  sink?: LogSink;
  /** Fixed context merged into every entry */
  context?: Record<string, unknown>;
  /** Returns the current time; overridable for tests */
  now?: () => Date;
}

/**
 * Log level severity (higher = more severe)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/**
 * Format log entry for human-readable terminal output
 *
 * The `tag` context key (e.g. `myService/default`) is printed in front of the
 * message; remaining context is appended as key=value pairs.
 */
export function formatForTerminal(entry: LogEntry): string {
  const colors: Record<LogLevel, (text: string) => string> = {
    debug: chalk.cyan,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
    fatal: chalk.bgRed.white,
  };

  const time = new Date(entry.timestamp).toLocaleTimeString();
  const level = entry.level.toUpperCase().padEnd(5);
  const { tag, ...rest }: Record<string, unknown> = entry.context ?? {};
  const prefix = typeof tag === 'string' ? `${chalk.bold(tag)} ` : '';

  let output = `${chalk.dim(`[${time}]`)} ${colors[entry.level](level)} ${prefix}${entry.message}`;

  if (Object.keys(rest).length > 0) {
    const contextStr = Object.entries(rest)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(' ');
    output += chalk.dim(` (${contextStr})`);
  }

  if (entry.error) {
    output += `\n  ${chalk.red(`Error: ${entry.error.message}`)}`;
    if (entry.level === 'debug' && entry.error.stack) {
      const stackLines = entry.error.stack.split('\n').slice(1, 4);
      output += `\n${chalk.dim(stackLines.join('\n'))}`;
    }
  }

  return output;
}

/**
 * Writes debug/info to stdout and warn and above to stderr
 */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const line = formatForTerminal(entry);
    if (LOG_LEVEL_PRIORITY[entry.level] >= LOG_LEVEL_PRIORITY.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Keeps entries in memory (tests, post-run inspection)
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Structured logger with a minimum level and an injected sink
 */
export class StructuredLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly context: Record<string, unknown>;
  private readonly now: () => Date;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.minLevel ?? 'info';
    this.sink = config.sink ?? new ConsoleSink();
    this.context = config.context ?? {};
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Check if log level should be processed
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private emit(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const merged = { ...this.context, ...context };
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
    };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }
    this.sink.write(entry);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  /**
   * Log error message
   *
   * @param error - Error object (optional)
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, context, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('fatal', message, context, error);
  }

  /**
   * Create a logger sharing this sink and level, with extra fixed context
   */
  child(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      minLevel: this.minLevel,
      sink: this.sink,
      context: { ...this.context, ...context },
      now: this.now,
    });
  }
}
