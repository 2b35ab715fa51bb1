/**
 * Diagnostic logging.
 *
 * Everything goes to stderr so that stdout only ever carries command
 * output (tasks, listings, JSON).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface Logger {
  readonly scope: string;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export type LogWriter = (line: string) => void;

let globalLevel: LogLevel = 'warn';
let writer: LogWriter = (line) => console.error(line);

/** Sets the global level; returns the previous one. */
export function setLogLevel(level: LogLevel): LogLevel {
  const previous = globalLevel;
  globalLevel = level;
  return previous;
}

/** Replaces the sink log lines are written to; returns the previous one. */
export function setLogWriter(next: LogWriter): LogWriter {
  const previous = writer;
  writer = next;
  return previous;
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  return ' ' + JSON.stringify(meta);
}

class ScopedLogger implements Logger {
  constructor(readonly scope: string) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}:${scope}`);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) {
      return;
    }
    writer(`[${this.scope}] ${level}: ${message}${formatMeta(meta)}`);
  }
}

export function createLogger(scope: string): Logger {
  return new ScopedLogger(`vcd-net:${scope}`);
}
