/**
 * Structured logger backed by winston.
 *
 * Everything goes to stderr so that command output on stdout stays
 * machine-readable. Library code receives a {@link Logger} through its
 * constructor and never reaches for a global instance.
 */

import winston from 'winston';
import type { LogLevel } from '../types/config.js';

export interface Logger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  /** Logger that tags every entry with extra metadata. */
  child(meta: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  /** Where entries are written. Defaults to the console (stderr). */
  destination?: NodeJS.WritableStream;
  colorize?: boolean;
}

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

function lineFormat(colorize: boolean): winston.Logform.Format {
  const parts: winston.Logform.Format[] = [
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  ];
  if (colorize) {
    parts.push(winston.format.colorize());
  }
  parts.push(
    winston.format.printf((info) => {
      const { timestamp, level, message, component, ...meta } = info;
      const tag = typeof component === 'string' ? `[${component}] ` : '';
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `[${String(timestamp)}] ${tag}${level}: ${String(message)}${metaStr}`;
    }),
  );
  return winston.format.combine(...parts);
}

class WinstonLogger implements Logger {
  private readonly inner: winston.Logger;

  constructor(inner: winston.Logger) {
    this.inner = inner;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.inner.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.inner.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.inner.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.inner.debug(message, meta);
  }

  child(meta: Record<string, unknown>): Logger {
    return new WinstonLogger(this.inner.child(meta));
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const colorize = options.colorize ?? (options.destination === undefined && process.stderr.isTTY === true);
  const transport = options.destination
    ? new winston.transports.Stream({ stream: options.destination })
    : new winston.transports.Console({ stderrLevels: ALL_LEVELS });

  const inner = winston.createLogger({
    level: options.level ?? 'warn',
    format: lineFormat(colorize),
    defaultMeta: options.component ? { component: options.component } : undefined,
    transports: [transport],
  });

  return new WinstonLogger(inner);
}

class SilentLogger implements Logger {
  error(): void {}
  warn(): void {}
  info(): void {}
  debug(): void {}
  child(): Logger {
    return this;
  }
}

/** No-op logger for tests and embedding callers that bring their own. */
export const silentLogger: Logger = new SilentLogger();
