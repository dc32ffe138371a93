/**
 * Structured console logger
 *
 * One JSON object per line in production, a readable line everywhere else.
 * Entries below the configured level are dropped before anything is built.
 */

import { CONFIG } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Resolved per call so console spies installed later still see the output
const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

function parseLevel(value: string): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

function readString(error: object, key: 'name' | 'code' | 'stack'): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

// Shape, not instanceof: errors from fs can belong to another realm
function serializeError(error: unknown): SerializedError {
  if (typeof error !== 'object' || error === null || !('message' in error) || typeof error.message !== 'string') {
    return { name: 'NonError', message: String(error) };
  }
  return {
    name: readString(error, 'name') ?? 'Error',
    message: error.message,
    code: readString(error, 'code'),
    stack: readString(error, 'stack'),
  };
}

export class Logger {
  private readonly threshold: number;
  private readonly pretty: boolean;

  constructor(
    private readonly context: string,
    private readonly options: LoggerOptions = {}
  ) {
    this.threshold = SEVERITY[options.level ?? parseLevel(CONFIG.logging.level)];
    this.pretty = options.pretty ?? CONFIG.logging.pretty;
  }

  /**
   * Logger for a sub-component, e.g. "FileStore:value table"
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.options);
  }

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= this.threshold;
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.write('error', message, data, error === undefined ? undefined : serializeError(error));
  }

  private write(level: LogLevel, message: string, data?: unknown, error?: SerializedError): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const time = new Date().toISOString();
    const line = this.pretty
      ? this.prettyLine(time, level, message, data, error)
      : JSON.stringify({ time, level, context: this.context, message, data, error });
    SINKS[level](line);
  }

  private prettyLine(
    time: string,
    level: LogLevel,
    message: string,
    data?: unknown,
    error?: SerializedError
  ): string {
    let line = `${time} ${level.toUpperCase().padEnd(5)} [${this.context}] ${message}`;
    if (data !== undefined) {
      line += ` ${JSON.stringify(data)}`;
    }
    if (error) {
      line += `\n  ${error.name}: ${error.message}`;
      if (error.code) {
        line += ` (${error.code})`;
      }
      if (error.stack) {
        line += `\n${error.stack}`;
      }
    }
    return line;
  }
}

export const createLogger = (context: string, options?: LoggerOptions): Logger => {
  return new Logger(context, options);
};
