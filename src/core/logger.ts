/**
 * Logging
 *
 * Components take a Logger instead of writing to the console directly.
 * The CLI builds a ConsoleLogger; library callers and tests get NullLogger.
 */

export interface Logger {
  debug: (message: string, context?: object) => void;
  info: (message: string, context?: object) => void;
  warn: (message: string, context?: object) => void;
  error: (message: string, context?: object) => void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export class NullLogger implements Logger {
  debug(_message: string, _context?: object): void { /* no-op */ }
  info(_message: string, _context?: object): void { /* no-op */ }
  warn(_message: string, _context?: object): void { /* no-op */ }
  error(_message: string, _context?: object): void { /* no-op */ }
}

/**
 * Writes to stderr so that stdout only carries command output
 * (search results, JSON, chat answers).
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private prefix: string;

  constructor(options: { level?: LogLevel; prefix?: string } = {}) {
    this.minLevel = options.level ?? 'info';
    this.prefix = options.prefix ?? '[tagdigest]';
  }

  debug(message: string, context?: object): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: object): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: object): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: object): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: object): void {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) {
      return;
    }

    const line = level === 'info'
      ? `${this.prefix} ${message}`
      : `${this.prefix} ${level.toUpperCase()} ${message}`;

    if (context && Object.keys(context).length > 0) {
      console.error(line, context);
    } else {
      console.error(line);
    }
  }
}

export function createLogger(verbose: boolean): Logger {
  return new ConsoleLogger({ level: verbose ? 'debug' : 'info' });
}
