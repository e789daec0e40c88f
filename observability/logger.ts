export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Prepended to every line, e.g. the component name. */
  scope?: string;
  sink?: Pick<Console, 'log' | 'warn' | 'error'>;
}

/**
 * Writes one line per entry: `[LEVEL] scope: message {"context":"as json"}`.
 * Errors found in the context are reduced to their message.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;
  private readonly sink: Pick<Console, 'log' | 'warn' | 'error'>;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.scope = options.scope;
    this.sink = options.sink ?? console;
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink
    });
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const prefix = `[${level.toUpperCase()}]${this.scope ? ` ${this.scope}:` : ''}`;
    const line = context && Object.keys(context).length > 0
      ? `${prefix} ${message} ${JSON.stringify(serializeContext(context))}`
      : `${prefix} ${message}`;

    if (level === 'error') {
      this.sink.error(line);
    } else if (level === 'warn') {
      this.sink.warn(line);
    } else {
      this.sink.log(line);
    }
  }
}

function serializeContext(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = value instanceof Error ? value.message : value;
  }
  return result;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
