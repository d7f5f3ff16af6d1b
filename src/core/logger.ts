/**
 * Leveled console logger.
 *
 * Output goes to stderr so that commands which print documents or generated
 * source on stdout stay pipeable. Library entry points default to
 * SILENT_LOGGER; callers opt in by passing a logger.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>, error?: unknown): void;
  child(component: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  format?: 'json' | 'pretty';
  /** Sink for formatted lines. Defaults to console.error. */
  write?: (line: string) => void;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

type EmitLevel = Exclude<LogLevel, 'silent'>;

class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(private readonly options: Required<Omit<LoggerOptions, 'write'>> & Pick<LoggerOptions, 'write'>) {
    this.minLevel = LEVEL_VALUES[options.level];
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.output('debug', msg, meta);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.output('info', msg, meta);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.output('warn', msg, meta);
  }

  error(msg: string, meta?: Record<string, unknown>, error?: unknown): void {
    const errMeta = error === undefined
      ? {}
      : { error: error instanceof Error ? { name: error.name, message: error.message } : { message: String(error) } };
    this.output('error', msg, { ...meta, ...errMeta });
  }

  child(component: string): Logger {
    return new ConsoleLogger({ ...this.options, component: `${this.options.component}:${component}` });
  }

  private output(level: EmitLevel, msg: string, meta: Record<string, unknown> = {}): void {
    if (LEVEL_VALUES[level] < this.minLevel) return;

    const write = this.options.write ?? ((line: string) => console.error(line));

    if (this.options.format === 'json') {
      write(JSON.stringify({ ts: Date.now(), level, component: this.options.component, msg, ...meta }));
      return;
    }

    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    write(`[${level.toUpperCase()}] [${this.options.component}] ${msg}${extra}`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger({
    level: options.level ?? 'info',
    component: options.component ?? 'kir',
    format: options.format ?? 'pretty',
    write: options.write,
  });
}

export const SILENT_LOGGER: Logger = createLogger({ level: 'silent' });
