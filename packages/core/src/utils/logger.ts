/**
 * Leveled console logger with injectable sinks.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSink = (message: string) => void;

export interface LoggerOptions {
  /** Minimum level written. Default 'info'. */
  level?: LogLevel;
  /** Sink for debug/info lines. Default console.log. */
  stdout?: LogSink;
  /** Sink for warn/error lines. Default console.error. */
  stderr?: LogSink;
  /** Prepended to every line, e.g. `[Runner]` */
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  readonly level: LogLevel;
  private readonly stdout: LogSink;
  private readonly stderr: LogSink;
  private readonly prefix: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.stdout = options.stdout ?? (message => console.log(message));
    this.stderr = options.stderr ?? (message => console.error(message));
    this.prefix = options.prefix ?? '';
  }

  /** Same sinks and level, with `[name]` added to the prefix */
  child(name: string): Logger {
    return new Logger({
      level: this.level,
      stdout: this.stdout,
      stderr: this.stderr,
      prefix: `${this.prefix}[${name}] `,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled('debug')) this.stdout(`${this.prefix}[DEBUG] ${message}`);
  }

  info(message: string): void {
    if (this.isEnabled('info')) this.stdout(`${this.prefix}${message}`);
  }

  warn(message: string): void {
    if (this.isEnabled('warn')) this.stderr(`${this.prefix}Warning: ${message}`);
  }

  error(message: string): void {
    if (this.isEnabled('error')) this.stderr(`${this.prefix}Error: ${message}`);
  }

  /** Bulleted lines at info level */
  list(items: readonly string[], indent = 2): void {
    const bullet = `${' '.repeat(indent)}- `;
    for (const item of items) this.info(`${bullet}${item}`);
  }

  section(title: string): void {
    this.info('');
    this.info(`${title}:`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** Logger that drops everything */
export const silentLogger = new Logger({ level: 'silent' });
