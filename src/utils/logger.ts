/**
 * Levelled console logging.
 *
 * Debug and error lines go to stderr so that JSON and DOT written to stdout
 * stay parseable. Child loggers share their parent's level unless one is set
 * on the child itself.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Payload = Record<string, unknown>;

class Logger {
  private ownLevel: LogLevel | undefined;

  constructor(
    private readonly prefix: string = '',
    private readonly parent?: Logger
  ) {}

  setLevel(level: LogLevel): void {
    this.ownLevel = level;
  }

  getLevel(): LogLevel {
    return this.ownLevel ?? this.parent?.getLevel() ?? 'info';
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private tag(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Payload): void {
    if (!this.enabled('debug')) return;
    console.error(chalk.gray(`[DEBUG] ${this.tag(message)}`));
    if (data) console.error(chalk.gray(JSON.stringify(data, null, 2)));
  }

  info(message: string, data?: Payload): void {
    if (!this.enabled('info')) return;
    console.log(chalk.blue(`[INFO] ${this.tag(message)}`));
    if (data) console.log(chalk.blue(JSON.stringify(data, null, 2)));
  }

  warn(message: string, data?: Payload): void {
    if (!this.enabled('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${this.tag(message)}`));
    if (data) console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
  }

  error(message: string, cause?: Error | Payload): void {
    if (!this.enabled('error')) return;
    console.error(chalk.red(`[ERROR] ${this.tag(message)}`));
    if (cause instanceof Error) {
      console.error(chalk.red(cause.stack ?? cause.message));
    } else if (cause) {
      console.error(chalk.red(JSON.stringify(cause, null, 2)));
    }
  }

  /**
   * Logger whose lines carry `[parent:prefix]` and whose level follows this one.
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this);
  }
}

export const logger = new Logger();

export { Logger };
