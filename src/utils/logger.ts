/**
 * Console logging for the seedling CLI.
 */
import chalk from 'chalk';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Stream = 'log' | 'warn' | 'error';
type Paint = (text: string) => string;

/**
 * Levelled logger with an optional `[prefix]` on every message.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', 'log', chalk.gray, `[DEBUG] ${this.format(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', 'log', chalk.blue, `[INFO] ${this.format(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', 'warn', chalk.yellow, `[WARN] ${this.format(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      if (!this.enabled('error')) return;
      console.error(chalk.red(`[ERROR] ${this.format(message)}`));
      console.error(chalk.red(error.stack || error.message));
      return;
    }
    this.emit('error', 'error', chalk.red, `[ERROR] ${this.format(message)}`, error);
  }

  /** `✓ message` in green. */
  success(message: string): void {
    this.emit('info', 'log', chalk.green, `✓ ${message}`);
  }

  /** `✗ message` in red, on stdout. */
  fail(message: string): void {
    this.emit('info', 'log', chalk.red, `✗ ${message}`);
  }

  /** A bold headline for the start of a phase. */
  step(message: string): void {
    this.emit('info', 'log', chalk.bold, `→ ${message}`);
  }

  /**
   * Echo captured command output, indented.
   */
  output(text: string): void {
    if (!this.enabled('info')) return;
    for (const line of text.split('\n')) {
      console.log(chalk.dim(`  ${line}`));
    }
  }

  /**
   * Create a child logger with a prefix.
   * The child copies the current level; later changes to either do not propagate.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(level: LogLevel, stream: Stream, paint: Paint, line: string, data?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;
    console[stream](paint(line));
    if (data) {
      console[stream](paint(JSON.stringify(data, null, 2)));
    }
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };

/**
 * Type guard for log level strings coming from flags or config.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}
