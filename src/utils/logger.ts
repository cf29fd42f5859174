/**
 * Leveled console logger for the cskit CLI.
 * Everything goes to stderr; stdout carries command output only.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    this.write('debug', chalk.gray, `[DEBUG] ${message}`);
  }

  info(message: string): void {
    this.write('info', chalk.blue, `[INFO] ${message}`);
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string): void {
    this.write('error', chalk.red, `[ERROR] ${message}`);
  }

  /**
   * Log a completed action, such as a blocklist change (shown at info).
   */
  success(message: string): void {
    this.write('info', chalk.green, `✓ ${message}`);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(level: LogLevel, color: ChalkInstance, text: string): void {
    if (this.shouldLog(level)) {
      console.error(color(text));
    }
  }
}

export const logger = new Logger();

export { Logger };
