import chalk from 'chalk';
import { appendFileSync } from 'node:fs';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

class Logger {
  private debugEnabled = false;
  private quiet = false;
  private logFile: string | null = null;

  enableDebug(): void {
    this.debugEnabled = true;
  }

  disableDebug(): void {
    this.debugEnabled = false;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  /**
   * Suppresses info and success lines, e.g. while a JSON report goes to stdout.
   * Warnings and errors are always written (to stderr).
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  /**
   * Also appends every emitted line, uncoloured and timestamped, to `logFile`.
   * The file is created if needed and never truncated; null stops writing to it.
   */
  setLogFile(logFile: string | null): void {
    if (logFile !== null) {
      // Fails here, rather than on the first line, when the file cannot be written
      appendFileSync(logFile, '');
    }
    this.logFile = logFile;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
      this.writeToFile('DEBUG', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
    this.writeToFile('INFO', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    this.writeToFile('WARN', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
    this.writeToFile('ERROR', message, args);
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
    this.writeToFile('SUCCESS', message, args);
  }

  private writeToFile(level: string, message: string, args: unknown[]): void {
    if (this.logFile === null) {
      return;
    }
    appendFileSync(this.logFile, `${new Date().toISOString()} [${level}] ${format(message, ...args)}\n`);
  }
}

export const logger = new Logger();
