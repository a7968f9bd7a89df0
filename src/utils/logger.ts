import chalk from 'chalk';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

class Logger {
  private sessionId: string;
  private logDirectory: string | null = null;
  private logFilePath: string | null = null;
  private logFileInitialized = false;
  private writeStream: fs.WriteStream | null = null;

  constructor() {
    this.sessionId = randomUUID();
  }

  /**
   * Enable file logging under the given directory.
   * Nothing is written to disk until a directory is set, since the
   * log location itself comes from the config resolver.
   */
  setLogDirectory(dir: string): void {
    this.close();
    this.logDirectory = dir;
    this.logFilePath = null;
    this.logFileInitialized = false;
  }

  /**
   * Initialize log file path and create write stream
   * Log file format: <dir>/debug-YYYY-MM-DD.log
   */
  private initializeLogFile(): void {
    if (this.logFileInitialized) return;
    this.logFileInitialized = true;

    if (!this.logDirectory) return;

    try {
      if (!fs.existsSync(this.logDirectory)) {
        fs.mkdirSync(this.logDirectory, { recursive: true, mode: 0o700 });
      }

      const today = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
      this.logFilePath = path.join(this.logDirectory, `debug-${today}.log`);
      const stream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      stream.on('error', (error) => {
        console.warn(chalk.yellow(`⚠ Debug log disabled: ${error.message}`));
        if (this.writeStream === stream) {
          this.writeStream = null;
        }
      });
      this.writeStream = stream;
    } catch (error) {
      // File logging is optional; report once and carry on with console output
      this.logFilePath = null;
      this.writeStream = null;
      console.warn(chalk.yellow(`⚠ Debug log disabled: ${error instanceof Error ? error.message : String(error)}`));
    }
  }

  /**
   * Write a log entry to the debug log file
   * Format: [ISO timestamp] [LEVEL] message args
   */
  private writeToLogFile(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.logFileInitialized) {
      this.initializeLogFile();
    }

    if (!this.writeStream) return;

    const timestamp = new Date().toISOString();
    const argsStr = args.length > 0 ? ' ' + args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ') : '';

    this.writeStream.write(`[${timestamp}] [${level.toUpperCase()}] [${this.sessionId}] ${message}${argsStr}\n`);
  }

  /**
   * Flush and close the write stream
   */
  close(): void {
    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
    }
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /**
   * Debug mode controls console output visibility, not file logging
   * @returns true if OKTETO_DEBUG is set to 'true' or '1'
   */
  isDebugMode(): boolean {
    return process.env.OKTETO_DEBUG === 'true' || process.env.OKTETO_DEBUG === '1';
  }

  getLogFilePath(): string | null {
    if (!this.logFileInitialized) {
      this.initializeLogFile();
    }
    return this.logFilePath;
  }

  debug(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.DEBUG, message, ...args);

    if (this.isDebugMode()) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.INFO, message, ...args);

    if (this.isDebugMode()) {
      console.log(chalk.cyan(`ℹ ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`✓ ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.WARN, message, ...args);
    console.warn(chalk.yellow(`⚠ ${message}`), ...args);
  }

  error(message: string, error?: Error | unknown): void {
    let errorDetails = '';
    if (error) {
      if (error instanceof Error) {
        errorDetails = error.message;
        if (error.stack) {
          errorDetails += `\n${error.stack}`;
        }
      } else {
        errorDetails = String(error);
      }
    }

    this.writeToLogFile(LogLevel.ERROR, message, errorDetails);

    console.error(chalk.red(`✗ ${message}`));
    if (error && this.isDebugMode()) {
      if (error instanceof Error && error.stack) {
        console.error(chalk.white(error.stack));
      } else {
        console.error(chalk.red(String(error)));
      }
    }
  }
}

export const logger = new Logger();
