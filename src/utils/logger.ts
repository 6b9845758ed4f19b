import chalk from 'chalk';
import { promises as fs } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { randomUUID } from 'crypto';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logging surface the runner, lock and repositories depend on.
 * Hosts embedding migrun can pass their own implementation.
 */
export interface MigrunLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  success(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error | unknown): void;
}

export function isDebugEnv(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

class Logger implements MigrunLogger {
  private debugEnabled: boolean;
  private debugLogFile: string | null = null;
  private sessionId: string;
  private writes: Promise<void> = Promise.resolve();

  constructor() {
    this.sessionId = randomUUID();
    this.debugEnabled = isDebugEnv(process.env.MIGRUN_DEBUG);
  }

  /**
   * Enable debug mode and initialize debug logging
   * @returns The debug session directory path
   */
  async enableDebugMode(): Promise<string | null> {
    if (!this.debugEnabled) {
      this.debugEnabled = true;
      process.env.MIGRUN_DEBUG = '1';
    }

    if (!this.debugLogFile) {
      await this.initializeDebugLogging();
    }

    return this.getDebugSessionDir();
  }

  private async initializeDebugLogging(): Promise<void> {
    const baseDir = join(homedir(), '.migrun', 'debug');
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const sessionDir = join(baseDir, `session-${timestamp}-${this.sessionId}`);

    try {
      await fs.mkdir(sessionDir, { recursive: true });
      this.debugLogFile = join(sessionDir, 'application.log');
    } catch (error: unknown) {
      this.debugLogFile = null;
      this.debugEnabled = false;
      console.warn(chalk.yellow(`⚠ Debug log disabled: ${error instanceof Error ? error.message : String(error)}`));
    }
  }

  getDebugSessionDir(): string | null {
    if (!this.debugLogFile) return null;
    return join(this.debugLogFile, '..');
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /**
   * Resolves once every queued debug line has been appended
   */
  flush(): Promise<void> {
    return this.writes;
  }

  private writeToFile(level: LogLevel, message: string, ...args: unknown[]): void {
    const timestamp = new Date().toISOString();
    const suffix = args.length > 0
      ? ' ' + args.map(a => typeof a === 'object' ? JSON.stringify(a) : String(a)).join(' ')
      : '';
    const logLine = `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}\n`;

    // Appends are serialized so lines keep their order in the file
    this.writes = this.writes.then(async () => {
      if (!this.debugLogFile) {
        await this.initializeDebugLogging();
      }
      if (!this.debugLogFile) return;
      try {
        await fs.appendFile(this.debugLogFile, logLine, 'utf-8');
      } catch (error: unknown) {
        this.debugLogFile = null;
        console.warn(chalk.yellow(`⚠ Debug log write failed: ${error instanceof Error ? error.message : String(error)}`));
      }
    });
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.DEBUG, message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(chalk.blueBright(message), ...args);
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.INFO, message, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`✓ ${message}`), ...args);
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.INFO, `✓ ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`⚠ ${message}`), ...args);
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.WARN, `⚠ ${message}`, ...args);
    }
  }

  error(message: string, error?: Error | unknown): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.ERROR, `✗ ${message}`);
    }

    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.message));
        if (this.debugEnabled) {
          this.writeToFile(LogLevel.ERROR, error.message);
          if (error.stack) {
            console.error(chalk.white(error.stack));
            this.writeToFile(LogLevel.ERROR, error.stack);
          }
        }
      } else {
        console.error(chalk.red(String(error)));
        if (this.debugEnabled) {
          this.writeToFile(LogLevel.ERROR, String(error));
        }
      }
    }
  }
}

export const logger = new Logger();
