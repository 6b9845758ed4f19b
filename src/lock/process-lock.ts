import { promises as fs, unlinkSync } from 'fs';
import { join } from 'path';
import { LockedError, getErrorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type MigrunLogger } from '../utils/logger.js';

export interface ProcessLockOptions {
  /** Directory holding the lock file */
  dir: string;

  /** Lock name; the file is `<dir>/<name>.lock` */
  name: string;

  logger?: MigrunLogger;

  /** Liveness check for a recorded owner pid; defaults to isProcessAlive */
  isAlive?: (pid: number) => boolean;
}

interface LockOwner {
  pid: number;
  acquiredAt: string;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function parseOwner(content: string): LockOwner | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (
      typeof parsed === 'object' && parsed !== null &&
      'pid' in parsed && typeof parsed.pid === 'number' && Number.isInteger(parsed.pid) &&
      'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string'
    ) {
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Signal 0 checks for existence without delivering anything.
 * EPERM means the process exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    return errorCode(error) === 'EPERM';
  }
}

/**
 * Host-local advisory lock preventing two processes from running the same
 * migration set at once. Acquisition never waits. No cross-host guarantee.
 */
export class ProcessLock {
  readonly path: string;
  /** Held only while a stale lock file is being replaced */
  readonly takeoverPath: string;
  private readonly logger: MigrunLogger;
  private readonly isAlive: (pid: number) => boolean;
  private held = false;
  private exitHook: (() => void) | null = null;

  constructor(options: ProcessLockOptions) {
    this.path = join(options.dir, `${options.name}.lock`);
    this.takeoverPath = `${this.path}.takeover`;
    this.logger = options.logger ?? defaultLogger;
    this.isAlive = options.isAlive ?? isProcessAlive;
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Take the lock or throw LockedError immediately.
   * A lock file left by a process that no longer exists is removed under the
   * takeover guard and acquisition retried once.
   */
  async tryAcquire(): Promise<void> {
    if (this.held) {
      throw new LockedError(this.path, process.pid);
    }

    await fs.mkdir(join(this.path, '..'), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await this.createOwnerFile(this.path);
        this.held = true;
        this.installExitHook();
        this.logger.debug(`[ProcessLock] Acquired ${this.path}`);
        return;
      } catch (error: unknown) {
        if (errorCode(error) !== 'EEXIST') throw error;
      }

      const owner = await this.readOwner(this.path);
      if (owner === null || this.isAlive(owner.pid) || attempt > 0) {
        throw new LockedError(this.path, owner?.pid);
      }

      await this.removeStaleLock(owner.pid);
    }

    throw new LockedError(this.path);
  }

  /**
   * Delete the lock file of dead process `stalePid`.
   * Only the holder of the takeover file may delete it, and only after
   * re-reading it under the guard: another process may already have replaced
   * the stale file with its own live lock.
   */
  private async removeStaleLock(stalePid: number): Promise<void> {
    try {
      await this.createOwnerFile(this.takeoverPath);
    } catch (error: unknown) {
      if (errorCode(error) !== 'EEXIST') throw error;
      await this.clearDeadTakeover();
      throw new LockedError(this.path);
    }

    try {
      const current = await this.readOwner(this.path);
      if (current === null) {
        // Gone, or a new owner is still writing it; the retry decides
        return;
      }
      if (current.pid !== stalePid) {
        throw new LockedError(this.path, current.pid);
      }
      this.logger.warn(`Removing stale lock ${this.path} left by pid ${stalePid}`);
      await this.unlink(this.path);
    } finally {
      await this.unlink(this.takeoverPath);
    }
  }

  /**
   * A takeover file whose owner died mid-takeover is removed so the next
   * attempt can proceed; this attempt still fails
   */
  private async clearDeadTakeover(): Promise<void> {
    const holder = await this.readOwner(this.takeoverPath);
    if (holder !== null && !this.isAlive(holder.pid)) {
      this.logger.warn(`Removing stale lock takeover ${this.takeoverPath} left by pid ${holder.pid}`);
      await this.unlink(this.takeoverPath);
    }
  }

  /**
   * Remove the lock file if this instance holds it. Safe to call repeatedly.
   */
  async release(): Promise<void> {
    if (!this.held) return;

    this.held = false;
    this.removeExitHook();
    await this.unlink(this.path);
    this.logger.debug(`[ProcessLock] Released ${this.path}`);
  }

  /**
   * Acquire, run `fn`, and release on every exit path
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.tryAcquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async createOwnerFile(filePath: string): Promise<void> {
    const handle = await fs.open(filePath, 'wx');
    try {
      const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() };
      await handle.writeFile(JSON.stringify(owner), 'utf-8');
    } finally {
      await handle.close();
    }
  }

  /**
   * @returns The owner, or null when the file is unreadable or still being written
   */
  private async readOwner(filePath: string): Promise<LockOwner | null> {
    try {
      return parseOwner(await fs.readFile(filePath, 'utf-8'));
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        // Released between our open and read; report as unknown owner
        return null;
      }
      throw error;
    }
  }

  private async unlink(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error: unknown) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }

  private installExitHook(): void {
    const hook = () => {
      try {
        unlinkSync(this.path);
      } catch (error: unknown) {
        if (errorCode(error) !== 'ENOENT') {
          console.error(`Failed to release lock ${this.path}: ${getErrorMessage(error)}`);
        }
      }
    };
    this.exitHook = hook;
    process.once('exit', hook);
  }

  private removeExitHook(): void {
    if (this.exitHook) {
      process.removeListener('exit', this.exitHook);
      this.exitHook = null;
    }
  }
}
