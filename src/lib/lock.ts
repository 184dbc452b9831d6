/**
 * Single-instance lock backed by a PID file.
 *
 * The file holds the holder's decimal PID on one line. A lock whose holder no
 * longer exists is orphaned and gets reclaimed; a lock is only ever removed by
 * the process whose PID it contains.
 */

import { readFile, unlink } from 'node:fs/promises';
import type { LockRecord } from '../types/lock.js';
import type { Logger } from '../types/logger.js';
import { atomicWriteText, errorMessage, hasErrorCode } from './fs.js';
import { silentLogger } from './logger.js';

/**
 * Checks if a process with the given PID is currently running.
 *
 * Uses process.kill(pid, 0), which checks for existence without sending a
 * signal. EPERM means the process exists but belongs to someone else.
 */
export function isPidRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return hasErrorCode(error, 'EPERM');
  }
}

/**
 * Parses lock file contents. Returns null unless it is a single positive integer.
 */
export function parseLockPid(content: string): number | null {
  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const pid = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

export interface InstanceLockOptions {
  /** PID written to and compared against the file; defaults to process.pid */
  pid?: number;
  isAlive?: (pid: number) => boolean;
  logger?: Logger;
}

export class InstanceLock {
  private record: LockRecord | null = null;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private readonly logger: Logger;

  constructor(
    public readonly path: string,
    options: InstanceLockOptions = {}
  ) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isPidRunning;
    this.logger = options.logger ?? silentLogger;
  }

  /** The lock this instance holds, if any. */
  get held(): LockRecord | null {
    return this.record;
  }

  /**
   * Takes the lock, reclaiming it from a holder that no longer exists.
   *
   * @returns false if a live process holds it or the file cannot be written
   */
  async acquire(): Promise<boolean> {
    let existing: string | null = null;
    try {
      existing = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.error(`Failed to read lock file ${this.path}: ${errorMessage(error)}`);
        return false;
      }
    }

    if (existing !== null) {
      const holder = parseLockPid(existing);
      if (holder === null) {
        this.logger.warn(`Lock file ${this.path} is malformed. Removing it.`);
        if (!(await this.removeFile())) return false;
      } else if (holder !== this.pid) {
        if (this.isAlive(holder)) {
          this.logger.error(`Another instance is already running (PID: ${holder})`);
          return false;
        }
        this.logger.warn(`Removing orphaned lock file (PID: ${holder} not running)`);
        if (!(await this.removeFile())) return false;
      }
    }

    try {
      await atomicWriteText(this.path, `${this.pid}\n`);
    } catch (error) {
      this.logger.error(`Failed to create lock file: ${errorMessage(error)}`);
      return false;
    }

    this.record = { pid: this.pid, path: this.path };
    this.logger.info(`Lock acquired (PID: ${this.pid}) at ${this.path}`);
    return true;
  }

  /**
   * Removes the lock file if, and only if, it still names this process.
   *
   * Safe to call more than once; never throws.
   */
  async release(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.warn(`Error releasing lock: ${errorMessage(error)}`);
      }
      this.record = null;
      return;
    }

    const holder = parseLockPid(content);
    if (holder !== this.pid) {
      this.logger.debug(`Lock file ${this.path} is not ours (holder: ${holder ?? 'unknown'}); leaving it`);
      this.record = null;
      return;
    }

    if (await this.removeFile()) {
      this.logger.info('Lock released');
    }
    this.record = null;
  }

  private async removeFile(): Promise<boolean> {
    try {
      await unlink(this.path);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return true;
      }
      this.logger.error(`Failed to remove lock file ${this.path}: ${errorMessage(error)}`);
      return false;
    }
  }
}
