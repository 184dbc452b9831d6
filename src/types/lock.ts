/**
 * Instance lock type definitions.
 */

/**
 * The lock currently held by this process.
 *
 * The file at `path` holds the decimal `pid` on a single line.
 */
export interface LockRecord {
  /** Process ID that holds the lock */
  pid: number;
  /** Path of the backing PID file */
  path: string;
}
