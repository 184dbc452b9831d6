/**
 * Crash-safe file helpers.
 *
 * Writes use the write-tmp-fsync-rename pattern so a reader never sees a
 * partially written file, even if the process dies mid-write.
 */

import { mkdir, open, rename, unlink, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * Returns true if `error` is a Node system error with the given code (e.g. ENOENT).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  if (error instanceof AtomicFsError) {
    return hasErrorCode(error.cause, code);
  }
  return error instanceof Error && 'code' in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Atomically writes text to a file, creating the parent directory if needed.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteText('/var/run/dns-rotator.pid', `${process.pid}\n`);
 * ```
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    await mkdir(dirname(filePath), { recursive: true, mode: 0o700 });

    fileHandle = await open(tmpPath, 'w', 0o644);
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    // The tmp file may not exist yet.
    await unlink(tmpPath).catch(() => undefined);

    throw new AtomicFsError(
      `Failed to atomically write ${filePath}: ${errorMessage(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a JSON file.
 *
 * @returns The parsed value, unvalidated
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${errorMessage(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
