/**
 * Well-known filesystem locations.
 *
 * State lives in /var/run when the process may write there (running as root
 * under launchd), and in ~/.dns-rotator otherwise.
 */

import { access, constants } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

export const APP_NAME = 'dns-rotator';
export const SYSTEM_STATE_DIR = '/var/run';
export const USER_STATE_DIR = join(homedir(), `.${APP_NAME}`);
export const LOCK_FILE_NAME = `${APP_NAME}.pid`;

/** Config files searched in order when --config is not given. */
export const CONFIG_SEARCH_PATHS: readonly string[] = [
  `/etc/${APP_NAME}/config.json`,
  `/usr/local/etc/${APP_NAME}/config.json`,
  join(USER_STATE_DIR, 'config.json'),
];

async function isWritable(dir: string): Promise<boolean> {
  try {
    await access(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves the default PID file path.
 */
export async function defaultLockPath(systemDir: string = SYSTEM_STATE_DIR): Promise<string> {
  const dir = (await isWritable(systemDir)) ? systemDir : USER_STATE_DIR;
  return join(dir, LOCK_FILE_NAME);
}
