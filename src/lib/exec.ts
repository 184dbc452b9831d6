/**
 * External command execution with a hard timeout.
 *
 * Commands are spawned without a shell. The outcome is reduced to
 * `{ ok, output }`: trimmed stdout on exit code 0, trimmed stderr otherwise.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { CommandResult } from '../types/network.js';
import { errorMessage } from './fs.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;
export const TIMED_OUT_MESSAGE = 'Command timed out';

/** Signature shared by the real runner and test doubles. */
export type CommandRunner = (cmd: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/**
 * Runs `cmd` with `args` and waits for it to exit or time out.
 *
 * Never rejects: spawn errors and timeouts come back as `ok: false`.
 *
 * @example
 * ```typescript
 * const result = await runCommand('networksetup', ['-listallnetworkservices'], 5000);
 * if (!result.ok) console.error(result.output);
 * ```
 */
export function runCommand(
  cmd: string,
  args: string[],
  timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeoutId: NodeJS.Timeout | null = null;

    const settle = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      resolve(result);
    };

    let child: ChildProcess;
    try {
      child = spawn(cmd, args, { shell: false, stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (error) {
      settle({ ok: false, output: errorMessage(error) });
      return;
    }

    if (timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        child.kill('SIGTERM');
        // Give it a moment to terminate gracefully, then force kill
        setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, 1000).unref();
        settle({ ok: false, output: TIMED_OUT_MESSAGE });
      }, timeoutMs);
    }

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error: Error) => {
      settle({ ok: false, output: error.message });
    });

    child.on('close', (code: number | null) => {
      if (code === 0) {
        settle({ ok: true, output: stdout.trim() });
      } else {
        settle({ ok: false, output: stderr.trim() || `${cmd} exited with code ${code ?? 'null'}` });
      }
    });
  });
}
