import { describe, it, expect } from 'vitest';
import { runCommand, TIMED_OUT_MESSAGE } from '../../src/lib/exec.js';

const NODE = process.execPath;

describe('runCommand', () => {
  it('returns trimmed stdout on success', async () => {
    const result = await runCommand(NODE, ['-e', 'process.stdout.write("  Enabled\\n")'], 5_000);

    expect(result).toEqual({ ok: true, output: 'Enabled' });
  });

  it('returns trimmed stderr on a non-zero exit', async () => {
    const result = await runCommand(
      NODE,
      ['-e', 'process.stderr.write("not allowed\\n"); process.exit(4)'],
      5_000
    );

    expect(result).toEqual({ ok: false, output: 'not allowed' });
  });

  it('describes a silent failure by its exit code', async () => {
    const result = await runCommand(NODE, ['-e', 'process.exit(3)'], 5_000);

    expect(result).toEqual({ ok: false, output: `${NODE} exited with code 3` });
  });

  it('kills the command when it outlives the timeout', async () => {
    const result = await runCommand(NODE, ['-e', 'setTimeout(() => {}, 10000)'], 200);

    expect(result).toEqual({ ok: false, output: TIMED_OUT_MESSAGE });
  });

  it('reports a missing executable without throwing', async () => {
    const result = await runCommand('/nonexistent/dns-rotator-command', [], 5_000);

    expect(result.ok).toBe(false);
    expect(result.output).toContain('ENOENT');
  });
});
