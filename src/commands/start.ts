/**
 * `dns-rotator start`: continuous rotation until SIGINT or SIGTERM.
 */

import type { ExitCode, GlobalOptions } from './runtime.js';
import { withRuntime } from './runtime.js';

export function startCommand(options: GlobalOptions): Promise<ExitCode> {
  return withRuntime(options, async ({ controller, signal }) => {
    console.log(
      `Starting continuous rotation every ${controller.interval}s on '${controller.interfaceName}'. Press Ctrl+C to stop.`
    );
    await controller.runContinuous(signal);
    return 0;
  });
}
