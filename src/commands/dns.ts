/**
 * One-shot commands: `once`, `get`, `set` and `reset`.
 */

import { formatPair } from '../lib/resolver.js';
import type { ExitCode, GlobalOptions } from './runtime.js';
import { withRuntime } from './runtime.js';

export function onceCommand(options: GlobalOptions): Promise<ExitCode> {
  return withRuntime(options, async ({ controller, logger, signal }) => {
    logger.info('Running single DNS rotation.');
    return (await controller.rotateOnce(signal)) ? 0 : 1;
  });
}

export function getCommand(options: GlobalOptions): Promise<ExitCode> {
  return withRuntime(options, async ({ controller }) => {
    const current = await controller.getCurrent();
    if (current) {
      console.log(`Current DNS: ${formatPair(current)}`);
    } else {
      console.log('Could not retrieve DNS configuration.');
    }
    return 0;
  });
}

export function setCommand(
  primary: string,
  secondary: string,
  options: GlobalOptions
): Promise<ExitCode> {
  return withRuntime(options, async ({ controller }) =>
    (await controller.setDns(primary, secondary)) ? 0 : 1
  );
}

export function resetCommand(options: GlobalOptions): Promise<ExitCode> {
  return withRuntime(options, async ({ controller }) => ((await controller.reset()) ? 0 : 1));
}
