/**
 * Shared startup for every command: configuration, logger, instance lock and
 * the rotation controller, built once and handed down explicitly.
 */

import type { DnsRotatorConfig } from '../types/config.js';
import type { Logger } from '../types/logger.js';
import type { NetworkConfigurator } from '../types/network.js';
import { loadConfig } from '../lib/config.js';
import type { ConfigOverrides } from '../lib/config.js';
import { HealthCache } from '../lib/health.js';
import { InstanceLock } from '../lib/lock.js';
import { createLogger } from '../lib/logger.js';
import { detectInterface, NetworkSetupConfigurator } from '../lib/network.js';
import { SelectionPolicy } from '../lib/selection.js';
import { RotationController } from '../runner/controller.js';

/** Options accepted by every command. */
export interface GlobalOptions extends ConfigOverrides {
  config?: string;
}

export interface Runtime {
  config: DnsRotatorConfig;
  logger: Logger;
  controller: RotationController;
  /** Aborts on the first SIGINT or SIGTERM after the lock was taken */
  signal: AbortSignal;
}

/** The part of `process` that shutdown handling listens on. */
export type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Routes SIGINT and SIGTERM into `abortController` instead of Node's default
 * exit, so the caller can finish and release its lock.
 *
 * @returns a function removing the handlers
 */
export function listenForShutdown(
  abortController: AbortController,
  source: SignalSource = process
): () => void {
  const handler = (signal: NodeJS.Signals) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    abortController.abort();
  };
  for (const name of SHUTDOWN_SIGNALS) {
    source.on(name, handler);
  }
  return () => {
    for (const name of SHUTDOWN_SIGNALS) {
      source.off(name, handler);
    }
  };
}

/** Exit code returned by a command. */
export type ExitCode = 0 | 1;

export const LOCK_HELD_MESSAGE = 'Error: Another instance of dns-rotator is already running.';

/**
 * Builds the controller and its collaborators from a resolved configuration.
 */
export async function createController(
  config: DnsRotatorConfig,
  logger: Logger,
  configurator: NetworkConfigurator = new NetworkSetupConfigurator({
    timeoutMs: config.commands.timeout_seconds * 1000,
    discoveryTimeoutMs: config.commands.discovery_timeout_seconds * 1000,
    logger: logger.child('network'),
  })
): Promise<RotationController> {
  const interfaceName = config.interface ?? (await detectInterface(configurator, logger.child('network')));

  const cache = new HealthCache({
    probeTimeoutSeconds: config.health.timeout_seconds,
    ttlSeconds: config.health.cache_ttl_seconds,
    logger: logger.child('health'),
  });
  const selection = new SelectionPolicy(cache, { logger: logger.child('selection') });

  return new RotationController(
    {
      interfaceName,
      interval: config.interval_seconds,
      candidates: config.resolvers,
      minInterval: config.min_interval_seconds,
      maxInterval: config.max_interval_seconds,
      maxRetries: config.health.max_retries,
      vpnPatterns: config.vpn.interface_patterns,
    },
    { configurator, selection, logger: logger.child('rotation') }
  );
}

/**
 * Loads configuration, takes the instance lock, runs `action`, and releases
 * the lock however `action` ends. Termination signals are caught from the
 * moment the lock is held, so an interrupted command still releases it.
 *
 * Nothing touches DNS settings before the lock is held.
 */
export async function withRuntime(
  options: GlobalOptions,
  action: (runtime: Runtime) => Promise<ExitCode>
): Promise<ExitCode> {
  const { config: configPath, ...overrides } = options;
  const config = await loadConfig(configPath, overrides);
  const logger = createLogger({ level: config.log_level });
  if (config.source) {
    logger.info(`Loaded configuration from ${config.source}`);
  } else {
    logger.info('No configuration file found. Using defaults.');
  }

  const lock = new InstanceLock(config.lock_file, { logger: logger.child('lock') });
  if (!(await lock.acquire())) {
    console.error(LOCK_HELD_MESSAGE);
    console.error('Stop it first or wait for it to finish.');
    return 1;
  }

  const abortController = new AbortController();
  const stopListening = listenForShutdown(abortController);
  try {
    const controller = await createController(config, logger);
    return await action({ config, logger, controller, signal: abortController.signal });
  } finally {
    stopListening();
    await lock.release();
  }
}
