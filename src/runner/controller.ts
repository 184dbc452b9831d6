/**
 * Rotation controller.
 *
 * Owns the rotation timer and a two-state machine:
 *
 *   ACTIVE --drift--> PAUSED --no drift--> ACTIVE
 *
 * Drift means the OS reports a resolver pair other than the one we last
 * applied, i.e. a VPN client or the user took over DNS. While paused nothing
 * is written; each tick only re-checks. A tick that ends ACTIVE rotates.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../types/logger.js';
import type { NetworkConfigurator } from '../types/network.js';
import type { ResolverPair } from '../types/resolver.js';
import { clampInterval, MAX_ROTATION_INTERVAL, MIN_ROTATION_INTERVAL } from '../lib/config.js';
import { errorMessage } from '../lib/fs.js';
import { silentLogger } from '../lib/logger.js';
import { DEFAULT_VPN_PATTERNS, findActiveVpnInterfaces, parseDnsServers } from '../lib/network.js';
import { createResolverPair, formatPair, InvalidResolverError, pairsEqual } from '../lib/resolver.js';
import { DEFAULT_MAX_RETRIES } from '../lib/selection.js';
import type { SelectionPolicy } from '../lib/selection.js';

export type PairSelector = Pick<SelectionPolicy, 'choose'>;

/** Sleeps for `ms` or until `signal` aborts, whichever comes first. Never rejects on abort. */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

/** Snapshot of the controller's mutable state. */
export interface RotationState {
  /** Pair last applied successfully, or null */
  current: ResolverPair | null;
  running: boolean;
  paused: boolean;
}

/** What a single tick observed and did. */
export interface TickOutcome {
  drift: boolean;
  /** Only probed when drift pauses rotation */
  vpn: boolean;
  paused: boolean;
  rotated: boolean;
}

export interface RotationControllerOptions {
  /** Network service whose resolvers are managed (e.g. "Wi-Fi") */
  interfaceName: string;
  /** Requested interval in seconds, clamped into [minInterval, maxInterval] */
  interval: number;
  candidates: readonly ResolverPair[];
  minInterval?: number;
  maxInterval?: number;
  maxRetries?: number;
  vpnPatterns?: readonly string[];
}

export interface RotationControllerDeps {
  configurator: NetworkConfigurator;
  selection: PairSelector;
  logger?: Logger;
  sleep?: SleepFn;
}

export class RotationController {
  readonly interfaceName: string;
  private intervalSeconds: number;
  private readonly minInterval: number;
  private readonly maxInterval: number;
  private readonly candidates: readonly ResolverPair[];
  private readonly maxRetries: number;
  private readonly vpnPatterns: readonly string[];

  private readonly configurator: NetworkConfigurator;
  private readonly selection: PairSelector;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;

  private current: ResolverPair | null = null;
  private running = false;
  private paused = false;

  constructor(options: RotationControllerOptions, deps: RotationControllerDeps) {
    this.interfaceName = options.interfaceName;
    this.minInterval = options.minInterval ?? MIN_ROTATION_INTERVAL;
    this.maxInterval = options.maxInterval ?? MAX_ROTATION_INTERVAL;
    this.candidates = options.candidates;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.vpnPatterns = options.vpnPatterns ?? DEFAULT_VPN_PATTERNS;

    this.configurator = deps.configurator;
    this.selection = deps.selection;
    this.logger = deps.logger ?? silentLogger;
    this.sleep = deps.sleep ?? abortableSleep;

    this.intervalSeconds = this.effectiveInterval(options.interval);
    this.logger.info(`DNS rotator initialized for interface: ${this.interfaceName}`);
  }

  /** Effective rotation interval in seconds. */
  get interval(): number {
    return this.intervalSeconds;
  }

  get state(): RotationState {
    return { current: this.current, running: this.running, paused: this.paused };
  }

  /**
   * Reads the resolvers the OS reports for the managed service.
   *
   * @returns null if the command fails or lists no addresses
   */
  async getCurrent(): Promise<ResolverPair | null> {
    const result = await this.configurator.getDnsServers(this.interfaceName);
    if (!result.ok) {
      this.logger.debug(`Could not read DNS servers: ${result.output}`);
      return null;
    }
    return parseDnsServers(result.output);
  }

  /**
   * Validates and applies an explicit pair. Malformed addresses are rejected
   * before any command runs.
   */
  async setDns(primary: string, secondary: string): Promise<boolean> {
    let pair: ResolverPair;
    try {
      pair = createResolverPair(primary, secondary);
    } catch (error) {
      if (error instanceof InvalidResolverError) {
        this.logger.error(error.message);
        return false;
      }
      throw error;
    }
    return this.apply(pair);
  }

  setExplicit(pair: ResolverPair): Promise<boolean> {
    return this.setDns(pair.primary, pair.secondary);
  }

  /** Returns the service to DHCP-provided resolvers. */
  async reset(): Promise<boolean> {
    const result = await this.configurator.clearDnsServers(this.interfaceName);
    if (!result.ok) {
      this.logger.error(`Error resetting DNS: ${result.output}`);
      return false;
    }
    this.current = null;
    this.logger.info('DNS reset to automatic DHCP.');
    return true;
  }

  /**
   * Applies a healthy pair other than the current one.
   *
   * Nothing is written once `signal` has aborted, even if selection already
   * picked a pair.
   *
   * @returns false when selection has no alternative, the write fails or
   *   shutdown was requested
   */
  async rotateOnce(signal?: AbortSignal): Promise<boolean> {
    const pair = await this.selection.choose(this.candidates, this.current, this.maxRetries, signal);
    if (signal?.aborted) {
      this.logger.info('Shutdown requested; skipping DNS change.');
      return false;
    }
    if (pair === null) {
      this.logger.warn('No alternative DNS available this cycle. Keeping current DNS.');
      return false;
    }
    return this.apply(pair);
  }

  /**
   * Runs one drift check and, when the resulting state is ACTIVE, one rotation.
   */
  async tick(signal?: AbortSignal): Promise<TickOutcome> {
    const drift = await this.detectDrift();
    let vpn = false;

    if (drift) {
      if (!this.paused) {
        vpn = await this.isVpnActive();
        if (vpn) {
          this.logger.warn('VPN detected with DNS overwrite. Pausing rotation to avoid conflicts.');
        } else {
          this.logger.warn('DNS was overwritten by an external process. Pausing rotation.');
        }
        this.paused = true;
      }
    } else if (this.paused) {
      this.logger.info('DNS is stable again. Resuming rotation.');
      this.paused = false;
    }

    if (this.paused) {
      this.logger.debug('Rotation paused.');
      return { drift, vpn, paused: true, rotated: false };
    }

    const rotated = await this.rotateOnce(signal);
    return { drift, vpn, paused: false, rotated };
  }

  /**
   * Rotates immediately, then ticks every interval until `signal` aborts.
   *
   * Errors inside a tick are logged and the loop carries on. An abort during
   * a rotation cancels its DNS write.
   */
  async runContinuous(signal: AbortSignal, intervalSeconds?: number): Promise<void> {
    if (intervalSeconds !== undefined) {
      this.intervalSeconds = this.effectiveInterval(intervalSeconds);
    }
    if (signal.aborted) {
      return;
    }

    this.running = true;
    this.logger.info(`Starting DNS rotation every ${this.intervalSeconds} seconds`);

    try {
      await this.guarded(() => this.rotateOnce(signal));

      while (!signal.aborted) {
        await this.sleep(this.intervalSeconds * 1000, signal);
        if (signal.aborted) break;
        await this.guarded(() => this.tick(signal));
      }
    } finally {
      this.running = false;
      this.logger.info('DNS rotation stopped.');
    }
  }

  private effectiveInterval(requested: number): number {
    const interval = clampInterval(requested, this.minInterval, this.maxInterval);
    if (interval > requested) {
      this.logger.warn(`Interval ${requested}s is too short. Using minimum ${interval}s.`);
    } else if (interval < requested) {
      this.logger.warn(`Interval ${requested}s exceeds maximum. Using maximum ${interval}s.`);
    } else {
      this.logger.info(`Rotation interval set to ${interval}s`);
    }
    return interval;
  }

  private async apply(pair: ResolverPair): Promise<boolean> {
    const result = await this.configurator.setDnsServers(this.interfaceName, pair);
    if (!result.ok) {
      this.logger.error(`Error changing DNS: ${result.output}`);
      return false;
    }
    this.current = pair;
    this.logger.info(`DNS changed to: ${formatPair(pair)}`);
    return true;
  }

  private async detectDrift(): Promise<boolean> {
    if (this.current === null) {
      return false;
    }

    const observed = await this.getCurrent();
    if (observed === null) {
      this.logger.warn('Could not read current DNS; skipping overwrite check.');
      return false;
    }

    if (!pairsEqual(observed, this.current)) {
      this.logger.warn(
        `DNS overwrite detected! Expected: ${formatPair(this.current)}, Current: ${formatPair(observed)}`
      );
      return true;
    }
    return false;
  }

  private async isVpnActive(): Promise<boolean> {
    const active = findActiveVpnInterfaces(await this.configurator.listInterfaces(), this.vpnPatterns);
    if (active.length > 0) {
      this.logger.debug(`Active VPN interface detected: ${active.join(', ')}`);
    }
    return active.length > 0;
  }

  private async guarded(step: () => Promise<unknown>): Promise<void> {
    try {
      await step();
    } catch (error) {
      this.logger.error(`Unexpected error in rotation loop: ${errorMessage(error)}`);
    }
  }
}
