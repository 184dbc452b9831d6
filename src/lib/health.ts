/**
 * Read-through cache of healthy resolver pairs.
 *
 * A refresh probes both members of every candidate pair, one address at a
 * time, and keeps the pairs where at least one member answered. Between
 * refreshes the cached set is served as-is until the TTL runs out.
 */

import type { Logger } from '../types/logger.js';
import type { ResolverPair } from '../types/resolver.js';
import { silentLogger } from './logger.js';
import { DEFAULT_PROBE_TIMEOUT_SECONDS, isResponsive } from './probe.js';
import type { ProbeFn } from './probe.js';
import { formatPair, pairKey } from './resolver.js';

export const DEFAULT_CACHE_TTL_SECONDS = 1800;

export interface HealthCacheOptions {
  probe?: ProbeFn;
  probeTimeoutSeconds?: number;
  ttlSeconds?: number;
  /** Milliseconds clock, `Date.now` by default */
  now?: () => number;
  logger?: Logger;
}

export type HealthySet = ReadonlyMap<string, ResolverPair>;

export class HealthCache {
  private healthy: HealthySet = new Map();
  private refreshedAt: number | null = null;

  private readonly probe: ProbeFn;
  private readonly probeTimeoutSeconds: number;
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: HealthCacheOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.probe =
      options.probe ??
      ((address, timeoutSeconds) => isResponsive(address, timeoutSeconds, { logger: this.logger }));
    this.probeTimeoutSeconds = options.probeTimeoutSeconds ?? DEFAULT_PROBE_TIMEOUT_SECONDS;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  /** Time of the last refresh in milliseconds, or null before the first one. */
  get lastRefresh(): number | null {
    return this.refreshedAt;
  }

  /**
   * Returns the healthy pairs, probing first on a miss.
   *
   * A miss is `forceRefresh`, an empty history, or a cache older than the TTL.
   * A refresh cut short by `signal` is returned but not cached.
   */
  async getHealthy(
    candidates: readonly ResolverPair[],
    forceRefresh = false,
    signal?: AbortSignal
  ): Promise<HealthySet> {
    const now = this.now();
    const expired =
      this.refreshedAt === null || (now - this.refreshedAt) / 1000 > this.ttlSeconds;

    if (forceRefresh || expired) {
      this.logger.info('Updating DNS health check cache...');
      const healthy = await this.validate(candidates, signal);
      if (signal?.aborted) {
        return healthy;
      }
      this.healthy = healthy;
      // Never move the stamp backwards, even if the clock does.
      this.refreshedAt = this.refreshedAt === null ? now : Math.max(this.refreshedAt, now);
    }

    return this.healthy;
  }

  /**
   * Probes every candidate pair and returns those with at least one live member.
   * Stops before the next pair once `signal` aborts.
   */
  async validate(candidates: readonly ResolverPair[], signal?: AbortSignal): Promise<HealthySet> {
    const healthy = new Map<string, ResolverPair>();
    this.logger.info(`Starting health check for ${candidates.length} DNS servers...`);

    for (const pair of candidates) {
      if (signal?.aborted) {
        this.logger.info('Health check interrupted.');
        return healthy;
      }
      const primaryOk = await this.probe(pair.primary, this.probeTimeoutSeconds);
      const secondaryOk = await this.probe(pair.secondary, this.probeTimeoutSeconds);

      if (primaryOk || secondaryOk) {
        healthy.set(pairKey(pair), pair);
        const status = primaryOk && secondaryOk ? 'HEALTHY' : 'PARTIAL';
        this.logger.debug(`${status}: ${formatPair(pair)}`);
      } else {
        this.logger.debug(`FAILED: ${formatPair(pair)}`);
      }
    }

    this.logger.info(`Health check complete: ${healthy.size}/${candidates.length} servers healthy`);
    return healthy;
  }
}
