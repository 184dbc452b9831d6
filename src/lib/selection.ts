/**
 * Picks the next resolver pair to apply.
 *
 * Selection always terminates: the current pair is removed from the pool up
 * front, random draws are bounded by `maxRetries`, and the first pool entry
 * is returned if every draw misses.
 */

import { randomInt } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { ResolverPair } from '../types/resolver.js';
import type { HealthCache } from './health.js';
import { silentLogger } from './logger.js';
import { createResolverPair, pairsEqual } from './resolver.js';

/** Applied when no candidate answers a probe. */
export const FALLBACK_PAIR: ResolverPair = createResolverPair('1.1.1.1', '1.0.0.1');

export const DEFAULT_MAX_RETRIES = 5;

/** Returns an integer in [0, max). */
export type RandomIndexFn = (max: number) => number;

export interface SelectionPolicyOptions {
  random?: RandomIndexFn;
  logger?: Logger;
  fallback?: ResolverPair;
}

export class SelectionPolicy {
  private readonly random: RandomIndexFn;
  private readonly logger: Logger;
  private readonly fallback: ResolverPair;

  constructor(
    private readonly cache: HealthCache,
    options: SelectionPolicyOptions = {}
  ) {
    this.random = options.random ?? ((max) => randomInt(max));
    this.logger = options.logger ?? silentLogger;
    this.fallback = options.fallback ?? FALLBACK_PAIR;
  }

  /**
   * Chooses a healthy pair different from `exclude`.
   *
   * @returns the chosen pair, or null when nothing but `exclude` is available
   *   or `signal` aborted, and the caller should skip this cycle
   */
  async choose(
    candidates: readonly ResolverPair[],
    exclude: ResolverPair | null = null,
    maxRetries: number = DEFAULT_MAX_RETRIES,
    signal?: AbortSignal
  ): Promise<ResolverPair | null> {
    let healthy = await this.cache.getHealthy(candidates, false, signal);
    if (signal?.aborted) {
      return null;
    }

    if (healthy.size === 0) {
      this.logger.warn('No healthy DNS servers in cache, forcing re-validation...');
      healthy = await this.cache.getHealthy(candidates, true, signal);
      if (signal?.aborted) {
        return null;
      }
    }

    if (healthy.size === 0) {
      this.logger.error(
        `No healthy DNS servers found! Using ${this.fallback.primary}, ${this.fallback.secondary} as fallback.`
      );
      return pairsEqual(this.fallback, exclude) ? null : this.fallback;
    }

    const pool = [...healthy.values()].filter((pair) => !pairsEqual(pair, exclude));
    if (pool.length === 0) {
      this.logger.warn(
        'Only the current DNS server is healthy. Cannot rotate to a different server this cycle.'
      );
      return null;
    }

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const chosen = pool[this.random(pool.length)];
      if (chosen !== undefined && !pairsEqual(chosen, exclude)) {
        return chosen;
      }
    }

    return pool[0];
  }
}
