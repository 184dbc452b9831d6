/**
 * TypeScript interfaces for the dns-rotator config.json file.
 *
 * `DnsRotatorConfigFile` mirrors what may appear on disk (every key optional);
 * `DnsRotatorConfig` is the resolved structure with defaults applied.
 */

import type { LogLevel } from './logger.js';
import type { ResolverEntry, ResolverPair } from './resolver.js';

/**
 * Health probing settings.
 */
export interface HealthConfig {
  /** Per-address UDP probe timeout */
  timeout_seconds: number;
  /** How long a probe pass stays valid before the next one */
  cache_ttl_seconds: number;
  /** Random draws before selection falls back to the first candidate */
  max_retries: number;
}

/**
 * Timeouts for the external network commands.
 */
export interface CommandsConfig {
  /** Reading and writing resolver settings */
  timeout_seconds: number;
  /** Service listing, default route and interface enumeration */
  discovery_timeout_seconds: number;
}

/**
 * VPN presence detection settings.
 */
export interface VpnConfig {
  /** Glob patterns matched against interface names (e.g. "utun*") */
  interface_patterns: string[];
}

/**
 * Configuration file contents as written by the operator.
 */
export interface DnsRotatorConfigFile {
  interval_seconds?: number;
  min_interval_seconds?: number;
  max_interval_seconds?: number;
  interface?: string;
  lock_file?: string;
  log_level?: LogLevel;
  health?: Partial<HealthConfig>;
  commands?: Partial<CommandsConfig>;
  vpn?: Partial<VpnConfig>;
  resolvers?: ResolverEntry[];
}

/**
 * Fully resolved configuration, built once at startup.
 */
export interface DnsRotatorConfig {
  /** Requested rotation interval (clamped by the controller) */
  interval_seconds: number;
  min_interval_seconds: number;
  max_interval_seconds: number;
  /** Network service to manage; null means auto-detect */
  interface: string | null;
  /** PID file path */
  lock_file: string;
  log_level: LogLevel;
  health: HealthConfig;
  commands: CommandsConfig;
  vpn: VpnConfig;
  /** Candidate list, in preference order */
  resolvers: readonly ResolverPair[];
  /** File the configuration was read from, or null when running on defaults */
  source: string | null;
}
