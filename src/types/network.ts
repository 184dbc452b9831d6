/**
 * Network configurator type definitions.
 *
 * The configurator wraps the OS commands that read and write resolver settings.
 * Everything above it talks to this interface only, so tests can swap in a fake.
 */

import type { ResolverPair } from './resolver.js';

/**
 * Outcome of an external command, reduced to success plus a message.
 *
 * `output` is trimmed stdout on success and trimmed stderr (or a description
 * of the failure) otherwise.
 */
export interface CommandResult {
  ok: boolean;
  output: string;
}

/**
 * A network interface as reported by `ifconfig`.
 */
export interface InterfaceStatus {
  name: string;
  /** Whether the header line carries the UP flag */
  up: boolean;
}

/**
 * Operations on the host's network settings.
 */
export interface NetworkConfigurator {
  /** Names of the enabled network services in service order. */
  listServices(): Promise<string[]>;
  isServiceEnabled(service: string): Promise<boolean>;
  /** BSD name of the interface carrying the default route, if any. */
  defaultRouteInterface(): Promise<string | null>;
  /** Raw resolver listing for `service`. */
  getDnsServers(service: string): Promise<CommandResult>;
  setDnsServers(service: string, pair: ResolverPair): Promise<CommandResult>;
  /** Returns `service` to DHCP-provided resolvers. */
  clearDnsServers(service: string): Promise<CommandResult>;
  listInterfaces(): Promise<InterfaceStatus[]>;
}
