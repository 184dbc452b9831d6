/**
 * macOS network configurator built on networksetup, route and ifconfig.
 *
 * Output parsing lives in pure functions so it can be tested without a Mac.
 */

import micromatch from 'micromatch';
import type { Logger } from '../types/logger.js';
import type {
  CommandResult,
  InterfaceStatus,
  NetworkConfigurator,
} from '../types/network.js';
import type { ResolverPair } from '../types/resolver.js';
import { runCommand, DEFAULT_COMMAND_TIMEOUT_MS } from './exec.js';
import type { CommandRunner } from './exec.js';
import { silentLogger } from './logger.js';
import { createResolverPair, isIpLiteral } from './resolver.js';

export const NETWORKSETUP = '/usr/sbin/networksetup';
export const ROUTE = '/sbin/route';
export const IFCONFIG = '/sbin/ifconfig';

/** Argument networksetup takes to drop manual resolvers. */
export const EMPTY_DNS = 'Empty';

/** Used when neither service listing nor the default route yields a name. */
export const FALLBACK_SERVICE = 'Wi-Fi';

export const DEFAULT_VPN_PATTERNS: readonly string[] = ['utun*', 'ppp*', 'tun*', 'tap*', 'ipsec*', 'wg*'];

/**
 * Parses `networksetup -listallnetworkservices`.
 *
 * The first line is an explanatory header containing an asterisk;
 * services prefixed with `*` are disabled.
 */
export function parseServiceList(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('*') && !line.includes('asterisk'));
}

/**
 * Extracts the interface name from `route get default`.
 */
export function parseDefaultRoute(output: string): string | null {
  for (const line of output.split('\n')) {
    const match = line.match(/^\s*interface:\s*(\S+)/);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Parses `networksetup -getdnsservers` into a pair.
 *
 * Non-address lines ("There aren't any DNS Servers set on Wi-Fi.") are ignored.
 * A single address is reported as `(ip, ip)`.
 */
export function parseDnsServers(output: string): ResolverPair | null {
  const addresses = output
    .split('\n')
    .map((line) => line.trim())
    .filter(isIpLiteral);

  if (addresses.length >= 2) {
    return createResolverPair(addresses[0], addresses[1]);
  }
  if (addresses.length === 1) {
    return createResolverPair(addresses[0], addresses[0]);
  }
  return null;
}

/**
 * Parses `ifconfig` output into interfaces and their UP flag.
 *
 * Header lines start in column 0 (`utun3: flags=8051<UP,POINTOPOINT,...>`);
 * indented lines belong to the previous header.
 */
export function parseIfconfig(output: string): InterfaceStatus[] {
  const interfaces: InterfaceStatus[] = [];
  for (const line of output.split('\n')) {
    if (line.length === 0 || /^\s/.test(line)) continue;
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const flags = line.match(/flags=\w+<([^>]*)>/);
    const up = flags !== null && flags[1].split(',').includes('UP');
    interfaces.push({ name: line.slice(0, colon), up });
  }
  return interfaces;
}

/**
 * Returns the UP interfaces whose names match the VPN patterns.
 */
export function findActiveVpnInterfaces(
  interfaces: readonly InterfaceStatus[],
  patterns: readonly string[] = DEFAULT_VPN_PATTERNS
): string[] {
  return interfaces
    .filter((iface) => iface.up && micromatch.isMatch(iface.name, [...patterns]))
    .map((iface) => iface.name);
}

export interface NetworkSetupOptions {
  run?: CommandRunner;
  /** Timeout for reading and writing resolvers */
  timeoutMs?: number;
  /** Timeout for service listing, route lookup and ifconfig */
  discoveryTimeoutMs?: number;
  logger?: Logger;
}

/**
 * NetworkConfigurator over the macOS command-line tools.
 *
 * Resolver reads and writes go through sudo so both run with the same
 * privileges; otherwise an unprivileged read could fail and look like drift.
 */
export class NetworkSetupConfigurator implements NetworkConfigurator {
  private readonly run: CommandRunner;
  private readonly timeoutMs: number;
  private readonly discoveryTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: NetworkSetupOptions = {}) {
    this.run = options.run ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? 5_000;
    this.logger = options.logger ?? silentLogger;
  }

  async listServices(): Promise<string[]> {
    const result = await this.run(NETWORKSETUP, ['-listallnetworkservices'], this.discoveryTimeoutMs);
    if (!result.ok) {
      this.logger.debug(`Error getting network service order: ${result.output}`);
      return [];
    }
    return parseServiceList(result.output);
  }

  async isServiceEnabled(service: string): Promise<boolean> {
    const result = await this.run(
      NETWORKSETUP,
      ['-getnetworkserviceenabled', service],
      this.discoveryTimeoutMs
    );
    if (!result.ok) {
      this.logger.debug(`Error checking interface ${service}: ${result.output}`);
      return false;
    }
    return result.output.includes('Enabled');
  }

  async defaultRouteInterface(): Promise<string | null> {
    const result = await this.run(ROUTE, ['get', 'default'], this.discoveryTimeoutMs);
    if (!result.ok) {
      this.logger.debug(`Error detecting interface via route: ${result.output}`);
      return null;
    }
    return parseDefaultRoute(result.output);
  }

  getDnsServers(service: string): Promise<CommandResult> {
    return this.run('sudo', [NETWORKSETUP, '-getdnsservers', service], this.timeoutMs);
  }

  setDnsServers(service: string, pair: ResolverPair): Promise<CommandResult> {
    return this.run(
      'sudo',
      [NETWORKSETUP, '-setdnsservers', service, pair.primary, pair.secondary],
      this.timeoutMs
    );
  }

  clearDnsServers(service: string): Promise<CommandResult> {
    return this.run('sudo', [NETWORKSETUP, '-setdnsservers', service, EMPTY_DNS], this.timeoutMs);
  }

  async listInterfaces(): Promise<InterfaceStatus[]> {
    const result = await this.run(IFCONFIG, [], this.discoveryTimeoutMs);
    if (!result.ok) {
      this.logger.debug(`Error checking VPN status: ${result.output}`);
      return [];
    }
    return parseIfconfig(result.output);
  }
}

/**
 * Picks the network service to manage.
 *
 * 1. First enabled service in service order
 * 2. Interface carrying the default route
 * 3. "Wi-Fi"
 */
export async function detectInterface(
  configurator: NetworkConfigurator,
  logger: Logger = silentLogger
): Promise<string> {
  logger.info('Starting network interface detection...');

  const active: string[] = [];
  for (const service of await configurator.listServices()) {
    if (await configurator.isServiceEnabled(service)) {
      active.push(service);
    }
  }

  if (active.length > 0) {
    if (active.length > 1) {
      logger.warn(
        `Multiple active interfaces detected: ${active.join(', ')}. ` +
          `Using '${active[0]}'. Override with --interface <name> if needed.`
      );
    } else {
      logger.info(`Detected active interface: ${active[0]}`);
    }
    return active[0];
  }

  const routed = await configurator.defaultRouteInterface();
  if (routed) {
    logger.info(`Detected interface via default route: ${routed}`);
    return routed;
  }

  logger.warn(
    `Could not auto-detect network interface. Defaulting to '${FALLBACK_SERVICE}'. ` +
      'Use --interface <name> to override.'
  );
  return FALLBACK_SERVICE;
}
