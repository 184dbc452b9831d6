import { describe, it, expect } from 'vitest';
import type { CommandResult } from '../../src/types/network.js';
import {
  detectInterface,
  findActiveVpnInterfaces,
  NetworkSetupConfigurator,
  parseDefaultRoute,
  parseDnsServers,
  parseIfconfig,
  parseServiceList,
} from '../../src/lib/network.js';
import { createRecordingLogger, FakeConfigurator, PAIR_B } from '../helpers/mocks.js';

const IFCONFIG_OUTPUT = [
  'lo0: flags=8049<UP,LOOPBACK,RUNNING,MULTICAST> mtu 16384',
  '\tinet 127.0.0.1 netmask 0xff000000',
  'en0: flags=8863<UP,BROADCAST,SMART,RUNNING,SIMPLEX,MULTICAST> mtu 1500',
  '\tether aa:bb:cc:dd:ee:ff',
  'utun0: flags=8051<UP,POINTOPOINT,RUNNING,MULTICAST> mtu 1380',
  'utun1: flags=8010<POINTOPOINT,MULTICAST> mtu 2000',
  'wg0: flags=8051<UP,POINTOPOINT,RUNNING,MULTICAST> mtu 1420',
  'ipsec0: flags=8010<POINTOPOINT,MULTICAST> mtu 1400',
  '',
].join('\n');

describe('parseServiceList', () => {
  it('skips the header and disabled services', () => {
    const output = [
      'An asterisk (*) denotes that a network service is disabled.',
      'Wi-Fi',
      '*Bluetooth PAN',
      'Thunderbolt Bridge',
      '',
    ].join('\n');

    expect(parseServiceList(output)).toEqual(['Wi-Fi', 'Thunderbolt Bridge']);
  });
});

describe('parseDefaultRoute', () => {
  it('extracts the interface line', () => {
    const output = [
      '   route to: default',
      'destination: default',
      '    gateway: 192.168.1.1',
      '  interface: en0',
      '      flags: <UP,GATEWAY,DONE,STATIC,PRCLONING>',
    ].join('\n');

    expect(parseDefaultRoute(output)).toBe('en0');
  });

  it('returns null without an interface line', () => {
    expect(parseDefaultRoute('route: writing to routing socket: not in table')).toBeNull();
  });
});

describe('parseDnsServers', () => {
  it('returns the first two addresses', () => {
    expect(parseDnsServers('9.9.9.9\n149.112.112.112\n1.1.1.1')).toEqual(PAIR_B);
  });

  it('duplicates a single address', () => {
    expect(parseDnsServers('2606:4700:4700::1111\n')).toEqual({
      primary: '2606:4700:4700::1111',
      secondary: '2606:4700:4700::1111',
    });
  });

  it('returns null when no servers are set', () => {
    expect(parseDnsServers("There aren't any DNS Servers set on Wi-Fi.")).toBeNull();
  });
});

describe('parseIfconfig', () => {
  it('reads interface names and the UP flag from header lines', () => {
    expect(parseIfconfig(IFCONFIG_OUTPUT)).toEqual([
      { name: 'lo0', up: true },
      { name: 'en0', up: true },
      { name: 'utun0', up: true },
      { name: 'utun1', up: false },
      { name: 'wg0', up: true },
      { name: 'ipsec0', up: false },
    ]);
  });
});

describe('findActiveVpnInterfaces', () => {
  it('returns UP interfaces matching the VPN patterns', () => {
    expect(findActiveVpnInterfaces(parseIfconfig(IFCONFIG_OUTPUT))).toEqual(['utun0', 'wg0']);
  });

  it('honours custom patterns', () => {
    expect(findActiveVpnInterfaces(parseIfconfig(IFCONFIG_OUTPUT), ['wg*'])).toEqual(['wg0']);
  });

  it('ignores interfaces that are down', () => {
    expect(findActiveVpnInterfaces([{ name: 'ppp0', up: false }])).toEqual([]);
  });
});

describe('NetworkSetupConfigurator', () => {
  function recordingRunner(results: Record<string, CommandResult> = {}) {
    const calls: Array<{ cmd: string; args: string[]; timeoutMs: number }> = [];
    const run = async (cmd: string, args: string[], timeoutMs: number): Promise<CommandResult> => {
      calls.push({ cmd, args, timeoutMs });
      return results[[cmd, ...args].join(' ')] ?? { ok: true, output: '' };
    };
    return { run, calls };
  }

  it('writes resolvers through sudo networksetup with the command timeout', async () => {
    const { run, calls } = recordingRunner();
    const configurator = new NetworkSetupConfigurator({ run, timeoutMs: 10_000 });

    await configurator.setDnsServers('Wi-Fi', PAIR_B);

    expect(calls).toEqual([
      {
        cmd: 'sudo',
        args: ['/usr/sbin/networksetup', '-setdnsservers', 'Wi-Fi', '9.9.9.9', '149.112.112.112'],
        timeoutMs: 10_000,
      },
    ]);
  });

  it('clears resolvers with "Empty"', async () => {
    const { run, calls } = recordingRunner();
    const configurator = new NetworkSetupConfigurator({ run });

    await configurator.clearDnsServers('Ethernet');

    expect(calls[0].args).toEqual(['/usr/sbin/networksetup', '-setdnsservers', 'Ethernet', 'Empty']);
  });

  it('uses the discovery timeout for listing services', async () => {
    const { run, calls } = recordingRunner({
      '/usr/sbin/networksetup -listallnetworkservices': {
        ok: true,
        output: 'An asterisk (*) denotes that a network service is disabled.\nWi-Fi',
      },
    });
    const configurator = new NetworkSetupConfigurator({ run, discoveryTimeoutMs: 5_000 });

    await expect(configurator.listServices()).resolves.toEqual(['Wi-Fi']);
    expect(calls[0].timeoutMs).toBe(5_000);
  });

  it('reports a service as enabled only when networksetup says so', async () => {
    const { run } = recordingRunner({
      '/usr/sbin/networksetup -getnetworkserviceenabled Wi-Fi': { ok: true, output: 'Enabled' },
      '/usr/sbin/networksetup -getnetworkserviceenabled Ethernet': { ok: true, output: 'Disabled' },
    });
    const configurator = new NetworkSetupConfigurator({ run });

    await expect(configurator.isServiceEnabled('Wi-Fi')).resolves.toBe(true);
    await expect(configurator.isServiceEnabled('Ethernet')).resolves.toBe(false);
  });

  it('returns no interfaces when ifconfig fails', async () => {
    const { run } = recordingRunner({ '/sbin/ifconfig': { ok: false, output: 'Command timed out' } });
    const configurator = new NetworkSetupConfigurator({ run });

    await expect(configurator.listInterfaces()).resolves.toEqual([]);
  });
});

describe('detectInterface', () => {
  it('uses the first enabled service', async () => {
    const configurator = new FakeConfigurator();
    configurator.services = ['Ethernet', 'Wi-Fi'];
    configurator.enabled = new Set(['Wi-Fi']);

    await expect(detectInterface(configurator)).resolves.toBe('Wi-Fi');
  });

  it('warns when several services are enabled', async () => {
    const configurator = new FakeConfigurator();
    configurator.services = ['Ethernet', 'Wi-Fi'];
    configurator.enabled = new Set(['Ethernet', 'Wi-Fi']);
    const logger = createRecordingLogger();

    await expect(detectInterface(configurator, logger)).resolves.toBe('Ethernet');
    expect(logger.lines.filter((line) => line.level === 'warn')).toHaveLength(1);
  });

  it('falls back to the default route interface', async () => {
    const configurator = new FakeConfigurator();
    configurator.enabled = new Set();
    configurator.route = 'en0';

    await expect(detectInterface(configurator)).resolves.toBe('en0');
  });

  it('defaults to Wi-Fi when nothing is detected', async () => {
    const configurator = new FakeConfigurator();
    configurator.services = [];
    configurator.route = null;

    await expect(detectInterface(configurator)).resolves.toBe('Wi-Fi');
  });
});
