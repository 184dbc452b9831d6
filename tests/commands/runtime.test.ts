import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig } from '../../src/lib/config.js';
import {
  createController,
  listenForShutdown,
  LOCK_HELD_MESSAGE,
  withRuntime,
} from '../../src/commands/runtime.js';
import { createRecordingLogger, FakeConfigurator } from '../helpers/mocks.js';

describe('runtime', () => {
  let testDir: string;
  let configPath: string;
  let lockPath: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `dns-rotator-runtime-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    lockPath = join(testDir, 'dns-rotator.pid');
    configPath = join(testDir, 'config.json');
    writeFileSync(
      configPath,
      JSON.stringify({ interface: 'Ethernet', interval_seconds: 600, lock_file: lockPath, log_level: 'error' }),
      'utf-8'
    );
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('withRuntime', () => {
    it('holds the lock while the action runs and releases it afterwards', async () => {
      let lockDuringAction: string | null = null;
      let interfaceName: string | null = null;

      const code = await withRuntime({ config: configPath }, async ({ config, controller }) => {
        lockDuringAction = readFileSync(lockPath, 'utf-8');
        interfaceName = controller.interfaceName;
        expect(config.interval_seconds).toBe(600);
        expect(controller.interval).toBe(600);
        return 0;
      });

      expect(code).toBe(0);
      expect(lockDuringAction).toBe(`${process.pid}\n`);
      expect(interfaceName).toBe('Ethernet');
      expect(existsSync(lockPath)).toBe(false);
    });

    it('passes the action exit code through', async () => {
      await expect(withRuntime({ config: configPath }, async () => 1)).resolves.toBe(1);
    });

    it('applies command-line overrides', async () => {
      const seen: number[] = [];

      await withRuntime({ config: configPath, interval_seconds: 900 }, async ({ controller }) => {
        seen.push(controller.interval);
        return 0;
      });

      expect(seen).toEqual([900]);
    });

    it('refuses to run while another live process holds the lock', async () => {
      writeFileSync(lockPath, `${process.ppid}\n`, 'utf-8');
      const action = vi.fn(async () => 0 as const);

      const code = await withRuntime({ config: configPath }, action);

      expect(code).toBe(1);
      expect(action).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalledWith(LOCK_HELD_MESSAGE);
      expect(readFileSync(lockPath, 'utf-8')).toBe(`${process.ppid}\n`);
    });

    it('catches termination signals for as long as the lock is held', async () => {
      const before = { SIGINT: process.listenerCount('SIGINT'), SIGTERM: process.listenerCount('SIGTERM') };
      const during: Array<{ SIGINT: number; SIGTERM: number; aborted: boolean }> = [];

      await withRuntime({ config: configPath }, async ({ signal }) => {
        during.push({
          SIGINT: process.listenerCount('SIGINT'),
          SIGTERM: process.listenerCount('SIGTERM'),
          aborted: signal.aborted,
        });
        return 0;
      });

      expect(during).toEqual([{ SIGINT: before.SIGINT + 1, SIGTERM: before.SIGTERM + 1, aborted: false }]);
      expect(process.listenerCount('SIGINT')).toBe(before.SIGINT);
      expect(process.listenerCount('SIGTERM')).toBe(before.SIGTERM);
    });

    it('installs no signal handlers when the lock is refused', async () => {
      writeFileSync(lockPath, `${process.ppid}\n`, 'utf-8');
      const before = process.listenerCount('SIGTERM');

      await withRuntime({ config: configPath }, async () => 0);

      expect(process.listenerCount('SIGTERM')).toBe(before);
    });

    it('releases the lock when the action throws', async () => {
      await expect(
        withRuntime({ config: configPath }, async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(existsSync(lockPath)).toBe(false);
    });
  });

  describe('listenForShutdown', () => {
    it.each(['SIGINT', 'SIGTERM'])('aborts on %s', (name) => {
      const source = new EventEmitter();
      const abortController = new AbortController();
      listenForShutdown(abortController, source);

      source.emit(name, name);

      expect(abortController.signal.aborted).toBe(true);
    });

    it('removes its handlers when stopped', () => {
      const source = new EventEmitter();
      const abortController = new AbortController();
      const stop = listenForShutdown(abortController, source);

      stop();
      source.emit('SIGTERM', 'SIGTERM');

      expect(source.listenerCount('SIGINT')).toBe(0);
      expect(source.listenerCount('SIGTERM')).toBe(0);
      expect(abortController.signal.aborted).toBe(false);
    });
  });

  describe('createController', () => {
    it('detects the interface when none is configured', async () => {
      writeFileSync(configPath, JSON.stringify({ lock_file: lockPath }), 'utf-8');
      const config = await loadConfig(configPath);
      const configurator = new FakeConfigurator();
      configurator.services = ['Ethernet', 'Wi-Fi'];
      configurator.enabled = new Set(['Wi-Fi']);

      const controller = await createController(config, createRecordingLogger(), configurator);

      expect(controller.interfaceName).toBe('Wi-Fi');
      expect(controller.interval).toBe(300);
    });

    it('uses the configured interface without probing the system', async () => {
      const config = await loadConfig(configPath);
      const configurator = new FakeConfigurator();

      const controller = await createController(config, createRecordingLogger(), configurator);

      expect(controller.interfaceName).toBe('Ethernet');
      expect(configurator.calls).toEqual([]);
    });
  });
});
