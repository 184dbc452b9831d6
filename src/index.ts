#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { ConfigError, DEFAULT_INTERVAL_SECONDS, MAX_ROTATION_INTERVAL, MIN_ROTATION_INTERVAL } from "./lib/config.js";
import { errorMessage } from "./lib/fs.js";
import { isLogLevel } from "./lib/logger.js";
import { LOG_LEVELS } from "./types/logger.js";
import type { ExitCode, GlobalOptions } from "./commands/runtime.js";

function parseInterval(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Interval must be a positive whole number of seconds.");
  }
  return parsed;
}

interface RawGlobalOptions {
  config?: string;
  interface?: string;
  interval?: number;
  logLevel?: string;
}

function toGlobalOptions(raw: RawGlobalOptions): GlobalOptions {
  return {
    config: raw.config,
    interface: raw.interface,
    interval_seconds: raw.interval,
    log_level: raw.logLevel !== undefined && isLogLevel(raw.logLevel) ? raw.logLevel : undefined,
  };
}

async function run(action: () => Promise<ExitCode>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error(`Fatal error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("dns-rotator")
  .description("Rotate the DNS resolver pair across healthy public resolvers")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to configuration file")
  .option("-i, --interface <name>", "Network service to manage (e.g. Wi-Fi, Ethernet)")
  .option(
    "-t, --interval <seconds>",
    `Rotation interval in seconds (min: ${MIN_ROTATION_INTERVAL}, max: ${MAX_ROTATION_INTERVAL}, default: ${DEFAULT_INTERVAL_SECONDS})`,
    parseInterval
  )
  .addOption(new Option("--log-level <level>", "Log verbosity").choices([...LOG_LEVELS]));

program
  .command("start", { isDefault: true })
  .description("Rotate DNS continuously until interrupted")
  .action(async (_options, command: Command) => {
    const { startCommand } = await import("./commands/start.js");
    await run(() => startCommand(toGlobalOptions(command.optsWithGlobals())));
  });

program
  .command("once")
  .description("Rotate DNS once and exit")
  .action(async (_options, command: Command) => {
    const { onceCommand } = await import("./commands/dns.js");
    await run(() => onceCommand(toGlobalOptions(command.optsWithGlobals())));
  });

program
  .command("get")
  .description("Display the current DNS configuration and exit")
  .action(async (_options, command: Command) => {
    const { getCommand } = await import("./commands/dns.js");
    await run(() => getCommand(toGlobalOptions(command.optsWithGlobals())));
  });

program
  .command("set")
  .description("Set specific DNS servers and exit (e.g. set 1.1.1.1 1.0.0.1)")
  .argument("<primary>", "Primary DNS server address")
  .argument("<secondary>", "Secondary DNS server address")
  .action(async (primary: string, secondary: string, _options, command: Command) => {
    const { setCommand } = await import("./commands/dns.js");
    await run(() => setCommand(primary, secondary, toGlobalOptions(command.optsWithGlobals())));
  });

program
  .command("reset")
  .description("Reset DNS to automatic DHCP and exit")
  .action(async (_options, command: Command) => {
    const { resetCommand } = await import("./commands/dns.js");
    await run(() => resetCommand(toGlobalOptions(command.optsWithGlobals())));
  });

await program.parseAsync();
