/**
 * Configuration loading and validation.
 *
 * The file is optional. When present it is validated against
 * schemas/config.schema.json with Ajv, then merged over the defaults into a
 * fully typed DnsRotatorConfig.
 */

import { access, readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { DnsRotatorConfig, DnsRotatorConfigFile } from '../types/config.js';
import type { LogLevel } from '../types/logger.js';
import type { ResolverPair } from '../types/resolver.js';
import { AtomicFsError, atomicReadJson, errorMessage } from './fs.js';
import { DEFAULT_CACHE_TTL_SECONDS } from './health.js';
import { DEFAULT_VPN_PATTERNS } from './network.js';
import { CONFIG_SEARCH_PATHS, defaultLockPath } from './paths.js';
import { DEFAULT_PROBE_TIMEOUT_SECONDS } from './probe.js';
import { InvalidResolverError, loadDefaultResolvers, toCandidateList } from './resolver.js';
import { DEFAULT_MAX_RETRIES } from './selection.js';

export const CONFIG_SCHEMA_URL = new URL('../../schemas/config.schema.json', import.meta.url);

export const DEFAULT_INTERVAL_SECONDS = 300;
/** Shorter intervals make the network flap */
export const MIN_ROTATION_INTERVAL = 180;
export const MAX_ROTATION_INTERVAL = 86_400;

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Command-line values that take precedence over the file.
 */
export interface ConfigOverrides {
  interval_seconds?: number;
  interface?: string;
  log_level?: LogLevel;
  lock_file?: string;
}

let compiledSchema: ValidateFunction<DnsRotatorConfigFile> | null = null;

async function getValidator(): Promise<ValidateFunction<DnsRotatorConfigFile>> {
  if (compiledSchema) {
    return compiledSchema;
  }
  // Ajv ships CommonJS; under NodeNext the default import is the module object's type.
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: <T>(schema: object) => ValidateFunction<T>;
  };
  const schema: unknown = JSON.parse(await readFile(CONFIG_SCHEMA_URL, 'utf-8'));
  if (typeof schema !== 'object' || schema === null) {
    throw new ConfigError(`Config schema at ${CONFIG_SCHEMA_URL.pathname} is not an object`);
  }
  compiledSchema = new Ajv({ strict: true, allErrors: true }).compile<DnsRotatorConfigFile>(schema);
  return compiledSchema;
}

/**
 * Validates raw JSON against the config schema.
 *
 * @returns The value, typed, if valid
 * @throws {ConfigError} Listing every schema violation
 */
export async function validateConfigFile(
  raw: unknown,
  configPath?: string
): Promise<DnsRotatorConfigFile> {
  const validate = await getValidator();
  if (validate(raw)) {
    return raw;
  }
  const problems = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || '(root)';
    return `${path}: ${error.message ?? 'invalid'}`;
  });
  throw new ConfigError(`Invalid configuration file: ${problems.join('; ')}`, configPath);
}

/**
 * Returns the first existing file among the search paths, or null.
 */
export async function findConfigFile(
  candidates: readonly string[] = CONFIG_SEARCH_PATHS
): Promise<string | null> {
  for (const candidate of candidates) {
    const exists = await access(candidate).then(
      () => true,
      () => false
    );
    if (exists) {
      return candidate;
    }
  }
  return null;
}

/**
 * Clamps a rotation interval into `[min, max]`.
 */
export function clampInterval(
  seconds: number,
  min: number = MIN_ROTATION_INTERVAL,
  max: number = MAX_ROTATION_INTERVAL
): number {
  return Math.min(Math.max(seconds, min), max);
}

/**
 * Merges a validated file and CLI overrides over the defaults.
 */
export async function resolveConfig(
  file: DnsRotatorConfigFile,
  overrides: ConfigOverrides = {},
  source: string | null = null
): Promise<DnsRotatorConfig> {
  let resolvers: readonly ResolverPair[];
  try {
    resolvers = file.resolvers ? toCandidateList(file.resolvers) : await loadDefaultResolvers();
  } catch (error) {
    if (error instanceof InvalidResolverError) {
      throw new ConfigError(`Invalid resolver list: ${error.message}`, source ?? undefined, error);
    }
    throw error;
  }

  const min = file.min_interval_seconds ?? MIN_ROTATION_INTERVAL;
  const max = file.max_interval_seconds ?? MAX_ROTATION_INTERVAL;
  if (min > max) {
    throw new ConfigError(
      `min_interval_seconds (${min}) is greater than max_interval_seconds (${max})`,
      source ?? undefined
    );
  }

  return {
    interval_seconds: overrides.interval_seconds ?? file.interval_seconds ?? DEFAULT_INTERVAL_SECONDS,
    min_interval_seconds: min,
    max_interval_seconds: max,
    interface: overrides.interface ?? file.interface ?? null,
    lock_file: overrides.lock_file ?? file.lock_file ?? (await defaultLockPath()),
    log_level: overrides.log_level ?? file.log_level ?? 'info',
    health: {
      timeout_seconds: file.health?.timeout_seconds ?? DEFAULT_PROBE_TIMEOUT_SECONDS,
      cache_ttl_seconds: file.health?.cache_ttl_seconds ?? DEFAULT_CACHE_TTL_SECONDS,
      max_retries: file.health?.max_retries ?? DEFAULT_MAX_RETRIES,
    },
    commands: {
      timeout_seconds: file.commands?.timeout_seconds ?? 10,
      discovery_timeout_seconds: file.commands?.discovery_timeout_seconds ?? 5,
    },
    vpn: {
      interface_patterns: file.vpn?.interface_patterns ?? [...DEFAULT_VPN_PATTERNS],
    },
    resolvers,
    source,
  };
}

/**
 * Loads the configuration.
 *
 * @param configPath - Explicit file; when omitted the search paths are tried
 *   and a missing file means defaults
 * @throws {ConfigError} If a file exists but cannot be read or is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig(undefined, { interval_seconds: 600 });
 * ```
 */
export async function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
  searchPaths: readonly string[] = CONFIG_SEARCH_PATHS
): Promise<DnsRotatorConfig> {
  const resolvedPath = configPath ? resolve(configPath) : await findConfigFile(searchPaths);
  if (!resolvedPath) {
    return resolveConfig({}, overrides, null);
  }

  let raw: unknown;
  try {
    raw = await atomicReadJson(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(
        `Failed to read configuration file: ${errorMessage(error)}`,
        resolvedPath,
        error
      );
    }
    throw error;
  }

  const file = await validateConfigFile(raw, resolvedPath);
  return resolveConfig(file, overrides, resolvedPath);
}
