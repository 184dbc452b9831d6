/**
 * Resolver pair construction, comparison and the built-in candidate list.
 */

import { readFile } from 'node:fs/promises';
import { isIP } from 'node:net';
import type { ResolverEntry, ResolverPair } from '../types/resolver.js';

/** Shipped candidate list, relative to this module in both src/ and dist/. */
export const DEFAULT_RESOLVERS_URL = new URL('../../data/resolvers.json', import.meta.url);

/**
 * Error thrown when a resolver address is not an IPv4 or IPv6 literal.
 */
export class InvalidResolverError extends Error {
  constructor(
    message: string,
    public readonly address: string
  ) {
    super(message);
    this.name = 'InvalidResolverError';
  }
}

/**
 * Returns true if `address` is an IPv4 or IPv6 literal.
 */
export function isIpLiteral(address: string): boolean {
  return isIP(address) !== 0;
}

/**
 * Builds an immutable resolver pair.
 *
 * @throws {InvalidResolverError} If either address is not an IP literal
 */
export function createResolverPair(primary: string, secondary: string): ResolverPair {
  for (const address of [primary, secondary]) {
    if (!isIpLiteral(address)) {
      throw new InvalidResolverError(`Invalid DNS address: '${address}'`, address);
    }
  }
  return Object.freeze({ primary, secondary });
}

/**
 * Order-sensitive pair equality. `null` only equals `null`.
 */
export function pairsEqual(a: ResolverPair | null, b: ResolverPair | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.primary === b.primary && a.secondary === b.secondary;
}

/** Stable key for use in maps and sets. */
export function pairKey(pair: ResolverPair): string {
  return `${pair.primary},${pair.secondary}`;
}

export function formatPair(pair: ResolverPair): string {
  return `${pair.primary}, ${pair.secondary}`;
}

/**
 * Converts entries into a frozen candidate list.
 *
 * @throws {InvalidResolverError} On the first malformed address
 */
export function toCandidateList(entries: readonly ResolverEntry[]): readonly ResolverPair[] {
  return Object.freeze(entries.map((entry) => createResolverPair(entry.primary, entry.secondary)));
}

function isResolverEntry(value: unknown): value is ResolverEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry = value as Record<string, unknown>;
  return typeof entry.primary === 'string' && typeof entry.secondary === 'string';
}

/**
 * Reads the shipped candidate list from `data/resolvers.json`.
 */
export async function loadDefaultResolvers(
  url: URL = DEFAULT_RESOLVERS_URL
): Promise<readonly ResolverPair[]> {
  const raw: unknown = JSON.parse(await readFile(url, 'utf-8'));
  if (!Array.isArray(raw) || !raw.every(isResolverEntry)) {
    throw new Error(`Resolver list at ${url.pathname} is not an array of {primary, secondary}`);
  }
  return toCandidateList(raw);
}
