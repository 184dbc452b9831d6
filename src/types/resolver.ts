/**
 * Resolver pair type definitions.
 */

/**
 * The primary/secondary DNS server addresses applied to a network service.
 *
 * Equality is order-sensitive: `(a, b)` and `(b, a)` are different pairs.
 */
export interface ResolverPair {
  readonly primary: string;
  readonly secondary: string;
}

/**
 * A resolver pair as written in `data/resolvers.json` or the config file.
 */
export interface ResolverEntry {
  /** Display name of the provider, if known */
  name?: string;
  primary: string;
  secondary: string;
}
