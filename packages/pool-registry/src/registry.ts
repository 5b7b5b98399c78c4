import { poolId, poolTradesPair } from '@hopline/types';
import type {
  Pool,
  PoolId,
  PoolRegistryConfig,
  PoolSource,
  TokenSymbol,
} from '@hopline/types';
import {
  DEFAULT_POOLS,
  DEFAULT_SUPPORTED_TOKENS,
  DEFAULT_TOKEN_ALIASES,
  DEFAULT_TOKEN_PRICES,
} from './constants.js';
import { PoolRegistryError } from './errors.js';

/**
 * Pool Registry
 *
 * Holds the static catalog of simulated liquidity pools, the allow-list of
 * tradable symbols, symbol aliases and the USD price table. Populated once
 * from its config and read-only afterwards: pools are frozen copies and no
 * method mutates state, so one instance can be shared by concurrent callers.
 */
export class PoolRegistry implements PoolSource {
  private readonly pools: readonly Pool[];
  private readonly tokens: readonly TokenSymbol[];
  private readonly prices: ReadonlyMap<TokenSymbol, number>;
  private readonly aliases: ReadonlyMap<TokenSymbol, TokenSymbol>;

  constructor(config: PoolRegistryConfig) {
    const issues = validatePools(config.pools);
    if (issues.length > 0) {
      throw new PoolRegistryError(`Invalid pool catalog (${issues.length} issue(s))`, issues);
    }

    this.pools = Object.freeze(config.pools.map((pool) => Object.freeze({ ...pool })));
    this.tokens = Object.freeze([...config.supportedTokens]);
    this.prices = new Map(Object.entries(config.tokenPrices));
    this.aliases = new Map(Object.entries(config.tokenAliases));
  }

  /**
   * Full catalog in insertion order.
   * The order is what makes tie-breaking downstream deterministic.
   */
  listPools(): readonly Pool[] {
    return this.pools;
  }

  supportedTokens(): readonly TokenSymbol[] {
    return this.tokens;
  }

  isSupported(symbol: TokenSymbol): boolean {
    return this.tokens.includes(symbol);
  }

  /**
   * Map a symbol through the alias table (ETH -> WETH).
   * Unknown symbols pass through unchanged.
   */
  normalizeToken(symbol: TokenSymbol): TokenSymbol {
    return this.aliases.get(symbol) ?? symbol;
  }

  /**
   * USD price of a token, looked up after alias normalization.
   * Returns 0 for tokens missing from the price table.
   */
  getTokenPrice(symbol: TokenSymbol): number {
    return this.prices.get(this.normalizeToken(symbol)) ?? 0;
  }

  /**
   * Pools trading the unordered pair {a, b}, in catalog order.
   */
  findPoolsForPair(a: TokenSymbol, b: TokenSymbol): Pool[] {
    return this.pools.filter((pool) => poolTradesPair(pool, a, b));
  }

  /**
   * Distinct symbols that appear in at least one pool, in first-seen order.
   */
  listTokens(): TokenSymbol[] {
    const seen = new Set<TokenSymbol>();
    for (const pool of this.pools) {
      seen.add(pool.tokenA);
      seen.add(pool.tokenB);
    }
    return Array.from(seen);
  }

  /**
   * Get the number of pools in the catalog.
   */
  get size(): number {
    return this.pools.length;
  }
}

/**
 * Build a registry from the reference catalog, optionally overriding parts of it.
 */
export function createDefaultRegistry(overrides: Partial<PoolRegistryConfig> = {}): PoolRegistry {
  return new PoolRegistry({
    pools: [...DEFAULT_POOLS],
    supportedTokens: [...DEFAULT_SUPPORTED_TOKENS],
    tokenPrices: DEFAULT_TOKEN_PRICES,
    tokenAliases: DEFAULT_TOKEN_ALIASES,
    ...overrides,
  });
}

/**
 * Check every pool against the registry invariants.
 * Returns one message per violation (empty when the catalog is valid).
 */
export function validatePools(pools: readonly Pool[]): string[] {
  const issues: string[] = [];
  const ids = new Set<PoolId>();

  pools.forEach((pool, index) => {
    const label = pool.dex && pool.name ? poolId(pool) : `pool #${index}`;

    if (!pool.name) issues.push(`${label}: name is empty`);
    if (!pool.dex) issues.push(`${label}: dex is empty`);
    if (!pool.tokenA || !pool.tokenB) {
      issues.push(`${label}: token symbols must be non-empty`);
    } else if (pool.tokenA === pool.tokenB) {
      issues.push(`${label}: tokenA and tokenB are both ${pool.tokenA}`);
    }

    if (!Number.isFinite(pool.reserveA) || pool.reserveA <= 0) {
      issues.push(`${label}: reserveA must be a positive number (got ${pool.reserveA})`);
    }
    if (!Number.isFinite(pool.reserveB) || pool.reserveB <= 0) {
      issues.push(`${label}: reserveB must be a positive number (got ${pool.reserveB})`);
    }
    if (!Number.isFinite(pool.feePct) || pool.feePct < 0 || pool.feePct >= 100) {
      issues.push(`${label}: feePct must be in [0, 100) (got ${pool.feePct})`);
    }

    if (pool.dex && pool.name) {
      const id = poolId(pool);
      if (ids.has(id)) issues.push(`${label}: duplicate pool id`);
      ids.add(id);
    }
  });

  return issues;
}
