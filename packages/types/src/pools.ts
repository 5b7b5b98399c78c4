import type { PoolId, TokenAliasTable, TokenPriceTable, TokenSymbol } from './common.js';

// ============================================================================
// Liquidity Pools
// ============================================================================

/**
 * A simulated constant-product liquidity pool.
 *
 * Reserves are static for the process lifetime: quotes never move them.
 */
export interface Pool {
  /** Display identifier, e.g. "WETH/USDC" */
  readonly name: string;
  readonly tokenA: TokenSymbol;
  readonly tokenB: TokenSymbol;
  /** Simulated liquidity of tokenA (> 0) */
  readonly reserveA: number;
  /** Simulated liquidity of tokenB (> 0) */
  readonly reserveB: number;
  /** Swap fee as a percentage (0.3 = 0.3%), taken from the input amount */
  readonly feePct: number;
  /** Exchange the pool belongs to, e.g. "uniswap" */
  readonly dex: string;
}

/**
 * Read-only view of the pool catalog consumed by the route finder.
 *
 * PoolRegistry is the production implementation; tests may pass any
 * object with this shape.
 */
export interface PoolSource {
  /** Full catalog, in stable insertion order */
  listPools(): readonly Pool[];
  /** Allow-list of symbols accepted in queries */
  supportedTokens(): readonly TokenSymbol[];
  /** Whether a symbol is on the allow-list (no alias applied) */
  isSupported(symbol: TokenSymbol): boolean;
  /** Pools trading the unordered pair {a, b}, in catalog order */
  findPoolsForPair(a: TokenSymbol, b: TokenSymbol): readonly Pool[];
  /** Apply symbol aliases (ETH -> WETH) */
  normalizeToken(symbol: TokenSymbol): TokenSymbol;
  /** USD price per token, 0 when unknown */
  getTokenPrice(symbol: TokenSymbol): number;
}

/** Everything needed to build a PoolRegistry */
export interface PoolRegistryConfig {
  pools: Pool[];
  supportedTokens: TokenSymbol[];
  tokenPrices: TokenPriceTable;
  tokenAliases: TokenAliasTable;
}

/** Build the `dex:name` identifier of a pool */
export function poolId(pool: Pick<Pool, 'dex' | 'name'>): PoolId {
  return `${pool.dex}:${pool.name}`;
}

/** Whether the pool trades the unordered pair {a, b} */
export function poolTradesPair(pool: Pick<Pool, 'tokenA' | 'tokenB'>, a: TokenSymbol, b: TokenSymbol): boolean {
  return (
    (pool.tokenA === a && pool.tokenB === b) ||
    (pool.tokenA === b && pool.tokenB === a)
  );
}
