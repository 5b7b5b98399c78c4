import type { Pool, TokenAliasTable, TokenPriceTable } from '@hopline/types';

/** Symbols accepted in queries (ETH is routed as WETH) */
export const DEFAULT_SUPPORTED_TOKENS: readonly string[] = ['WETH', 'ETH', 'USDC', 'RISE'];

/** Native ETH routes through the wrapped pools */
export const DEFAULT_TOKEN_ALIASES: TokenAliasTable = {
  ETH: 'WETH',
};

/** Simulated USD prices */
export const DEFAULT_TOKEN_PRICES: TokenPriceTable = {
  WETH: 2000,
  USDC: 1,
  RISE: 0.05,
};

/** Reference pool catalog: three simulated dexes */
export const DEFAULT_POOLS: readonly Pool[] = [
  // Uniswap V2 style
  { name: 'WETH/USDC', tokenA: 'WETH', tokenB: 'USDC', reserveA: 1_000, reserveB: 2_000_000, feePct: 0.3, dex: 'uniswap' },
  { name: 'WETH/RISE', tokenA: 'WETH', tokenB: 'RISE', reserveA: 100, reserveB: 4_000_000, feePct: 0.3, dex: 'uniswap' },
  { name: 'USDC/RISE', tokenA: 'USDC', tokenB: 'RISE', reserveA: 50_000, reserveB: 1_000_000, feePct: 0.3, dex: 'uniswap' },

  // SushiSwap
  { name: 'WETH/USDC', tokenA: 'WETH', tokenB: 'USDC', reserveA: 800, reserveB: 1_600_000, feePct: 0.25, dex: 'sushiswap' },
  { name: 'RISE/USDC', tokenA: 'RISE', tokenB: 'USDC', reserveA: 2_000_000, reserveB: 100_000, feePct: 0.25, dex: 'sushiswap' },

  // 1inch
  { name: 'WETH/USDC', tokenA: 'WETH', tokenB: 'USDC', reserveA: 1_200, reserveB: 2_400_000, feePct: 0.1, dex: '1inch' },
  { name: 'RISE/WETH', tokenA: 'RISE', tokenB: 'WETH', reserveA: 5_000_000, reserveB: 125, feePct: 0.2, dex: '1inch' },
];
