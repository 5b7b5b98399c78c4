// ============================================================================
// Core Primitives
// ============================================================================

/** Token symbol as used in pools and queries (e.g. "WETH", "USDC") */
export type TokenSymbol = string;

/** Pool identifier in the form `dex:name` (e.g. "uniswap:WETH/USDC") */
export type PoolId = string;

/** Route kind, determined by hop count */
export type RouteType = 'direct' | 'multi-hop';

/** USD price per whole token, keyed by symbol */
export type TokenPriceTable = Readonly<Record<TokenSymbol, number>>;

/** Symbol aliases applied before routing (e.g. ETH -> WETH) */
export type TokenAliasTable = Readonly<Record<TokenSymbol, TokenSymbol>>;

// ============================================================================
// Gas Model
// ============================================================================

/** Simulated gas model used to price a route in USD */
export interface GasModel {
  /** Gas units assumed for a single-pool swap */
  directGasUnits: number;
  /** Gas units assumed for a two-hop swap */
  multiHopGasUnits: number;
  /** Gas price in gwei */
  gasPriceGwei: number;
}

/** Reference gas model (5 gwei, 50k / 100k units) */
export const DEFAULT_GAS_MODEL: GasModel = {
  directGasUnits: 50_000,
  multiHopGasUnits: 100_000,
  gasPriceGwei: 5,
};

// ============================================================================
// Configuration
// ============================================================================

/** Hopline runtime configuration (CLI and embedding applications) */
export interface HoplineConfig {
  /** Optional JSON pool catalog replacing the built-in defaults */
  poolsFile?: string;
  /** Gas price in gwei for the gas model */
  gasPriceGwei: number;
  /** Slippage buffer in basis points for minimumOutput (50 = 0.5%) */
  slippageBps: number;
  /** Tokens tried as the middle hop of two-hop routes */
  intermediateTokens: TokenSymbol[];
}
