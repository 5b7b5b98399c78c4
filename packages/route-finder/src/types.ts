import { DEFAULT_GAS_MODEL } from '@hopline/types';
import type { GasModel, TokenSymbol } from '@hopline/types';

/** Configuration for the route finder */
export interface RouteFinderOptions {
  /** Tokens tried as the middle hop of two-hop routes */
  intermediateTokens: TokenSymbol[];
  /** Slippage buffer for minimumOutput, in basis points (50 = 0.5%) */
  slippageBps: number;
  /** Number of ranked candidates returned next to the selected route */
  maxAlternatives: number;
  /** Gas model used for gasCostUsd */
  gas: GasModel;
  /** Token whose USD price converts gas cost (the chain's native asset) */
  gasPriceToken: TokenSymbol;
}

/** Constructor input: every field optional, gas model mergeable field by field */
export type RouteFinderInit = Partial<Omit<RouteFinderOptions, 'gas'>> & {
  gas?: Partial<GasModel>;
};

/** Default route finder configuration (reference deployment) */
export const DEFAULT_ROUTE_FINDER_OPTIONS: RouteFinderOptions = {
  intermediateTokens: ['WETH', 'USDC', 'USDT'],
  slippageBps: 50,
  maxAlternatives: 3,
  gas: DEFAULT_GAS_MODEL,
  gasPriceToken: 'WETH',
};
