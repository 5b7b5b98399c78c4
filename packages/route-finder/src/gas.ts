import type { GasModel, RouteType } from '@hopline/types';

const GWEI_PER_ETH = 1e9;

/**
 * Simulated USD cost of executing a route.
 *
 * Depends on the route kind only: a fixed gas-unit baseline per kind,
 * times the gas price, converted at the native token's USD price.
 */
export function estimateGasCost(kind: RouteType, gas: GasModel, nativePriceUsd: number): number {
  const units = kind === 'direct' ? gas.directGasUnits : gas.multiHopGasUnits;
  const costEth = (units * gas.gasPriceGwei) / GWEI_PER_ETH;
  return costEth * nativePriceUsd;
}
