/**
 * @hopline/route-finder - Best-route search across simulated AMM pools
 *
 * Components:
 * - RouteFinder: direct + two-hop search, selection, result assembly
 * - AMM helpers: constant-product output, price impact, reserve orientation
 * - estimateGasCost: hop-count based gas model
 * - simulatePriceImpact: quote one pair at several sizes
 * - Display helpers: plain-text formatting for CLI and logs
 *
 * Usage:
 *   const finder = new RouteFinder(createDefaultRegistry());
 *   const result = finder.findBestRoute('ETH', 'USDC', 1);
 */

export { RouteFinder, selectBestRoute } from './route-finder.js';
export {
  DEFAULT_ROUTE_FINDER_OPTIONS,
  type RouteFinderOptions,
  type RouteFinderInit,
} from './types.js';
export { RoutingError } from './errors.js';
export { getAmountOut, calculatePriceImpact, orientReserves } from './amm.js';
export { estimateGasCost } from './gas.js';
export {
  simulatePriceImpact,
  recommendAmounts,
  HIGH_IMPACT_THRESHOLD_PCT,
  OPTIMAL_IMPACT_THRESHOLD_PCT,
} from './simulator.js';
export { formatRoutePath, formatRouteSummary, formatRoutingFailure } from './display.js';
