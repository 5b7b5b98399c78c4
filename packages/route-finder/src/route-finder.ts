import { poolId } from '@hopline/types';
import type {
  FindRouteResult,
  PoolSource,
  RouteAlternative,
  RouteDetails,
  RouteType,
  SwapRoute,
  TokenSymbol,
} from '@hopline/types';
import { calculatePriceImpact, getAmountOut, orientReserves } from './amm.js';
import { estimateGasCost } from './gas.js';
import { RoutingError } from './errors.js';
import {
  DEFAULT_ROUTE_FINDER_OPTIONS,
  type RouteFinderInit,
  type RouteFinderOptions,
} from './types.js';

/**
 * Route Finder
 *
 * Prices every way to swap `fromToken` into `toToken` across the pool
 * catalog and picks the one with the largest output.
 *
 * Search space:
 * 1. Direct routes: one candidate per pool trading the pair (any dex)
 * 2. Two-hop routes: from -> intermediate -> to, for each configured
 *    intermediate token, composing every first-hop pool with every
 *    second-hop pool
 *
 * Pure and synchronous. The pool source is only read, so a single finder
 * can serve concurrent callers.
 */
export class RouteFinder {
  private readonly source: PoolSource;
  private readonly options: RouteFinderOptions;

  constructor(source: PoolSource, init: RouteFinderInit = {}) {
    const { gas, ...rest } = init;
    this.source = source;
    this.options = {
      ...DEFAULT_ROUTE_FINDER_OPTIONS,
      ...rest,
      gas: { ...DEFAULT_ROUTE_FINDER_OPTIONS.gas, ...gas },
    };

    const { slippageBps, maxAlternatives } = this.options;
    if (!Number.isFinite(slippageBps) || slippageBps < 0 || slippageBps >= 10_000) {
      throw new Error(`slippageBps must be in [0, 10000), got ${slippageBps}`);
    }
    if (!Number.isInteger(maxAlternatives) || maxAlternatives < 0) {
      throw new Error(`maxAlternatives must be a non-negative integer, got ${maxAlternatives}`);
    }
  }

  /**
   * Find the best route for a swap.
   *
   * Validation runs before any search, first failure wins:
   * unsupported token, same token, non-positive amount.
   * Never throws: every failure, including unexpected exceptions during
   * pricing, comes back as `{ success: false }`.
   */
  findBestRoute(fromToken: TokenSymbol, toToken: TokenSymbol, amount: number): FindRouteResult {
    try {
      return this.resolve(fromToken, toToken, amount);
    } catch (err) {
      if (err instanceof RoutingError) {
        return err.toFailure();
      }
      const reason = err instanceof Error ? err.message : String(err);
      return new RoutingError('RoutingInternalError', `Route calculation failed: ${reason}`, {
        suggestion: 'Please try again',
      }).toFailure();
    }
  }

  /**
   * Price every pool trading {from, to}. Tokens must already be normalized.
   */
  findDirectRoutes(from: TokenSymbol, to: TokenSymbol, amount: number): SwapRoute[] {
    const routes: SwapRoute[] = [];

    for (const pool of this.source.findPoolsForPair(from, to)) {
      const [reserveIn, reserveOut] = orientReserves(pool, from);

      routes.push({
        path: [from, to],
        pools: [poolId(pool)],
        estimatedOutput: getAmountOut(amount, reserveIn, reserveOut, pool.feePct),
        priceImpact: calculatePriceImpact(amount, reserveIn),
        gasCostUsd: this.estimateGasCost('direct'),
        totalFee: pool.feePct,
      });
    }

    return routes;
  }

  /**
   * Compose two direct hops through each intermediate token.
   * Depth is fixed at two hops.
   */
  findMultiHopRoutes(from: TokenSymbol, to: TokenSymbol, amount: number): SwapRoute[] {
    const routes: SwapRoute[] = [];

    for (const intermediate of this.getIntermediates()) {
      if (intermediate === from || intermediate === to) continue;

      for (const firstHop of this.findDirectRoutes(from, intermediate, amount)) {
        if (firstHop.estimatedOutput <= 0) continue;

        const secondHops = this.findDirectRoutes(intermediate, to, firstHop.estimatedOutput);
        for (const secondHop of secondHops) {
          if (secondHop.estimatedOutput <= 0) continue;

          routes.push({
            path: [from, intermediate, to],
            pools: [...firstHop.pools, ...secondHop.pools],
            estimatedOutput: secondHop.estimatedOutput,
            priceImpact: firstHop.priceImpact + secondHop.priceImpact,
            gasCostUsd: this.estimateGasCost('multi-hop'),
            totalFee: firstHop.totalFee + secondHop.totalFee,
          });
        }
      }
    }

    return routes;
  }

  /**
   * All candidates in generation order: direct first, then two-hop.
   */
  findAllRoutes(from: TokenSymbol, to: TokenSymbol, amount: number): SwapRoute[] {
    return [
      ...this.findDirectRoutes(from, to, amount),
      ...this.findMultiHopRoutes(from, to, amount),
    ];
  }

  /**
   * Simulated USD cost of a route of the given kind.
   */
  estimateGasCost(kind: RouteType): number {
    const nativePrice = this.source.getTokenPrice(this.options.gasPriceToken);
    return estimateGasCost(kind, this.options.gas, nativePrice);
  }

  /**
   * Effective options after defaults are merged (a copy).
   * The CLI reads it to report the slippage buffer behind minimumOutput.
   */
  getOptions(): RouteFinderOptions {
    return { ...this.options, gas: { ...this.options.gas } };
  }

  // ---- Private helpers ----

  private resolve(fromToken: TokenSymbol, toToken: TokenSymbol, amount: number): FindRouteResult {
    const from = this.source.normalizeToken(fromToken);
    const to = this.source.normalizeToken(toToken);
    if (!this.source.isSupported(from) || !this.source.isSupported(to)) {
      throw new RoutingError('UnsupportedToken', `Unsupported token: ${fromToken} or ${toToken}`, {
        supportedTokens: [...this.source.supportedTokens()],
      });
    }

    if (from === to) {
      throw new RoutingError('SameToken', 'Source and target token cannot be the same');
    }

    if (!Number.isFinite(amount) || amount <= 0) {
      throw new RoutingError('InvalidAmount', 'Amount must be greater than 0');
    }

    const candidates = this.findAllRoutes(from, to, amount);
    if (candidates.length === 0) {
      throw new RoutingError('RouteNotFound', `No route found for ${fromToken} -> ${toToken}`, {
        suggestion: 'Try a different token pair or a smaller amount',
      });
    }

    const best = selectBestRoute(candidates);
    if (!Number.isFinite(best.estimatedOutput)) {
      throw new Error(`Non-finite output ${best.estimatedOutput} via ${best.pools.join(', ')}`);
    }

    return {
      success: true,
      routeDetails: this.buildRouteDetails(best, amount, fromToken, toToken),
      alternatives: this.rankAlternatives(candidates),
    };
  }

  private buildRouteDetails(
    route: SwapRoute,
    amount: number,
    inputToken: TokenSymbol,
    outputToken: TokenSymbol
  ): RouteDetails {
    return {
      path: [...route.path],
      pools: [...route.pools],
      estimatedOutput: route.estimatedOutput,
      priceImpact: route.priceImpact,
      gasCostUsd: route.gasCostUsd,
      totalFee: route.totalFee,
      inputAmount: amount,
      inputToken,
      outputToken,
      exchangeRate: route.estimatedOutput / amount,
      minimumOutput: route.estimatedOutput * (1 - this.options.slippageBps / 10_000),
      routeType: route.path.length === 2 ? 'direct' : 'multi-hop',
    };
  }

  private rankAlternatives(candidates: SwapRoute[]): RouteAlternative[] {
    return [...candidates]
      .sort((a, b) => b.estimatedOutput - a.estimatedOutput)
      .slice(0, this.options.maxAlternatives)
      .map((route) => ({
        path: [...route.path],
        pools: [...route.pools],
        estimatedOutput: route.estimatedOutput,
        dex: route.pools[0],
      }));
  }

  /**
   * Configured intermediates, alias-normalized, duplicates dropped.
   */
  private getIntermediates(): TokenSymbol[] {
    const seen = new Set<TokenSymbol>();
    for (const token of this.options.intermediateTokens) {
      seen.add(this.source.normalizeToken(token));
    }
    return Array.from(seen);
  }
}

/**
 * Route with the strictly largest output. Ties keep the earliest candidate.
 */
export function selectBestRoute(candidates: SwapRoute[]): SwapRoute {
  if (candidates.length === 0) {
    throw new Error('selectBestRoute called with no candidates');
  }

  let best = candidates[0];
  for (const route of candidates.slice(1)) {
    if (route.estimatedOutput > best.estimatedOutput) {
      best = route;
    }
  }
  return best;
}
