import { describe, it, expect, vi } from 'vitest';
import { poolTradesPair } from '@hopline/types';
import type { FindRouteResult, Pool, PoolSource, RouteFailure, RouteFound } from '@hopline/types';
import { PoolRegistry, createDefaultRegistry } from '@hopline/pool-registry';
import { RouteFinder, selectBestRoute } from '../route-finder.js';

function pool(dex: string, tokenA: string, tokenB: string, reserveA: number, reserveB: number, feePct: number): Pool {
  return { name: `${tokenA}/${tokenB}`, tokenA, tokenB, reserveA, reserveB, feePct, dex };
}

function registryOf(pools: Pool[]): PoolRegistry {
  return new PoolRegistry({
    pools,
    supportedTokens: ['WETH', 'ETH', 'USDC', 'RISE'],
    tokenPrices: { WETH: 2000, USDC: 1, RISE: 0.05 },
    tokenAliases: { ETH: 'WETH' },
  });
}

// Bypasses registry validation, for exercising the internal-error path
function rawSource(pools: Pool[]): PoolSource {
  const supported = ['WETH', 'ETH', 'USDC', 'RISE'];
  return {
    listPools: () => pools,
    supportedTokens: () => supported,
    isSupported: (symbol) => supported.includes(symbol),
    findPoolsForPair: (a, b) => pools.filter((p) => poolTradesPair(p, a, b)),
    normalizeToken: (symbol) => (symbol === 'ETH' ? 'WETH' : symbol),
    getTokenPrice: (symbol) => (symbol === 'WETH' ? 2000 : 0),
  };
}

function expectFound(result: FindRouteResult): RouteFound {
  if (!result.success) {
    throw new Error(`expected a route, got ${result.kind}: ${result.error}`);
  }
  return result;
}

function expectFailure(result: FindRouteResult): RouteFailure {
  if (result.success) {
    throw new Error(`expected a failure, got route ${result.routeDetails.pools.join(', ')}`);
  }
  return result;
}

describe('RouteFinder', () => {
  describe('validation', () => {
    const finder = new RouteFinder(createDefaultRegistry());

    it('rejects unsupported tokens and lists the supported set', () => {
      const failure = expectFailure(finder.findBestRoute('DOGE', 'USDC', 1));
      expect(failure.kind).toBe('UnsupportedToken');
      expect(failure.error).toBe('Unsupported token: DOGE or USDC');
      expect(failure.supportedTokens).toEqual(['WETH', 'ETH', 'USDC', 'RISE']);
    });

    it('rejects the same token on both sides', () => {
      const failure = expectFailure(finder.findBestRoute('USDC', 'USDC', 5));
      expect(failure.kind).toBe('SameToken');
      expect(failure.error).toBe('Source and target token cannot be the same');
    });

    it('treats ETH and WETH as the same token', () => {
      expect(expectFailure(finder.findBestRoute('ETH', 'WETH', 1)).kind).toBe('SameToken');
    });

    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects amount %s', (amount) => {
      const failure = expectFailure(finder.findBestRoute('WETH', 'USDC', amount));
      expect(failure.kind).toBe('InvalidAmount');
      expect(failure.error).toBe('Amount must be greater than 0');
    });

    it('checks tokens before sameness and sameness before amount', () => {
      expect(expectFailure(finder.findBestRoute('DOGE', 'DOGE', 0)).kind).toBe('UnsupportedToken');
      expect(expectFailure(finder.findBestRoute('USDC', 'USDC', 0)).kind).toBe('SameToken');
    });

    it('does not touch the pools when validation fails', () => {
      const source = rawSource([]);
      const findPoolsForPair = vi.spyOn(source, 'findPoolsForPair');
      new RouteFinder(source).findBestRoute('WETH', 'USDC', -1);
      expect(findPoolsForPair).not.toHaveBeenCalled();
    });
  });

  describe('direct routes', () => {
    it('picks the 1inch pool for 1 WETH -> USDC on the reference catalog', () => {
      const { routeDetails } = expectFound(
        new RouteFinder(createDefaultRegistry()).findBestRoute('WETH', 'USDC', 1)
      );

      expect(routeDetails.path).toEqual(['WETH', 'USDC']);
      expect(routeDetails.pools).toEqual(['1inch:WETH/USDC']);
      expect(routeDetails.routeType).toBe('direct');
      expect(routeDetails.estimatedOutput).toBeCloseTo(1996.3380485745615, 9);
      expect(routeDetails.priceImpact).toBeCloseTo(0.08333333333333334, 12);
      expect(routeDetails.totalFee).toBe(0.1);
      expect(routeDetails.gasCostUsd).toBeCloseTo(0.5, 12);
      expect(routeDetails.inputAmount).toBe(1);
      expect(routeDetails.inputToken).toBe('WETH');
      expect(routeDetails.outputToken).toBe('USDC');
      expect(routeDetails.exchangeRate).toBeCloseTo(1996.3380485745615, 9);
      expect(routeDetails.minimumOutput).toBeCloseTo(1986.3563583316886, 9);
    });

    it('ranks up to three alternatives by output', () => {
      const { alternatives } = expectFound(
        new RouteFinder(createDefaultRegistry()).findBestRoute('WETH', 'USDC', 1)
      );

      expect(alternatives.map((a) => a.dex)).toEqual([
        '1inch:WETH/USDC',
        'sushiswap:WETH/USDC',
        'uniswap:WETH/USDC',
      ]);
      expect(alternatives[1].estimatedOutput).toBeCloseTo(1992.5155821335275, 9);
      expect(alternatives[2].estimatedOutput).toBeCloseTo(1992.0139620798066, 9);
    });

    it('prefers the deeper, cheaper pool across dexes', () => {
      const finder = new RouteFinder(
        registryOf([
          pool('dexA', 'WETH', 'USDC', 1_000, 2_000_000, 0.3),
          pool('dexB', 'WETH', 'USDC', 1_200, 2_400_000, 0.1),
        ])
      );

      const { routeDetails } = expectFound(finder.findBestRoute('WETH', 'USDC', 1));
      expect(routeDetails.pools).toEqual(['dexB:WETH/USDC']);
      expect(routeDetails.routeType).toBe('direct');
    });

    it('prices pools stored in the reverse orientation', () => {
      const finder = new RouteFinder(registryOf([pool('x', 'USDC', 'WETH', 2_000_000, 1_000, 0.3)]));
      const { routeDetails } = expectFound(finder.findBestRoute('WETH', 'USDC', 1));
      expect(routeDetails.estimatedOutput).toBeCloseTo(1992.0139620798066, 9);
      expect(routeDetails.priceImpact).toBeCloseTo(0.1, 12);
    });

    it('keeps the first candidate on a tie', () => {
      const finder = new RouteFinder(
        registryOf([
          pool('first', 'WETH', 'USDC', 1_000, 2_000_000, 0.3),
          pool('second', 'WETH', 'USDC', 1_000, 2_000_000, 0.3),
        ])
      );
      const { routeDetails, alternatives } = expectFound(finder.findBestRoute('WETH', 'USDC', 1));
      expect(routeDetails.pools).toEqual(['first:WETH/USDC']);
      expect(alternatives.map((a) => a.dex)).toEqual(['first:WETH/USDC', 'second:WETH/USDC']);
    });
  });

  describe('multi-hop routes', () => {
    it('routes through an intermediate when no direct pool exists', () => {
      const finder = new RouteFinder(
        registryOf([
          pool('uniswap', 'WETH', 'USDC', 1_000, 2_000_000, 0.3),
          pool('uniswap', 'USDC', 'RISE', 50_000, 1_000_000, 0.3),
        ])
      );

      const { routeDetails } = expectFound(finder.findBestRoute('WETH', 'RISE', 10));
      expect(routeDetails.routeType).toBe('multi-hop');
      expect(routeDetails.path).toEqual(['WETH', 'USDC', 'RISE']);
      expect(routeDetails.pools).toEqual(['uniswap:WETH/USDC', 'uniswap:USDC/RISE']);
      expect(routeDetails.estimatedOutput).toBeCloseTo(282474.46527840535, 6);
      expect(routeDetails.priceImpact).toBeCloseTo(40.48632137588245, 9);
      expect(routeDetails.totalFee).toBeCloseTo(0.6, 12);
      expect(routeDetails.gasCostUsd).toBeCloseTo(1.0, 12);
    });

    it('picks a two-hop route when it beats every direct pool', () => {
      const { routeDetails } = expectFound(
        new RouteFinder(createDefaultRegistry()).findBestRoute('USDC', 'RISE', 1_000)
      );
      expect(routeDetails.path).toEqual(['USDC', 'WETH', 'RISE']);
      expect(routeDetails.pools).toEqual(['1inch:WETH/USDC', '1inch:RISE/WETH']);
      expect(routeDetails.estimatedOutput).toBeCloseTo(19852.60400996826, 6);
      expect(routeDetails.totalFee).toBeCloseTo(0.3, 12);
    });

    it('keeps a direct route when it wins', () => {
      const { routeDetails, alternatives } = expectFound(
        new RouteFinder(createDefaultRegistry()).findBestRoute('WETH', 'RISE', 10)
      );
      expect(routeDetails.pools).toEqual(['1inch:RISE/WETH']);
      expect(routeDetails.estimatedOutput).toBeCloseTo(369684.39768854645, 6);
      expect(alternatives.map((a) => a.pools)).toEqual([
        ['1inch:RISE/WETH'],
        ['uniswap:WETH/RISE'],
        ['1inch:WETH/USDC', 'sushiswap:RISE/USDC'],
      ]);
    });

    it('skips intermediates equal to either endpoint', () => {
      const finder = new RouteFinder(createDefaultRegistry());
      const routes = finder.findMultiHopRoutes('WETH', 'USDC', 1);
      expect(routes).toEqual([]);
    });

    it('enumerates every first-hop and second-hop pool pair', () => {
      const finder = new RouteFinder(createDefaultRegistry());
      // 3 WETH/USDC pools x 2 USDC/RISE pools
      expect(finder.findMultiHopRoutes('WETH', 'RISE', 10)).toHaveLength(6);
    });

    it('normalizes configured intermediates', () => {
      const finder = new RouteFinder(createDefaultRegistry(), { intermediateTokens: ['ETH', 'WETH'] });
      // Only WETH is tried, once: 3 USDC/WETH pools x 2 WETH/RISE pools
      expect(finder.findMultiHopRoutes('USDC', 'RISE', 1_000)).toHaveLength(6);
    });

    it('returns RouteNotFound when no path exists', () => {
      const finder = new RouteFinder(registryOf([pool('uniswap', 'WETH', 'USDC', 1_000, 2_000_000, 0.3)]));
      const failure = expectFailure(finder.findBestRoute('WETH', 'RISE', 1));
      expect(failure.kind).toBe('RouteNotFound');
      expect(failure.error).toBe('No route found for WETH -> RISE');
      expect(failure.suggestion).toBe('Try a different token pair or a smaller amount');
    });

    it('finds nothing two-hop when intermediates are disabled', () => {
      const finder = new RouteFinder(
        registryOf([
          pool('uniswap', 'WETH', 'USDC', 1_000, 2_000_000, 0.3),
          pool('uniswap', 'USDC', 'RISE', 50_000, 1_000_000, 0.3),
        ]),
        { intermediateTokens: [] }
      );
      expect(expectFailure(finder.findBestRoute('WETH', 'RISE', 10)).kind).toBe('RouteNotFound');
    });
  });

  describe('invariants', () => {
    const registry = createDefaultRegistry();
    const finder = new RouteFinder(registry);
    const tokens = ['WETH', 'ETH', 'USDC', 'RISE'];

    it('starts and ends every path at the normalized endpoints', () => {
      for (const from of tokens) {
        for (const to of tokens) {
          const result = finder.findBestRoute(from, to, 5);
          if (!result.success) {
            expect(result.kind).toBe('SameToken');
            continue;
          }
          const { path } = result.routeDetails;
          expect(path[0]).toBe(registry.normalizeToken(from));
          expect(path[path.length - 1]).toBe(registry.normalizeToken(to));
        }
      }
    });

    it('routes ETH exactly like WETH', () => {
      const eth = expectFound(finder.findBestRoute('ETH', 'USDC', 1));
      const weth = expectFound(finder.findBestRoute('WETH', 'USDC', 1));

      expect(eth.routeDetails.inputToken).toBe('ETH');
      expect({ ...eth.routeDetails, inputToken: 'WETH' }).toEqual(weth.routeDetails);
      expect(eth.alternatives).toEqual(weth.alternatives);
    });

    it('returns identical results for identical calls', () => {
      const first = finder.findBestRoute('RISE', 'USDC', 1_000);
      const second = finder.findBestRoute('RISE', 'USDC', 1_000);
      expect(second).toEqual(first);
    });

    it('never changes pool reserves', () => {
      const before = registry.listPools().map((p) => [p.reserveA, p.reserveB]);
      finder.findBestRoute('WETH', 'USDC', 500);
      finder.findBestRoute('RISE', 'WETH', 100_000);
      expect(registry.listPools().map((p) => [p.reserveA, p.reserveB])).toEqual(before);
    });
  });

  describe('findAllRoutes', () => {
    it('lists the same candidates the quote ranked, in generation order', () => {
      const finder = new RouteFinder(createDefaultRegistry());
      const { alternatives } = expectFound(finder.findBestRoute('WETH', 'USDC', 1));
      const candidates = finder.findAllRoutes('WETH', 'USDC', 1);

      expect(candidates.map((route) => route.pools)).toEqual([
        ['uniswap:WETH/USDC'],
        ['sushiswap:WETH/USDC'],
        ['1inch:WETH/USDC'],
      ]);
      const ranked = [...candidates].sort((x, y) => y.estimatedOutput - x.estimatedOutput);
      expect(ranked.map((route) => route.estimatedOutput)).toEqual(
        alternatives.map((alt) => alt.estimatedOutput)
      );
    });
  });

  describe('very large amounts', () => {
    it('still finds a bounded route when the input dwarfs every reserve', () => {
      const { routeDetails } = expectFound(
        new RouteFinder(createDefaultRegistry()).findBestRoute('WETH', 'USDC', 1e303)
      );

      expect(routeDetails.pools).toEqual(['1inch:WETH/USDC']);
      expect(routeDetails.estimatedOutput).toBeLessThan(2_400_000);
      expect(routeDetails.estimatedOutput).toBeGreaterThan(2_399_999);
    });
  });

  describe('internal errors', () => {
    it('reports a zero reserve as RoutingInternalError instead of throwing', () => {
      const finder = new RouteFinder(rawSource([pool('broken', 'WETH', 'USDC', 0, 2_000_000, 0.3)]));
      const failure = expectFailure(finder.findBestRoute('WETH', 'USDC', 1));
      expect(failure.kind).toBe('RoutingInternalError');
      expect(failure.error).toBe(
        'Route calculation failed: Cannot price against reserves 0/2000000: both must be positive'
      );
      expect(failure.suggestion).toBe('Please try again');
    });

    it('reports a failing pool source as RoutingInternalError', () => {
      const source = rawSource([]);
      source.findPoolsForPair = () => {
        throw new Error('catalog unavailable');
      };
      const failure = expectFailure(new RouteFinder(source).findBestRoute('WETH', 'USDC', 1));
      expect(failure.kind).toBe('RoutingInternalError');
      expect(failure.error).toBe('Route calculation failed: catalog unavailable');
    });
  });

  describe('options', () => {
    it('uses the configured slippage for minimumOutput', () => {
      const finder = new RouteFinder(createDefaultRegistry(), { slippageBps: 100 });
      const { routeDetails } = expectFound(finder.findBestRoute('WETH', 'USDC', 1));
      expect(routeDetails.minimumOutput).toBeCloseTo(routeDetails.estimatedOutput * 0.99, 9);
    });

    it('limits the number of alternatives', () => {
      const finder = new RouteFinder(createDefaultRegistry(), { maxAlternatives: 1 });
      expect(expectFound(finder.findBestRoute('WETH', 'USDC', 1)).alternatives).toHaveLength(1);
    });

    it('merges a partial gas model with the defaults', () => {
      const finder = new RouteFinder(createDefaultRegistry(), { gas: { gasPriceGwei: 10 } });
      expect(finder.getOptions().gas).toEqual({
        directGasUnits: 50_000,
        multiHopGasUnits: 100_000,
        gasPriceGwei: 10,
      });
      expect(finder.estimateGasCost('direct')).toBeCloseTo(1.0, 12);
      expect(finder.estimateGasCost('multi-hop')).toBeCloseTo(2.0, 12);
    });

    it('rejects out-of-range settings', () => {
      const registry = createDefaultRegistry();
      expect(() => new RouteFinder(registry, { slippageBps: -1 })).toThrow('slippageBps');
      expect(() => new RouteFinder(registry, { slippageBps: 10_000 })).toThrow('slippageBps');
      expect(() => new RouteFinder(registry, { maxAlternatives: 1.5 })).toThrow('maxAlternatives');
    });
  });
});

describe('selectBestRoute', () => {
  const route = (estimatedOutput: number, id: string) => ({
    path: ['A', 'B'],
    pools: [id],
    estimatedOutput,
    priceImpact: 0,
    gasCostUsd: 0,
    totalFee: 0,
  });

  it('returns the strictly largest output, first wins on ties', () => {
    expect(selectBestRoute([route(1, 'a'), route(3, 'b'), route(3, 'c'), route(2, 'd')]).pools).toEqual(['b']);
  });

  it('throws on an empty candidate list', () => {
    expect(() => selectBestRoute([])).toThrow('no candidates');
  });
});
