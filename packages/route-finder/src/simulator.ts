import type {
  AmountRecommendation,
  PriceImpactSample,
  PriceImpactSimulation,
  TokenSymbol,
} from '@hopline/types';
import type { RouteFinder } from './route-finder.js';

/** Impact above this (percent) is flagged as too high */
export const HIGH_IMPACT_THRESHOLD_PCT = 5;

/** Impact below this (percent) is flagged as optimal */
export const OPTIMAL_IMPACT_THRESHOLD_PCT = 1;

/**
 * Quote the same pair at several trade sizes to show how price impact grows.
 * Amounts that fail to route are left out of the samples.
 */
export function simulatePriceImpact(
  finder: RouteFinder,
  fromToken: TokenSymbol,
  toToken: TokenSymbol,
  amounts: number[]
): PriceImpactSimulation {
  const simulations: PriceImpactSample[] = [];

  for (const amount of amounts) {
    const result = finder.findBestRoute(fromToken, toToken, amount);
    if (!result.success) continue;

    simulations.push({
      amount,
      output: result.routeDetails.estimatedOutput,
      priceImpact: result.routeDetails.priceImpact,
      gasCostUsd: result.routeDetails.gasCostUsd,
    });
  }

  return {
    tokenPair: `${fromToken}/${toToken}`,
    simulations,
    recommendations: recommendAmounts(simulations),
  };
}

/**
 * Flag samples whose impact is above 5% or below 1%.
 * Samples in between get no recommendation.
 */
export function recommendAmounts(samples: PriceImpactSample[]): AmountRecommendation[] {
  const recommendations: AmountRecommendation[] = [];

  for (const sample of samples) {
    const impact = sample.priceImpact.toFixed(2);
    if (sample.priceImpact > HIGH_IMPACT_THRESHOLD_PCT) {
      recommendations.push({
        amount: sample.amount,
        level: 'high',
        message: `Price impact too high for ${sample.amount} (${impact}%)`,
      });
    } else if (sample.priceImpact < OPTIMAL_IMPACT_THRESHOLD_PCT) {
      recommendations.push({
        amount: sample.amount,
        level: 'optimal',
        message: `Optimal price impact for ${sample.amount} (${impact}%)`,
      });
    }
  }

  return recommendations;
}
