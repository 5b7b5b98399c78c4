import type { Pool, TokenSymbol } from '@hopline/types';

/** Largest factor below 1, used to keep outputs strictly under the reserve */
const BELOW_ONE = 1 - Number.EPSILON;

/**
 * Constant-product swap output with the pool fee taken from the input.
 *
 *   amountInAfterFee = amountIn * (10000 - feePct * 100) / 10000
 *   amountOut        = reserveOut * amountInAfterFee / (reserveIn + amountInAfterFee)
 *
 * The share of the reserve is computed first so that the product cannot
 * overflow. Once the input dwarfs the reserve that share rounds to 1, so
 * the result is capped one step below `reserveOut`.
 *
 * Pricing only: reserves are not updated.
 */
export function getAmountOut(
  amountIn: number,
  reserveIn: number,
  reserveOut: number,
  feePct: number
): number {
  if (!Number.isFinite(reserveIn) || !Number.isFinite(reserveOut) || reserveIn <= 0 || reserveOut <= 0) {
    throw new Error(`Cannot price against reserves ${reserveIn}/${reserveOut}: both must be positive`);
  }

  const feeMultiplier = (10_000 - feePct * 100) / 10_000;
  const amountInAfterFee = amountIn * feeMultiplier;

  const share = amountInAfterFee / (reserveIn + amountInAfterFee);

  return Math.min(reserveOut * share, reserveOut * BELOW_ONE);
}

/**
 * Share of the input-side reserve consumed by the trade, in percent.
 *
 * A linear proxy (amountIn / reserveIn * 100), not the marginal price
 * shift of the constant-product curve.
 */
export function calculatePriceImpact(amountIn: number, reserveIn: number): number {
  return (amountIn / reserveIn) * 100;
}

/**
 * Reserves ordered as [reserveIn, reserveOut] for a swap selling `fromToken`.
 */
export function orientReserves(pool: Pool, fromToken: TokenSymbol): [number, number] {
  return pool.tokenA === fromToken
    ? [pool.reserveA, pool.reserveB]
    : [pool.reserveB, pool.reserveA];
}
