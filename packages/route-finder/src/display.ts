import type { RouteDetails, RouteFailure, TokenSymbol } from '@hopline/types';

/**
 * Format a token path as "WETH -> USDC -> RISE".
 */
export function formatRoutePath(path: TokenSymbol[]): string {
  return path.join(' -> ');
}

/**
 * Format a selected route as a compact one-liner.
 * The CLI prints it above the route table.
 */
export function formatRouteSummary(details: RouteDetails): string {
  return (
    `${details.inputAmount} ${details.inputToken} -> ` +
    `${details.estimatedOutput.toFixed(4)} ${details.outputToken} ` +
    `via ${details.pools.join(' -> ')} ` +
    `[${details.routeType}, impact ${details.priceImpact.toFixed(2)}%, ` +
    `fee ${details.totalFee.toFixed(2)}%, gas $${details.gasCostUsd.toFixed(2)}]`
  );
}

/**
 * Format a routing failure with its suggestion and, for unsupported
 * tokens, the accepted symbols. One fact per line; the CLI prints the
 * first as the error and the rest as notes.
 */
export function formatRoutingFailure(failure: RouteFailure): string {
  const lines = [`[${failure.kind}] ${failure.error}`];

  if (failure.suggestion) {
    lines.push(`Suggestion: ${failure.suggestion}`);
  }
  if (failure.supportedTokens && failure.supportedTokens.length > 0) {
    lines.push(`Supported tokens: ${failure.supportedTokens.join(', ')}`);
  }

  return lines.join('\n');
}
