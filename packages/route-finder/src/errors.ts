import type { RouteFailure, RoutingErrorKind, TokenSymbol } from '@hopline/types';

/**
 * Typed routing failure. Thrown inside the route finder and converted to a
 * RouteFailure value at the findBestRoute boundary.
 */
export class RoutingError extends Error {
  readonly kind: RoutingErrorKind;
  readonly suggestion?: string;
  readonly supportedTokens?: TokenSymbol[];

  constructor(
    kind: RoutingErrorKind,
    message: string,
    details: { suggestion?: string; supportedTokens?: TokenSymbol[] } = {}
  ) {
    super(message);
    this.name = 'RoutingError';
    this.kind = kind;
    this.suggestion = details.suggestion;
    this.supportedTokens = details.supportedTokens;
  }

  toFailure(): RouteFailure {
    const failure: RouteFailure = { success: false, kind: this.kind, error: this.message };
    if (this.suggestion !== undefined) failure.suggestion = this.suggestion;
    if (this.supportedTokens !== undefined) failure.supportedTokens = [...this.supportedTokens];
    return failure;
  }
}
