import type { PoolId, RouteType, TokenSymbol } from './common.js';

// ============================================================================
// Routes
// ============================================================================

/** A priced swap path. Built per query, never persisted. */
export interface SwapRoute {
  /** Token symbols, length 2 (direct) or 3 (one intermediate) */
  path: TokenSymbol[];
  /** One `dex:name` id per hop, aligned with consecutive path pairs */
  pools: PoolId[];
  /** Amount of the last path token received */
  estimatedOutput: number;
  /** Sum of per-hop price impacts, in percent */
  priceImpact: number;
  /** Simulated execution cost in USD (depends on hop count only) */
  gasCostUsd: number;
  /** Sum of per-hop fee percentages (not compounded) */
  totalFee: number;
}

/** Full detail of the selected route */
export interface RouteDetails extends SwapRoute {
  inputAmount: number;
  /** Source symbol as the caller passed it (before alias normalization) */
  inputToken: TokenSymbol;
  /** Destination symbol as the caller passed it */
  outputToken: TokenSymbol;
  /** estimatedOutput / inputAmount */
  exchangeRate: number;
  /** estimatedOutput minus the slippage buffer */
  minimumOutput: number;
  routeType: RouteType;
}

/** A ranked candidate shown next to the selected route */
export interface RouteAlternative {
  path: TokenSymbol[];
  pools: PoolId[];
  estimatedOutput: number;
  /** First pool used by the route */
  dex: PoolId;
}

// ============================================================================
// Results
// ============================================================================

/** Failure kinds returned by the route finder */
export type RoutingErrorKind =
  | 'UnsupportedToken'
  | 'SameToken'
  | 'InvalidAmount'
  | 'RouteNotFound'
  | 'RoutingInternalError';

export interface RouteFound {
  success: true;
  routeDetails: RouteDetails;
  /** Best candidates by estimatedOutput, descending (includes the selected one) */
  alternatives: RouteAlternative[];
}

export interface RouteFailure {
  success: false;
  kind: RoutingErrorKind;
  /** Human-readable message */
  error: string;
  suggestion?: string;
  /** Present on UnsupportedToken */
  supportedTokens?: TokenSymbol[];
}

/** Outcome of findBestRoute. Failures are values, never thrown. */
export type FindRouteResult = RouteFound | RouteFailure;

// ============================================================================
// Price Impact Simulation
// ============================================================================

/** One row of a price-impact simulation */
export interface PriceImpactSample {
  amount: number;
  output: number;
  priceImpact: number;
  gasCostUsd: number;
}

/** Advice attached to a sample whose impact is notably low or high */
export interface AmountRecommendation {
  amount: number;
  level: 'optimal' | 'high';
  message: string;
}

export interface PriceImpactSimulation {
  /** "FROM/TO" as passed by the caller */
  tokenPair: string;
  simulations: PriceImpactSample[];
  recommendations: AmountRecommendation[];
}
