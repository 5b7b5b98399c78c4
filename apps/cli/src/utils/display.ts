import chalk from 'chalk';
import Table from 'cli-table3';
import type {
  AmountRecommendation,
  Pool,
  PriceImpactSample,
  RouteAlternative,
  RouteDetails,
  RouteFailure,
  SwapRoute,
} from '@hopline/types';
import { poolId } from '@hopline/types';
import { formatRoutePath, formatRouteSummary, formatRoutingFailure } from '@hopline/route-finder';

// Hopline brand colors
const BRAND = {
  primary: chalk.hex('#0ea5e9'),   // Sky blue
  secondary: chalk.hex('#38bdf8'), // Light blue
  success: chalk.hex('#10b981'),   // Green
  warning: chalk.hex('#f59e0b'),   // Amber
  error: chalk.hex('#ef4444'),     // Red
  muted: chalk.gray,
};

/** Price impact above this many percent is highlighted */
const HIGH_IMPACT_PCT = 1;

/**
 * Print the Hopline banner/header.
 */
export function printBanner(): void {
  console.log('');
  console.log(BRAND.primary('  ╔══════════════════════════════════════╗'));
  console.log(BRAND.primary('  ║') + BRAND.secondary('     HOPLINE - Swap Route Finder      ') + BRAND.primary('║'));
  console.log(BRAND.primary('  ║') + BRAND.muted('    Direct and two-hop AMM quotes     ') + BRAND.primary('║'));
  console.log(BRAND.primary('  ╚══════════════════════════════════════╝'));
  console.log('');
}

/**
 * Format a USD value with $ sign and 2 decimal places.
 */
export function formatUsd(value: number): string {
  if (value >= 1_000_000) {
    return `$${(value / 1_000_000).toFixed(2)}M`;
  }
  if (value >= 1_000) {
    return `$${(value / 1_000).toFixed(2)}K`;
  }
  return `$${value.toFixed(2)}`;
}

/**
 * Format a token amount with appropriate decimal places.
 */
export function formatAmount(amount: number, decimals: number = 4): string {
  if (amount === 0) return '0';
  if (Math.abs(amount) < 0.0001) return '<0.0001';
  return amount.toFixed(decimals);
}

/**
 * Format a percentage with 4 decimals (impacts are often tiny).
 */
export function formatPct(value: number, decimals: number = 4): string {
  return `${value.toFixed(decimals)}%`;
}

/**
 * Print an info message.
 */
export function printInfo(message: string): void {
  console.log(BRAND.secondary('  i ') + message);
}

/**
 * Print a success message.
 */
export function printSuccess(message: string): void {
  console.log(BRAND.success('  + ') + message);
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  console.log(BRAND.warning('  ! ') + message);
}

/**
 * Print an error message.
 */
export function printError(message: string): void {
  console.log(BRAND.error('  x ') + message);
}

/**
 * Print a formatted table with headers and rows.
 */
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.bold(h)),
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const row of rows) {
    table.push(row);
  }

  console.log(table.toString());
}

/**
 * Print the selected route as a one-line summary and a detail table.
 */
export function printRouteDetails(details: RouteDetails, slippageBps: number): void {
  const out = details.outputToken;

  printInfo(formatRouteSummary(details));
  console.log('');

  printTable(['Detail', 'Value'], [
    ['Path', formatRoutePath(details.path)],
    ['Pools', details.pools.join(' -> ')],
    ['Expected Output', `~${formatAmount(details.estimatedOutput)} ${out}`],
    ['Minimum Output', `${formatAmount(details.minimumOutput)} ${out} (${formatPct(slippageBps / 100, 2)} slippage)`],
    ['Exchange Rate', `1 ${details.inputToken} = ${formatAmount(details.exchangeRate, 6)} ${out}`],
    ['Price Impact', formatPct(details.priceImpact)],
    ['Total Fee', formatPct(details.totalFee, 2)],
    ['Gas Cost', formatUsd(details.gasCostUsd)],
  ]);
  console.log('');

  if (details.priceImpact > HIGH_IMPACT_PCT) {
    printWarning(`High price impact (${details.priceImpact.toFixed(2)}%). Consider a smaller amount.`);
  } else {
    printSuccess(`Low price impact (${details.priceImpact.toFixed(4)}%).`);
  }
}

/**
 * Print the ranked alternatives returned with a quote.
 */
export function printAlternatives(alternatives: RouteAlternative[], outputToken: string): void {
  console.log(BRAND.primary.bold('  ALTERNATIVES'));
  console.log('');
  printTable(
    ['#', 'Path', 'Pools', 'Output'],
    alternatives.map((alt, index) => [
      String(index + 1),
      formatRoutePath(alt.path),
      alt.pools.join(' -> '),
      `${formatAmount(alt.estimatedOutput)} ${outputToken}`,
    ])
  );
}

/**
 * Print every candidate route considered for a quote (--verbose).
 */
export function printCandidates(routes: SwapRoute[]): void {
  console.log(BRAND.primary.bold(`  CANDIDATES (${routes.length})`));
  console.log('');
  printTable(
    ['Path', 'Pools', 'Output', 'Impact', 'Fee', 'Gas'],
    routes.map((route) => [
      formatRoutePath(route.path),
      route.pools.join(' -> '),
      formatAmount(route.estimatedOutput),
      formatPct(route.priceImpact),
      formatPct(route.totalFee, 2),
      formatUsd(route.gasCostUsd),
    ])
  );
}

/**
 * Print a routing failure with its suggestion and supported tokens.
 */
export function printRoutingFailure(failure: RouteFailure): void {
  const [headline, ...details] = formatRoutingFailure(failure).split('\n');
  printError(headline);
  for (const line of details) {
    printInfo(line);
  }
}

/**
 * Print the pool catalog.
 */
export function printPools(pools: readonly Pool[]): void {
  printTable(
    ['Pool', 'Reserve A', 'Reserve B', 'Fee'],
    pools.map((pool) => [
      BRAND.secondary(poolId(pool)),
      `${pool.reserveA.toLocaleString('en-US')} ${pool.tokenA}`,
      `${pool.reserveB.toLocaleString('en-US')} ${pool.tokenB}`,
      formatPct(pool.feePct, 2),
    ])
  );
}

/**
 * Print price-impact samples and the advice attached to them.
 */
export function printSimulation(
  samples: PriceImpactSample[],
  recommendations: AmountRecommendation[],
  outputToken: string
): void {
  printTable(
    ['Amount', 'Output', 'Price Impact', 'Gas'],
    samples.map((sample) => [
      String(sample.amount),
      `${formatAmount(sample.output)} ${outputToken}`,
      formatPct(sample.priceImpact),
      formatUsd(sample.gasCostUsd),
    ])
  );
  console.log('');

  for (const recommendation of recommendations) {
    if (recommendation.level === 'high') {
      printWarning(recommendation.message);
    } else {
      printSuccess(recommendation.message);
    }
  }
}
