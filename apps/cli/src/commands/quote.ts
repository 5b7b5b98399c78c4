import { Command } from 'commander';
import { loadRouteFinder } from '../utils/finder-factory.js';
import {
  printBanner,
  printRouteDetails,
  printAlternatives,
  printCandidates,
  printRoutingFailure,
} from '../utils/display.js';

interface QuoteOptions {
  slippage?: string;
  pools?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Register the `hopline quote` command.
 *
 * Finds the best route for a swap across the simulated pools and prints it
 * with the ranked alternatives. Amount and symbols go to the route finder
 * as typed (symbols upper-cased), so malformed input surfaces as the
 * finder's own validation failure. `--verbose` runs the search a second
 * time through `findAllRoutes` to list every candidate.
 */
export function registerQuoteCommand(program: Command): void {
  program
    .command('quote <amount> <from> <to>')
    .description('Find the best swap route across the simulated pools')
    .option('--slippage <bps>', 'Slippage buffer in basis points for the minimum output')
    .option('--pools <file>', 'JSON pool catalog to load instead of the built-in one')
    .option('--json', 'Print the raw result as JSON')
    .option('--verbose', 'List every candidate route that was priced')
    .action((amountStr: string, from: string, to: string, options: QuoteOptions) => {
      const json = options.json === true;
      if (!json) printBanner();

      const { registry, finder } = loadRouteFinder(
        { pools: options.pools, slippage: options.slippage },
        json
      );

      const amount = Number(amountStr);
      const fromToken = from.toUpperCase();
      const toToken = to.toUpperCase();
      const result = finder.findBestRoute(fromToken, toToken, amount);

      if (json) {
        console.log(JSON.stringify(result, null, 2));
        if (!result.success) process.exit(1);
        return;
      }

      console.log('');
      if (!result.success) {
        printRoutingFailure(result);
        process.exit(1);
      }

      printRouteDetails(result.routeDetails, finder.getOptions().slippageBps);
      console.log('');

      if (options.verbose) {
        const candidates = finder.findAllRoutes(
          registry.normalizeToken(fromToken),
          registry.normalizeToken(toToken),
          amount
        );
        printCandidates(candidates);
        console.log('');
      }

      printAlternatives(result.alternatives, result.routeDetails.outputToken);
      console.log('');
    });
}
