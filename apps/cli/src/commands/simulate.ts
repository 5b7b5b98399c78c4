import { Command } from 'commander';
import { simulatePriceImpact } from '@hopline/route-finder';
import { loadRouteFinder } from '../utils/finder-factory.js';
import { printBanner, printError, printInfo, printSimulation } from '../utils/display.js';

interface SimulateOptions {
  pools?: string;
}

/**
 * Register the `hopline simulate` command.
 *
 * Quotes one pair at several sizes and flags amounts whose price impact
 * is below 1% or above 5%.
 */
export function registerSimulateCommand(program: Command): void {
  program
    .command('simulate <from> <to> <amounts...>')
    .description('Show how price impact grows with trade size')
    .option('--pools <file>', 'JSON pool catalog to load instead of the built-in one')
    .action((from: string, to: string, amountStrs: string[], options: SimulateOptions) => {
      printBanner();

      const { finder } = loadRouteFinder({ pools: options.pools });
      const fromToken = from.toUpperCase();
      const toToken = to.toUpperCase();
      const amounts = amountStrs.map(Number);

      const simulation = simulatePriceImpact(finder, fromToken, toToken, amounts);

      console.log('');
      if (simulation.simulations.length === 0) {
        printError(`No amount could be routed for ${simulation.tokenPair}.`);
        process.exit(1);
      }

      const skipped = amounts.length - simulation.simulations.length;
      printInfo(`Price impact simulation for ${simulation.tokenPair}`);
      console.log('');
      printSimulation(simulation.simulations, simulation.recommendations, toToken);

      if (skipped > 0) {
        printInfo(`${skipped} amount(s) could not be routed and were skipped.`);
      }
      console.log('');
    });
}
