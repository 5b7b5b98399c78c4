import { Command } from 'commander';
import chalk from 'chalk';
import { loadRouteFinder } from '../utils/finder-factory.js';
import { printBanner, printPools, printTable, printWarning, formatUsd } from '../utils/display.js';

interface CatalogOptions {
  pools?: string;
}

/**
 * Register the `hopline pools` and `hopline tokens` commands.
 */
export function registerCatalogCommands(program: Command): void {
  program
    .command('pools')
    .description('List the liquidity pools in the catalog')
    .option('--pools <file>', 'JSON pool catalog to load instead of the built-in one')
    .action((options: CatalogOptions) => {
      printBanner();
      const { registry } = loadRouteFinder({ pools: options.pools });

      console.log('');
      printPools(registry.listPools());
      console.log('');
    });

  program
    .command('tokens')
    .description('List supported tokens and their simulated USD prices')
    .option('--pools <file>', 'JSON pool catalog to load instead of the built-in one')
    .action((options: CatalogOptions) => {
      printBanner();
      const { registry } = loadRouteFinder({ pools: options.pools });

      console.log('');
      printTable(
        ['Token', 'Routes As', 'Price'],
        registry.supportedTokens().map((symbol) => {
          const routedAs = registry.normalizeToken(symbol);
          return [
            chalk.cyan(symbol),
            routedAs === symbol ? chalk.gray('-') : routedAs,
            formatUsd(registry.getTokenPrice(symbol)),
          ];
        })
      );

      const unquotable = registry.listTokens().filter((symbol) => !registry.isSupported(symbol));
      if (unquotable.length > 0) {
        console.log('');
        printWarning(`Pooled but not accepted in quotes: ${unquotable.join(', ')}`);
      }
      console.log('');
    });
}
