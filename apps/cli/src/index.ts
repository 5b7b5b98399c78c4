import { Command } from 'commander';
import { registerQuoteCommand } from './commands/quote.js';
import { registerSimulateCommand } from './commands/simulate.js';
import { registerCatalogCommands } from './commands/catalog.js';

const program = new Command();

program
  .name('hopline')
  .description('Hopline - best-route quotes across simulated AMM pools')
  .version('0.1.0');

// Register commands
registerQuoteCommand(program);
registerSimulateCommand(program);
registerCatalogCommands(program);

// Parse and execute
program.parse();
