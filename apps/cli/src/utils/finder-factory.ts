import ora from 'ora';
import type { HoplineConfig } from '@hopline/types';
import { PoolRegistry, createDefaultRegistry, loadPoolCatalog } from '@hopline/pool-registry';
import { RouteFinder } from '@hopline/route-finder';
import { loadConfig } from './config.js';
import { printError } from './display.js';

/** CLI flags that override the loaded configuration */
export interface ConfigOverrides {
  pools?: string;
  slippage?: string;
}

/**
 * Build the pool registry: the configured catalog file, or the built-in defaults.
 */
export function createRegistryFromConfig(config: HoplineConfig): PoolRegistry {
  if (config.poolsFile) {
    return new PoolRegistry(loadPoolCatalog(config.poolsFile));
  }
  return createDefaultRegistry();
}

/**
 * Create a RouteFinder wired to the given registry and configuration.
 */
export function createRouteFinder(config: HoplineConfig, registry: PoolRegistry): RouteFinder {
  return new RouteFinder(registry, {
    intermediateTokens: config.intermediateTokens,
    slippageBps: config.slippageBps,
    gas: { gasPriceGwei: config.gasPriceGwei },
  });
}

/**
 * Apply CLI flag overrides on top of a loaded configuration.
 * Throws on a malformed --slippage value.
 */
export function applyOverrides(config: HoplineConfig, overrides: ConfigOverrides): HoplineConfig {
  const result = { ...config };

  if (overrides.pools) result.poolsFile = overrides.pools;

  if (overrides.slippage !== undefined) {
    const slippage = Number(overrides.slippage);
    if (!Number.isInteger(slippage) || slippage < 0 || slippage >= 10_000) {
      throw new Error('Invalid slippage. Please provide whole basis points between 0 and 9999.');
    }
    result.slippageBps = slippage;
  }

  return result;
}

/**
 * Load config, registry and finder for a command.
 *
 * This is the central factory used by all CLI commands. Prints a spinner
 * unless `quiet` is set; on failure prints the error and exits.
 */
export function loadRouteFinder(
  overrides: ConfigOverrides,
  quiet: boolean = false
): { config: HoplineConfig; registry: PoolRegistry; finder: RouteFinder } {
  const spinner = quiet ? null : ora({ text: 'Loading pool catalog...', color: 'magenta' }).start();

  try {
    const config = applyOverrides(loadConfig(), overrides);
    const registry = createRegistryFromConfig(config);
    const finder = createRouteFinder(config, registry);

    spinner?.succeed(
      `Loaded ${registry.size} pools from ${config.poolsFile ?? 'the built-in catalog'}`
    );
    return { config, registry, finder };
  } catch (err) {
    spinner?.fail('Failed to load pool catalog');
    printError(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
