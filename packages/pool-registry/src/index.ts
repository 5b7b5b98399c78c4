/**
 * @hopline/pool-registry - Static catalog of simulated liquidity pools
 *
 * Components:
 * - PoolRegistry: immutable pool catalog, supported tokens, aliases, prices
 * - createDefaultRegistry: registry over the reference catalog
 * - loadPoolCatalog: JSON catalog loader with schema validation
 */

export { PoolRegistry, createDefaultRegistry, validatePools } from './registry.js';
export {
  loadPoolCatalog,
  parsePoolCatalog,
  poolSchema,
  poolCatalogSchema,
  type PoolCatalogFile,
} from './catalog.js';
export { PoolRegistryError } from './errors.js';
export {
  DEFAULT_POOLS,
  DEFAULT_SUPPORTED_TOKENS,
  DEFAULT_TOKEN_ALIASES,
  DEFAULT_TOKEN_PRICES,
} from './constants.js';
