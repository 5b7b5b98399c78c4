import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { PoolRegistryConfig } from '@hopline/types';
import {
  DEFAULT_SUPPORTED_TOKENS,
  DEFAULT_TOKEN_ALIASES,
  DEFAULT_TOKEN_PRICES,
} from './constants.js';
import { PoolRegistryError } from './errors.js';

const symbol = z.string().trim().min(1);

export const poolSchema = z.object({
  name: z.string().trim().min(1),
  tokenA: symbol,
  tokenB: symbol,
  reserveA: z.number().positive(),
  reserveB: z.number().positive(),
  feePct: z.number().min(0).lt(100),
  dex: z.string().trim().min(1),
});

/**
 * On-disk catalog format. Only `pools` is required; the other sections
 * fall back to the reference deployment's values.
 */
export const poolCatalogSchema = z.object({
  pools: z.array(poolSchema).min(1),
  supportedTokens: z.array(symbol).min(1).optional(),
  tokenPrices: z.record(z.number().nonnegative()).optional(),
  tokenAliases: z.record(symbol).optional(),
});

export type PoolCatalogFile = z.infer<typeof poolCatalogSchema>;

/**
 * Validate an already-parsed catalog object.
 *
 * @param source - label used in error messages (usually the file path)
 */
export function parsePoolCatalog(raw: unknown, source: string = 'pool catalog'): PoolRegistryConfig {
  const parsed = poolCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PoolRegistryError(
      `Invalid pool catalog in ${source}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const catalog = parsed.data;
  return {
    pools: catalog.pools,
    supportedTokens: catalog.supportedTokens ?? [...DEFAULT_SUPPORTED_TOKENS],
    tokenPrices: catalog.tokenPrices ?? DEFAULT_TOKEN_PRICES,
    tokenAliases: catalog.tokenAliases ?? DEFAULT_TOKEN_ALIASES,
  };
}

/**
 * Read and validate a JSON pool catalog from disk.
 */
export function loadPoolCatalog(path: string): PoolRegistryConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PoolRegistryError(`Cannot read pool catalog ${path}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PoolRegistryError(`Pool catalog ${path} is not valid JSON: ${reason}`);
  }

  return parsePoolCatalog(raw, path);
}
