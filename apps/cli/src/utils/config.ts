import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { HoplineConfig } from '@hopline/types';

const envSchema = z.object({
  HOPLINE_POOLS_FILE: z.string().trim().min(1).optional(),
  HOPLINE_GAS_PRICE_GWEI: z.coerce.number().positive().default(5),
  HOPLINE_SLIPPAGE_BPS: z.coerce.number().int().min(0).lt(10_000).default(50),
  HOPLINE_INTERMEDIATES: z
    .string()
    .default('WETH,USDC,USDT')
    .transform((list) => parseTokenList(list)),
});

/**
 * Load Hopline configuration from environment variables and .env file.
 */
export function loadConfig(): HoplineConfig {
  loadDotenv({ path: resolve(process.cwd(), '.env') });
  return parseConfig(process.env);
}

/**
 * Validate configuration from an environment map.
 * Empty variables count as unset.
 */
export function parseConfig(env: Record<string, string | undefined>): HoplineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    poolsFile: vars.HOPLINE_POOLS_FILE,
    gasPriceGwei: vars.HOPLINE_GAS_PRICE_GWEI,
    slippageBps: vars.HOPLINE_SLIPPAGE_BPS,
    intermediateTokens: vars.HOPLINE_INTERMEDIATES,
  };
}

/**
 * Split a comma-separated symbol list, upper-casing each entry.
 */
export function parseTokenList(list: string): string[] {
  return list
    .split(',')
    .map((symbol) => symbol.trim().toUpperCase())
    .filter((symbol) => symbol.length > 0);
}
