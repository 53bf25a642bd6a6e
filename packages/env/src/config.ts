import path from 'node:path';

import { z } from 'zod';

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : undefined));

const envSchema = z.object({
  SWAPTRACE_DATA_DIR: z.string().min(1).or(z.undefined()),
  CRYPTOCOMPARE_API_KEY: optionalSecret,
  COINGECKO_API_KEY: optionalSecret,
  COINGECKO_USE_PRO_API: z
    .string()
    .default('false')
    .transform((val) => val === 'true'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Parse an environment record without caching.
 * @throws Error if validation fails
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Forget the cached environment (tests change process.env between cases)
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Get the data directory path for the prices database.
 *
 * Priority:
 * 1. SWAPTRACE_DATA_DIR environment variable (if set)
 * 2. process.cwd() + '/data' (default)
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.SWAPTRACE_DATA_DIR ?? path.join(process.cwd(), 'data');
}

export function getPricesDatabasePath(): string {
  return path.join(getDataDirectory(), 'prices.db');
}

export function getCryptoCompareApiKey(): string | undefined {
  return validateEnv().CRYPTOCOMPARE_API_KEY;
}

export function getCoinGeckoSettings(): { apiKey: string | undefined; useProApi: boolean } {
  const env = validateEnv();
  return { apiKey: env.COINGECKO_API_KEY, useProApi: env.COINGECKO_USE_PRO_API };
}
