// Filename: config/configApiKeys.ts

import dotenv from 'dotenv';
import { join } from 'path';
import { log, LOG, TMI } from '../utils/log.js';
import { EnvMissingError } from '../utils/errors.js';

/** Variables checked, in this order, by loadApiKeys */
export const POLYGON_KEY_ENV = 'POLYGON_KEY';
export const COINGECKO_KEY_ENV = 'COINGECKO_KEY';

/** Holds the provider credentials read from the environment */
export interface ApiKeys {
  readonly polygon: string;
  readonly coingecko: string;
}

/**
 * Loads `.env.local` from the working directory with dotenv.
 * Variables already exported win; a missing file is fine.
 */
export function loadLocalEnv(cwd: string = process.cwd()): void {
  const envPath = join(cwd, '.env.local');
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    // Env vars might be set another way
    log(`🔑 No ${envPath} loaded, using process environment only`, TMI);
  }
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new EnvMissingError(name);
  }
  return value;
}

/**
 * Reads both provider keys. POLYGON_KEY is checked first, so with neither
 * set the error always names POLYGON_KEY.
 *
 * @throws EnvMissingError naming the first variable that is unset or empty
 */
export function loadApiKeys(env: NodeJS.ProcessEnv = process.env): ApiKeys {
  const polygon = requireEnv(env, POLYGON_KEY_ENV);
  const coingecko = requireEnv(env, COINGECKO_KEY_ENV);

  log('🔑 Polygon and CoinGecko keys found', LOG);

  return Object.freeze({ polygon, coingecko });
}
