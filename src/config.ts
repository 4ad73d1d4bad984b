/**
 * Environment-based configuration
 */

import { CloudError } from "./core/errors.js";

export const ENV_API_KEY = "REDIS_CLOUD_API_KEY";
export const ENV_ACCOUNT_KEY = "REDIS_CLOUD_ACCOUNT_KEY";
export const ENV_API_SECRET = "REDIS_CLOUD_API_SECRET";
export const ENV_SECRET_KEY = "REDIS_CLOUD_SECRET_KEY";
export const ENV_USER_KEY = "REDIS_CLOUD_USER_KEY";
export const ENV_BASE_URL = "REDIS_CLOUD_BASE_URL";

export type Environment = Record<string, string | undefined>;

export interface EnvConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
}

/**
 * Reads credentials from the environment.
 *
 * Key lookup order: REDIS_CLOUD_API_KEY, then REDIS_CLOUD_ACCOUNT_KEY.
 * Secret lookup order: REDIS_CLOUD_API_SECRET, REDIS_CLOUD_SECRET_KEY,
 * REDIS_CLOUD_USER_KEY. Empty values count as unset.
 */
export function loadEnvConfig(env: Environment = process.env): EnvConfig {
  const apiKey = firstSet(env, [ENV_API_KEY, ENV_ACCOUNT_KEY]);
  if (apiKey === undefined) {
    throw CloudError.configuration(
      `API key not found. Set ${ENV_API_KEY} or ${ENV_ACCOUNT_KEY}`
    );
  }

  const apiSecret = firstSet(env, [ENV_API_SECRET, ENV_SECRET_KEY, ENV_USER_KEY]);
  if (apiSecret === undefined) {
    throw CloudError.configuration(`API secret not found. Set ${ENV_API_SECRET}`);
  }

  const config: EnvConfig = { apiKey, apiSecret };
  const baseUrl = firstSet(env, [ENV_BASE_URL]);
  if (baseUrl !== undefined) {
    config.baseUrl = baseUrl;
  }
  return config;
}

function firstSet(env: Environment, names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") {
      return value;
    }
  }
  return undefined;
}
