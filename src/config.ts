/**
 * Configuration
 * Reads client settings from the environment (and a .env file, if present)
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  GeocodingClient,
  type GeocodingClientConfig,
} from './services/geocoding/client.js';

const EnvSchema = z.object({
  GEOCODER_API_KEY: z
    .string({ required_error: 'environment variable is not set' })
    .min(1, 'environment variable is empty'),
  GEOCODER_API_HOST: z.string().url().optional(),
  GEOCODER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  GEOCODER_DEBUG: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

function readEnvironment(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = readEnvironment()
): GeocodingClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid geocoder configuration: ${problems}`);
  }

  const {
    GEOCODER_API_KEY,
    GEOCODER_API_HOST,
    GEOCODER_TIMEOUT_MS,
    GEOCODER_DEBUG,
  } = parsed.data;

  return {
    apiKey: GEOCODER_API_KEY,
    ...(GEOCODER_API_HOST !== undefined ? { hostname: GEOCODER_API_HOST } : {}),
    ...(GEOCODER_TIMEOUT_MS !== undefined ? { timeout: GEOCODER_TIMEOUT_MS } : {}),
    debug: GEOCODER_DEBUG,
  };
}

export function createClientFromEnv(
  env?: NodeJS.ProcessEnv
): GeocodingClient {
  return new GeocodingClient(loadConfig(env));
}
