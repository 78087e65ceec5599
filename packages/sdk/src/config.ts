/**
 * Client configuration — reads from environment variables with sensible defaults.
 */

import { createAuth, type CubeAuth } from '@cubeload/core';
import { DEFAULT_RETRY_CONFIG } from './retry.js';

export interface ClientConfig {
  /** Per-attempt timeout in ms (default: 60000) */
  timeout: number;
  retry: {
    /** Total attempts including the first (default: 5) */
    maxAttempts: number;
    /** Cap on a single backoff wait in ms (default: 30000) */
    maxDelayMs: number;
  };
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Read client configuration from environment variables.
 */
export function getClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    timeout: readPositiveInt(env['CUBE_TIMEOUT_MS'], 60_000),
    retry: {
      maxAttempts: readPositiveInt(env['CUBE_MAX_ATTEMPTS'], DEFAULT_RETRY_CONFIG.maxAttempts),
      maxDelayMs: readPositiveInt(env['CUBE_BACKOFF_MAX_MS'], DEFAULT_RETRY_CONFIG.maxDelayMs),
    },
  };
}

/**
 * Build credentials from `CUBE_API_TOKEN` and `CUBE_API_URL`.
 * Missing values fail validation like any other bad input.
 */
export function authFromEnv(env: NodeJS.ProcessEnv = process.env): CubeAuth {
  return createAuth({
    token: env['CUBE_API_TOKEN'] ?? '',
    host: env['CUBE_API_URL'] ?? '',
  });
}
