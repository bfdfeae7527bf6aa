/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration for the repository client: server host,
 * transport timeout, token expiry policy and credentials.
 */

import { ConfigurationError } from '../errors.js';

export type TokenExpiryPolicy = 'always' | 'jwt-exp';

export const TOKEN_EXPIRY_POLICIES: readonly TokenExpiryPolicy[] = ['always', 'jwt-exp'];

export interface ClientConfig {
  /** Server root, never with a trailing slash */
  host: string;
  timeoutMs: number;
  tokenExpiry: TokenExpiryPolicy;
}

export interface Credentials {
  username: string;
  password: string;
}

export const DEFAULT_HOST = 'http://127.0.0.1:8000';
export const DEFAULT_TIMEOUT_MS = 30_000;

export function isTokenExpiryPolicy(value: string): value is TokenExpiryPolicy {
  return (TOKEN_EXPIRY_POLICIES as readonly string[]).includes(value);
}

/**
 * Strip trailing slashes so that `${host}/api/...` never doubles them
 */
export function normalizeHost(host: string): string {
  return host.replace(/\/+$/, '');
}

/**
 * Load client configuration from environment variables
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const { PREDICTKIT_HOST, PREDICTKIT_TIMEOUT_MS, PREDICTKIT_TOKEN_EXPIRY } = env;

  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (PREDICTKIT_TIMEOUT_MS) {
    timeoutMs = Number(PREDICTKIT_TIMEOUT_MS);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(
        `PREDICTKIT_TIMEOUT_MS must be a positive integer, got '${PREDICTKIT_TIMEOUT_MS}'`,
        'PREDICTKIT_TIMEOUT_MS'
      );
    }
  }

  let tokenExpiry: TokenExpiryPolicy = 'always';
  if (PREDICTKIT_TOKEN_EXPIRY) {
    if (!isTokenExpiryPolicy(PREDICTKIT_TOKEN_EXPIRY)) {
      throw new ConfigurationError(
        `PREDICTKIT_TOKEN_EXPIRY must be one of ${TOKEN_EXPIRY_POLICIES.join(', ')}, got '${PREDICTKIT_TOKEN_EXPIRY}'`,
        'PREDICTKIT_TOKEN_EXPIRY'
      );
    }
    tokenExpiry = PREDICTKIT_TOKEN_EXPIRY;
  }

  return {
    host: normalizeHost(PREDICTKIT_HOST || DEFAULT_HOST),
    timeoutMs,
    tokenExpiry,
  };
}

/**
 * Load credentials from environment variables. Both are required.
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const { PREDICTKIT_USERNAME, PREDICTKIT_PASSWORD } = env;

  if (!PREDICTKIT_USERNAME) {
    throw new ConfigurationError(
      'PREDICTKIT_USERNAME environment variable is required',
      'PREDICTKIT_USERNAME'
    );
  }
  if (!PREDICTKIT_PASSWORD) {
    throw new ConfigurationError(
      'PREDICTKIT_PASSWORD environment variable is required',
      'PREDICTKIT_PASSWORD'
    );
  }

  return { username: PREDICTKIT_USERNAME, password: PREDICTKIT_PASSWORD };
}
