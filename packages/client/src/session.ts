/**
 * Session
 *
 * Holds one bearer token obtained for one (username, password) pair against
 * one server, and decides when that token must be renewed.
 */

import { z } from 'zod';
import {
  AuthenticationError,
  createLogger,
  type Credentials,
  type TokenExpiryPolicy,
} from '@predictkit/utils';
import type { Transport } from './transport.js';

const log = createLogger('client:session');

const TokenResponseSchema = z.object({ token: z.string().min(1) });

const JwtClaimsSchema = z.object({ exp: z.number() });

export interface SessionOptions {
  tokenExpiry: TokenExpiryPolicy;
  /** Milliseconds since the epoch */
  now?: () => number;
}

/**
 * Expiry (seconds since the epoch) from a JWT's `exp` claim, if the token is
 * a JWT carrying one. Any other token yields undefined.
 */
export function jwtExpiry(token: string): number | undefined {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return undefined;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
  const claims = JwtClaimsSchema.safeParse(payload);
  return claims.success ? claims.data.exp : undefined;
}

export class Session {
  readonly host: string;
  readonly username: string;
  readonly token: string;
  private readonly tokenExpiry: TokenExpiryPolicy;
  private readonly now: () => number;
  private readonly expiresAt?: number;

  private constructor(host: string, username: string, token: string, options: SessionOptions) {
    this.host = host;
    this.username = username;
    this.token = token;
    this.tokenExpiry = options.tokenExpiry;
    this.now = options.now ?? Date.now;
    this.expiresAt = jwtExpiry(token);
  }

  /**
   * Exchange credentials for a token at `<host>/api-token-auth/`
   */
  static async authenticate(
    transport: Transport,
    host: string,
    credentials: Credentials,
    options: SessionOptions
  ): Promise<Session> {
    const uri = `${host}/api-token-auth/`;
    const response = await transport.request({
      method: 'POST',
      url: uri,
      body: {
        kind: 'form',
        fields: { username: credentials.username, password: credentials.password },
      },
    });

    if (response.status !== 200) {
      log.warn('Token request rejected', { host, username: credentials.username, status: response.status });
      throw new AuthenticationError(
        `Token request failed: status=${response.status}. body=${response.body}`,
        response.status,
        response.body,
        { host, username: credentials.username }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch {
      json = undefined;
    }
    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthenticationError(
        `Token endpoint returned no token. body=${response.body}`,
        response.status,
        response.body,
        { host, username: credentials.username }
      );
    }

    return new Session(host, credentials.username, parsed.data.token, options);
  }

  /**
   * Whether the token must be renewed before its next use.
   *
   * Under `always` every check reports expired. Under `jwt-exp` the token's
   * own `exp` claim decides; a token without one counts as expired.
   */
  isExpired(): boolean {
    if (this.tokenExpiry === 'always' || this.expiresAt === undefined) {
      return true;
    }
    return this.now() >= this.expiresAt * 1000;
  }

  authorizationHeader(): string {
    return `JWT ${this.token}`;
  }
}
