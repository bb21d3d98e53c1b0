/**
 * Bearer token types for authenticating the client's own API calls.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { CredentialError } from '../errors.js';

/**
 * OAuth token pair issued to the API client (not to the end user).
 * Timestamps are Unix ms.
 */
export interface BearerToken {
  readonly accessToken: string;
  readonly refreshToken: string;
  readonly createdAt: number;
  readonly accessExpiresAt: number;
  readonly refreshExpiresAt: number;
}

/**
 * Supplies a non-expired access token, refreshing transparently.
 *
 * Implementations must be safe for concurrent use.
 */
export interface BearerTokenSupplier {
  readonly currentToken: () => Promise<Result<string, CredentialError>>;
}

/**
 * Holds the current token between calls.
 */
export interface TokenStore {
  readonly get: () => Promise<BearerToken | undefined>;
  readonly set: (token: BearerToken) => Promise<void>;
  readonly clear: () => Promise<void>;
}

/**
 * API client credentials and refresh policy.
 */
export interface TokenCredentialsConfig {
  /** API base URL (e.g., "https://api.us.onelogin.com") */
  readonly apiUrl: string;
  readonly clientId: string;
  readonly clientSecret: string;
  /**
   * Seconds before access expiry at which the token counts as expiring.
   * Default: 60
   */
  readonly refreshBufferSeconds?: number;
  /** Refresh token lifetime in ms (default: 45 days) */
  readonly refreshTokenTtlMs?: number;
  /** Log token lifecycle events to stderr (default: false) */
  readonly debug?: boolean;
}

/**
 * Token supplier backed by the OAuth2 client-credentials API.
 */
export interface TokenCredentials extends BearerTokenSupplier {
  /** The stored token, without refreshing */
  readonly getToken: () => Promise<BearerToken | undefined>;
  /** Forgets the stored token; the next call acquires a new one */
  readonly clear: () => Promise<void>;
}
