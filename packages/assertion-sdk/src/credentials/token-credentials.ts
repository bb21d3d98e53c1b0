/**
 * Bearer token supplier for the provider's OAuth2 token API.
 *
 * Acquires a token with the client-credentials grant, refreshes it before it
 * expires, and falls back to a fresh grant when the refresh token is spent.
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { CredentialError } from '../errors.js';
import { createCredentialError } from '../errors.js';
import type { HttpClient } from '../http/types.js';
import { createFetchClient } from '../http/fetch-client.js';
import type { BearerToken, TokenCredentials, TokenCredentialsConfig, TokenStore } from './types.js';
import { createMemoryTokenStore } from './memory-token-store.js';

export const TOKEN_PATH = '/auth/oauth2/v2/token';

/** Default refresh buffer: 60 seconds before expiry */
const DEFAULT_REFRESH_BUFFER_SECONDS = 60;

/** Default refresh token lifetime: 45 days */
const DEFAULT_REFRESH_TOKEN_TTL_MS = 45 * 24 * 60 * 60 * 1000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  created_at: z.string().optional(),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
});

type TokenGrant =
  | { readonly grant_type: 'client_credentials' }
  | {
      readonly grant_type: 'refresh_token';
      readonly access_token: string;
      readonly refresh_token: string;
    };

/**
 * The token API authenticates clients with this non-standard header.
 */
const createClientAuthHeader = (clientId: string, clientSecret: string): string =>
  `client_id:${clientId}, client_secret:${clientSecret}`;

/**
 * Reads an error message from a token API error body.
 */
const readErrorMessage = (body: unknown, status: number): string => {
  if (typeof body === 'object' && body !== null) {
    if ('message' in body && typeof body.message === 'string') {
      return body.message;
    }
    if ('error_description' in body && typeof body.error_description === 'string') {
      return body.error_description;
    }
  }
  return `Token request failed with HTTP ${String(status)}`;
};

/**
 * Creates a token supplier for the client's own API calls.
 *
 * @param config - Client credentials and refresh policy
 * @param store - Where the current token lives (optional, defaults to in-memory)
 * @param httpClient - HTTP client (optional)
 * @returns TokenCredentials instance
 *
 * @example
 * ```typescript
 * const credentials = createTokenCredentials({
 *   apiUrl: 'https://api.us.onelogin.com',
 *   clientId: 'my-client-id',
 *   clientSecret: 'secret',
 * });
 *
 * const token = await credentials.currentToken();
 * if (token.isOk()) {
 *   // Use token.value as the bearer token
 * }
 * ```
 */
export const createTokenCredentials = (
  config: TokenCredentialsConfig,
  store: TokenStore = createMemoryTokenStore(),
  httpClient: HttpClient = createFetchClient()
): TokenCredentials => {
  const refreshBufferMs = (config.refreshBufferSeconds ?? DEFAULT_REFRESH_BUFFER_SECONDS) * 1000;
  const refreshTokenTtlMs = config.refreshTokenTtlMs ?? DEFAULT_REFRESH_TOKEN_TTL_MS;
  const tokenUrl = `${config.apiUrl.replace(/\/+$/, '')}${TOKEN_PATH}`;

  let inFlight: Promise<Result<BearerToken, CredentialError>> | undefined;

  const log = (message: string): void => {
    if (config.debug === true) {
      console.error(`[token] ${message}`);
    }
  };

  const isAccessExpiring = (token: BearerToken, now: number): boolean =>
    token.accessExpiresAt - refreshBufferMs <= now;

  const canRefresh = (token: BearerToken, now: number): boolean =>
    token.refreshToken.length > 0 && token.refreshExpiresAt > now;

  /**
   * Makes a request to the token endpoint.
   */
  const requestToken = async (grant: TokenGrant): Promise<Result<BearerToken, CredentialError>> => {
    const response = await httpClient.json({
      url: tokenUrl,
      method: 'POST',
      headers: {
        Authorization: createClientAuthHeader(config.clientId, config.clientSecret),
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(grant),
    });

    if (response.isErr()) {
      return err(
        createCredentialError(`Token request failed: ${response.error.message}`, response.error)
      );
    }

    const { status, body } = response.value;

    if (status >= 400) {
      return err(createCredentialError(readErrorMessage(body, status)));
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(
        createCredentialError('Invalid token response: missing required fields', parsed.error)
      );
    }

    const tokenResponse = parsed.data;
    const issuedAt =
      tokenResponse.created_at !== undefined ? Date.parse(tokenResponse.created_at) : Number.NaN;
    const createdAt = Number.isNaN(issuedAt) ? Date.now() : issuedAt;

    return ok({
      accessToken: tokenResponse.access_token,
      refreshToken: tokenResponse.refresh_token,
      createdAt,
      accessExpiresAt: createdAt + tokenResponse.expires_in * 1000,
      refreshExpiresAt: createdAt + refreshTokenTtlMs,
    });
  };

  /**
   * Returns the stored token, or a refreshed or newly granted one.
   */
  const ensureToken = async (): Promise<Result<BearerToken, CredentialError>> => {
    const stored = await store.get();
    const now = Date.now();

    if (stored !== undefined && !isAccessExpiring(stored, now)) {
      return ok(stored);
    }

    let next: Result<BearerToken, CredentialError> | undefined;

    if (stored !== undefined && canRefresh(stored, now)) {
      log('access token expiring, refreshing');
      next = await requestToken({
        grant_type: 'refresh_token',
        access_token: stored.accessToken,
        refresh_token: stored.refreshToken,
      });
      if (next.isErr()) {
        log(`refresh failed (${next.error.message}), requesting a new token`);
      }
    }

    if (next === undefined || next.isErr()) {
      log('requesting token with client credentials');
      next = await requestToken({ grant_type: 'client_credentials' });
    }

    if (next.isOk()) {
      await store.set(next.value);
    }

    return next;
  };

  const currentToken = async (): Promise<Result<string, CredentialError>> => {
    // Concurrent callers share one lookup, and therefore at most one refresh
    if (inFlight === undefined) {
      inFlight = ensureToken().finally(() => {
        inFlight = undefined;
      });
    }

    const result = await inFlight;
    return result.map((token) => token.accessToken);
  };

  const getToken = (): Promise<BearerToken | undefined> => store.get();

  const clear = (): Promise<void> => store.clear();

  return {
    currentToken,
    getToken,
    clear,
  };
};
