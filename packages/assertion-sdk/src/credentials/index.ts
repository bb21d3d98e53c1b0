/**
 * Bearer tokens for the client's own API calls.
 *
 * @packageDocumentation
 */

export type {
  BearerToken,
  BearerTokenSupplier,
  TokenStore,
  TokenCredentialsConfig,
  TokenCredentials,
} from './types.js';

export { createMemoryTokenStore } from './memory-token-store.js';
export { createTokenCredentials, TOKEN_PATH } from './token-credentials.js';
