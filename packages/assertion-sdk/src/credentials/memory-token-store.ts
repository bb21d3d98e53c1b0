import type { BearerToken, TokenStore } from './types.js';

/**
 * Creates an in-memory token store. The token is lost when the process exits.
 *
 * @param initial - Token to start with, e.g. one restored by the caller
 * @returns A TokenStore instance
 */
export const createMemoryTokenStore = (initial?: BearerToken): TokenStore => {
  let current = initial;

  return {
    get: () => Promise.resolve(current),
    set: (token) => {
      current = token;
      return Promise.resolve();
    },
    clear: () => {
      current = undefined;
      return Promise.resolve();
    },
  };
};
