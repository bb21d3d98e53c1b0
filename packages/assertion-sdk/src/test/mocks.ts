/**
 * Mock factories for testing.
 * Provides scripted in-process stand-ins for the transport and token supplier.
 */

import { ok, err, type Result } from 'neverthrow';
import type { HttpClient, HttpError, HttpRequest, HttpResponse } from '../http/types.js';
import type { BearerTokenSupplier } from '../credentials/types.js';
import type { CredentialError } from '../errors.js';
import { TEST_ACCESS_TOKEN } from './fixtures.js';

// ============================================================================
// HTTP Client Mocks
// ============================================================================

/**
 * One scripted reply: a decoded response, or a transport failure.
 */
export type ScriptedReply =
  | { readonly status: number; readonly body: unknown }
  | { readonly error: HttpError };

/**
 * A request as the mock saw it, with the JSON body decoded.
 */
export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly signal: AbortSignal | undefined;
}

/**
 * Creates a mock HTTP client that answers from a script, in order.
 * The last reply repeats once the script runs out.
 */
export const createScriptedHttpClient = (
  replies: readonly ScriptedReply[]
): HttpClient & { readonly requests: RecordedRequest[] } => {
  const requests: RecordedRequest[] = [];

  const json = (request: HttpRequest): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    const body: unknown = request.body !== undefined ? JSON.parse(request.body) : undefined;
    requests.push({
      url: request.url,
      method: request.method,
      headers: request.headers ?? {},
      body,
      signal: request.signal,
    });

    if (request.signal?.aborted === true) {
      const aborted: HttpError = { type: 'aborted', message: 'Request was cancelled' };
      return Promise.resolve(err(aborted));
    }

    const reply = replies[Math.min(requests.length, replies.length) - 1];
    if (reply === undefined) {
      const exhausted: HttpError = { type: 'network', message: 'No scripted reply' };
      return Promise.resolve(err(exhausted));
    }

    if ('error' in reply) {
      return Promise.resolve(err(reply.error));
    }

    return Promise.resolve(
      ok({ status: reply.status, statusText: '', headers: {}, body: reply.body })
    );
  };

  return { json, requests };
};

/**
 * Shorthand for a JSON reply.
 */
export const jsonReply = (body: unknown, status = 200): ScriptedReply => ({ status, body });

/**
 * Shorthand for a transport failure.
 */
export const errorReply = (error: HttpError): ScriptedReply => ({ error });

// ============================================================================
// Token Supplier Mocks
// ============================================================================

/**
 * Creates a token supplier that always returns the same token.
 */
export const createStaticTokenSupplier = (
  token = TEST_ACCESS_TOKEN
): BearerTokenSupplier & { readonly calls: () => number } => {
  let count = 0;
  return {
    currentToken: () => {
      count++;
      return Promise.resolve(ok(token));
    },
    calls: () => count,
  };
};

/**
 * Creates a token supplier that always fails.
 */
export const createFailingTokenSupplier = (message = 'Refresh token expired'): BearerTokenSupplier => {
  const error: CredentialError = { type: 'credential', message };
  return {
    currentToken: () => Promise.resolve(err(error)),
  };
};
