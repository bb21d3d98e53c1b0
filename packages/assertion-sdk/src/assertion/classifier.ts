/**
 * Response classification shared by login and factor verification.
 *
 * Order of precedence:
 * 1. transport failure or undecodable JSON → protocol error
 * 2. non-2xx status or `status.error` → authentication error, read
 *    leniently so a partial status block still counts
 * 3. envelope shape → protocol error when it does not match
 * 4. `data` decoded by JSON kind: string, array, or absent
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { HttpError, HttpResponse } from '../http/types.js';
import type { AuthenticationError, CancelledError, ProtocolError } from '../errors.js';
import {
  createAuthenticationError,
  createCancelledError,
  createProtocolError,
} from '../errors.js';
import {
  errorFlagSchema,
  rawFactorListSchema,
  rejectionStatusSchema,
  responseEnvelopeSchema,
} from './schemas.js';
import type { RawFactor } from './schemas.js';
import type { ResponseStatus } from './types.js';

export const STATUS_TYPE_SUCCESS = 'success';
export const STATUS_TYPE_PENDING = 'pending';

/**
 * The `data` field, decoded by its JSON kind.
 */
export type ReplyPayload =
  | { readonly kind: 'assertion'; readonly samlAssertion: string }
  | { readonly kind: 'challenge'; readonly factors: readonly RawFactor[] }
  | { readonly kind: 'empty' };

/**
 * A provider reply that passed transport and error checks.
 */
export interface ProviderReply {
  readonly httpStatus: number;
  readonly status: ResponseStatus;
  readonly payload: ReplyPayload;
}

export type ClassificationError = ProtocolError | AuthenticationError | CancelledError;

const isSuccessStatus = (httpStatus: number): boolean => httpStatus >= 200 && httpStatus < 300;

/**
 * Maps a transport failure to the error taxonomy.
 */
const fromHttpError = (error: HttpError): ProtocolError | CancelledError => {
  if (error.type === 'aborted') {
    return createCancelledError(error.message);
  }
  return createProtocolError(error.message, error.status, error);
};

/**
 * Builds the authentication error for a rejected request, preferring the
 * provider's own status block fields where present.
 */
const toRejection = (response: HttpResponse<unknown>): AuthenticationError => {
  const body = response.body;
  const statusResult =
    typeof body === 'object' && body !== null && 'status' in body
      ? rejectionStatusSchema.safeParse(body.status)
      : undefined;

  const statusText = response.statusText.length > 0 ? `: ${response.statusText}` : '';
  const fallbackMessage = `HTTP ${String(response.status)}${statusText}`;

  if (statusResult?.success === true) {
    const status = statusResult.data;
    return createAuthenticationError(
      status.message.length > 0 ? status.message : fallbackMessage,
      status.code ?? response.status,
      status.type
    );
  }

  return createAuthenticationError(fallbackMessage, response.status, '');
};

/**
 * Decodes `data` by inspecting its JSON kind before any structural decoding.
 */
const decodePayload = (data: unknown, httpStatus: number): Result<ReplyPayload, ProtocolError> => {
  if (data === undefined || data === null) {
    return ok({ kind: 'empty' });
  }

  if (typeof data === 'string') {
    return ok({ kind: 'assertion', samlAssertion: data });
  }

  if (Array.isArray(data)) {
    const factors = rawFactorListSchema.safeParse(data);
    if (!factors.success) {
      return err(createProtocolError('Malformed MFA factor list', httpStatus, factors.error));
    }
    return ok({ kind: 'challenge', factors: factors.data });
  }

  return err(createProtocolError(`Unexpected data of type ${typeof data}`, httpStatus));
};

/**
 * Classifies a transport result into a provider reply or an error.
 *
 * @param result - Outcome of the HTTP call
 * @returns Result with the decoded reply or the classified error
 *
 * @example
 * ```typescript
 * const reply = classifyResponse(await httpClient.json(request));
 * if (reply.isOk() && reply.value.payload.kind === 'assertion') {
 *   console.log(reply.value.payload.samlAssertion);
 * }
 * ```
 */
export const classifyResponse = (
  result: Result<HttpResponse<unknown>, HttpError>
): Result<ProviderReply, ClassificationError> => {
  if (result.isErr()) {
    return err(fromHttpError(result.error));
  }

  const response = result.value;

  // The error flag is read before anything else in the body is validated
  if (!isSuccessStatus(response.status) || errorFlagSchema.safeParse(response.body).success) {
    return err(toRejection(response));
  }

  const envelope = responseEnvelopeSchema.safeParse(response.body);

  if (!envelope.success) {
    return err(createProtocolError('Unexpected response shape', response.status, envelope.error));
  }

  const { status, data } = envelope.data;
  const payload = decodePayload(data, response.status);
  if (payload.isErr()) {
    return err(payload.error);
  }

  return ok({ httpStatus: response.status, status, payload: payload.value });
};

/**
 * A verified factor: success status and the SAML string.
 */
export const isVerified = (
  reply: ProviderReply
): reply is ProviderReply & {
  readonly payload: { readonly kind: 'assertion'; readonly samlAssertion: string };
} => reply.status.type === STATUS_TYPE_SUCCESS && reply.payload.kind === 'assertion';

/**
 * Push approval still outstanding: pending status and no data.
 */
export const isPending = (reply: ProviderReply): boolean =>
  reply.status.type === STATUS_TYPE_PENDING && reply.payload.kind === 'empty';
