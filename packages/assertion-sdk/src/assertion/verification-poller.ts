/**
 * Bounded polling for push-based factor confirmation.
 *
 * The first attempt is sent as given. Every later attempt asks only for the
 * outcome of the push already sent: `doNotNotify` is forced to true and the
 * OTP is cleared, so the device is notified at most once per poll sequence.
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { SamlAssertionError } from '../errors.js';
import {
  createAuthenticationError,
  createCancelledError,
  createMfaTimeoutError,
} from '../errors.js';
import { isPending, isVerified } from './classifier.js';
import type { ProviderReply } from './classifier.js';
import type { PollOptions, VerificationRequest, VerificationResult } from './types.js';

/** Default attempt budget: 30 verify_factor calls */
export const DEFAULT_MAX_ATTEMPTS = 30;

/** Default wait between attempts: 2 seconds */
export const DEFAULT_ATTEMPT_INTERVAL_MS = 2000;

/**
 * Sends one verification attempt and classifies the reply.
 */
export type VerificationAttempt = (
  request: VerificationRequest,
  signal?: AbortSignal
) => Promise<Result<ProviderReply, SamlAssertionError>>;

/**
 * Observer for attempt progress, used for debug logging.
 */
export type AttemptListener = (attempt: number, maxAttempts: number, reply: ProviderReply) => void;

/**
 * Resolves after `ms`, or early with `false` when the signal aborts.
 */
export const waitForNextAttempt = (ms: number, signal?: AbortSignal): Promise<boolean> => {
  if (signal?.aborted === true) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve(false);
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Builds the request for a given attempt number.
 */
export const requestForAttempt = (
  request: VerificationRequest,
  attempt: number
): VerificationRequest =>
  attempt === 1 ? request : { ...request, otpToken: '', doNotNotify: true };

/**
 * The budget is always finite and at least one attempt; NaN and infinities
 * fall back to the default.
 */
const normalizeMaxAttempts = (value: number | undefined): number =>
  value === undefined || !Number.isFinite(value)
    ? DEFAULT_MAX_ATTEMPTS
    : Math.max(1, Math.floor(value));

const normalizeInterval = (value: number | undefined): number =>
  value === undefined || !Number.isFinite(value)
    ? DEFAULT_ATTEMPT_INTERVAL_MS
    : Math.max(0, value);

/**
 * Runs the verification loop until the factor is verified, rejected, the
 * attempt budget runs out, or the caller cancels.
 *
 * @param send - Sends one attempt
 * @param request - The first attempt's request
 * @param options - Polling bounds and cancellation
 * @param onAttempt - Optional progress observer
 * @returns Result with the verification or error
 *
 * @example
 * ```typescript
 * const result = await pollVerification(send, request, { maxAttempts: 2, attemptIntervalMs: 10 });
 * if (result.isErr() && result.error.type === 'mfa_timeout') {
 *   // restart the login from the beginning
 * }
 * ```
 */
export const pollVerification = async (
  send: VerificationAttempt,
  request: VerificationRequest,
  options: PollOptions = {},
  onAttempt?: AttemptListener
): Promise<Result<VerificationResult, SamlAssertionError>> => {
  const maxAttempts = normalizeMaxAttempts(options.maxAttempts);
  const intervalMs = normalizeInterval(options.attemptIntervalMs);
  const { signal } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted === true) {
      return err(createCancelledError('MFA verification was cancelled'));
    }

    const replyResult = await send(requestForAttempt(request, attempt), signal);
    if (replyResult.isErr()) {
      return err(replyResult.error);
    }

    const reply = replyResult.value;
    onAttempt?.(attempt, maxAttempts, reply);

    if (isVerified(reply)) {
      return ok({
        status: reply.status,
        samlAssertion: reply.payload.samlAssertion,
        attempts: attempt,
      });
    }

    if (!isPending(reply)) {
      return err(
        createAuthenticationError(
          reply.status.message.length > 0
            ? reply.status.message
            : `Unexpected verification status "${reply.status.type}"`,
          reply.status.code,
          reply.status.type
        )
      );
    }

    if (attempt < maxAttempts) {
      const waited = await waitForNextAttempt(intervalMs, signal);
      if (!waited) {
        return err(createCancelledError('MFA verification was cancelled'));
      }
    }
  }

  return err(createMfaTimeoutError(maxAttempts));
};
