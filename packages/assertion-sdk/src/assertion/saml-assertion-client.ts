/**
 * Client for the SAML assertion API.
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { SamlAssertionError } from '../errors.js';
import { createAuthenticationError } from '../errors.js';
import type { HttpClient } from '../http/types.js';
import { createFetchClient } from '../http/fetch-client.js';
import type { BearerTokenSupplier } from '../credentials/types.js';
import { classifyResponse } from './classifier.js';
import type { ProviderReply } from './classifier.js';
import { toFactor } from './devices.js';
import {
  SAML_ASSERTION_PATH,
  VERIFY_FACTOR_PATH,
  buildApiUrl,
  buildPostRequest,
  toGenerateRequestBody,
  toVerifyFactorRequestBody,
} from './request-builder.js';
import type { GenerateRequestBody, VerifyFactorRequestBody } from './schemas.js';
import { pollVerification } from './verification-poller.js';
import type { VerificationAttempt } from './verification-poller.js';
import type {
  AssertionGranted,
  AssertionResult,
  AuthenticationRequest,
  GenerateOptions,
  MfaChallenge,
  PollOptions,
  SamlAssertionClient,
  SamlAssertionClientConfig,
  VerificationRequest,
  VerificationResult,
} from './types.js';

/**
 * Turns a classified login reply into an assertion or a challenge.
 *
 * A reply with neither is rejected: the provider documents no such success.
 */
const toAssertionResult = (reply: ProviderReply): Result<AssertionResult, SamlAssertionError> => {
  const { status, payload } = reply;

  if (payload.kind === 'assertion' && payload.samlAssertion.length > 0) {
    const granted: AssertionGranted = {
      type: 'assertion',
      status,
      samlAssertion: payload.samlAssertion,
      factors: [],
    };
    return ok(granted);
  }

  if (payload.kind === 'challenge') {
    const factors = payload.factors.map(toFactor);
    const usable = factors.length > 0 && factors.every((factor) => factor.devices.length > 0);
    if (usable) {
      const challenge: MfaChallenge = { type: 'mfa_required', status, samlAssertion: '', factors };
      return ok(challenge);
    }
    return err(
      createAuthenticationError(
        'MFA is required but no MFA device is available',
        status.code,
        status.type
      )
    );
  }

  return err(
    createAuthenticationError(
      'Provider returned neither a SAML assertion nor an MFA challenge',
      status.code,
      status.type
    )
  );
};

/**
 * Creates a client for the SAML assertion API.
 *
 * @param config - API location and logging
 * @param tokenSupplier - Bearer token for the client's own calls
 * @param httpClient - HTTP client (optional)
 * @returns SamlAssertionClient instance
 *
 * @example
 * ```typescript
 * const client = createSamlAssertionClient(
 *   { apiUrl: 'https://api.us.onelogin.com' },
 *   createTokenCredentials({ apiUrl, clientId, clientSecret })
 * );
 *
 * const login = await client.generate({
 *   usernameOrEmail: 'user@example.com',
 *   password,
 *   appId: '123456',
 *   subdomain: 'example',
 * });
 *
 * if (login.isOk() && login.value.type === 'mfa_required') {
 *   const [factor] = login.value.factors;
 *   // choose a device, then:
 *   const verified = await client.verifyFactor(
 *     { appId: '123456', deviceId: '42', stateToken: factor.stateToken, otpToken: '', doNotNotify: false },
 *     { maxAttempts: 30, attemptIntervalMs: 2000 }
 *   );
 * }
 * ```
 */
export const createSamlAssertionClient = (
  config: SamlAssertionClientConfig,
  tokenSupplier: BearerTokenSupplier,
  httpClient: HttpClient = createFetchClient()
): SamlAssertionClient => {
  const generateUrl = buildApiUrl(config.apiUrl, SAML_ASSERTION_PATH);
  const verifyUrl = buildApiUrl(config.apiUrl, VERIFY_FACTOR_PATH);

  const log = (message: string): void => {
    if (config.debug === true) {
      console.error(`[saml-assertion] ${message}`);
    }
  };

  /**
   * Sends one authenticated POST and classifies the reply.
   * The bearer token is fetched immediately before each call.
   */
  const send = async (
    url: string,
    body: GenerateRequestBody | VerifyFactorRequestBody,
    signal?: AbortSignal
  ): Promise<Result<ProviderReply, SamlAssertionError>> => {
    const token = await tokenSupplier.currentToken();
    if (token.isErr()) {
      return err(token.error);
    }

    const response = await httpClient.json(buildPostRequest(url, token.value, body, signal));
    return classifyResponse(response);
  };

  const generate = async (
    request: AuthenticationRequest,
    options: GenerateOptions = {}
  ): Promise<Result<AssertionResult, SamlAssertionError>> => {
    log(`requesting assertion for app ${request.appId} in ${request.subdomain}`);

    const reply = await send(generateUrl, toGenerateRequestBody(request), options.signal);
    if (reply.isErr()) {
      log(`assertion request failed: ${reply.error.type}`);
      return err(reply.error);
    }

    const result = toAssertionResult(reply.value);
    if (result.isOk()) {
      log(
        result.value.type === 'assertion'
          ? 'assertion issued without MFA'
          : `MFA required (${String(result.value.factors.length)} factor(s))`
      );
    }
    return result;
  };

  const verifyFactor = (
    request: VerificationRequest,
    options: PollOptions = {}
  ): Promise<Result<VerificationResult, SamlAssertionError>> => {
    const attempt: VerificationAttempt = (attemptRequest, signal) =>
      send(verifyUrl, toVerifyFactorRequestBody(attemptRequest), signal);

    log(`verifying device ${request.deviceId} (notify: ${String(!request.doNotNotify)})`);

    return pollVerification(attempt, request, options, (attemptNumber, maxAttempts, reply) => {
      log(`verify attempt ${String(attemptNumber)}/${String(maxAttempts)}: ${reply.status.type}`);
    });
  };

  return {
    generate,
    verifyFactor,
  };
};
