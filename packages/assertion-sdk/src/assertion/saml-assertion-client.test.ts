import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSamlAssertionClient } from './saml-assertion-client.js';
import { isMfaChallenge } from './types.js';
import {
  createFailingTokenSupplier,
  createScriptedHttpClient,
  createStaticTokenSupplier,
  errorReply,
  jsonReply,
} from '../test/mocks.js';
import {
  BAD_REQUEST_BODY,
  PENDING_BODY,
  TEST_API_URL,
  TEST_DEVICE_ID,
  TEST_SAML,
  TEST_SAML_ASSERTION_URL,
  TEST_STATE_TOKEN,
  TEST_VERIFY_FACTOR_URL,
  createAuthenticationRequest,
  createMfaRequiredBody,
  createSuccessBody,
  createVerificationRequest,
} from '../test/fixtures.js';

describe('createSamlAssertionClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('generate', () => {
    describe('given an application that does not require MFA', () => {
      it('returns the SAML assertion with no factors', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(createSuccessBody())]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isOk()).toBe(true);
        if (result.isOk()) {
          expect(result.value.type).toBe('assertion');
          expect(result.value.samlAssertion).toBe(TEST_SAML);
          expect(result.value.factors).toEqual([]);
          expect(isMfaChallenge(result.value)).toBe(false);
        }
      });

      it('posts the credentials with a bearer token', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(createSuccessBody())]);
        const client = createSamlAssertionClient(
          { apiUrl: `${TEST_API_URL}/` },
          createStaticTokenSupplier(),
          httpClient
        );

        await client.generate(createAuthenticationRequest());

        expect(httpClient.requests).toHaveLength(1);
        const [request] = httpClient.requests;
        expect(request?.url).toBe(TEST_SAML_ASSERTION_URL);
        expect(request?.method).toBe('POST');
        expect(request?.headers['Authorization']).toBe('Bearer test-access-token');
        expect(request?.body).toEqual({
          username_or_email: 'username-or-email',
          password: 'test-password',
          app_id: 'app-id',
          subdomain: 'subdomain',
          ip_address: 'ip-address',
        });
      });
    });

    describe('given an application that requires MFA', () => {
      it('returns the challenge with an empty assertion', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(createMfaRequiredBody())]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isOk()).toBe(true);
        if (result.isOk() && isMfaChallenge(result.value)) {
          expect(result.value.samlAssertion).toBe('');
          expect(result.value.status.message).toBe('MFA is required for this user');
          expect(result.value.factors).toHaveLength(1);
          expect(result.value.factors[0]?.stateToken).toBe(TEST_STATE_TOKEN);
          expect(result.value.factors[0]?.devices).toEqual([
            { deviceId: TEST_DEVICE_ID, deviceType: 'Google Authenticator', requiresOtpToken: true },
          ]);
        } else {
          expect.unreachable('expected an MFA challenge');
        }
      });

      it('expands push-capable devices into two entries', async () => {
        const httpClient = createScriptedHttpClient([
          jsonReply(createMfaRequiredBody([{ device_id: 42, device_type: 'OneLogin Protect' }])),
        ]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isOk()).toBe(true);
        if (result.isOk() && isMfaChallenge(result.value)) {
          expect(result.value.factors[0]?.devices.map((device) => device.deviceType)).toEqual([
            'OneLogin Protect',
            'Notify to OneLogin Protect',
          ]);
        } else {
          expect.unreachable('expected an MFA challenge');
        }
      });

      it('rejects a challenge that offers no device', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(createMfaRequiredBody([]))]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error).toEqual({
            type: 'authentication',
            message: 'MFA is required but no MFA device is available',
            code: 200,
            statusType: 'success',
          });
        }
      });
    });

    describe('given incorrect credentials', () => {
      it('returns the provider rejection', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(BAD_REQUEST_BODY, 400)]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error).toEqual({
            type: 'authentication',
            message: 'Authorization Information is incorrect',
            code: 400,
            statusType: 'bad request',
          });
        }
      });
    });

    describe('given a reply with neither assertion nor factors', () => {
      it('returns an authentication error', async () => {
        const httpClient = createScriptedHttpClient([
          jsonReply({ status: { type: 'success', message: 'Success', error: false, code: 200 } }),
        ]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isErr() && result.error.message).toBe(
          'Provider returned neither a SAML assertion nor an MFA challenge'
        );
      });
    });

    describe('given an undecodable body', () => {
      it('returns a protocol error whatever the HTTP status', async () => {
        const httpClient = createScriptedHttpClient([
          errorReply({ type: 'parse', message: 'Failed to parse JSON response', status: 400 }),
        ]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error).toMatchObject({ type: 'protocol', status: 400 });
        }
      });
    });

    describe('given no bearer token is available', () => {
      it('returns the credential error without calling the API', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(createSuccessBody())]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createFailingTokenSupplier(),
          httpClient
        );

        const result = await client.generate(createAuthenticationRequest());

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error).toEqual({ type: 'credential', message: 'Refresh token expired' });
        }
        expect(httpClient.requests).toHaveLength(0);
      });
    });

    describe('given debug logging', () => {
      it('logs to stderr with a prefix', async () => {
        const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL, debug: true },
          createStaticTokenSupplier(),
          createScriptedHttpClient([jsonReply(createSuccessBody())])
        );

        await client.generate(createAuthenticationRequest());

        expect(consoleSpy).toHaveBeenCalledWith(
          '[saml-assertion] requesting assertion for app app-id in subdomain'
        );
        expect(consoleSpy).toHaveBeenCalledWith('[saml-assertion] assertion issued without MFA');
      });
    });
  });

  describe('verifyFactor', () => {
    describe('given a correct code', () => {
      it('returns the assertion', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(createSuccessBody())]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.verifyFactor(createVerificationRequest());

        expect(result.isOk()).toBe(true);
        if (result.isOk()) {
          expect(result.value.samlAssertion).toBe(TEST_SAML);
          expect(result.value.attempts).toBe(1);
        }
        expect(httpClient.requests[0]?.url).toBe(TEST_VERIFY_FACTOR_URL);
        expect(httpClient.requests[0]?.body).toEqual({
          app_id: 'app-id',
          device_id: '666666',
          state_token: TEST_STATE_TOKEN,
          otp_token: '123456',
          do_not_notify: false,
        });
      });
    });

    describe('given a push that is approved on the third attempt', () => {
      it('polls and fetches a token before every call', async () => {
        const tokenSupplier = createStaticTokenSupplier();
        const httpClient = createScriptedHttpClient([
          jsonReply(PENDING_BODY),
          jsonReply(PENDING_BODY),
          jsonReply(createSuccessBody()),
        ]);
        const client = createSamlAssertionClient({ apiUrl: TEST_API_URL }, tokenSupplier, httpClient);

        const result = await client.verifyFactor(
          createVerificationRequest({ otpToken: '', doNotNotify: false }),
          { maxAttempts: 5, attemptIntervalMs: 1 }
        );

        expect(result.isOk() && result.value.attempts).toBe(3);
        expect(tokenSupplier.calls()).toBe(3);
        expect(httpClient.requests.map((request) => request.body)).toEqual([
          expect.objectContaining({ do_not_notify: false }),
          expect.objectContaining({ do_not_notify: true, otp_token: '' }),
          expect.objectContaining({ do_not_notify: true, otp_token: '' }),
        ]);
      });
    });

    describe('given a push that is never approved', () => {
      it('times out after the attempt budget', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(PENDING_BODY)]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.verifyFactor(createVerificationRequest(), {
          maxAttempts: 2,
          attemptIntervalMs: 1,
        });

        expect(result.isErr() && result.error.type).toBe('mfa_timeout');
        expect(httpClient.requests).toHaveLength(2);
      });
    });

    describe('given an incorrect code', () => {
      it('returns the provider rejection', async () => {
        const httpClient = createScriptedHttpClient([jsonReply(BAD_REQUEST_BODY, 400)]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.verifyFactor(createVerificationRequest());

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error).toEqual({
            type: 'authentication',
            message: 'Authorization Information is incorrect',
            code: 400,
            statusType: 'bad request',
          });
        }
        expect(httpClient.requests).toHaveLength(1);
      });
    });

    describe('given a cancelled signal', () => {
      it('returns a cancelled error without calling the API', async () => {
        const controller = new AbortController();
        controller.abort();
        const httpClient = createScriptedHttpClient([jsonReply(PENDING_BODY)]);
        const client = createSamlAssertionClient(
          { apiUrl: TEST_API_URL },
          createStaticTokenSupplier(),
          httpClient
        );

        const result = await client.verifyFactor(createVerificationRequest(), {
          signal: controller.signal,
        });

        expect(result.isErr() && result.error.type).toBe('cancelled');
        expect(httpClient.requests).toHaveLength(0);
      });
    });
  });
});
