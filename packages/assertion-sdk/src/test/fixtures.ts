/**
 * Shared test fixtures and constants.
 * Provider replies mirror the shapes the assertion API actually returns.
 */

import type { RawDevice } from '../assertion/schemas.js';
import type { AuthenticationRequest, VerificationRequest } from '../assertion/types.js';

// ============================================================================
// Connection
// ============================================================================

export const TEST_API_URL = 'https://api.example.com';
export const TEST_SAML_ASSERTION_URL = `${TEST_API_URL}/api/1/saml_assertion`;
export const TEST_VERIFY_FACTOR_URL = `${TEST_API_URL}/api/1/saml_assertion/verify_factor`;
export const TEST_TOKEN_URL = `${TEST_API_URL}/auth/oauth2/v2/token`;

export const TEST_CLIENT_ID = 'test-client-id';
export const TEST_CLIENT_SECRET = 'test-client-secret';
export const TEST_ACCESS_TOKEN = 'test-access-token';
export const TEST_REFRESH_TOKEN = 'test-refresh-token';

// ============================================================================
// Login
// ============================================================================

export const TEST_APP_ID = 'app-id';
export const TEST_SUBDOMAIN = 'subdomain';
export const TEST_STATE_TOKEN = 'state-token-5x604x8';
export const TEST_DEVICE_ID = 666666;
export const TEST_SAML = 'Base64 Encoded SAML Data';

export const createAuthenticationRequest = (
  overrides: Partial<AuthenticationRequest> = {}
): AuthenticationRequest => ({
  usernameOrEmail: 'username-or-email',
  password: 'test-password',
  appId: TEST_APP_ID,
  subdomain: TEST_SUBDOMAIN,
  ipAddress: 'ip-address',
  ...overrides,
});

export const createVerificationRequest = (
  overrides: Partial<VerificationRequest> = {}
): VerificationRequest => ({
  appId: TEST_APP_ID,
  deviceId: String(TEST_DEVICE_ID),
  stateToken: TEST_STATE_TOKEN,
  otpToken: '123456',
  doNotNotify: false,
  ...overrides,
});

// ============================================================================
// Provider Replies
// ============================================================================

export const SUCCESS_STATUS = {
  type: 'success',
  message: 'Success',
  error: false,
  code: 200,
} as const;

export const createSuccessBody = (saml = TEST_SAML): Record<string, unknown> => ({
  status: SUCCESS_STATUS,
  data: saml,
});

export const createMfaRequiredBody = (
  devices: readonly RawDevice[] = [{ device_id: TEST_DEVICE_ID, device_type: 'Google Authenticator' }]
): Record<string, unknown> => ({
  status: {
    type: 'success',
    message: 'MFA is required for this user',
    error: false,
    code: 200,
  },
  data: [
    {
      state_token: TEST_STATE_TOKEN,
      devices,
      callback_url: `${TEST_API_URL}/api/1/saml_assertion/verify_factor`,
      user: {
        lastname: 'Lovelace',
        username: 'username',
        email: 'username@example.com',
        firstname: 'Ada',
        id: 12345678,
      },
    },
  ],
});

export const PENDING_BODY = {
  status: {
    type: 'pending',
    message: 'Authentication pending on OL Protect',
    error: false,
    code: 200,
  },
} as const;

export const BAD_REQUEST_BODY = {
  status: {
    type: 'bad request',
    message: 'Authorization Information is incorrect',
    error: true,
    code: 400,
  },
} as const;
