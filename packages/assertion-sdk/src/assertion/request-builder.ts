import type { HttpRequest } from '../http/types.js';
import type { GenerateRequestBody, VerifyFactorRequestBody } from './schemas.js';
import type { AuthenticationRequest, VerificationRequest } from './types.js';

export const SAML_ASSERTION_PATH = '/api/1/saml_assertion';
export const VERIFY_FACTOR_PATH = '/api/1/saml_assertion/verify_factor';

/**
 * Joins the API base URL and a path, tolerating a trailing slash.
 */
export const buildApiUrl = (apiUrl: string, path: string): string =>
  `${apiUrl.replace(/\/+$/, '')}${path}`;

export const toGenerateRequestBody = (request: AuthenticationRequest): GenerateRequestBody => ({
  username_or_email: request.usernameOrEmail,
  password: request.password,
  app_id: request.appId,
  subdomain: request.subdomain,
  ...(request.ipAddress !== undefined ? { ip_address: request.ipAddress } : {}),
});

export const toVerifyFactorRequestBody = (
  request: VerificationRequest
): VerifyFactorRequestBody => ({
  app_id: request.appId,
  device_id: request.deviceId,
  state_token: request.stateToken,
  otp_token: request.otpToken,
  do_not_notify: request.doNotNotify,
});

/**
 * Builds an authenticated JSON POST.
 */
export const buildPostRequest = (
  url: string,
  accessToken: string,
  body: GenerateRequestBody | VerifyFactorRequestBody,
  signal?: AbortSignal
): HttpRequest => ({
  url,
  method: 'POST',
  headers: {
    Authorization: `Bearer ${accessToken}`,
    'Content-Type': 'application/json',
  },
  body: JSON.stringify(body),
  ...(signal !== undefined ? { signal } : {}),
});
