/**
 * Types for the SAML assertion API: login, MFA challenge and factor
 * verification.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { SamlAssertionError } from '../errors.js';

// ============================================================================
// Provider Status
// ============================================================================

/**
 * The `status` block every assertion API response carries.
 */
export interface ResponseStatus {
  /** "success", "pending", "bad request", ... */
  readonly type: string;
  readonly message: string;
  readonly error: boolean;
  readonly code: number;
}

// ============================================================================
// Requests
// ============================================================================

/**
 * Credentials for one login attempt.
 */
export interface AuthenticationRequest {
  readonly usernameOrEmail: string;
  readonly password: string;
  /** SAML connector app ID */
  readonly appId: string;
  /** Account subdomain (the `acme` of acme.onelogin.com) */
  readonly subdomain: string;
  /** End-user IP, forwarded for IP allow-listing policies */
  readonly ipAddress?: string;
}

/**
 * Factor verification request.
 *
 * `doNotNotify: false` sends a push to the device; `true` only asks for the
 * outcome of a push that was already sent.
 */
export interface VerificationRequest {
  readonly appId: string;
  /** Device ID in string form, as the API expects */
  readonly deviceId: string;
  /** Opaque token from the MFA challenge, echoed verbatim */
  readonly stateToken: string;
  /** One-time code; empty for push confirmation */
  readonly otpToken: string;
  readonly doNotNotify: boolean;
}

// ============================================================================
// MFA Model
// ============================================================================

/**
 * A selectable MFA entry.
 *
 * A single provider device may appear twice: once for typing a code and once
 * for approving a push.
 */
export interface Device {
  readonly deviceId: number;
  readonly deviceType: string;
  readonly requiresOtpToken: boolean;
}

/**
 * The user the MFA challenge was issued for.
 */
export interface FactorUser {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
}

/**
 * One pending MFA challenge.
 */
export interface Factor {
  readonly stateToken: string;
  readonly devices: readonly Device[];
  /** Informational; verification always goes to the configured API URL */
  readonly callbackUrl: string;
  readonly user: FactorUser;
}

// ============================================================================
// Results
// ============================================================================

/**
 * Login completed without MFA.
 */
export interface AssertionGranted {
  readonly type: 'assertion';
  readonly status: ResponseStatus;
  /** Base64-encoded SAML response */
  readonly samlAssertion: string;
  readonly factors: readonly [];
}

/**
 * Login requires MFA before an assertion is issued.
 */
export interface MfaChallenge {
  readonly type: 'mfa_required';
  readonly status: ResponseStatus;
  readonly samlAssertion: '';
  /** Never empty */
  readonly factors: readonly Factor[];
}

/**
 * Result of the initial login call (discriminated union).
 */
export type AssertionResult = AssertionGranted | MfaChallenge;

/**
 * Successful factor verification.
 */
export interface VerificationResult {
  readonly status: ResponseStatus;
  readonly samlAssertion: string;
  /** Number of verify_factor calls made, including the first */
  readonly attempts: number;
}

// ============================================================================
// Client
// ============================================================================

/**
 * Bounds for push confirmation polling.
 */
export interface PollOptions {
  /** Maximum verify_factor calls, including the first (default: 30) */
  readonly maxAttempts?: number;
  /** Wait between calls in milliseconds (default: 2000) */
  readonly attemptIntervalMs?: number;
  /** Aborts the wait or the in-flight call with a `cancelled` error */
  readonly signal?: AbortSignal;
}

/**
 * Options for the initial login call.
 */
export interface GenerateOptions {
  readonly signal?: AbortSignal;
}

/**
 * SAML assertion client configuration.
 */
export interface SamlAssertionClientConfig {
  /** API base URL (e.g., "https://api.us.onelogin.com") */
  readonly apiUrl: string;
  /** Log request progress to stderr (default: false) */
  readonly debug?: boolean;
}

/**
 * SAML assertion client interface.
 */
export interface SamlAssertionClient {
  /**
   * Submits credentials and returns either the SAML assertion or the MFA
   * challenge that must be completed first.
   *
   * @param request - Login credentials
   * @param options - Cancellation
   * @returns Result with assertion or challenge, or error
   */
  readonly generate: (
    request: AuthenticationRequest,
    options?: GenerateOptions
  ) => Promise<Result<AssertionResult, SamlAssertionError>>;

  /**
   * Verifies an MFA factor, polling while a push approval is pending.
   *
   * @param request - Verification request built from the chosen device
   * @param options - Polling bounds and cancellation
   * @returns Result with the SAML assertion or error
   */
  readonly verifyFactor: (
    request: VerificationRequest,
    options?: PollOptions
  ) => Promise<Result<VerificationResult, SamlAssertionError>>;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard for a login that needs MFA.
 */
export const isMfaChallenge = (result: AssertionResult): result is MfaChallenge => {
  return result.type === 'mfa_required';
};
