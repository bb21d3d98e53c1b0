/**
 * Error taxonomy shared by the assertion client, the verification poller and
 * the bearer token supplier.
 *
 * Errors are plain objects discriminated by `type` and travel inside
 * `neverthrow` results; nothing here is thrown.
 *
 * @packageDocumentation
 */

/**
 * Transport failure or a body that could not be decoded.
 * Never retried.
 */
export interface ProtocolError {
  readonly type: 'protocol';
  readonly message: string;
  /** HTTP status, when a response was received */
  readonly status?: number | undefined;
  readonly cause?: unknown;
}

/**
 * The provider rejected the request, or answered with a state the client
 * does not recognise as success or pending.
 */
export interface AuthenticationError {
  readonly type: 'authentication';
  /** Provider `status.message`, suitable for display */
  readonly message: string;
  /** Provider `status.code`, or the HTTP status when the body carried none */
  readonly code: number;
  /** Provider `status.type` ("bad request", "pending", ...) */
  readonly statusType: string;
}

/**
 * Push confirmation was still pending after the last permitted attempt.
 */
export interface MfaTimeoutError {
  readonly type: 'mfa_timeout';
  readonly message: string;
  readonly attempts: number;
}

/**
 * No bearer token could be obtained for the client's own API calls.
 */
export interface CredentialError {
  readonly type: 'credential';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * The caller aborted the operation through its AbortSignal.
 */
export interface CancelledError {
  readonly type: 'cancelled';
  readonly message: string;
}

/**
 * Any failure of a SAML assertion operation.
 */
export type SamlAssertionError =
  | ProtocolError
  | AuthenticationError
  | MfaTimeoutError
  | CredentialError
  | CancelledError;

export const createProtocolError = (
  message: string,
  status?: number,
  cause?: unknown
): ProtocolError => ({
  type: 'protocol',
  message,
  status,
  cause,
});

export const createAuthenticationError = (
  message: string,
  code: number,
  statusType: string
): AuthenticationError => ({
  type: 'authentication',
  message,
  code,
  statusType,
});

export const createMfaTimeoutError = (attempts: number): MfaTimeoutError => ({
  type: 'mfa_timeout',
  message: `MFA confirmation still pending after ${String(attempts)} attempt(s)`,
  attempts,
});

export const createCredentialError = (message: string, cause?: unknown): CredentialError => ({
  type: 'credential',
  message,
  cause,
});

export const createCancelledError = (message = 'Operation was cancelled'): CancelledError => ({
  type: 'cancelled',
  message,
});

/**
 * Formats an error for display, prefixing provider codes where present.
 *
 * @example
 * ```typescript
 * describeError(createAuthenticationError('Authorization Information is incorrect', 400, 'bad request'));
 * // => 'Authentication failed (400): Authorization Information is incorrect'
 * ```
 */
export const describeError = (error: SamlAssertionError): string => {
  switch (error.type) {
    case 'protocol':
      return error.status !== undefined
        ? `Protocol error (HTTP ${String(error.status)}): ${error.message}`
        : `Protocol error: ${error.message}`;
    case 'authentication':
      return `Authentication failed (${String(error.code)}): ${error.message}`;
    case 'mfa_timeout':
      return error.message;
    case 'credential':
      return `Credential error: ${error.message}`;
    case 'cancelled':
      return error.message;
  }
};
