/**
 * SAML assertion SDK - credentials and MFA in, SAML assertion out
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: SAML Assertion Client
// ============================================================================

export {
  createSamlAssertionClient,
  isMfaChallenge,
  // Device expansion
  ONELOGIN_PROTECT,
  PUSH_NOTIFY_DEVICE_TYPES,
  expandDevice,
  expandDevices,
  // Polling defaults
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_ATTEMPT_INTERVAL_MS,
} from './assertion/index.js';
export type {
  ResponseStatus,
  AuthenticationRequest,
  VerificationRequest,
  Device,
  FactorUser,
  Factor,
  AssertionGranted,
  MfaChallenge,
  AssertionResult,
  VerificationResult,
  PollOptions,
  GenerateOptions,
  SamlAssertionClientConfig,
  SamlAssertionClient,
} from './assertion/index.js';

// ============================================================================
// CORE: Errors
// ============================================================================

export {
  createProtocolError,
  createAuthenticationError,
  createMfaTimeoutError,
  createCredentialError,
  createCancelledError,
  describeError,
} from './errors.js';
export type {
  ProtocolError,
  AuthenticationError,
  MfaTimeoutError,
  CredentialError,
  CancelledError,
  SamlAssertionError,
} from './errors.js';

// ============================================================================
// CORE: Bearer Tokens
// ============================================================================

export { createTokenCredentials, createMemoryTokenStore } from './credentials/index.js';
export type {
  BearerToken,
  BearerTokenSupplier,
  TokenStore,
  TokenCredentialsConfig,
  TokenCredentials,
} from './credentials/index.js';

// ============================================================================
// CORE: Login Flow
// ============================================================================

export { createLoginFlow } from './login/index.js';
export type {
  LoginPrompts,
  AssumeRoleInput,
  TemporaryCredentials,
  RoleAssumer,
  PromptError,
  InvalidSelectionError,
  RoleAssumptionError,
  LoginError,
  LoginParameters,
  LoginFlowConfig,
  LoginOptions,
  LoginFlow,
} from './login/index.js';

// ============================================================================
// ADVANCED: Custom HTTP Implementations
// ============================================================================

export { createFetchClient } from './http/index.js';
export type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './http/index.js';

// ============================================================================
// ADVANCED: Response Classification and Polling
// ============================================================================

export {
  classifyResponse,
  isVerified,
  isPending,
  pollVerification,
  STATUS_TYPE_SUCCESS,
  STATUS_TYPE_PENDING,
} from './assertion/index.js';
export type {
  ProviderReply,
  ReplyPayload,
  ClassificationError,
  VerificationAttempt,
  RawDevice,
  RawFactor,
} from './assertion/index.js';
