/**
 * SAML assertion module: login, MFA device expansion and push verification.
 *
 * @packageDocumentation
 */

// Types
export type {
  // Status
  ResponseStatus,
  // Requests
  AuthenticationRequest,
  VerificationRequest,
  // MFA model
  Device,
  FactorUser,
  Factor,
  // Results
  AssertionGranted,
  MfaChallenge,
  AssertionResult,
  VerificationResult,
  // Client
  PollOptions,
  GenerateOptions,
  SamlAssertionClientConfig,
  SamlAssertionClient,
} from './types.js';

export { isMfaChallenge } from './types.js';

// Device expansion
export {
  ONELOGIN_PROTECT,
  PUSH_NOTIFY_DEVICE_TYPES,
  expandDevice,
  expandDevices,
  toFactor,
} from './devices.js';

// Wire shapes
export type {
  RawDevice,
  RawFactor,
  GenerateRequestBody,
  VerifyFactorRequestBody,
} from './schemas.js';

// Request building
export {
  SAML_ASSERTION_PATH,
  VERIFY_FACTOR_PATH,
  buildApiUrl,
  toGenerateRequestBody,
  toVerifyFactorRequestBody,
} from './request-builder.js';

// Classification
export {
  STATUS_TYPE_SUCCESS,
  STATUS_TYPE_PENDING,
  classifyResponse,
  isVerified,
  isPending,
} from './classifier.js';
export type { ReplyPayload, ProviderReply, ClassificationError } from './classifier.js';

// Polling
export {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_ATTEMPT_INTERVAL_MS,
  pollVerification,
  requestForAttempt,
  waitForNextAttempt,
} from './verification-poller.js';
export type { VerificationAttempt, AttemptListener } from './verification-poller.js';

// Client
export { createSamlAssertionClient } from './saml-assertion-client.js';
