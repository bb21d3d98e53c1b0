/**
 * Types for the end-to-end login: assertion, MFA and role assumption.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { SamlAssertionError } from '../errors.js';
import type { Device, PollOptions, SamlAssertionClient } from '../assertion/types.js';

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Interactive MFA callbacks. Either may reject, e.g. when input is closed.
 */
export interface LoginPrompts {
  /** Picks an index into `devices`; only called with two or more devices */
  readonly chooseDevice: (devices: readonly Device[]) => Promise<number>;
  /** Reads a one-time code for a device that requires one */
  readonly requestOtp: (device: Device) => Promise<string>;
}

/**
 * Input to the cloud role-assumption call.
 */
export interface AssumeRoleInput {
  readonly principalArn: string;
  readonly roleArn: string;
  readonly samlAssertion: string;
  readonly durationSeconds: number;
}

/**
 * Temporary cloud credentials.
 */
export interface TemporaryCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken: string;
  readonly expiration: Date;
}

/**
 * Trades a SAML assertion for temporary credentials. Called once per login,
 * never retried.
 */
export interface RoleAssumer {
  readonly assumeRole: (
    input: AssumeRoleInput
  ) => Promise<Result<TemporaryCredentials, RoleAssumptionError>>;
}

// ============================================================================
// Errors
// ============================================================================

export interface PromptError {
  readonly type: 'prompt';
  readonly message: string;
  readonly cause?: unknown;
}

export interface InvalidSelectionError {
  readonly type: 'invalid_selection';
  readonly message: string;
  readonly index: number;
}

export interface RoleAssumptionError {
  readonly type: 'role_assumption';
  readonly message: string;
  readonly cause?: unknown;
}

export type LoginError =
  | SamlAssertionError
  | PromptError
  | InvalidSelectionError
  | RoleAssumptionError;

// ============================================================================
// Flow
// ============================================================================

/**
 * Everything one login needs.
 */
export interface LoginParameters {
  readonly usernameOrEmail: string;
  readonly password: string;
  readonly appId: string;
  readonly subdomain: string;
  readonly ipAddress?: string;
  readonly principalArn: string;
  readonly roleArn: string;
  readonly durationSeconds: number;
}

/**
 * Login flow configuration.
 */
export interface LoginFlowConfig {
  readonly assertionClient: SamlAssertionClient;
  readonly roleAssumer: RoleAssumer;
  readonly prompts: LoginPrompts;
  /** Push polling bounds; the signal comes per login */
  readonly polling?: Omit<PollOptions, 'signal'>;
}

export interface LoginOptions {
  readonly signal?: AbortSignal;
}

/**
 * Login flow interface.
 */
export interface LoginFlow {
  /**
   * Obtains a SAML assertion, completing MFA through the prompts if asked.
   */
  readonly obtainAssertion: (
    params: LoginParameters,
    options?: LoginOptions
  ) => Promise<Result<string, LoginError>>;

  /**
   * Obtains an assertion and trades it for temporary credentials.
   */
  readonly login: (
    params: LoginParameters,
    options?: LoginOptions
  ) => Promise<Result<TemporaryCredentials, LoginError>>;
}
