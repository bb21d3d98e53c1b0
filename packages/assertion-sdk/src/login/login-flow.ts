/**
 * End-to-end login: credentials → (MFA) → SAML assertion → temporary
 * credentials.
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Device, Factor, VerificationRequest } from '../assertion/types.js';
import type {
  InvalidSelectionError,
  LoginError,
  LoginFlow,
  LoginFlowConfig,
  LoginOptions,
  LoginParameters,
  PromptError,
  TemporaryCredentials,
} from './types.js';

const toPromptError = (message: string, cause: unknown): PromptError => ({
  type: 'prompt',
  message: cause instanceof Error ? `${message}: ${cause.message}` : message,
  cause,
});

const toInvalidSelection = (message: string, index: number): InvalidSelectionError => ({
  type: 'invalid_selection',
  message,
  index,
});

/**
 * Builds the verification request for a chosen device.
 *
 * A typed code never triggers a push; a push entry (no code) triggers one.
 */
export const toVerificationRequest = (
  appId: string,
  factor: Factor,
  device: Device,
  otpToken: string
): VerificationRequest => ({
  appId,
  deviceId: String(device.deviceId),
  stateToken: factor.stateToken,
  otpToken,
  doNotNotify: otpToken !== '',
});

/**
 * Creates the login flow.
 *
 * @param config - Assertion client, role assumer, prompts and polling bounds
 * @returns LoginFlow instance
 *
 * @example
 * ```typescript
 * const flow = createLoginFlow({ assertionClient, roleAssumer, prompts });
 * const result = await flow.login({
 *   usernameOrEmail: 'user@example.com',
 *   password,
 *   appId: '123456',
 *   subdomain: 'example',
 *   principalArn: 'arn:aws:iam::123456789012:saml-provider/onelogin',
 *   roleArn: 'arn:aws:iam::123456789012:role/developer',
 *   durationSeconds: 3600,
 * });
 * ```
 */
export const createLoginFlow = (config: LoginFlowConfig): LoginFlow => {
  const { assertionClient, roleAssumer, prompts, polling = {} } = config;

  /**
   * Picks a device, asking only when there is a choice to make.
   */
  const selectDevice = async (devices: readonly Device[]): Promise<Result<Device, LoginError>> => {
    let index = 0;
    if (devices.length > 1) {
      try {
        index = await prompts.chooseDevice(devices);
      } catch (error) {
        return err(toPromptError('Device selection failed', error));
      }
    }

    const device = Number.isInteger(index) ? devices[index] : undefined;
    if (device === undefined) {
      return err(toInvalidSelection(`No MFA device at index ${String(index)}`, index));
    }

    return ok(device);
  };

  const readOtp = async (device: Device): Promise<Result<string, LoginError>> => {
    if (!device.requiresOtpToken) {
      return ok('');
    }

    try {
      return ok(await prompts.requestOtp(device));
    } catch (error) {
      return err(toPromptError('One-time code entry failed', error));
    }
  };

  const obtainAssertion = async (
    params: LoginParameters,
    options: LoginOptions = {}
  ): Promise<Result<string, LoginError>> => {
    const { signal } = options;

    const generated = await assertionClient.generate(
      {
        usernameOrEmail: params.usernameOrEmail,
        password: params.password,
        appId: params.appId,
        subdomain: params.subdomain,
        ...(params.ipAddress !== undefined ? { ipAddress: params.ipAddress } : {}),
      },
      signal !== undefined ? { signal } : {}
    );

    if (generated.isErr()) {
      return err(generated.error);
    }

    const assertion = generated.value;
    if (assertion.type === 'assertion') {
      return ok(assertion.samlAssertion);
    }

    // The provider issues one factor per challenge
    const [factor] = assertion.factors;
    if (factor === undefined) {
      return err(toInvalidSelection('MFA challenge contained no factor', 0));
    }

    const device = await selectDevice(factor.devices);
    if (device.isErr()) {
      return err(device.error);
    }

    const otpToken = await readOtp(device.value);
    if (otpToken.isErr()) {
      return err(otpToken.error);
    }

    const verified = await assertionClient.verifyFactor(
      toVerificationRequest(params.appId, factor, device.value, otpToken.value),
      { ...polling, ...(signal !== undefined ? { signal } : {}) }
    );

    if (verified.isErr()) {
      return err(verified.error);
    }

    return ok(verified.value.samlAssertion);
  };

  const login = async (
    params: LoginParameters,
    options: LoginOptions = {}
  ): Promise<Result<TemporaryCredentials, LoginError>> => {
    const assertion = await obtainAssertion(params, options);
    if (assertion.isErr()) {
      return err(assertion.error);
    }

    const credentials = await roleAssumer.assumeRole({
      principalArn: params.principalArn,
      roleArn: params.roleArn,
      samlAssertion: assertion.value,
      durationSeconds: params.durationSeconds,
    });

    if (credentials.isErr()) {
      return err(credentials.error);
    }

    return ok(credentials.value);
  };

  return {
    obtainAssertion,
    login,
  };
};
