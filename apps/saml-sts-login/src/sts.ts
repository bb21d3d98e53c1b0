/**
 * Role assumption through AWS STS.
 *
 * @packageDocumentation
 */

import { AssumeRoleWithSAMLCommand, STSClient } from '@aws-sdk/client-sts';
import type {
  AssumeRoleWithSAMLCommandInput,
  AssumeRoleWithSAMLCommandOutput,
  Credentials,
} from '@aws-sdk/client-sts';
import { ok, err } from 'neverthrow';
import type { RoleAssumer, RoleAssumptionError } from '@saml-sts/assertion-sdk';

/**
 * Sends one AssumeRoleWithSAML call.
 */
export type AssumeRoleWithSaml = (
  input: AssumeRoleWithSAMLCommandInput
) => Promise<AssumeRoleWithSAMLCommandOutput>;

const toRoleAssumptionError = (message: string, cause?: unknown): RoleAssumptionError => ({
  type: 'role_assumption',
  message,
  cause,
});

/**
 * Creates the STS-backed sender for a region.
 */
export const createStsSender = (region: string): AssumeRoleWithSaml => {
  const client = new STSClient({ region });
  return (input) => client.send(new AssumeRoleWithSAMLCommand(input));
};

/**
 * Creates a role assumer that trades a SAML assertion for temporary
 * credentials.
 *
 * @param region - STS region
 * @param send - AssumeRoleWithSAML sender (optional, defaults to an STS client)
 * @returns RoleAssumer instance
 */
export const createStsRoleAssumer = (
  region: string,
  send: AssumeRoleWithSaml = createStsSender(region)
): RoleAssumer => ({
  assumeRole: async (input) => {
    let response: AssumeRoleWithSAMLCommandOutput;
    try {
      response = await send({
        PrincipalArn: input.principalArn,
        RoleArn: input.roleArn,
        SAMLAssertion: input.samlAssertion,
        DurationSeconds: input.durationSeconds,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(toRoleAssumptionError(`AssumeRoleWithSAML failed: ${reason}`, error));
    }

    const credentials: Partial<Credentials> = response.Credentials ?? {};
    const { AccessKeyId, SecretAccessKey, SessionToken, Expiration } = credentials;
    if (
      AccessKeyId === undefined ||
      SecretAccessKey === undefined ||
      SessionToken === undefined ||
      Expiration === undefined
    ) {
      return err(toRoleAssumptionError('STS response did not include temporary credentials'));
    }

    return ok({
      accessKeyId: AccessKeyId,
      secretAccessKey: SecretAccessKey,
      sessionToken: SessionToken,
      expiration: Expiration,
    });
  },
});
