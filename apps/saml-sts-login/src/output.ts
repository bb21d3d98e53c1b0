import { describeError } from '@saml-sts/assertion-sdk';
import type { LoginError, TemporaryCredentials } from '@saml-sts/assertion-sdk';
import type { OutputFormat } from './config.js';

/**
 * Quotes a value for POSIX shells.
 */
export const shellQuote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;

/**
 * Renders credentials for stdout: `export` lines for `eval`, or the JSON
 * document AWS `credential_process` expects.
 */
export const formatCredentials = (
  credentials: TemporaryCredentials,
  format: OutputFormat
): string => {
  if (format === 'json') {
    return `${JSON.stringify(
      {
        Version: 1,
        AccessKeyId: credentials.accessKeyId,
        SecretAccessKey: credentials.secretAccessKey,
        SessionToken: credentials.sessionToken,
        Expiration: credentials.expiration.toISOString(),
      },
      null,
      2
    )}\n`;
  }

  return [
    `export AWS_ACCESS_KEY_ID=${shellQuote(credentials.accessKeyId)}`,
    `export AWS_SECRET_ACCESS_KEY=${shellQuote(credentials.secretAccessKey)}`,
    `export AWS_SESSION_TOKEN=${shellQuote(credentials.sessionToken)}`,
    `export AWS_CREDENTIAL_EXPIRATION=${shellQuote(credentials.expiration.toISOString())}`,
    '',
  ].join('\n');
};

/**
 * Formats a login failure for display.
 */
export const formatLoginError = (error: LoginError): string => {
  switch (error.type) {
    case 'prompt':
    case 'invalid_selection':
    case 'role_assumption':
      return error.message;
    default:
      return describeError(error);
  }
};
