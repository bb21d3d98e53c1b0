/**
 * Login CLI configuration.
 *
 * Each value is resolved from, in order: explicit options, environment
 * variables, built-in defaults.
 *
 * @packageDocumentation
 */

import type { PollOptions, TokenCredentialsConfig } from '@saml-sts/assertion-sdk';

export type OutputFormat = 'env' | 'json';

/**
 * Configuration for one login run.
 */
export interface LoginConfig {
  /** Identity provider API URL */
  readonly apiUrl: string;
  /** API client credentials used for the bearer token */
  readonly clientId: string;
  readonly clientSecret: string;
  readonly subdomain: string;
  readonly appId: string;
  readonly usernameOrEmail: string;
  /** Prompted for when absent */
  readonly password?: string;
  readonly roleArn: string;
  readonly principalArn: string;
  readonly durationSeconds: number;
  readonly region: string;
  readonly polling: Omit<PollOptions, 'signal'>;
  readonly outputFormat: OutputFormat;
  readonly debug: boolean;
}

/**
 * Overrides for configuration values. Unset fields fall back to the
 * environment, then to defaults.
 */
export interface LoginConfigOptions {
  /** Override API URL (default: ONELOGIN_API_URL env var or https://api.us.onelogin.com) */
  readonly apiUrl?: string;
  /** Override client ID (default: ONELOGIN_CLIENT_ID env var) */
  readonly clientId?: string;
  /** Override client secret (default: ONELOGIN_CLIENT_SECRET env var) */
  readonly clientSecret?: string;
  readonly subdomain?: string;
  readonly appId?: string;
  readonly usernameOrEmail?: string;
  readonly password?: string;
  readonly roleArn?: string;
  readonly principalArn?: string;
  /** Override session length (default: AWS_DURATION_SECONDS env var or 3600) */
  readonly durationSeconds?: number;
  /** Override STS region (default: AWS_REGION env var or us-east-1) */
  readonly region?: string;
  readonly maxAttempts?: number;
  readonly attemptIntervalMs?: number;
  readonly outputFormat?: OutputFormat;
  readonly debug?: boolean;
}

export const DEFAULT_API_URL = 'https://api.us.onelogin.com';
export const DEFAULT_DURATION_SECONDS = 3600;
export const DEFAULT_REGION = 'us-east-1';

type Environment = Readonly<Record<string, string | undefined>>;

const readEnv = (env: Environment, name: string): string | undefined => {
  const value = env[name];
  return value !== undefined && value.length > 0 ? value : undefined;
};

const requireValue = (value: string | undefined, name: string): string => {
  if (value === undefined || value.length === 0) {
    throw new Error(`${name} is required`);
  }
  return value;
};

const parseInteger = (value: string | undefined, name: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
};

const parseOutputFormat = (value: string | undefined): OutputFormat | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (value === 'env' || value === 'json') {
    return value;
  }
  throw new Error(`OUTPUT_FORMAT must be "env" or "json", got "${value}"`);
};

/**
 * Creates the login configuration.
 *
 * Required env vars (unless given as options):
 * - ONELOGIN_CLIENT_ID, ONELOGIN_CLIENT_SECRET: API client credentials
 * - ONELOGIN_SUBDOMAIN, ONELOGIN_APP_ID: account and SAML application
 * - ONELOGIN_USERNAME: user to log in as
 * - AWS_ROLE_ARN, AWS_PRINCIPAL_ARN: role to assume and its SAML provider
 *
 * Optional env vars:
 * - ONELOGIN_API_URL (default: https://api.us.onelogin.com)
 * - ONELOGIN_PASSWORD (prompted when absent)
 * - AWS_DURATION_SECONDS (default: 3600)
 * - AWS_REGION (default: us-east-1)
 * - MFA_MAX_ATTEMPTS, MFA_ATTEMPT_INTERVAL_MS (default: 30 and 2000)
 * - OUTPUT_FORMAT: env or json (default: env)
 * - DEBUG: any non-empty value enables request logging
 *
 * @param options - Optional overrides for configuration values
 * @param env - Environment to read (default: process.env)
 * @returns Complete login configuration
 * @throws Error if a required value is missing or a number is invalid
 */
export function createLoginConfig(
  options: LoginConfigOptions = {},
  env: Environment = process.env
): LoginConfig {
  const apiUrl = options.apiUrl ?? readEnv(env, 'ONELOGIN_API_URL') ?? DEFAULT_API_URL;
  const clientId = requireValue(
    options.clientId ?? readEnv(env, 'ONELOGIN_CLIENT_ID'),
    'ONELOGIN_CLIENT_ID'
  );
  const clientSecret = requireValue(
    options.clientSecret ?? readEnv(env, 'ONELOGIN_CLIENT_SECRET'),
    'ONELOGIN_CLIENT_SECRET'
  );
  const subdomain = requireValue(
    options.subdomain ?? readEnv(env, 'ONELOGIN_SUBDOMAIN'),
    'ONELOGIN_SUBDOMAIN'
  );
  const appId = requireValue(options.appId ?? readEnv(env, 'ONELOGIN_APP_ID'), 'ONELOGIN_APP_ID');
  const usernameOrEmail = requireValue(
    options.usernameOrEmail ?? readEnv(env, 'ONELOGIN_USERNAME'),
    'ONELOGIN_USERNAME'
  );
  const password = options.password ?? readEnv(env, 'ONELOGIN_PASSWORD');
  const roleArn = requireValue(options.roleArn ?? readEnv(env, 'AWS_ROLE_ARN'), 'AWS_ROLE_ARN');
  const principalArn = requireValue(
    options.principalArn ?? readEnv(env, 'AWS_PRINCIPAL_ARN'),
    'AWS_PRINCIPAL_ARN'
  );

  const durationSeconds =
    options.durationSeconds ??
    parseInteger(readEnv(env, 'AWS_DURATION_SECONDS'), 'AWS_DURATION_SECONDS') ??
    DEFAULT_DURATION_SECONDS;
  const region = options.region ?? readEnv(env, 'AWS_REGION') ?? DEFAULT_REGION;

  const maxAttempts =
    options.maxAttempts ?? parseInteger(readEnv(env, 'MFA_MAX_ATTEMPTS'), 'MFA_MAX_ATTEMPTS');
  const attemptIntervalMs =
    options.attemptIntervalMs ??
    parseInteger(readEnv(env, 'MFA_ATTEMPT_INTERVAL_MS'), 'MFA_ATTEMPT_INTERVAL_MS');

  const outputFormat =
    options.outputFormat ?? parseOutputFormat(readEnv(env, 'OUTPUT_FORMAT')) ?? 'env';
  const debug = options.debug ?? readEnv(env, 'DEBUG') !== undefined;

  return {
    apiUrl,
    clientId,
    clientSecret,
    subdomain,
    appId,
    usernameOrEmail,
    ...(password !== undefined ? { password } : {}),
    roleArn,
    principalArn,
    durationSeconds,
    region,
    polling: {
      ...(maxAttempts !== undefined ? { maxAttempts } : {}),
      ...(attemptIntervalMs !== undefined ? { attemptIntervalMs } : {}),
    },
    outputFormat,
    debug,
  };
}

/**
 * Creates the bearer token configuration from the login configuration.
 */
export function toTokenCredentialsConfig(config: LoginConfig): TokenCredentialsConfig {
  return {
    apiUrl: config.apiUrl,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    debug: config.debug,
  };
}
