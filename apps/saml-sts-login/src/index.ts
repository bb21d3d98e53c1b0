#!/usr/bin/env node

/**
 * saml-sts-login: logs in to the identity provider, completes MFA on the
 * terminal, and prints temporary AWS credentials for the configured role.
 *
 * ```sh
 * eval "$(saml-sts-login)"
 * ```
 *
 * @packageDocumentation
 */

import {
  createLoginFlow,
  createSamlAssertionClient,
  createTokenCredentials,
} from '@saml-sts/assertion-sdk';
import type { RoleAssumer, SamlAssertionClient } from '@saml-sts/assertion-sdk';
import { createLoginConfig, toTokenCredentialsConfig } from './config.js';
import type { LoginConfig, LoginConfigOptions } from './config.js';
import { formatCredentials, formatLoginError } from './output.js';
import { createTerminalPrompts } from './prompts.js';
import type { TerminalPrompts } from './prompts.js';
import { createStsRoleAssumer } from './sts.js';

export { createLoginConfig };
export type { LoginConfig, LoginConfigOptions };

/**
 * Collaborators of one run, replaceable for testing.
 */
export interface LoginDependencies {
  readonly assertionClient: SamlAssertionClient;
  readonly roleAssumer: RoleAssumer;
  readonly prompts: TerminalPrompts;
  readonly writeOutput: (text: string) => void;
}

const createDefaultDependencies = (
  config: LoginConfig,
  controller: AbortController = new AbortController()
): LoginDependencies => ({
  assertionClient: createSamlAssertionClient(
    { apiUrl: config.apiUrl, debug: config.debug },
    createTokenCredentials(toTokenCredentialsConfig(config))
  ),
  roleAssumer: createStsRoleAssumer(config.region),
  prompts: createTerminalPrompts({
    signal: controller.signal,
    onInterrupt: () => {
      console.error('[login] Cancelling...');
      controller.abort();
    },
  }),
  writeOutput: (text) => {
    process.stdout.write(text);
  },
});

/**
 * Runs one login and prints the credentials.
 *
 * @param config - Login configuration
 * @param deps - Collaborators (optional, defaults to the real ones)
 * @param signal - Aborts MFA polling
 * @returns Process exit code
 */
export async function runLogin(
  config: LoginConfig,
  deps: LoginDependencies = createDefaultDependencies(config),
  signal?: AbortSignal
): Promise<number> {
  const { assertionClient, roleAssumer, prompts, writeOutput } = deps;

  try {
    let password = config.password;
    if (password === undefined) {
      try {
        password = await prompts.readPassword();
      } catch (error) {
        console.error(
          `[login] Password entry failed: ${error instanceof Error ? error.message : String(error)}`
        );
        return 1;
      }
    }

    const flow = createLoginFlow({
      assertionClient,
      roleAssumer,
      prompts,
      polling: config.polling,
    });

    const result = await flow.login(
      {
        usernameOrEmail: config.usernameOrEmail,
        password,
        appId: config.appId,
        subdomain: config.subdomain,
        principalArn: config.principalArn,
        roleArn: config.roleArn,
        durationSeconds: config.durationSeconds,
      },
      signal !== undefined ? { signal } : {}
    );

    if (result.isErr()) {
      console.error(`[login] ${formatLoginError(result.error)}`);
      return 1;
    }

    if (config.debug) {
      console.error(`[login] credentials expire at ${result.value.expiration.toISOString()}`);
    }
    writeOutput(formatCredentials(result.value, config.outputFormat));
    return 0;
  } finally {
    prompts.close();
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(options: LoginConfigOptions = {}): Promise<void> {
  const config = createLoginConfig(options);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('[login] Cancelling...');
    controller.abort();
  });

  process.exitCode = await runLogin(
    config,
    createDefaultDependencies(config, controller),
    controller.signal
  );
}

// Only run main if this is the entry point
const isMainModule =
  Boolean(process.argv[1]?.endsWith('index.js')) ||
  Boolean(process.argv[1]?.endsWith('index.ts')) ||
  Boolean(process.argv[1]?.endsWith('saml-sts-login'));
if (isMainModule) {
  main().catch((error: unknown) => {
    console.error('[login]', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
