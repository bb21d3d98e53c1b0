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
} from './types.js';

export { createLoginFlow, toVerificationRequest } from './login-flow.js';
