/**
 * Configuration Module - Public API
 */

export { ConfigManager, configFromEnv, expandHome, DEFAULT_STATE_DIR } from './manager.js';
export type { ConfigManagerOptions } from './manager.js';

export {
  UnifiedConfigSchema,
  CoreConfigSchema,
  CredentialsConfigSchema,
  RetryPolicySchema,
  NtfyConfigSchema,
  NotificationConfigSchema,
  MfaConfigSchema,
  MailboxConfigSchema,
  ImapConfigSchema,
  MCPConfigSchema,
  type UnifiedConfig,
  type UnifiedConfigInput,
  type CoreConfig,
  type CredentialsConfig,
  type RetryPolicyConfig,
  type NotificationConfig,
  type MfaConfig,
  type MailboxConfig,
  type ImapConfig,
  type MCPConfig,
} from './schemas/index.js';

export {
  SecretResolver,
  FileSecretProvider,
  EnvProvider,
  isSecretProvider,
  type ISecretProvider,
} from './secrets/index.js';
