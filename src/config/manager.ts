/**
 * Configuration Manager
 *
 * Builds the unified configuration from one of two sources:
 * - a JSON file (`configPath` argument or CONFIG_PATH), whose
 *   `{"$secret": "NAME"}` descriptors are resolved through the secret
 *   provider chain (files under the secrets directory, then environment)
 * - otherwise the process environment (FITNESS_IDENTITY, MFA_CODE, ...)
 *
 * The result is validated with zod and `~` is expanded in every path.
 */

import { readFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ZodError } from 'zod';
import { UnifiedConfigSchema, type UnifiedConfig } from './schemas/index.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { Credentials } from '../core/types.js';
import { AuthError, AuthErrors, errorMessage } from '../utils/errors.js';

export const DEFAULT_STATE_DIR = '~/.fitness-auth';

export interface ConfigManagerOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;
}

export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Map environment variables onto the unified config input shape
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const gmailTokenFile = nonEmpty(env.GMAIL_TOKEN_FILE);
  const emailUser = nonEmpty(env.EMAIL_USER);
  const emailPassword = nonEmpty(env.EMAIL_PASSWORD);
  const ntfyTopic = nonEmpty(env.NTFY_TOPIC);

  const mailbox =
    gmailTokenFile || (emailUser && emailPassword)
      ? {
          senderDomain: nonEmpty(env.MFA_EMAIL_SENDER),
          initialDelayMs: optionalInt(env.MFA_EMAIL_DELAY_MS),
          gmailTokenFile,
          imap:
            emailUser && emailPassword
              ? {
                  host: nonEmpty(env.EMAIL_SERVER),
                  port: optionalInt(env.EMAIL_PORT),
                  user: emailUser,
                  password: emailPassword,
                }
              : undefined,
        }
      : undefined;

  return {
    auth: {
      serviceName: nonEmpty(env.SERVICE_NAME),
      credentials: {
        identity: nonEmpty(env.FITNESS_IDENTITY),
        secret: nonEmpty(env.FITNESS_SECRET),
      },
      tokenStorePath: nonEmpty(env.TOKEN_STORE_PATH) ?? `${DEFAULT_STATE_DIR}/tokens`,
      auditLogPath: nonEmpty(env.AUDIT_LOG_PATH) ?? `${DEFAULT_STATE_DIR}/auth_log.json`,
      retry: {
        maxAttempts: optionalInt(env.AUTH_RETRY_MAX_ATTEMPTS),
        initialDelayMs: optionalInt(env.AUTH_RETRY_DELAY_MS),
      },
      notifications: {
        ntfy: ntfyTopic
          ? {
              server: nonEmpty(env.NTFY_SERVER) ?? 'https://ntfy.sh',
              topic: ntfyTopic,
              token: nonEmpty(env.NTFY_TOKEN),
              fallbackServer: nonEmpty(env.NTFY_FALLBACK_SERVER),
            }
          : undefined,
      },
    },
    mfa: {
      code: nonEmpty(env.MFA_CODE),
      filePath: nonEmpty(env.MFA_FILE_PATH),
      webhookUrl: nonEmpty(env.MFA_WEBHOOK_URL),
      mailbox,
    },
    mcp: {
      transport: nonEmpty(env.MCP_TRANSPORT),
      port: optionalInt(env.MCP_PORT),
    },
  };
}

export class ConfigManager {
  private config: UnifiedConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;

    this.secretResolver = new SecretResolver({ failFast: true });
    this.secretResolver.addProvider(new FileSecretProvider(options?.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  async loadConfig(configPath?: string): Promise<UnifiedConfig> {
    if (this.config) {
      return this.config;
    }

    const filePath = configPath ?? nonEmpty(this.env.CONFIG_PATH);
    let rawConfig: unknown;

    if (filePath) {
      try {
        rawConfig = JSON.parse(await readFile(filePath, 'utf-8'));
      } catch (error) {
        throw AuthErrors.CONFIGURATION_ERROR(`cannot read ${filePath}: ${errorMessage(error)}`);
      }
      console.log('[ConfigManager] Resolving secrets...');
      await this.secretResolver.resolveSecrets(rawConfig);
    } else {
      rawConfig = configFromEnv(this.env);
    }

    this.config = this.parse(rawConfig);
    console.log(
      `[ConfigManager] Configuration loaded from ${filePath ? filePath : 'environment'}`
    );
    return this.config;
  }

  getConfig(): UnifiedConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  /**
   * Credentials if both parts are configured
   */
  getCredentials(): Credentials | undefined {
    const { identity, secret } = this.getConfig().auth.credentials;
    if (!identity || !secret) {
      return undefined;
    }
    return { identity, secret };
  }

  async reloadConfig(configPath?: string): Promise<UnifiedConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  private parse(rawConfig: unknown): UnifiedConfig {
    let config: UnifiedConfig;
    try {
      config = UnifiedConfigSchema.parse(rawConfig);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        throw AuthErrors.CONFIGURATION_ERROR(issues);
      }
      throw error instanceof AuthError ? error : AuthErrors.CONFIGURATION_ERROR(errorMessage(error));
    }

    config.auth.tokenStorePath = expandHome(config.auth.tokenStorePath);
    if (config.auth.auditLogPath) {
      config.auth.auditLogPath = expandHome(config.auth.auditLogPath);
    }
    if (config.mfa.filePath) {
      config.mfa.filePath = expandHome(config.mfa.filePath);
    }
    if (config.mfa.mailbox?.gmailTokenFile) {
      config.mfa.mailbox.gmailTokenFile = expandHome(config.mfa.mailbox.gmailTokenFile);
    }
    return config;
  }
}
