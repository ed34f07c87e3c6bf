/**
 * Core Configuration Schema
 *
 * Credentials, persistence paths, retry policy and notifications.
 */

import { z } from 'zod';

/**
 * Upstream account credentials. Both are optional here: a missing value is
 * reported as CREDENTIALS_MISSING when authentication is attempted, so the
 * MCP server can still start and report status.
 */
export const CredentialsConfigSchema = z.object({
  identity: z.string().min(1).optional().describe('Account identity (email)'),
  secret: z.string().min(1).optional().describe('Account password'),
});

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(1).describe('Full cycles including the first'),
  initialDelayMs: z.number().int().min(0).default(60_000),
  backoffMultiplier: z.number().min(1).max(10).default(2),
  maxDelayMs: z.number().int().min(0).default(30 * 60_000),
});

export const NtfyConfigSchema = z.object({
  server: z.string().url().describe('ntfy server base URL'),
  topic: z.string().min(1).describe('ntfy topic'),
  token: z.string().min(1).optional().describe('Bearer token for the primary server'),
  fallbackServer: z.string().url().optional().describe('Server used when the primary fails'),
  fallbackTopic: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(100).max(60_000).default(10_000),
});

export const NotificationConfigSchema = z.object({
  ntfy: NtfyConfigSchema.optional(),
});

export const CoreConfigSchema = z.object({
  serviceName: z.string().min(1).default('Fitness API').describe('Name used in alerts'),
  credentials: CredentialsConfigSchema.default({}),
  tokenStorePath: z.string().min(1).describe('Directory holding the session bundle'),
  auditLogPath: z
    .string()
    .min(1)
    .optional()
    .describe('JSON file for the attempt history (in-memory when unset)'),
  retry: RetryPolicySchema.default({}),
  notifications: NotificationConfigSchema.default({}),
});

export type CredentialsConfig = z.infer<typeof CredentialsConfigSchema>;
export type RetryPolicyConfig = z.infer<typeof RetryPolicySchema>;
export type NtfySettings = z.infer<typeof NtfyConfigSchema>;
export type NotificationConfig = z.infer<typeof NotificationConfigSchema>;
export type CoreConfig = z.infer<typeof CoreConfigSchema>;
