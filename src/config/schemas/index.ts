/**
 * Unified Configuration Schema
 *
 * Combines the core, MFA and MCP layers into the single configuration object
 * consumed by ContextBuilder and the MCP server.
 */

import { z } from 'zod';
import { CoreConfigSchema } from './core.js';
import { MfaConfigSchema } from './mfa.js';
import { MCPConfigSchema } from './mcp.js';

export {
  CredentialsConfigSchema,
  RetryPolicySchema,
  NtfyConfigSchema,
  NotificationConfigSchema,
  CoreConfigSchema,
  type CredentialsConfig,
  type RetryPolicyConfig,
  type NtfySettings,
  type NotificationConfig,
  type CoreConfig,
} from './core.js';

export {
  ImapConfigSchema,
  MailboxConfigSchema,
  MfaConfigSchema,
  type ImapConfig,
  type MailboxConfig,
  type MfaConfig,
  type MfaConfigInput,
} from './mfa.js';

export { MCPConfigSchema, type MCPConfig } from './mcp.js';

// ============================================================================
// Unified Configuration
// ============================================================================

export const UnifiedConfigSchema = z.object({
  auth: CoreConfigSchema,
  mfa: MfaConfigSchema.default({}),
  mcp: MCPConfigSchema.default({}),
});

export type UnifiedConfig = z.infer<typeof UnifiedConfigSchema>;

/**
 * Input shape accepted by UnifiedConfigSchema (before defaults)
 */
export type UnifiedConfigInput = z.input<typeof UnifiedConfigSchema>;
