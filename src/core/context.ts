/**
 * AuthContext - dependency container shared by the MCP tools and any host
 * that embeds the orchestrator.
 *
 * Defined in core so tool factories import it from here, never from the MCP
 * layer.
 */

import type { AuthOrchestrator } from './auth-orchestrator.js';
import type { AuthAuditLog } from './audit-log.js';
import type { TokenStore } from './token-store.js';
import type { UpstreamAuthClient } from './upstream.js';
import type { MfaResolver } from '../mfa/resolver.js';
import type { NotificationSink } from '../notifications/types.js';
import type { ConfigManager } from '../config/manager.js';

export interface AuthContext {
  orchestrator: AuthOrchestrator;
  tokenStore: TokenStore;
  auditLog: AuthAuditLog;
  resolver: MfaResolver;
  notifier: NotificationSink;
  upstream: UpstreamAuthClient;
  configManager: ConfigManager;
}

/**
 * Runtime check that every service is present. Called from server start,
 * after the context has been built.
 */
export function validateAuthContext(context: AuthContext): void {
  const required: Array<keyof AuthContext> = [
    'orchestrator',
    'tokenStore',
    'auditLog',
    'resolver',
    'notifier',
    'upstream',
    'configManager',
  ];

  for (const field of required) {
    if (!context[field]) {
      throw new Error(`AuthContext missing required field: ${field}`);
    }
  }
}
