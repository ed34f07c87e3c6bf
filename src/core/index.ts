/**
 * Core Module Public API
 *
 * AuthContext is exported from here, not from the MCP layer.
 */

// ============================================================================
// Services
// ============================================================================

export { AuthOrchestrator, RATE_LIMIT_BACKOFF_MINUTES } from './auth-orchestrator.js';
export type { AuthOrchestratorOptions, StateChangeListener } from './auth-orchestrator.js';

export { FileTokenStore, SESSION_FILE_NAME } from './token-store.js';
export type { TokenStore } from './token-store.js';

export {
  AuthAuditLog,
  FileAuditStorage,
  InMemoryAuditStorage,
  MAX_AUDIT_ENTRIES,
} from './audit-log.js';
export type { AuditStorage, AuditSummary } from './audit-log.js';

export { assessTokenAge, TOKEN_AGE_WARNING_DAYS, TOKEN_AGE_CRITICAL_DAYS } from './monitor.js';
export { DEFAULT_RETRY_POLICY, retryDelayMs, isRetryable } from './retry-policy.js';
export type { RetryPolicy } from './retry-policy.js';

export { validateAuthContext } from './context.js';
export type { AuthContext } from './context.js';

// ============================================================================
// Types
// ============================================================================

export type { UpstreamAuthClient, LoginOptions } from './upstream.js';
export { AUTH_METHODS } from './types.js';
export type {
  Credentials,
  Session,
  MfaCodeProvider,
  AuthMethod,
  AuditEntry,
  TokenAgeSeverity,
  NotificationEvent,
  NotificationType,
  AuthState,
  AuthStatus,
} from './types.js';
