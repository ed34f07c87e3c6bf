/**
 * Core Authentication Types
 *
 * Types shared by the token store, audit log, MFA resolver and orchestrator.
 * Nothing in this file depends on the MCP layer.
 */

// ============================================================================
// Credentials & Session
// ============================================================================

/**
 * Account credentials for the upstream service. Supplied at process start
 * and never written to disk.
 */
export interface Credentials {
  readonly identity: string;
  readonly secret: string;
}

/**
 * Serialized authenticated state returned by the upstream login client.
 *
 * The bundle is opaque to this package; downstream tools hand it back to the
 * upstream client as a capability.
 */
export interface Session {
  bundle: string;
  createdAt: Date;
}

/**
 * Supplies an MFA code on demand. Resolves to the code or rejects when none
 * can be obtained.
 */
export type MfaCodeProvider = () => Promise<string>;

// ============================================================================
// Audit
// ============================================================================

export const AUTH_METHODS = ['token_validation', 'token_resume', 'fresh_login'] as const;

export type AuthMethod = (typeof AUTH_METHODS)[number];

export interface AuditEntry {
  timestamp: Date;
  success: boolean;
  method: AuthMethod;
  error?: string;
}

// ============================================================================
// Notifications
// ============================================================================

export type TokenAgeSeverity = 'ok' | 'warning' | 'critical';

export type NotificationEvent =
  | { type: 'auth_success'; method: string }
  | { type: 'auth_failure'; error: string; retrySuggested: boolean }
  | { type: 'mfa_required'; availableMethods: string[] }
  | { type: 'rate_limited'; retryAfterMinutes: number }
  | { type: 'tokens_expiring'; severity: Exclude<TokenAgeSeverity, 'ok'>; ageDays: number };

export type NotificationType = NotificationEvent['type'];

// ============================================================================
// Orchestrator state
// ============================================================================

export type AuthState =
  | 'idle'
  | 'checking_stored_session'
  | 'fresh_login'
  | 'resolving_mfa'
  | 'completing_login'
  | 'ready'
  | 'failed';

export interface AuthStatus {
  /** Whether the stored session is accepted by the upstream service */
  valid: boolean;

  /** Days since the last successful login or validation (undefined if never) */
  lastSuccessAgeDays?: number;

  /** Failed attempts within the last 24 hours */
  recentFailureCount: number;

  severity: TokenAgeSeverity;

  /** Labels of the MFA strategies that are currently configured */
  mfaMethods: string[];
}
