/**
 * Authentication error taxonomy
 *
 * Every failure that can end an authentication cycle is an AuthError with a
 * stable code. Callers branch on `code` (or the `is*` guards below), never on
 * message text.
 */

export type AuthErrorCode =
  | 'CREDENTIALS_MISSING'
  | 'MFA_CHALLENGE_REQUIRED'
  | 'MFA_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'TRANSPORT_ERROR'
  | 'LOGIN_FAILED'
  | 'CONFIGURATION_ERROR';

export class AuthError extends Error {
  constructor(
    public code: AuthErrorCode,
    message: string,
    public retryable: boolean = false,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuthError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export function createAuthError(
  code: AuthErrorCode,
  message: string,
  retryable: boolean = false,
  details?: Record<string, unknown>
): AuthError {
  return new AuthError(code, message, retryable, details);
}

export const AuthErrors = {
  CREDENTIALS_MISSING: (missing: string[]) =>
    createAuthError(
      'CREDENTIALS_MISSING',
      `Missing credentials: ${missing.join(', ')} must be set`,
      false,
      { missing }
    ),

  MFA_CHALLENGE_REQUIRED: () =>
    createAuthError('MFA_CHALLENGE_REQUIRED', 'Upstream login requires an MFA code', true),

  MFA_UNAVAILABLE: (instructions: string, configured: string[]) =>
    createAuthError('MFA_UNAVAILABLE', instructions, false, { configured }),

  RATE_LIMITED: (retryAfterMinutes: number, cause?: string) =>
    createAuthError(
      'RATE_LIMITED',
      `Rate limited by upstream service - wait about ${retryAfterMinutes} minutes before retrying`,
      false,
      { retryAfterMinutes, cause }
    ),

  TRANSPORT_ERROR: (target: string, reason: string) =>
    createAuthError('TRANSPORT_ERROR', `${target} request failed: ${reason}`, true),

  LOGIN_FAILED: (reason: string) =>
    createAuthError('LOGIN_FAILED', `Login failed: ${reason}`, true),

  CONFIGURATION_ERROR: (message: string) =>
    createAuthError('CONFIGURATION_ERROR', `Configuration error: ${message}`, false),
} as const;

// ============================================================================
// Upstream condition detection
// ============================================================================

const RATE_LIMIT_MARKERS = [/\b429\b/, /too many requests/i, /rate.?limit/i];
const REJECTION_MARKERS = [/\b401\b/, /unauthori[sz]ed/i];
const CHALLENGE_MARKERS = [/\bmfa\b/i, /verification code/i, /two.?factor/i, /\b2fa\b/i];

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : '';
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' ? status : undefined;
}

/**
 * True when the upstream error carries a rate-limit marker: an AuthError with
 * code RATE_LIMITED, an HTTP status of 429, or a recognisable message.
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof AuthError) {
    return error.code === 'RATE_LIMITED';
  }
  if (statusOf(error) === 429) {
    return true;
  }
  const message = messageOf(error);
  return RATE_LIMIT_MARKERS.some((marker) => marker.test(message));
}

/**
 * True when the upstream error signals that an MFA code is needed to finish
 * the login.
 */
export function isChallengeRequired(error: unknown): boolean {
  if (error instanceof AuthError) {
    return error.code === 'MFA_CHALLENGE_REQUIRED';
  }
  const message = messageOf(error);
  return CHALLENGE_MARKERS.some((marker) => marker.test(message));
}

/**
 * True when a downstream call failed because the upstream no longer accepts
 * the session (HTTP 401 or an "unauthorized" message).
 */
export function isSessionRejected(error: unknown): boolean {
  if (error instanceof AuthError) {
    return false;
  }
  if (statusOf(error) === 401) {
    return true;
  }
  const message = messageOf(error);
  return REJECTION_MARKERS.some((marker) => marker.test(message));
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof AuthError) {
    return {
      type: 'AuthError',
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
