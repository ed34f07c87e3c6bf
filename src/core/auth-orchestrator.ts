/**
 * Authentication Orchestrator
 *
 * State machine for one authentication cycle:
 *
 * ```
 * idle -> checking_stored_session -> ready
 *                                 -> fresh_login -> ready
 *                                                -> resolving_mfa -> completing_login -> ready
 *                                                                                    -> failed
 *                                                                 -> failed
 *                                                -> failed
 * ```
 *
 * `ready` and `failed` end a cycle. The orchestrator can be invoked again
 * afterwards; a call made while a cycle is running joins that cycle instead
 * of starting a second login against the same account.
 *
 * Two MFA styles are supported for the upstream client:
 * - the client calls the injected `promptMfa` mid-login (client-driven)
 * - the client throws a challenge-required error, and the orchestrator
 *   resolves a code and calls `login()` again with `mfaCode`
 */

import type {
  AuditEntry,
  AuthMethod,
  AuthState,
  AuthStatus,
  Credentials,
  MfaCodeProvider,
  Session,
} from './types.js';
import type { TokenStore } from './token-store.js';
import type { UpstreamAuthClient } from './upstream.js';
import { AuthAuditLog } from './audit-log.js';
import { assessTokenAge } from './monitor.js';
import { DEFAULT_RETRY_POLICY, isRetryable, retryDelayMs } from './retry-policy.js';
import type { RetryPolicy } from './retry-policy.js';
import type { MfaResolver } from '../mfa/resolver.js';
import type { NotificationSink } from '../notifications/types.js';
import { NullNotificationSink, notifySafely } from '../notifications/types.js';
import {
  AuthError,
  AuthErrors,
  errorMessage,
  isChallengeRequired,
  isRateLimitError,
} from '../utils/errors.js';
import type { Sleep } from '../utils/timing.js';
import { sleep as defaultSleep } from '../utils/timing.js';

/** Suggested wait after the upstream throttles a login */
export const RATE_LIMIT_BACKOFF_MINUTES = 60;

export type StateChangeListener = (state: AuthState, previous: AuthState) => void;

export interface AuthOrchestratorOptions {
  /** Account credentials; only needed when a fresh login is required */
  credentials: Partial<Credentials>;

  tokenStore: TokenStore;
  upstream: UpstreamAuthClient;
  resolver: MfaResolver;

  /** Attempt history (default: in-memory) */
  auditLog?: AuthAuditLog;

  /** Alert sink (default: none) */
  notifier?: NotificationSink;

  /** Policy for authenticateWithRetry() (default: single attempt) */
  retryPolicy?: RetryPolicy;

  sleep?: Sleep;
  now?: () => Date;
  onStateChange?: StateChangeListener;
}

interface LoginResult {
  session: Session;
  withMfa: boolean;
}

export class AuthOrchestrator {
  private state: AuthState = 'idle';
  private session: Session | undefined;
  private inFlight: Promise<Session> | undefined;

  private readonly credentials: Partial<Credentials>;
  private readonly tokenStore: TokenStore;
  private readonly upstream: UpstreamAuthClient;
  private readonly resolver: MfaResolver;
  private readonly auditLog: AuthAuditLog;
  private readonly notifier: NotificationSink;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly onStateChange?: StateChangeListener;

  constructor(options: AuthOrchestratorOptions) {
    this.credentials = options.credentials;
    this.tokenStore = options.tokenStore;
    this.upstream = options.upstream;
    this.resolver = options.resolver;
    this.auditLog = options.auditLog ?? new AuthAuditLog();
    this.notifier = options.notifier ?? new NullNotificationSink();
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.onStateChange = options.onStateChange;
  }

  getState(): AuthState {
    return this.state;
  }

  /**
   * Session produced by the last successful cycle
   */
  getSession(): Session | undefined {
    return this.session;
  }

  /**
   * Session for downstream calls. Reuses the session of the last successful
   * cycle without contacting the upstream; runs a cycle only when there is
   * none.
   */
  async getActiveSession(): Promise<Session> {
    if (this.session && this.state === 'ready') {
      return this.session;
    }
    return this.authenticate();
  }

  /**
   * Forget the in-memory session after a downstream call was rejected, so
   * the next getActiveSession() runs a full cycle.
   */
  invalidateSession(): void {
    if (this.session) {
      console.log('[AuthOrchestrator] Session invalidated by a downstream rejection');
      this.session = undefined;
    }
  }

  /**
   * Run one authentication cycle, or join the one already running
   *
   * @throws AuthError with code CREDENTIALS_MISSING, MFA_UNAVAILABLE,
   *   RATE_LIMITED or LOGIN_FAILED
   */
  async authenticate(): Promise<Session> {
    if (this.inFlight) {
      console.log('[AuthOrchestrator] Authentication already in progress, joining it');
      return this.inFlight;
    }

    this.inFlight = this.runCycle().finally(() => {
      this.inFlight = undefined;
    });
    return this.inFlight;
  }

  /**
   * Repeat full cycles according to the retry policy. Failures that cannot
   * be fixed by waiting (missing credentials, rate limiting, no MFA source)
   * end the loop at once.
   */
  async authenticateWithRetry(): Promise<Session> {
    const { maxAttempts } = this.retryPolicy;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.authenticate();
      } catch (error) {
        if (attempt >= maxAttempts || !isRetryable(error)) {
          throw error;
        }
        const delayMs = retryDelayMs(this.retryPolicy, attempt);
        console.warn(
          `[AuthOrchestrator] Attempt ${attempt}/${maxAttempts} failed (${errorMessage(error)}), retrying in ${delayMs}ms`
        );
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Validate the stored session and report token health
   *
   * The summary reflects the history before this check, so a validation
   * done here does not reset the reported token age.
   */
  async checkStatus(): Promise<AuthStatus> {
    const summary = await this.auditLog.summarize(this.now());
    const stored = await this.loadStored();

    let valid = false;
    if (stored) {
      valid = await this.tokenStore.validate(stored);
      await this.record('token_validation', valid, valid ? undefined : 'Stored session rejected');
    }

    const severity = assessTokenAge(summary.lastSuccessAgeDays);
    if (severity !== 'ok' && summary.lastSuccessAgeDays !== undefined) {
      await notifySafely(this.notifier, {
        type: 'tokens_expiring',
        severity,
        ageDays: summary.lastSuccessAgeDays,
      });
    }

    return {
      valid,
      lastSuccessAgeDays: summary.lastSuccessAgeDays,
      recentFailureCount: summary.recentFailureCount,
      severity,
      mfaMethods: this.resolver.configuredMethods(),
    };
  }

  // ==========================================================================
  // Cycle
  // ==========================================================================

  private async runCycle(): Promise<Session> {
    this.transition('checking_stored_session');

    const resumed = await this.resumeStoredSession();
    if (resumed) {
      this.session = resumed;
      this.transition('ready');
      return resumed;
    }

    const { identity, secret } = this.credentials;
    if (!identity || !secret) {
      const missing = [!identity && 'FITNESS_IDENTITY', !secret && 'FITNESS_SECRET'].filter(
        (name): name is string => typeof name === 'string'
      );
      return this.fail(AuthErrors.CREDENTIALS_MISSING(missing));
    }

    this.transition('fresh_login');

    let result: LoginResult;
    try {
      result = await this.freshLogin({ identity, secret });
    } catch (error) {
      return this.fail(error);
    }

    try {
      await this.tokenStore.save(result.session);
    } catch (error) {
      // The session is still usable for this process
      console.error(`[AuthOrchestrator] Failed to persist session: ${errorMessage(error)}`);
    }

    this.session = result.session;
    this.transition('ready');
    await this.record('fresh_login', true);
    await notifySafely(this.notifier, {
      type: 'auth_success',
      method: result.withMfa ? 'fresh login with MFA' : 'fresh login',
    });
    return result.session;
  }

  /**
   * Stored session if it loads and the upstream still accepts it.
   * Never throws: every problem routes to a fresh login.
   */
  private async resumeStoredSession(): Promise<Session | undefined> {
    const stored = await this.loadStored();
    if (!stored) {
      return undefined;
    }

    if (await this.tokenStore.validate(stored)) {
      console.log('[AuthOrchestrator] Resumed stored session');
      await this.record('token_resume', true);
      return stored;
    }

    console.log('[AuthOrchestrator] Stored session rejected, falling back to fresh login');
    await this.record('token_validation', false, 'Stored session rejected');
    return undefined;
  }

  private async loadStored(): Promise<Session | undefined> {
    try {
      return await this.tokenStore.load();
    } catch (error) {
      console.warn(`[AuthOrchestrator] Could not load stored session: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async freshLogin(credentials: Credentials): Promise<LoginResult> {
    let withMfa = false;
    const promptMfa: MfaCodeProvider = async () => {
      withMfa = true;
      return this.resolveMfa();
    };

    try {
      const session = await this.upstream.login(credentials, { promptMfa });
      return { session, withMfa };
    } catch (error) {
      // A challenge after promptMfa already ran means the code was rejected
      if (withMfa || isRateLimitError(error) || !isChallengeRequired(error)) {
        throw error;
      }
    }

    const mfaCode = await this.resolveMfa();
    const session = await this.upstream.login(credentials, { mfaCode });
    return { session, withMfa: true };
  }

  private async resolveMfa(): Promise<string> {
    this.transition('resolving_mfa');
    const code = await this.resolver.resolve();
    this.transition('completing_login');
    return code;
  }

  private async fail(error: unknown): Promise<never> {
    this.transition('failed');

    if (isRateLimitError(error)) {
      const rateLimited = this.toRateLimited(error);
      const retryAfterMinutes = rateLimited.details?.retryAfterMinutes;
      console.error(`[AuthOrchestrator] ${rateLimited.message}`);
      await this.record('fresh_login', false, rateLimited.message);
      await notifySafely(this.notifier, {
        type: 'rate_limited',
        retryAfterMinutes:
          typeof retryAfterMinutes === 'number' ? retryAfterMinutes : RATE_LIMIT_BACKOFF_MINUTES,
      });
      throw rateLimited;
    }

    const authError =
      error instanceof AuthError ? error : AuthErrors.LOGIN_FAILED(errorMessage(error));
    console.error(`[AuthOrchestrator] Authentication failed: ${authError.message}`);
    await this.record('fresh_login', false, authError.message);
    await notifySafely(this.notifier, {
      type: 'auth_failure',
      error: authError.message,
      retrySuggested: authError.code !== 'CREDENTIALS_MISSING',
    });
    throw authError;
  }

  private toRateLimited(error: unknown): AuthError {
    if (error instanceof AuthError && error.code === 'RATE_LIMITED') {
      return error;
    }
    return AuthErrors.RATE_LIMITED(RATE_LIMIT_BACKOFF_MINUTES, errorMessage(error));
  }

  private async record(method: AuthMethod, success: boolean, error?: string): Promise<void> {
    const entry: AuditEntry = {
      timestamp: this.now(),
      success,
      method,
      ...(error ? { error } : {}),
    };
    await this.auditLog.append(entry);
  }

  private transition(next: AuthState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    console.log(`[AuthOrchestrator] ${previous} -> ${next}`);
    if (!this.onStateChange) {
      return;
    }
    try {
      this.onStateChange(next, previous);
    } catch (error) {
      console.error(`[AuthOrchestrator] State change listener failed: ${errorMessage(error)}`);
    }
  }
}
