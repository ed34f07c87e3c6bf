/**
 * Upstream Login Client Contract
 *
 * The fitness-data API client is an external collaborator. This package only
 * depends on the two calls below.
 *
 * MFA can be handled two ways and the orchestrator supports both:
 * - the client calls `promptMfa` mid-login and waits for the code, or
 * - the client rejects with a challenge-required error (see
 *   `AuthErrors.MFA_CHALLENGE_REQUIRED`) and expects a second `login` call
 *   carrying `mfaCode`.
 *
 * Throttling must surface as an error carrying a rate-limit marker (HTTP 429
 * status, "429"/"Too Many Requests" in the message, or
 * `AuthErrors.RATE_LIMITED`).
 */

import type { Credentials, MfaCodeProvider, Session } from './types.js';

export interface LoginOptions {
  /** Code for a challenge raised by a previous login call */
  mfaCode?: string;

  /** Called by the client when it needs a code during this login */
  promptMfa?: MfaCodeProvider;
}

export interface UpstreamAuthClient {
  /**
   * Log in with credentials, returning a fresh serialized session.
   */
  login(credentials: Credentials, options?: LoginOptions): Promise<Session>;

  /**
   * Cheap authenticated call used to confirm a stored session still works.
   */
  fetchProfileName(session: Session): Promise<string>;
}
