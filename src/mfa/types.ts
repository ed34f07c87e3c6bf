/**
 * MFA Strategy Interface
 *
 * A strategy tries to produce an MFA code from one source (configuration, a
 * dropped file, a mailbox, a webhook). Strategies are tried in order by
 * MfaResolver until one returns a code.
 *
 * Contract:
 * - Return undefined when no code is available, so the chain moves on
 * - Throw only for unexpected failures; the resolver logs and skips them
 * - Never cache a code: each call reads its source again
 * - Stop at the next step once `signal` is aborted, and never consume a
 *   code (delete a file, trash an email) after that
 */

export const MIN_MFA_CODE_LENGTH = 4;

export interface MfaStrategy {
  /** Stable identifier (e.g. 'preset', 'file') */
  readonly name: string;

  /** Operator-facing description of the source, used in alerts */
  readonly label: string;

  /** Per-strategy timeout override in milliseconds */
  readonly timeoutMs?: number;

  /** Whether the source this strategy reads is configured */
  isConfigured(): boolean;

  /** Operator instruction for supplying a code through this source */
  remediation(): string;

  obtainCode(signal?: AbortSignal): Promise<string | undefined>;
}

/**
 * Normalise a raw read and apply the minimum-length rule
 */
export function acceptCode(raw: string | undefined | null): string | undefined {
  const code = raw?.trim();
  if (!code || code.length < MIN_MFA_CODE_LENGTH) {
    return undefined;
  }
  return code;
}

/**
 * Mask a code for log output (keeps the last two characters)
 */
export function maskCode(code: string): string {
  return `${'*'.repeat(Math.max(code.length - 2, 0))}${code.slice(-2)}`;
}
