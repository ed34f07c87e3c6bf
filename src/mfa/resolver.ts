/**
 * MFA Resolver
 *
 * Walks an ordered chain of strategies to obtain exactly one code for a
 * pending login challenge.
 *
 * Features:
 * - Strict order, first acceptable code wins, no concurrent strategies
 * - Per-strategy timeout; throws and timeouts count as "no code". A timed
 *   out strategy is aborted and given `abortGraceMs` to stop before the
 *   next one starts
 * - Unconfigured strategies are skipped and never suggested to the operator
 * - Exhaustion fires `mfa_required` and throws MFA_UNAVAILABLE with the
 *   remediation steps of the configured strategies only
 *
 * Usage:
 * ```typescript
 * const resolver = new MfaResolver({ notifier });
 * resolver.addStrategy(new PresetCodeStrategy(config.mfa.code));
 * resolver.addStrategy(new FileCodeStrategy(config.mfa.filePath));
 * const code = await resolver.resolve();
 * ```
 */

import type { MfaStrategy } from './types.js';
import { acceptCode, maskCode } from './types.js';
import type { NotificationSink } from '../notifications/types.js';
import { NullNotificationSink, notifySafely } from '../notifications/types.js';
import { AuthErrors, errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/timing.js';

export const DEFAULT_STRATEGY_TIMEOUT_MS = 10_000;
export const DEFAULT_ABORT_GRACE_MS = 5_000;

export interface MfaResolverConfig {
  /** Sink for the `mfa_required` alert (default: none) */
  notifier?: NotificationSink;

  /** Timeout for strategies that do not declare their own (default: 10s) */
  defaultTimeoutMs?: number;

  /** Wait for an aborted strategy to stop (default: 5s) */
  abortGraceMs?: number;
}

export class MfaResolver {
  private strategies: MfaStrategy[] = [];
  private readonly notifier: NotificationSink;
  private readonly defaultTimeoutMs: number;
  private readonly abortGraceMs: number;

  constructor(config?: MfaResolverConfig) {
    this.notifier = config?.notifier ?? new NullNotificationSink();
    this.defaultTimeoutMs = config?.defaultTimeoutMs ?? DEFAULT_STRATEGY_TIMEOUT_MS;
    this.abortGraceMs = config?.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS;
  }

  /**
   * Append a strategy to the chain. Strategies run in insertion order.
   */
  addStrategy(strategy: MfaStrategy): this {
    if (this.strategies.some((existing) => existing.name === strategy.name)) {
      throw new Error(`MFA strategy already registered: ${strategy.name}`);
    }
    this.strategies.push(strategy);
    return this;
  }

  getStrategies(): MfaStrategy[] {
    return [...this.strategies];
  }

  /**
   * Labels of strategies whose source is configured right now
   */
  configuredMethods(): string[] {
    return this.configured().map((strategy) => strategy.label);
  }

  /**
   * Obtain one code for the current challenge
   *
   * @throws AuthError MFA_UNAVAILABLE when every configured strategy came up empty
   */
  async resolve(): Promise<string> {
    for (const strategy of this.configured()) {
      const timeoutMs = strategy.timeoutMs ?? this.defaultTimeoutMs;
      try {
        const code = acceptCode(
          await withTimeout(
            (signal) => strategy.obtainCode(signal),
            timeoutMs,
            `MFA strategy "${strategy.name}"`,
            this.abortGraceMs
          )
        );
        if (code) {
          console.log(`[MfaResolver] Code ${maskCode(code)} obtained via ${strategy.name}`);
          return code;
        }
        console.log(`[MfaResolver] No code from ${strategy.name}`);
      } catch (error) {
        console.warn(`[MfaResolver] Strategy ${strategy.name} failed: ${errorMessage(error)}`);
      }
    }

    return this.fail();
  }

  private configured(): MfaStrategy[] {
    return this.strategies.filter((strategy) => strategy.isConfigured());
  }

  private async fail(): Promise<never> {
    const configured = this.configured();
    const methods = configured.map((strategy) => strategy.label);

    await notifySafely(this.notifier, { type: 'mfa_required', availableMethods: methods });

    const lines = ['MFA code required but none could be obtained headlessly.'];
    if (configured.length > 0) {
      lines.push('Supply a fresh code through a configured method:');
      configured.forEach((strategy, index) => {
        lines.push(`  ${index + 1}. ${strategy.label}: ${strategy.remediation()}`);
      });
    } else {
      lines.push('No automated MFA method is configured; configure one and retry.');
    }
    lines.push('Then run authentication again.');

    const instructions = lines.join('\n');
    console.error(`[MfaResolver] ${instructions}`);
    throw AuthErrors.MFA_UNAVAILABLE(instructions, methods);
  }
}
