/**
 * Mailbox Strategy
 *
 * Waits for the provider's verification email and pulls the code out of it.
 *
 * Flow:
 * 1. Sleep for the initial delay (the email is sent by the same login call
 *    that raised the challenge and needs a few seconds to land)
 * 2. Search each window, narrowest first, until one has matches
 * 3. Take only the most recent match by server ordering
 * 4. Extract the code (plain text, else stripped HTML)
 * 5. Delete the message so a retry can never pick the same code again
 *
 * An aborted run stops between steps and leaves the message in place.
 */

import type { MfaStrategy } from '../types.js';
import { acceptCode } from '../types.js';
import type { MailboxClient, MessageRef } from '../mailbox/types.js';
import { bodyText, extractCode } from '../mailbox/code-extractor.js';
import type { Sleep } from '../../utils/timing.js';
import { sleep as defaultSleep } from '../../utils/timing.js';
import { errorMessage } from '../../utils/errors.js';

export interface MailboxStrategyOptions {
  /** Sender domain of the verification email (default: 'garmin.com') */
  senderDomain?: string;

  /** Wait before the first search (default: 15s) */
  initialDelayMs?: number;

  /** Search windows in minutes, narrowest first (default: [5, 10]) */
  searchWindowsMinutes?: number[];

  /** Network allowance on top of the initial delay (default: 30s) */
  searchTimeoutMs?: number;

  sleep?: Sleep;
  now?: () => Date;
}

export class MailboxCodeStrategy implements MfaStrategy {
  readonly name = 'mailbox';
  readonly label: string;
  readonly timeoutMs: number;

  private readonly senderDomain: string;
  private readonly initialDelayMs: number;
  private readonly windows: number[];
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(
    private readonly client: MailboxClient | undefined,
    options: MailboxStrategyOptions = {}
  ) {
    this.senderDomain = options.senderDomain ?? 'garmin.com';
    this.initialDelayMs = options.initialDelayMs ?? 15_000;
    this.windows = options.searchWindowsMinutes ?? [5, 10];
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.timeoutMs = this.initialDelayMs + (options.searchTimeoutMs ?? 30_000);
    this.label = client ? `Email inbox via ${client.description}` : 'Email inbox (unset)';
  }

  isConfigured(): boolean {
    return this.client !== undefined;
  }

  remediation(): string {
    return `trigger a new login so ${this.senderDomain} sends a fresh code to the monitored inbox`;
  }

  async obtainCode(signal?: AbortSignal): Promise<string | undefined> {
    if (!this.client) {
      return undefined;
    }

    if (this.initialDelayMs > 0) {
      console.log(`[MailboxCodeStrategy] Waiting ${this.initialDelayMs}ms for the email to arrive...`);
      await this.sleep(this.initialDelayMs);
    }
    signal?.throwIfAborted();

    try {
      const latest = await this.findLatest(this.client, signal);
      if (!latest) {
        console.log(`[MailboxCodeStrategy] No recent email from ${this.senderDomain}`);
        return undefined;
      }

      const body = await this.client.fetchBody(latest, signal);
      signal?.throwIfAborted();

      const code = acceptCode(extractCode(bodyText(body)));
      if (!code) {
        console.warn('[MailboxCodeStrategy] Latest email has no recognisable code');
        return undefined;
      }

      if (signal?.aborted) {
        console.warn('[MailboxCodeStrategy] Run was abandoned, leaving the email in place');
        return undefined;
      }
      await this.client.markConsumed(latest, signal);
      return code;
    } finally {
      await this.closeQuietly(this.client);
    }
  }

  private async findLatest(
    client: MailboxClient,
    signal: AbortSignal | undefined
  ): Promise<MessageRef | undefined> {
    for (const minutes of this.windows) {
      signal?.throwIfAborted();
      const since = new Date(this.now().getTime() - minutes * 60_000);
      const matches = await client.search(this.senderDomain, since, signal);
      if (matches.length > 0) {
        return matches.reduce((latest, ref) => (ref.order > latest.order ? ref : latest));
      }
    }
    return undefined;
  }

  private async closeQuietly(client: MailboxClient): Promise<void> {
    if (!client.close) {
      return;
    }
    try {
      await client.close();
    } catch (error) {
      console.warn(`[MailboxCodeStrategy] Mailbox close failed: ${errorMessage(error)}`);
    }
  }
}
