import { describe, it, expect, vi } from 'vitest';
import { MfaResolver } from '../../../src/mfa/resolver.js';
import { MailboxCodeStrategy } from '../../../src/mfa/strategies/mailbox-code.js';
import type { MessageBody, MessageRef } from '../../../src/mfa/mailbox/types.js';
import { AuthError } from '../../../src/utils/errors.js';
import { sleep } from '../../../src/utils/timing.js';
import { InMemoryMailboxClient, RecordingNotificationSink } from '../../../src/testing/index.js';

/** Inbox whose body download outlasts the strategy timeout */
class SlowInbox extends InMemoryMailboxClient {
  async fetchBody(ref: MessageRef): Promise<MessageBody> {
    await sleep(80);
    return super.fetchBody(ref);
  }
}

function strategy(
  name: string,
  obtain: () => Promise<string | undefined>,
  configured = true,
  timeoutMs?: number
) {
  return {
    name,
    label: `${name} source`,
    timeoutMs,
    isConfigured: () => configured,
    remediation: () => `provide a code via ${name}`,
    obtainCode: vi.fn(obtain),
  };
}

describe('MfaResolver', () => {
  it('should return the first acceptable code and stop', async () => {
    const first = strategy('first', async () => '111111');
    const second = strategy('second', async () => '222222');
    const resolver = new MfaResolver().addStrategy(first).addStrategy(second);

    await expect(resolver.resolve()).resolves.toBe('111111');
    expect(second.obtainCode).not.toHaveBeenCalled();
  });

  it('should reject codes shorter than four characters and move on', async () => {
    const short = strategy('short', async () => ' 123 ');
    const good = strategy('good', async () => ' 4567 ');
    const resolver = new MfaResolver().addStrategy(short).addStrategy(good);

    await expect(resolver.resolve()).resolves.toBe('4567');
    expect(short.obtainCode).toHaveBeenCalledTimes(1);
  });

  it('should treat a throwing strategy as no code', async () => {
    const broken = strategy('broken', async () => {
      throw new Error('connection refused');
    });
    const good = strategy('good', async () => '998877');
    const resolver = new MfaResolver().addStrategy(broken).addStrategy(good);

    await expect(resolver.resolve()).resolves.toBe('998877');
  });

  it('should time out a slow strategy and continue', async () => {
    const slow = strategy('slow', () => new Promise<string>(() => undefined), true, 20);
    const good = strategy('good', async () => '135790');
    const resolver = new MfaResolver({ abortGraceMs: 10 }).addStrategy(slow).addStrategy(good);

    await expect(resolver.resolve()).resolves.toBe('135790');
  });

  it('should abort a timed-out mailbox run before the next strategy and keep its email', async () => {
    const inbox = new SlowInbox().deliver({
      id: 'mfa-1',
      order: 1,
      from: 'alerts@garmin.com',
      receivedAt: new Date(Date.now() - 60_000),
      body: { text: 'Your verification code: 246813' },
    });
    const mailbox = new MailboxCodeStrategy(inbox, { initialDelayMs: 0, searchTimeoutMs: 20 });
    const observed: string[] = [];
    const next = strategy('webhook', async () => {
      observed.push(`start, inbox=${inbox.remaining().length}`);
      await sleep(30);
      observed.push(`end, inbox=${inbox.remaining().length}`);
      return undefined;
    });
    const resolver = new MfaResolver({ abortGraceMs: 500 }).addStrategy(mailbox).addStrategy(next);

    await expect(resolver.resolve()).rejects.toMatchObject({ code: 'MFA_UNAVAILABLE' });

    expect(observed).toEqual(['start, inbox=1', 'end, inbox=1']);
    expect(inbox.remaining().map((message) => message.id)).toEqual(['mfa-1']);
    expect(inbox.closeCount).toBe(1);
  });

  it('should skip unconfigured strategies entirely', async () => {
    const unconfigured = strategy('unconfigured', async () => '000111', false);
    const resolver = new MfaResolver().addStrategy(unconfigured);

    await expect(resolver.resolve()).rejects.toBeInstanceOf(AuthError);
    expect(unconfigured.obtainCode).not.toHaveBeenCalled();
  });

  it('should refuse duplicate strategy names', () => {
    const resolver = new MfaResolver().addStrategy(strategy('dup', async () => undefined));

    expect(() => resolver.addStrategy(strategy('dup', async () => undefined))).toThrow(
      'MFA strategy already registered: dup'
    );
  });

  describe('exhaustion', () => {
    it('should notify and throw with remediation for configured strategies only', async () => {
      const notifier = new RecordingNotificationSink();
      const resolver = new MfaResolver({ notifier })
        .addStrategy(strategy('file', async () => undefined))
        .addStrategy(strategy('mailbox', async () => undefined, false))
        .addStrategy(strategy('webhook', async () => undefined));

      const error = await resolver.resolve().catch((caught: unknown) => caught);

      expect(notifier.events).toEqual([
        { type: 'mfa_required', availableMethods: ['file source', 'webhook source'] },
      ]);
      expect(error).toBeInstanceOf(AuthError);
      if (!(error instanceof AuthError)) {
        return;
      }
      expect(error.code).toBe('MFA_UNAVAILABLE');
      expect(error.message).toBe(
        [
          'MFA code required but none could be obtained headlessly.',
          'Supply a fresh code through a configured method:',
          '  1. file source: provide a code via file',
          '  2. webhook source: provide a code via webhook',
          'Then run authentication again.',
        ].join('\n')
      );
    });

    it('should say so when no strategy is configured', async () => {
      const notifier = new RecordingNotificationSink();
      const resolver = new MfaResolver({ notifier });

      await expect(resolver.resolve()).rejects.toThrow(
        'No automated MFA method is configured; configure one and retry.'
      );
      expect(notifier.events).toEqual([{ type: 'mfa_required', availableMethods: [] }]);
    });

    it('should still throw MFA_UNAVAILABLE when the notifier fails', async () => {
      const resolver = new MfaResolver({
        notifier: {
          notify: async () => {
            throw new Error('ntfy down');
          },
        },
      });

      await expect(resolver.resolve()).rejects.toMatchObject({ code: 'MFA_UNAVAILABLE' });
    });
  });

  it('should list configured methods in chain order', () => {
    const resolver = new MfaResolver()
      .addStrategy(strategy('a', async () => undefined))
      .addStrategy(strategy('b', async () => undefined, false))
      .addStrategy(strategy('c', async () => undefined));

    expect(resolver.configuredMethods()).toEqual(['a source', 'c source']);
  });
});
