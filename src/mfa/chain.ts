/**
 * Builds the resolver chain from configuration in the fixed order:
 * preset code, transient file, mailbox, webhook. The terminal failure step
 * lives in MfaResolver itself.
 */

import type { MfaConfig } from '../config/schemas/index.js';
import type { NotificationSink } from '../notifications/types.js';
import type { Sleep } from '../utils/timing.js';
import { MfaResolver } from './resolver.js';
import type { MailboxClient } from './mailbox/types.js';
import { createMailboxClient } from './mailbox/factory.js';
import {
  FileCodeStrategy,
  MailboxCodeStrategy,
  PresetCodeStrategy,
  WebhookCodeStrategy,
} from './strategies/index.js';

export interface MfaChainOptions {
  notifier?: NotificationSink;

  /** Replaces the client derived from `config.mailbox` */
  mailboxClient?: MailboxClient;

  sleep?: Sleep;
}

export function createMfaResolver(config: MfaConfig, options: MfaChainOptions = {}): MfaResolver {
  const mailboxClient = options.mailboxClient ?? createMailboxClient(config.mailbox);

  return new MfaResolver({
    notifier: options.notifier,
    defaultTimeoutMs: config.strategyTimeoutMs,
  })
    .addStrategy(new PresetCodeStrategy(config.code))
    .addStrategy(new FileCodeStrategy(config.filePath))
    .addStrategy(
      new MailboxCodeStrategy(mailboxClient, {
        senderDomain: config.mailbox?.senderDomain,
        initialDelayMs: config.mailbox?.initialDelayMs,
        searchWindowsMinutes: config.mailbox?.searchWindowsMinutes,
        sleep: options.sleep,
      })
    )
    .addStrategy(new WebhookCodeStrategy(config.webhookUrl, config.webhookTimeoutMs));
}
