/**
 * IMAP Mailbox Client (username + application password)
 *
 * Uses imapflow for the IMAP session and mailparser to split the raw message
 * into text and HTML parts. IMAP SINCE only has day granularity, so search
 * results are filtered again on each message's internal date.
 *
 * Consumed messages are flagged \Deleted and expunged.
 */

import { ImapFlow } from 'imapflow';
import { simpleParser } from 'mailparser';
import type { MailboxClient, MessageBody, MessageRef } from './types.js';

export interface ImapMailboxConfig {
  host: string;
  port: number;
  user: string;
  password: string;

  /** Use implicit TLS (default: true) */
  secure?: boolean;

  mailbox?: string;
}

export class ImapPasswordMailboxClient implements MailboxClient {
  readonly description = 'IMAP (application password)';
  private readonly config: ImapMailboxConfig;
  private client?: ImapFlow;

  constructor(config: ImapMailboxConfig) {
    this.config = config;
  }

  async search(senderDomain: string, since: Date, signal?: AbortSignal): Promise<MessageRef[]> {
    return this.withMailbox(async (client) => {
      const uids = (await client.search({ from: senderDomain, since }, { uid: true })) || [];

      const refs: MessageRef[] = [];
      for (const uid of uids) {
        signal?.throwIfAborted();
        const message = await client.fetchOne(String(uid), { internalDate: true }, { uid: true });
        if (!message) {
          continue;
        }
        const receivedAt = message.internalDate ? new Date(message.internalDate) : undefined;
        if (receivedAt && receivedAt.getTime() < since.getTime()) {
          continue;
        }
        refs.push({ id: String(uid), order: uid, receivedAt });
      }
      return refs;
    });
  }

  async fetchBody(ref: MessageRef): Promise<MessageBody> {
    return this.withMailbox(async (client) => {
      const message = await client.fetchOne(ref.id, { source: true }, { uid: true });
      if (!message || !message.source) {
        return {};
      }
      const parsed = await simpleParser(message.source);
      return {
        text: parsed.text,
        html: parsed.html === false ? undefined : parsed.html,
      };
    });
  }

  async markConsumed(ref: MessageRef, signal?: AbortSignal): Promise<void> {
    await this.withMailbox(async (client) => {
      // imapflow has no cancellation; the last check happens here
      signal?.throwIfAborted();
      await client.messageDelete(ref.id, { uid: true });
    });
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }
    const client = this.client;
    this.client = undefined;
    await client.logout();
  }

  private async connect(): Promise<ImapFlow> {
    if (this.client) {
      return this.client;
    }
    const client = new ImapFlow({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure ?? true,
      auth: { user: this.config.user, pass: this.config.password },
      logger: false,
    });
    await client.connect();
    this.client = client;
    return client;
  }

  private async withMailbox<T>(work: (client: ImapFlow) => Promise<T>): Promise<T> {
    const client = await this.connect();
    const lock = await client.getMailboxLock(this.config.mailbox ?? 'INBOX');
    try {
      return await work(client);
    } finally {
      lock.release();
    }
  }
}
