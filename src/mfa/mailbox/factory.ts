/**
 * Picks the mailbox capability set once from configuration.
 *
 * The stored-token flow is preferred over the password flow when both are
 * configured. Returns undefined when neither is, which leaves the mailbox
 * strategy unconfigured.
 */

import type { MailboxConfig } from '../../config/schemas/index.js';
import type { MailboxClient } from './types.js';
import { GmailTokenMailboxClient } from './gmail-client.js';
import { ImapPasswordMailboxClient } from './imap-client.js';

export function createMailboxClient(config: MailboxConfig | undefined): MailboxClient | undefined {
  if (!config) {
    return undefined;
  }

  if (config.gmailTokenFile) {
    return new GmailTokenMailboxClient({ tokenFile: config.gmailTokenFile });
  }

  if (config.imap) {
    return new ImapPasswordMailboxClient({
      host: config.imap.host,
      port: config.imap.port,
      user: config.imap.user,
      password: config.imap.password,
      secure: config.imap.secure,
    });
  }

  return undefined;
}
