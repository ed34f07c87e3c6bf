export { MfaResolver, DEFAULT_STRATEGY_TIMEOUT_MS, DEFAULT_ABORT_GRACE_MS } from './resolver.js';
export type { MfaResolverConfig } from './resolver.js';
export { createMfaResolver } from './chain.js';
export type { MfaChainOptions } from './chain.js';
export { acceptCode, maskCode, MIN_MFA_CODE_LENGTH } from './types.js';
export type { MfaStrategy } from './types.js';
export * from './strategies/index.js';
export { extractCode, bodyText, stripHtml } from './mailbox/code-extractor.js';
export { createMailboxClient } from './mailbox/factory.js';
export { GmailTokenMailboxClient } from './mailbox/gmail-client.js';
export { ImapPasswordMailboxClient } from './mailbox/imap-client.js';
export type { MailboxClient, MessageRef, MessageBody } from './mailbox/types.js';
