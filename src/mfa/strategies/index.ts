export { PresetCodeStrategy } from './preset-code.js';
export { FileCodeStrategy, DEFAULT_MFA_FILE_PATH } from './file-code.js';
export { MailboxCodeStrategy } from './mailbox-code.js';
export type { MailboxStrategyOptions } from './mailbox-code.js';
export { WebhookCodeStrategy } from './webhook-code.js';
