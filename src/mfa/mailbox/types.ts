/**
 * Mailbox client contract used by the mailbox MFA strategy
 */

export interface MessageRef {
  /** Provider message id (Gmail id or IMAP uid as string) */
  id: string;

  /** Server-assigned ordering; larger is more recent */
  order: number;

  receivedAt?: Date;
}

export interface MessageBody {
  text?: string;
  html?: string;
}

export interface MailboxClient {
  /** Human-readable description of the auth method, e.g. 'Gmail API (stored token)' */
  readonly description: string;

  /** Messages from `senderDomain` received at or after `since` */
  search(senderDomain: string, since: Date, signal?: AbortSignal): Promise<MessageRef[]>;

  fetchBody(ref: MessageRef, signal?: AbortSignal): Promise<MessageBody>;

  /** Remove the message so later searches cannot match it again */
  markConsumed(ref: MessageRef, signal?: AbortSignal): Promise<void>;

  close?(): Promise<void>;
}
