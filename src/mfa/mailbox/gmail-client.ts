/**
 * Gmail Mailbox Client (stored refreshable token)
 *
 * Talks to the Gmail REST API with an OAuth token file in Google's
 * "authorized user" format (`client_id`, `client_secret`, `refresh_token`,
 * optional `token`/`expiry`). The access token is refreshed against the
 * token endpoint when missing or expired, and the refreshed token is
 * written back to the file.
 *
 * Consumed messages are moved to the trash, which needs the
 * `gmail.modify` scope on the stored token.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { MailboxClient, MessageBody, MessageRef } from './types.js';
import { fetchWithTimeout } from '../../utils/timing.js';
import { AuthErrors } from '../../utils/errors.js';

const GMAIL_API = 'https://gmail.googleapis.com/gmail/v1/users/me';
const DEFAULT_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';

/** Refresh this long before the recorded expiry */
const EXPIRY_SKEW_MS = 60_000;

const StoredTokenSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    refresh_token: z.string().min(1),
    token: z.string().optional(),
    expiry: z.string().optional(),
    token_uri: z.string().url().optional(),
  })
  .passthrough();

type StoredToken = z.infer<typeof StoredTokenSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

const MessageListSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).optional(),
});

interface GmailPart {
  mimeType?: string;
  body?: { data?: string };
  parts?: GmailPart[];
}

const GmailPartSchema: z.ZodType<GmailPart> = z.lazy(() =>
  z.object({
    mimeType: z.string().optional(),
    body: z.object({ data: z.string().optional() }).optional(),
    parts: z.array(GmailPartSchema).optional(),
  })
);

const MessageSchema = z.object({
  id: z.string(),
  internalDate: z.string().optional(),
  payload: GmailPartSchema,
});

export interface GmailMailboxConfig {
  /** Path of the stored token file */
  tokenFile: string;

  /** Per-request timeout (default: 10s) */
  timeoutMs?: number;

  /** Max messages listed per search (default: 10) */
  maxResults?: number;
}

export class GmailTokenMailboxClient implements MailboxClient {
  readonly description = 'Gmail API (stored token)';
  private readonly config: GmailMailboxConfig;
  private accessToken?: { value: string; expiresAt: number };

  constructor(config: GmailMailboxConfig) {
    this.config = config;
  }

  async search(senderDomain: string, since: Date, signal?: AbortSignal): Promise<MessageRef[]> {
    const afterSeconds = Math.floor(since.getTime() / 1000);
    const params = new URLSearchParams({
      q: `from:${senderDomain} after:${afterSeconds}`,
      maxResults: String(this.config.maxResults ?? 10),
    });

    const data = MessageListSchema.parse(await this.request('GET', `/messages?${params.toString()}`, signal));
    const messages = data.messages ?? [];

    // Gmail lists newest first
    return messages.map((message, index) => ({
      id: message.id,
      order: messages.length - index,
    }));
  }

  async fetchBody(ref: MessageRef, signal?: AbortSignal): Promise<MessageBody> {
    const message = MessageSchema.parse(
      await this.request('GET', `/messages/${encodeURIComponent(ref.id)}?format=full`, signal)
    );
    return {
      text: findPart(message.payload, 'text/plain'),
      html: findPart(message.payload, 'text/html'),
    };
  }

  async markConsumed(ref: MessageRef, signal?: AbortSignal): Promise<void> {
    await this.request('POST', `/messages/${encodeURIComponent(ref.id)}/trash`, signal);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    const accessToken = await this.getAccessToken();
    const response = await fetchWithTimeout(
      `${GMAIL_API}${path}`,
      { method, headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' } },
      this.config.timeoutMs ?? 10_000,
      signal
    );

    if (!response.ok) {
      throw AuthErrors.TRANSPORT_ERROR('Gmail API', `HTTP ${response.status}`);
    }
    return response.json();
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken && this.accessToken.expiresAt - EXPIRY_SKEW_MS > Date.now()) {
      return this.accessToken.value;
    }

    const stored = await this.readToken();
    const storedExpiry = stored.expiry ? Date.parse(stored.expiry) : NaN;
    if (stored.token && storedExpiry - EXPIRY_SKEW_MS > Date.now()) {
      this.accessToken = { value: stored.token, expiresAt: storedExpiry };
      return stored.token;
    }

    return this.refresh(stored);
  }

  private async refresh(stored: StoredToken): Promise<string> {
    const response = await fetchWithTimeout(
      stored.token_uri ?? DEFAULT_TOKEN_ENDPOINT,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          client_id: stored.client_id,
          client_secret: stored.client_secret,
          refresh_token: stored.refresh_token,
        }).toString(),
      },
      this.config.timeoutMs ?? 10_000
    );

    if (!response.ok) {
      throw AuthErrors.TRANSPORT_ERROR('Gmail token refresh', `HTTP ${response.status}`);
    }

    const refreshed = TokenResponseSchema.parse(await response.json());
    const expiresAt = Date.now() + (refreshed.expires_in ?? 3600) * 1000;
    this.accessToken = { value: refreshed.access_token, expiresAt };

    const updated: StoredToken = {
      ...stored,
      token: refreshed.access_token,
      expiry: new Date(expiresAt).toISOString(),
    };
    await fs.writeFile(this.config.tokenFile, JSON.stringify(updated, null, 2), { mode: 0o600 });
    console.log('[GmailTokenMailboxClient] Access token refreshed');

    return refreshed.access_token;
  }

  private async readToken(): Promise<StoredToken> {
    const raw = await fs.readFile(this.config.tokenFile, 'utf-8');
    return StoredTokenSchema.parse(JSON.parse(raw));
  }
}

function findPart(part: GmailPart, mimeType: string): string | undefined {
  if (part.mimeType === mimeType && part.body?.data) {
    return Buffer.from(part.body.data, 'base64url').toString('utf-8');
  }
  for (const child of part.parts ?? []) {
    const found = findPart(child, mimeType);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}
