/**
 * ntfy Notification Sink
 *
 * Publishes auth events to an ntfy topic (`POST {server}/{topic}` with the
 * title, priority and tags carried in headers). When the primary server
 * rejects or is unreachable, the message is retried once against a fallback
 * server without credentials.
 *
 * Usage:
 * ```typescript
 * const sink = new NtfyNotificationSink({
 *   server: 'https://ntfy.example.com',
 *   topic: 'fitness-auth',
 *   token: process.env.NTFY_TOKEN,
 * });
 * await sink.notify({ type: 'rate_limited', retryAfterMinutes: 60 });
 * ```
 */

import type { NotificationEvent } from '../core/types.js';
import type { NotificationMessage, NotificationSink } from './types.js';
import { formatNotification } from './format.js';
import { fetchWithTimeout } from '../utils/timing.js';
import { AuthErrors, errorMessage } from '../utils/errors.js';

export interface NtfyConfig {
  server: string;
  topic: string;

  /** Bearer token for the primary server */
  token?: string;

  /** Server used when the primary fails (no auth sent) */
  fallbackServer?: string;

  /** Topic on the fallback server (default: same topic) */
  fallbackTopic?: string;

  /** Name used in titles (default: 'Fitness API') */
  serviceName?: string;

  /** Per-request timeout (default: 10s) */
  timeoutMs?: number;
}

export class NtfyNotificationSink implements NotificationSink {
  private readonly config: NtfyConfig;

  constructor(config: NtfyConfig) {
    this.config = config;
  }

  getTopicUrl(): string {
    return joinUrl(this.config.server, this.config.topic);
  }

  getFallbackUrl(): string | undefined {
    if (!this.config.fallbackServer) {
      return undefined;
    }
    return joinUrl(this.config.fallbackServer, this.config.fallbackTopic ?? this.config.topic);
  }

  async notify(event: NotificationEvent): Promise<void> {
    const message = formatNotification(event, this.config.serviceName ?? 'Fitness API');

    const primaryError = await this.send(this.getTopicUrl(), message, true);
    if (!primaryError) {
      console.log(`[NtfyNotificationSink] Notification sent: ${message.title}`);
      return;
    }

    const fallbackUrl = this.getFallbackUrl();
    if (!fallbackUrl) {
      throw AuthErrors.TRANSPORT_ERROR('ntfy', primaryError);
    }

    console.warn(`[NtfyNotificationSink] Primary server failed (${primaryError}), trying fallback...`);
    const fallbackError = await this.send(fallbackUrl, message, false);
    if (fallbackError) {
      throw AuthErrors.TRANSPORT_ERROR('ntfy', `primary: ${primaryError}; fallback: ${fallbackError}`);
    }
    console.log(`[NtfyNotificationSink] Notification sent via fallback: ${message.title}`);
  }

  /**
   * Returns undefined on success, otherwise a short reason
   */
  private async send(
    url: string,
    message: NotificationMessage,
    useAuth: boolean
  ): Promise<string | undefined> {
    const headers: Record<string, string> = {
      'Content-Type': 'text/plain; charset=utf-8',
      Title: message.title,
      Priority: message.priority,
    };
    if (message.tags.length > 0) {
      headers['Tags'] = message.tags.join(',');
    }
    if (useAuth && this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    try {
      const response = await fetchWithTimeout(
        url,
        { method: 'POST', headers, body: message.message },
        this.config.timeoutMs ?? 10_000
      );
      return response.ok ? undefined : `HTTP ${response.status}`;
    } catch (error) {
      return errorMessage(error);
    }
  }
}

function joinUrl(server: string, topic: string): string {
  return `${server.replace(/\/+$/, '')}/${topic.replace(/^\/+/, '')}`;
}
