/**
 * Webhook Strategy
 *
 * Fetches a code from an operator-supplied endpoint. A 200 response whose
 * trimmed body is at least four characters long is taken as the code.
 */

import type { MfaStrategy } from '../types.js';
import { acceptCode } from '../types.js';
import { fetchWithTimeout } from '../../utils/timing.js';

export class WebhookCodeStrategy implements MfaStrategy {
  readonly name = 'webhook';
  readonly label = 'Webhook endpoint (MFA_WEBHOOK_URL)';
  readonly timeoutMs: number;

  constructor(
    private readonly url: string | undefined,
    timeoutMs: number = 10_000
  ) {
    this.timeoutMs = timeoutMs;
  }

  isConfigured(): boolean {
    return Boolean(this.url);
  }

  remediation(): string {
    return `make ${this.url} return the current code as plain text`;
  }

  async obtainCode(signal?: AbortSignal): Promise<string | undefined> {
    if (!this.url) {
      return undefined;
    }

    const response = await fetchWithTimeout(
      this.url,
      { method: 'GET', headers: { Accept: 'text/plain' } },
      this.timeoutMs,
      signal
    );

    if (response.status !== 200) {
      console.warn(`[WebhookCodeStrategy] Endpoint responded with HTTP ${response.status}`);
      return undefined;
    }

    return acceptCode(await response.text());
  }
}
