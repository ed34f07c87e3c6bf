/**
 * Renders notification events into title/body/priority/tags
 */

import type { NotificationEvent } from '../core/types.js';
import type { NotificationMessage } from './types.js';

export function formatNotification(
  event: NotificationEvent,
  serviceName: string
): NotificationMessage {
  switch (event.type) {
    case 'auth_success':
      return {
        title: `${serviceName} Auth Success`,
        message:
          `${serviceName} authentication successful using ${event.method}.\n` +
          'Tokens refreshed and valid for about 3 months.',
        priority: 'low',
        tags: ['success', 'auth'],
      };

    case 'auth_failure': {
      let message = `${serviceName} authentication failed:\n${event.error}`;
      if (event.retrySuggested) {
        message += '\n\nAction needed: check credentials or provide an MFA code.';
      }
      return {
        title: `${serviceName} Auth Failed`,
        message,
        priority: 'high',
        tags: ['error', 'auth', 'alert'],
      };
    }

    case 'mfa_required': {
      let message = `${serviceName} requires an MFA code to finish logging in.\n\n`;
      if (event.availableMethods.length > 0) {
        message += 'Configured methods:\n';
        message += event.availableMethods.map((method) => `- ${method}\n`).join('');
      } else {
        message += 'No automated MFA method is configured.\n';
      }
      return {
        title: `${serviceName} MFA Required`,
        message,
        priority: 'high',
        tags: ['mfa', 'auth'],
      };
    }

    case 'rate_limited':
      return {
        title: `${serviceName} Rate Limited`,
        message:
          `${serviceName} rate limit hit.\n\n` +
          `Retry in about ${event.retryAfterMinutes} minutes.`,
        priority: 'low',
        tags: ['ratelimit', 'auth'],
      };

    case 'tokens_expiring':
      if (event.severity === 'critical') {
        return {
          title: `${serviceName} Tokens Critical`,
          message:
            `${serviceName} tokens are ${event.ageDays} days old and may expire soon!\n\n` +
            'Action required: re-authenticate before the tokens expire.',
          priority: 'urgent',
          tags: ['critical', 'auth', 'urgent'],
        };
      }
      return {
        title: `${serviceName} Tokens Aging`,
        message:
          `${serviceName} tokens are ${event.ageDays} days old.\n\n` +
          'Recommended: plan to re-authenticate soon.',
        priority: 'high',
        tags: ['warning', 'auth'],
      };
  }
}
