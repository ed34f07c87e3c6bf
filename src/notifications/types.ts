import type { NotificationEvent } from '../core/types.js';

/**
 * Outbound alert sink. Delivery is best effort: callers go through
 * `notifySafely()` so a failing sink never affects authentication.
 */
export interface NotificationSink {
  notify(event: NotificationEvent): Promise<void>;
}

export type NotificationPriority = 'min' | 'low' | 'default' | 'high' | 'urgent';

export interface NotificationMessage {
  title: string;
  message: string;
  priority: NotificationPriority;
  tags: string[];
}

/**
 * Null Object sink used when no transport is configured
 */
export class NullNotificationSink implements NotificationSink {
  async notify(): Promise<void> {
    return;
  }
}

export async function notifySafely(
  sink: NotificationSink,
  event: NotificationEvent
): Promise<void> {
  try {
    await sink.notify(event);
  } catch (error) {
    console.warn(
      `[Notifications] ${event.type} delivery failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
