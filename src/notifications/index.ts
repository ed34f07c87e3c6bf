export { NullNotificationSink, notifySafely } from './types.js';
export type { NotificationSink, NotificationMessage, NotificationPriority } from './types.js';
export { NtfyNotificationSink } from './ntfy-sink.js';
export type { NtfyConfig } from './ntfy-sink.js';
export { formatNotification } from './format.js';
