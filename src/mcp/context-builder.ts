/**
 * Context Builder
 *
 * Creates every core service from the loaded configuration and wires them
 * into an AuthContext. The context is built with `satisfies AuthContext` so
 * a missing or mistyped service fails at compile time.
 */

import type { AuthContext } from '../core/context.js';
import { validateAuthContext } from '../core/context.js';
import { AuthOrchestrator } from '../core/auth-orchestrator.js';
import { AuthAuditLog, FileAuditStorage, InMemoryAuditStorage } from '../core/audit-log.js';
import { FileTokenStore } from '../core/token-store.js';
import type { UpstreamAuthClient } from '../core/upstream.js';
import type { StateChangeListener } from '../core/auth-orchestrator.js';
import { createMfaResolver } from '../mfa/chain.js';
import type { MailboxClient } from '../mfa/mailbox/types.js';
import type { NotificationSink } from '../notifications/types.js';
import { NullNotificationSink } from '../notifications/types.js';
import { NtfyNotificationSink } from '../notifications/ntfy-sink.js';
import type { ConfigManager } from '../config/manager.js';
import type { UnifiedConfig } from '../config/schemas/index.js';
import type { Sleep } from '../utils/timing.js';

export interface ContextBuilderOptions {
  /** Configuration manager with the configuration already loaded */
  configManager: ConfigManager;

  upstream: UpstreamAuthClient;

  /** Replaces the sink derived from configuration */
  notifier?: NotificationSink;

  /** Replaces the mailbox client derived from configuration */
  mailboxClient?: MailboxClient;

  sleep?: Sleep;
  onStateChange?: StateChangeListener;
}

export class ContextBuilder {
  private readonly options: ContextBuilderOptions;

  constructor(options: ContextBuilderOptions) {
    this.options = options;
  }

  buildAuthContext(): AuthContext {
    const { configManager, upstream } = this.options;
    const config = configManager.getConfig();

    const notifier = this.options.notifier ?? this.createNotifier(config);
    const auditLog = this.createAuditLog(config);
    const tokenStore = new FileTokenStore(config.auth.tokenStorePath, upstream);
    const resolver = createMfaResolver(config.mfa, {
      notifier,
      mailboxClient: this.options.mailboxClient,
      sleep: this.options.sleep,
    });

    const orchestrator = new AuthOrchestrator({
      credentials: config.auth.credentials,
      tokenStore,
      upstream,
      resolver,
      auditLog,
      notifier,
      retryPolicy: config.auth.retry,
      sleep: this.options.sleep,
      onStateChange: this.options.onStateChange,
    });

    const context = {
      orchestrator,
      tokenStore,
      auditLog,
      resolver,
      notifier,
      upstream,
      configManager,
    } satisfies AuthContext;

    validateAuthContext(context);
    console.log(
      `[ContextBuilder] MFA sources configured: ${resolver.configuredMethods().join(', ') || 'none'}`
    );
    return context;
  }

  private createNotifier(config: UnifiedConfig): NotificationSink {
    const ntfy = config.auth.notifications.ntfy;
    if (!ntfy) {
      // Null Object Pattern - alerts disabled
      return new NullNotificationSink();
    }
    return new NtfyNotificationSink({ ...ntfy, serviceName: config.auth.serviceName });
  }

  private createAuditLog(config: UnifiedConfig): AuthAuditLog {
    const storage = config.auth.auditLogPath
      ? new FileAuditStorage(config.auth.auditLogPath)
      : new InMemoryAuditStorage();
    return new AuthAuditLog(storage);
  }
}
