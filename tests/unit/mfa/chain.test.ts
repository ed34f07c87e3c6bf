import { describe, it, expect } from 'vitest';
import { createMfaResolver } from '../../../src/mfa/chain.js';
import { MfaConfigSchema } from '../../../src/config/schemas/mfa.js';
import { InMemoryMailboxClient } from '../../../src/testing/index.js';

describe('createMfaResolver', () => {
  it('should build the chain in the fixed order', () => {
    const resolver = createMfaResolver(MfaConfigSchema.parse({}));

    expect(resolver.getStrategies().map((strategy) => strategy.name)).toEqual([
      'preset',
      'file',
      'mailbox',
      'webhook',
    ]);
  });

  it('should report only the configured sources', () => {
    const resolver = createMfaResolver(
      MfaConfigSchema.parse({
        code: '123456',
        filePath: '/tmp/fitness-mfa.txt',
        webhookUrl: 'https://mfa.example.com/code',
      })
    );

    expect(resolver.configuredMethods()).toEqual([
      'Pre-set code (MFA_CODE)',
      'Temporary file (/tmp/fitness-mfa.txt)',
      'Webhook endpoint (MFA_WEBHOOK_URL)',
    ]);
  });

  it('should configure the mailbox strategy from an injected client', () => {
    const resolver = createMfaResolver(MfaConfigSchema.parse({}), {
      mailboxClient: new InMemoryMailboxClient(),
    });

    expect(resolver.configuredMethods()).toEqual(['Email inbox via in-memory inbox']);
  });

  it('should pick the stored-token mailbox flow over IMAP', () => {
    const resolver = createMfaResolver(
      MfaConfigSchema.parse({
        mailbox: {
          gmailTokenFile: '/home/athlete/.gmail/token.json',
          imap: { user: 'athlete@example.com', password: 'test-secret' },
        },
      })
    );

    expect(resolver.configuredMethods()).toEqual(['Email inbox via Gmail API (stored token)']);
  });

  it('should use IMAP when only a password is configured', () => {
    const resolver = createMfaResolver(
      MfaConfigSchema.parse({
        mailbox: { imap: { user: 'athlete@example.com', password: 'test-secret' } },
      })
    );

    expect(resolver.configuredMethods()).toEqual(['Email inbox via IMAP (application password)']);
  });
});
