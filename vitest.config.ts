import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        // Entry points (re-exports only)
        'src/index.ts',
        'src/core/index.ts',
        'src/mcp/index.ts',
        'src/mfa/index.ts',
        'src/config/index.ts',
        'src/config/schemas/index.ts',
        'src/notifications/index.ts',
        // Type-only files
        'src/core/types.ts',
        'src/core/upstream.ts',
        'src/mcp/types.ts',
        // Network clients exercised against real servers only
        'src/mfa/mailbox/gmail-client.ts',
        'src/mfa/mailbox/imap-client.ts',
      ],
    },
  },
});
