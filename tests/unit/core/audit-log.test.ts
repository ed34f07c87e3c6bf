import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  AuthAuditLog,
  FileAuditStorage,
  InMemoryAuditStorage,
  MAX_AUDIT_ENTRIES,
} from '../../../src/core/audit-log.js';
import type { AuditStorage } from '../../../src/core/audit-log.js';
import type { AuditEntry } from '../../../src/core/types.js';

const NOW = new Date('2026-06-15T12:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

function ago(ms: number): Date {
  return new Date(NOW.getTime() - ms);
}

describe('AuthAuditLog', () => {
  describe('append', () => {
    it('should keep entries in insertion order', async () => {
      const log = new AuthAuditLog();

      await log.append({ timestamp: ago(2 * HOUR_MS), success: false, method: 'fresh_login' });
      await log.append({ timestamp: ago(HOUR_MS), success: true, method: 'fresh_login' });

      const entries = await log.entries();
      expect(entries.map((entry) => entry.success)).toEqual([false, true]);
    });

    it('should evict the oldest entries beyond the cap', async () => {
      const log = new AuthAuditLog(new InMemoryAuditStorage());

      for (let i = 0; i < MAX_AUDIT_ENTRIES + 5; i++) {
        await log.append({
          timestamp: new Date(NOW.getTime() + i * 1000),
          success: true,
          method: 'token_resume',
          error: `entry-${i}`,
        });
      }

      const entries = await log.entries();
      expect(entries).toHaveLength(50);
      expect(entries[0].error).toBe('entry-5');
      expect(entries[49].error).toBe('entry-54');
    });

    it('should swallow storage write failures', async () => {
      const failing: AuditStorage = {
        read: async () => [],
        write: async () => {
          throw new Error('disk full');
        },
      };
      const log = new AuthAuditLog(failing);

      await expect(
        log.append({ timestamp: NOW, success: true, method: 'fresh_login' })
      ).resolves.toBeUndefined();
    });
  });

  describe('summarize', () => {
    it('should report nothing for an empty history', async () => {
      const summary = await new AuthAuditLog().summarize(NOW);

      expect(summary).toEqual({ lastSuccessAgeDays: undefined, recentFailureCount: 0 });
    });

    it('should age from the latest fresh login or validation success', async () => {
      const log = new AuthAuditLog();
      await log.append({ timestamp: ago(70 * DAY_MS), success: true, method: 'fresh_login' });
      await log.append({ timestamp: ago(65 * DAY_MS), success: true, method: 'token_validation' });
      await log.append({ timestamp: ago(DAY_MS), success: true, method: 'token_resume' });

      const summary = await log.summarize(NOW);

      expect(summary.lastSuccessAgeDays).toBe(65);
    });

    it('should count only failures within the last 24 hours', async () => {
      const log = new AuthAuditLog();
      await log.append({ timestamp: ago(25 * HOUR_MS), success: false, method: 'fresh_login' });
      await log.append({ timestamp: ago(23 * HOUR_MS), success: false, method: 'fresh_login' });
      await log.append({ timestamp: ago(HOUR_MS), success: false, method: 'token_validation' });
      await log.append({ timestamp: ago(HOUR_MS), success: true, method: 'fresh_login' });

      const summary = await log.summarize(NOW);

      expect(summary).toEqual({ lastSuccessAgeDays: 0, recentFailureCount: 2 });
    });
  });
});

describe('FileAuditStorage', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audit-log-'));
    filePath = path.join(tempDir, 'nested', 'auth_log.json');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should return an empty history when the file does not exist', async () => {
    await expect(new FileAuditStorage(filePath).read()).resolves.toEqual([]);
  });

  it('should persist entries as a JSON array', async () => {
    const log = new AuthAuditLog(new FileAuditStorage(filePath));

    await log.append({ timestamp: NOW, success: true, method: 'fresh_login' });
    await log.append({
      timestamp: NOW,
      success: false,
      method: 'token_validation',
      error: 'Stored session rejected',
    });

    const raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(raw).toEqual([
      { timestamp: '2026-06-15T12:00:00.000Z', success: true, method: 'fresh_login', error: null },
      {
        timestamp: '2026-06-15T12:00:00.000Z',
        success: false,
        method: 'token_validation',
        error: 'Stored session rejected',
      },
    ]);
  });

  it('should read back entries written by another instance', async () => {
    await new AuthAuditLog(new FileAuditStorage(filePath)).append({
      timestamp: NOW,
      success: true,
      method: 'token_resume',
    });

    const entries: AuditEntry[] = await new FileAuditStorage(filePath).read();

    expect(entries).toEqual([{ timestamp: NOW, success: true, method: 'token_resume' }]);
  });

  it('should skip entries that do not parse', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      JSON.stringify([
        { timestamp: 'not a date', success: true, method: 'fresh_login' },
        { timestamp: '2026-06-15T12:00:00.000Z', success: true, method: 'unknown_method' },
        { timestamp: '2026-06-15T12:00:00.000Z', success: false, method: 'fresh_login', error: 'x' },
      ])
    );

    const entries = await new FileAuditStorage(filePath).read();

    expect(entries).toEqual([
      { timestamp: NOW, success: false, method: 'fresh_login', error: 'x' },
    ]);
  });
});
