/**
 * Auth Audit Log - Bounded Attempt History
 *
 * Append-only history of authentication attempts, capped at the 50 most
 * recent entries (oldest evicted first). The monitor reads it back through
 * `summarize()` to judge token age and recent failure rate.
 *
 * Writes never fail an authentication cycle: storage errors are logged and
 * dropped.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AUTH_METHODS } from './types.js';
import type { AuditEntry, AuthMethod } from './types.js';
import { errorMessage } from '../utils/errors.js';

export const MAX_AUDIT_ENTRIES = 50;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Methods whose success proves the stored tokens were good at that time */
const AGE_METHODS: readonly AuthMethod[] = ['fresh_login', 'token_validation'];

// ============================================================================
// Storage
// ============================================================================

/**
 * Storage backend for the ordered entry sequence
 */
export interface AuditStorage {
  read(): Promise<AuditEntry[]>;
  write(entries: AuditEntry[]): Promise<void>;
}

/**
 * In-memory storage, used when no log path is configured and in tests
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  async read(): Promise<AuditEntry[]> {
    return [...this.entries];
  }

  async write(entries: AuditEntry[]): Promise<void> {
    this.entries = [...entries];
  }
}

const StoredEntrySchema = z.object({
  timestamp: z.string(),
  success: z.boolean(),
  method: z.enum(AUTH_METHODS),
  error: z.string().nullish(),
});

/**
 * JSON-array file storage. Entries that do not parse are skipped rather than
 * poisoning the whole history.
 */
export class FileAuditStorage implements AuditStorage {
  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  async read(): Promise<AuditEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const data: unknown = JSON.parse(raw);
    if (!Array.isArray(data)) {
      return [];
    }

    const entries: AuditEntry[] = [];
    for (const item of data) {
      const parsed = StoredEntrySchema.safeParse(item);
      if (!parsed.success) {
        continue;
      }
      const timestamp = new Date(parsed.data.timestamp);
      if (Number.isNaN(timestamp.getTime())) {
        continue;
      }
      entries.push({
        timestamp,
        success: parsed.data.success,
        method: parsed.data.method,
        ...(parsed.data.error ? { error: parsed.data.error } : {}),
      });
    }
    return entries;
  }

  async write(entries: AuditEntry[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const serialized = entries.map((entry) => ({
      timestamp: entry.timestamp.toISOString(),
      success: entry.success,
      method: entry.method,
      error: entry.error ?? null,
    }));
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(serialized, null, 2));
    await fs.rename(tempPath, this.filePath);
  }
}

// ============================================================================
// Audit Log
// ============================================================================

export interface AuditSummary {
  /** Whole days since the latest successful login/validation */
  lastSuccessAgeDays?: number;

  /** Failed entries recorded within the last 24 hours */
  recentFailureCount: number;
}

export class AuthAuditLog {
  private readonly storage: AuditStorage;
  private readonly maxEntries: number;

  /**
   * @param storage - Backend (default: in-memory)
   * @param maxEntries - History cap (default: 50)
   */
  constructor(storage?: AuditStorage, maxEntries: number = MAX_AUDIT_ENTRIES) {
    this.storage = storage ?? new InMemoryAuditStorage();
    this.maxEntries = maxEntries;
  }

  /**
   * Append an entry, evicting the oldest beyond the cap. Never throws.
   */
  async append(entry: AuditEntry): Promise<void> {
    try {
      const entries = await this.readSafely();
      entries.push(entry);
      await this.storage.write(entries.slice(-this.maxEntries));
    } catch (error) {
      console.warn(`[AuthAuditLog] Failed to record ${entry.method} attempt: ${errorMessage(error)}`);
    }
  }

  /**
   * Entries in insertion order (oldest first)
   */
  async entries(): Promise<AuditEntry[]> {
    return this.readSafely();
  }

  async summarize(now: Date = new Date()): Promise<AuditSummary> {
    const entries = await this.readSafely();

    let lastSuccessAgeDays: number | undefined;
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry.success && AGE_METHODS.includes(entry.method)) {
        lastSuccessAgeDays = Math.floor((now.getTime() - entry.timestamp.getTime()) / DAY_MS);
        break;
      }
    }

    const recentFailureCount = entries.filter(
      (entry) => !entry.success && now.getTime() - entry.timestamp.getTime() < DAY_MS
    ).length;

    return { lastSuccessAgeDays, recentFailureCount };
  }

  private async readSafely(): Promise<AuditEntry[]> {
    try {
      return await this.storage.read();
    } catch (error) {
      console.warn(`[AuthAuditLog] Could not read audit history: ${errorMessage(error)}`);
      return [];
    }
  }
}
