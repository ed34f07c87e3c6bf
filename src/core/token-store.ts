/**
 * Token Store - Durable Session Persistence
 *
 * Sessions live in a directory (default `~/.fitness-auth/tokens`) holding a
 * single `session.json` bundle. The directory layout mirrors what upstream
 * clients dump, so an empty directory left behind by an interrupted login is
 * treated as "no session" and removed.
 *
 * Writes go to a temp file in the same directory and are renamed over the
 * bundle, so a reader never sees a half-written file.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import type { Session } from './types.js';
import type { UpstreamAuthClient } from './upstream.js';
import { errorMessage } from '../utils/errors.js';

export const SESSION_FILE_NAME = 'session.json';

const StoredSessionSchema = z.object({
  version: z.literal(1),
  createdAt: z.string().datetime(),
  bundle: z.string().min(1),
});

type StoredSession = z.infer<typeof StoredSessionSchema>;

export interface TokenStore {
  /** Returns the stored session, or undefined when none is persisted */
  load(): Promise<Session | undefined>;

  /** Atomically replaces the stored session */
  save(session: Session): Promise<void>;

  /** Confirms with the upstream service that the session is still accepted */
  validate(session: Session): Promise<boolean>;

  /** Removes the stored session */
  clear(): Promise<void>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class FileTokenStore implements TokenStore {
  private readonly directory: string;
  private readonly upstream: UpstreamAuthClient;

  /**
   * @param directory - Directory that holds the session bundle
   * @param upstream - Client used by validate()
   */
  constructor(directory: string, upstream: UpstreamAuthClient) {
    this.directory = directory;
    this.upstream = upstream;
  }

  getDirectory(): string {
    return this.directory;
  }

  getBundlePath(): string {
    return path.join(this.directory, SESSION_FILE_NAME);
  }

  async load(): Promise<Session | undefined> {
    const stat = await fs.stat(this.directory).catch((error: unknown) => {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    });
    if (!stat) {
      return undefined;
    }

    // A plain empty file at the store path is a placeholder, not a session
    if (!stat.isDirectory()) {
      if (stat.size === 0) {
        console.warn(`[TokenStore] Removing empty placeholder file at ${this.directory}`);
        await fs.rm(this.directory, { force: true });
      }
      return undefined;
    }

    const entries = await fs.readdir(this.directory);
    if (entries.length === 0) {
      console.warn(`[TokenStore] Removing empty token directory ${this.directory}`);
      await fs.rmdir(this.directory);
      return undefined;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.getBundlePath(), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    if (raw.trim() === '') {
      console.warn('[TokenStore] Removing empty session bundle');
      await fs.rm(this.getBundlePath(), { force: true });
      return undefined;
    }

    const parsed = this.parse(raw);
    if (!parsed) {
      console.warn('[TokenStore] Stored session bundle is malformed, ignoring it');
      return undefined;
    }

    return { bundle: parsed.bundle, createdAt: new Date(parsed.createdAt) };
  }

  async save(session: Session): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });

    const stored: StoredSession = {
      version: 1,
      createdAt: session.createdAt.toISOString(),
      bundle: session.bundle,
    };

    const tempPath = path.join(
      this.directory,
      `.${SESSION_FILE_NAME}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
    );

    try {
      await fs.writeFile(tempPath, JSON.stringify(stored, null, 2), { mode: 0o600 });
      await fs.rename(tempPath, this.getBundlePath());
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    console.log(`[TokenStore] Session saved to ${this.directory}`);
  }

  async validate(session: Session): Promise<boolean> {
    try {
      const profileName = await this.upstream.fetchProfileName(session);
      return typeof profileName === 'string' && profileName.length > 0;
    } catch (error) {
      console.warn(`[TokenStore] Stored session rejected: ${errorMessage(error)}`);
      return false;
    }
  }

  async clear(): Promise<void> {
    await fs.rm(this.getBundlePath(), { force: true });
  }

  private parse(raw: string): StoredSession | undefined {
    try {
      const result = StoredSessionSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : undefined;
    } catch {
      return undefined;
    }
  }
}
