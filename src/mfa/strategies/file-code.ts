/**
 * Transient File Strategy
 *
 * Reads a code that an operator or CI job dropped into a well-known file.
 * The file is deleted as soon as an acceptable code is read, so a code is
 * consumed at most once even when several processes watch the same path.
 *
 * Without an explicit path the strategy watches `<tmpdir>/fitness-mfa.txt`
 * and only counts as configured while that file exists, so operators who
 * never set it up are not told to use it.
 */

import { existsSync, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { MfaStrategy } from '../types.js';
import { acceptCode } from '../types.js';

export const DEFAULT_MFA_FILE_PATH = path.join(os.tmpdir(), 'fitness-mfa.txt');

export class FileCodeStrategy implements MfaStrategy {
  readonly name = 'file';
  readonly label: string;

  private readonly filePath: string;
  private readonly explicit: boolean;

  constructor(filePath: string | undefined, defaultPath: string = DEFAULT_MFA_FILE_PATH) {
    this.filePath = filePath ?? defaultPath;
    this.explicit = filePath !== undefined;
    this.label = `Temporary file (${this.filePath})`;
  }

  isConfigured(): boolean {
    return this.explicit || existsSync(this.filePath);
  }

  remediation(): string {
    return `echo "<code>" > ${this.filePath}`;
  }

  async obtainCode(signal?: AbortSignal): Promise<string | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    const code = acceptCode(raw);
    if (!code) {
      console.warn(`[FileCodeStrategy] Ignoring malformed code in ${this.filePath}`);
      return undefined;
    }

    signal?.throwIfAborted();

    // Whoever deletes the file owns the code
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        console.warn('[FileCodeStrategy] Code file consumed by another process');
        return undefined;
      }
      throw error;
    }

    return code;
  }
}
