/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}` (Docker/Kubernetes secret mounts). Names
 * that would escape the directory are refused.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ISecretProvider } from '../ISecretProvider.js';

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  /**
   * @param secretDir - Directory holding one file per secret (default: /run/secrets)
   */
  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const filePath = path.resolve(this.secretDir, logicalName);
    if (!filePath.startsWith(path.resolve(this.secretDir) + path.sep)) {
      return undefined;
    }

    try {
      const value = (await fs.readFile(filePath, 'utf-8')).trim();
      return value === '' ? undefined : value;
    } catch (error) {
      if (error instanceof Error && 'code' in error) {
        if (error.code === 'ENOENT' || error.code === 'EACCES' || error.code === 'EISDIR') {
          return undefined;
        }
      }
      console.warn(
        `[FileSecretProvider] Unexpected error reading ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
