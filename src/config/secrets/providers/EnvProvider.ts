/**
 * Environment Variable Secret Provider
 *
 * Fallback after FileSecretProvider. The entry point loads `.env` through
 * dotenv before configuration is read, so values from that file land here.
 */

import { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value.trim();
  }
}
