/**
 * Secret Resolver
 *
 * Walks a parsed JSON configuration and replaces every `{"$secret": "NAME"}`
 * descriptor with the value found by the first provider that knows NAME.
 * Credentials and mailbox passwords can therefore stay out of config files.
 *
 * Usage:
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * await resolver.resolveSecrets(rawConfig);
 * ```
 */

import { ISecretProvider, isSecretProvider } from './ISecretProvider.js';
import { AuthErrors } from '../../utils/errors.js';

export interface SecretResolverConfig {
  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

type SecretDescriptor = { $secret: string };

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    '$secret' in value &&
    typeof value.$secret === 'string' &&
    value.$secret !== ''
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.failFast = config?.failFast ?? true;
  }

  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Resolve descriptors in place
   *
   * @throws AuthError CONFIGURATION_ERROR when failFast is set and a secret is missing
   */
  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  private async resolveNode(node: unknown, nodePath: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const child: unknown = node[i];
        if (isSecretDescriptor(child)) {
          node[i] = await this.resolveDescriptor(child, `${nodePath}[${i}]`);
        } else {
          await this.resolveNode(child, `${nodePath}[${i}]`);
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const child = node[key];
      if (isSecretDescriptor(child)) {
        node[key] = await this.resolveDescriptor(child, `${nodePath}.${key}`);
      } else {
        await this.resolveNode(child, `${nodePath}.${key}`);
      }
    }
  }

  private async resolveDescriptor(
    descriptor: SecretDescriptor,
    nodePath: string
  ): Promise<string | undefined> {
    const value = await this.lookup(descriptor.$secret);
    if (value !== undefined) {
      return value;
    }

    const message = `Secret "${descriptor.$secret}" at path "${nodePath}" could not be resolved by any provider`;
    if (this.failFast) {
      throw AuthErrors.CONFIGURATION_ERROR(message);
    }
    console.warn(`[SecretResolver] ${message}`);
    return undefined;
  }

  private async lookup(logicalName: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);
        if (value !== undefined) {
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }
    return undefined;
  }
}
