export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver } from './SecretResolver.js';
export type { SecretResolverConfig } from './SecretResolver.js';
export { EnvProvider } from './providers/EnvProvider.js';
export { FileSecretProvider } from './providers/FileSecretProvider.js';
