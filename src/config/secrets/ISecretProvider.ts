/**
 * Secret Provider Interface
 *
 * A provider looks up a logical secret name (e.g. "FITNESS_SECRET",
 * "EMAIL_PASSWORD") in one source. SecretResolver tries providers in order
 * until one returns a value.
 *
 * Return undefined for "not found" so the next provider gets a chance; throw
 * only for unexpected failures.
 */
export interface ISecretProvider {
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolve' in obj &&
    typeof obj.resolve === 'function'
  );
}
