import type { MfaStrategy } from '../types.js';
import { acceptCode } from '../types.js';

/**
 * Code supplied up front through configuration (e.g. `MFA_CODE`).
 * No I/O; only useful while the code is still fresh.
 */
export class PresetCodeStrategy implements MfaStrategy {
  readonly name = 'preset';
  readonly label = 'Pre-set code (MFA_CODE)';

  constructor(private readonly code: string | undefined) {}

  isConfigured(): boolean {
    return Boolean(this.code?.trim());
  }

  remediation(): string {
    return 'export MFA_CODE="<code>" with a code that has not been used yet';
  }

  async obtainCode(signal?: AbortSignal): Promise<string | undefined> {
    signal?.throwIfAborted();
    return acceptCode(this.code);
  }
}
