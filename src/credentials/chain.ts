import { CredentialStoreError } from '../errors/categories.js';
import type { CredentialProvider, CredentialWriteResult } from './types.js';

/**
 * Tries providers in order. `get` answers with the first secret found;
 * `set` stops at the first store that accepts the write.
 */
export class ChainCredentialProvider implements CredentialProvider {
  readonly name: string;

  constructor(private readonly providers: readonly CredentialProvider[]) {
    if (providers.length === 0) {
      throw new Error('ChainCredentialProvider requires at least one provider');
    }
    this.name = providers.map((p) => p.name).join(' -> ');
  }

  async get(): Promise<string | undefined> {
    for (const provider of this.providers) {
      const secret = await provider.get();
      if (secret !== undefined) {
        return secret;
      }
    }
    return undefined;
  }

  async set(secret: string): Promise<CredentialWriteResult> {
    const failures: string[] = [];
    for (const provider of this.providers) {
      const result = await provider.set(secret);
      if (result.ok) {
        return result;
      }
      failures.push(result.error.message);
    }
    return {
      ok: false,
      error: new CredentialStoreError(`No credential store accepted the key: ${failures.join('; ')}`),
    };
  }
}
