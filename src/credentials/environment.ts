import type { CredentialProvider, CredentialWriteResult } from './types.js';

export const API_KEY_ENV = 'OPENROUTER_API_KEY';

/**
 * Reads the key from the environment. `set` only changes the running
 * process, so it is the store of last resort.
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  readonly name = 'environment';

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly variable: string = API_KEY_ENV
  ) {}

  async get(): Promise<string | undefined> {
    const value = this.env[this.variable]?.trim();
    return value ? value : undefined;
  }

  async set(secret: string): Promise<CredentialWriteResult> {
    this.env[this.variable] = secret;
    return { ok: true, store: this.name };
  }
}
