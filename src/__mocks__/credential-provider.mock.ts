import { CredentialStoreError } from '../errors/categories.js';
import type { CredentialProvider, CredentialWriteResult } from '../credentials/types.js';

/** In-memory store; `failWrites` makes every `set` report a failure. */
export class InMemoryCredentialProvider implements CredentialProvider {
  readonly name: string;
  readonly writes: string[] = [];
  gets = 0;

  constructor(
    private secret?: string,
    private readonly options: { name?: string; failWrites?: boolean } = {}
  ) {
    this.name = options.name ?? 'memory';
  }

  async get(): Promise<string | undefined> {
    this.gets++;
    return this.secret;
  }

  async set(secret: string): Promise<CredentialWriteResult> {
    this.writes.push(secret);
    if (this.options.failWrites) {
      return { ok: false, error: new CredentialStoreError(`${this.name} is read-only`) };
    }
    this.secret = secret;
    return { ok: true, store: this.name };
  }
}
