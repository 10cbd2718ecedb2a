import type { CredentialStoreError } from '../errors/categories.js';

/** Service/account pair every OS store files the API key under. */
export const CREDENTIAL_SERVICE = 'openrouter-prompt';
export const CREDENTIAL_ACCOUNT = 'api-key';

export type CredentialWriteResult =
  | { readonly ok: true; readonly store: string }
  | { readonly ok: false; readonly error: CredentialStoreError };

/**
 * A place the API key can live.
 *
 * `get` resolves `undefined` when the store holds no key or cannot be
 * reached; it never throws for an absent secret.
 */
export interface CredentialProvider {
  readonly name: string;
  get(): Promise<string | undefined>;
  set(secret: string): Promise<CredentialWriteResult>;
}
