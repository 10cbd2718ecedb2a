import { CommandBackedProvider } from './command-backed.js';
import type { CredentialWriteResult } from './types.js';
import { CREDENTIAL_ACCOUNT, CREDENTIAL_SERVICE } from './types.js';

/** macOS login keychain, through `security`. */
export class KeychainCredentialProvider extends CommandBackedProvider {
  readonly name = 'macOS Keychain';

  async get(): Promise<string | undefined> {
    const result = await this.runner('security', [
      'find-generic-password',
      '-s', CREDENTIAL_SERVICE,
      '-a', CREDENTIAL_ACCOUNT,
      '-w',
    ]);
    return this.secretFrom(result);
  }

  async set(secret: string): Promise<CredentialWriteResult> {
    // -U updates an existing item in place
    const result = await this.runner('security', [
      'add-generic-password',
      '-U',
      '-s', CREDENTIAL_SERVICE,
      '-a', CREDENTIAL_ACCOUNT,
      '-w', secret,
    ]);
    return this.writeResult(result);
  }
}
