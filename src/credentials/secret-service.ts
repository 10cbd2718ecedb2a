import { CommandBackedProvider } from './command-backed.js';
import type { CredentialWriteResult } from './types.js';
import { CREDENTIAL_ACCOUNT, CREDENTIAL_SERVICE } from './types.js';

const ATTRIBUTES = ['service', CREDENTIAL_SERVICE, 'account', CREDENTIAL_ACCOUNT];

/** Freedesktop Secret Service (GNOME Keyring, KWallet), through `secret-tool`. */
export class SecretServiceCredentialProvider extends CommandBackedProvider {
  readonly name = 'Secret Service';

  async get(): Promise<string | undefined> {
    return this.secretFrom(await this.runner('secret-tool', ['lookup', ...ATTRIBUTES]));
  }

  async set(secret: string): Promise<CredentialWriteResult> {
    const result = await this.runner(
      'secret-tool',
      ['store', '--label', `${CREDENTIAL_SERVICE} API key`, ...ATTRIBUTES],
      { input: secret }
    );
    return this.writeResult(result);
  }
}
