import { CommandBackedProvider } from './command-backed.js';
import type { CredentialWriteResult } from './types.js';
import { CREDENTIAL_ACCOUNT, CREDENTIAL_SERVICE } from './types.js';

const LOAD_VAULT =
  '[void][Windows.Security.Credentials.PasswordVault,Windows.Security.Credentials,ContentType=WindowsRuntime];' +
  '$vault = New-Object Windows.Security.Credentials.PasswordVault;';

// The secret is read from stdin so it never appears in the process list.
const RETRIEVE_SCRIPT =
  LOAD_VAULT +
  `$c = $vault.Retrieve('${CREDENTIAL_SERVICE}','${CREDENTIAL_ACCOUNT}');` +
  '$c.RetrievePassword();' +
  '[Console]::Out.Write($c.Password)';

const STORE_SCRIPT =
  LOAD_VAULT +
  '$secret = [Console]::In.ReadToEnd().Trim();' +
  `$vault.Add((New-Object Windows.Security.Credentials.PasswordCredential('${CREDENTIAL_SERVICE}','${CREDENTIAL_ACCOUNT}',$secret)))`;

const POWERSHELL_ARGS = ['-NoProfile', '-NonInteractive', '-Command'];

/** Windows Credential Manager, through the PasswordVault WinRT API. */
export class CredentialManagerProvider extends CommandBackedProvider {
  readonly name = 'Windows Credential Manager';

  async get(): Promise<string | undefined> {
    return this.secretFrom(await this.runner('powershell.exe', [...POWERSHELL_ARGS, RETRIEVE_SCRIPT]));
  }

  async set(secret: string): Promise<CredentialWriteResult> {
    const result = await this.runner('powershell.exe', [...POWERSHELL_ARGS, STORE_SCRIPT], { input: secret });
    return this.writeResult(result);
  }
}
