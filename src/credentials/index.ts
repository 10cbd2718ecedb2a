import type { Logger } from '../observability/logging.js';
import { ChainCredentialProvider } from './chain.js';
import type { CommandRunner } from './command-runner.js';
import { CredentialManagerProvider } from './credential-manager.js';
import { EnvironmentCredentialProvider } from './environment.js';
import { KeychainCredentialProvider } from './keychain.js';
import { SecretServiceCredentialProvider } from './secret-service.js';
import type { CredentialProvider } from './types.js';

export type { CredentialProvider, CredentialWriteResult } from './types.js';
export { CREDENTIAL_SERVICE, CREDENTIAL_ACCOUNT } from './types.js';
export type { CommandRunner, CommandResult, CommandOptions } from './command-runner.js';
export { execFileRunner } from './command-runner.js';
export { EnvironmentCredentialProvider, API_KEY_ENV } from './environment.js';
export { KeychainCredentialProvider } from './keychain.js';
export { CredentialManagerProvider } from './credential-manager.js';
export { SecretServiceCredentialProvider } from './secret-service.js';
export { ChainCredentialProvider } from './chain.js';

export interface DefaultCredentialOptions {
  runner?: CommandRunner;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

/** The OS store for `platform`, or `undefined` where none is supported. */
export function backendForPlatform(
  platform: NodeJS.Platform,
  options: DefaultCredentialOptions = {}
): CredentialProvider | undefined {
  const backendOptions = { runner: options.runner, logger: options.logger };
  switch (platform) {
    case 'darwin':
      return new KeychainCredentialProvider(backendOptions);
    case 'win32':
      return new CredentialManagerProvider(backendOptions);
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return new SecretServiceCredentialProvider(backendOptions);
    default:
      return undefined;
  }
}

/** Platform store first, then `OPENROUTER_API_KEY`. */
export function defaultCredentialProvider(
  platform: NodeJS.Platform = process.platform,
  options: DefaultCredentialOptions = {}
): CredentialProvider {
  const environment = new EnvironmentCredentialProvider(options.env);
  const backend = backendForPlatform(platform, options);
  return new ChainCredentialProvider(backend ? [backend, environment] : [environment]);
}
