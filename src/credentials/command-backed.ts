import { CredentialStoreError } from '../errors/categories.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { CommandResult, CommandRunner } from './command-runner.js';
import { execFileRunner } from './command-runner.js';
import type { CredentialProvider, CredentialWriteResult } from './types.js';

export interface CommandBackedOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

/** Shared plumbing for stores that are reached through an OS tool. */
export abstract class CommandBackedProvider implements CredentialProvider {
  abstract readonly name: string;
  protected readonly runner: CommandRunner;
  protected readonly logger: Logger;

  constructor(options: CommandBackedOptions = {}) {
    this.runner = options.runner ?? execFileRunner;
    this.logger = options.logger ?? new NoopLogger();
  }

  abstract get(): Promise<string | undefined>;
  abstract set(secret: string): Promise<CredentialWriteResult>;

  /** Trimmed stdout of a successful lookup, otherwise `undefined`. */
  protected secretFrom(result: CommandResult): string | undefined {
    if (result.exitCode !== 0) {
      this.logger.debug('Credential lookup found nothing', {
        store: this.name,
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
      return undefined;
    }
    const secret = result.stdout.trim();
    return secret ? secret : undefined;
  }

  protected writeResult(result: CommandResult): CredentialWriteResult {
    if (result.exitCode === 0) {
      return { ok: true, store: this.name };
    }
    const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
    return {
      ok: false,
      error: new CredentialStoreError(`Could not save API key to ${this.name}: ${detail}`),
    };
  }
}
