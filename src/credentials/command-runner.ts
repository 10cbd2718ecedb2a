import { execFile } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

/** Runs an OS tool without a shell. Never rejects: failures are exit codes. */
export type CommandRunner = (command: string, args: readonly string[], options?: CommandOptions) => Promise<CommandResult>;

const COMMAND_NOT_FOUND = 127;
const COMMAND_TIMEOUT_MS = 10_000;

export const execFileRunner: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandResult>((resolve) => {
    let stdinError: Error | undefined;
    const child = execFile(
      command,
      [...args],
      { encoding: 'utf8', timeout: COMMAND_TIMEOUT_MS, windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        const detail = stderr || stdinError?.message || error.message;
        resolve({
          exitCode: typeof error.code === 'number' ? error.code : COMMAND_NOT_FOUND,
          stdout,
          stderr: detail,
        });
      }
    );

    if (options.input !== undefined && child.stdin) {
      child.stdin.on('error', (error) => {
        stdinError = error;
      });
      child.stdin.end(options.input);
    }
  });
