import { vi, type Mock } from 'vitest';
import type { CommandOptions, CommandResult } from '../credentials/command-runner.js';

export type MockCommandRunner = Mock<[string, readonly string[], CommandOptions?], Promise<CommandResult>>;

export function createMockCommandRunner(result: Partial<CommandResult> = {}): MockCommandRunner {
  return vi.fn<[string, readonly string[], CommandOptions?], Promise<CommandResult>>(async () => ({
    exitCode: 0,
    stdout: '',
    stderr: '',
    ...result,
  }));
}
