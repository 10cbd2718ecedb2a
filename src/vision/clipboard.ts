import type { CommandRunner } from '../credentials/command-runner.js';
import { execFileRunner } from '../credentials/command-runner.js';

export type ClipboardResult = { readonly ok: true; readonly tool: string } | { readonly ok: false; readonly reason: string };

interface ClipboardCommand {
  command: string;
  args: readonly string[];
}

function clipboardCommands(platform: NodeJS.Platform): ClipboardCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'pbcopy', args: [] }];
    case 'win32':
      return [{ command: 'clip', args: [] }];
    default:
      // xclip first, xsel if it is missing
      return [
        { command: 'xclip', args: ['-selection', 'clipboard'] },
        { command: 'xsel', args: ['--clipboard', '--input'] },
      ];
  }
}

/** Places `text` on the system clipboard. */
export async function copyToClipboard(
  text: string,
  platform: NodeJS.Platform = process.platform,
  runner: CommandRunner = execFileRunner
): Promise<ClipboardResult> {
  const failures: string[] = [];
  for (const { command, args } of clipboardCommands(platform)) {
    const result = await runner(command, args, { input: text });
    if (result.exitCode === 0) {
      return { ok: true, tool: command };
    }
    failures.push(`${command}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
  }
  return { ok: false, reason: failures.join('; ') };
}
