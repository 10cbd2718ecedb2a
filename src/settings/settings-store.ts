import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { CallerError } from '../errors/categories.js';

export const SETTINGS_DIR_NAME = 'openrouter-prompt';
export const SETTINGS_FILE_NAME = 'settings.json';

const settingsSchema = z
  .object({
    defaultModel: z.string().trim().min(1).optional(),
  })
  .passthrough();

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Per-user settings file: `%APPDATA%` on Windows, otherwise
 * `$XDG_CONFIG_HOME` or `~/.config`.
 */
export function settingsPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  const base =
    platform === 'win32'
      ? env['APPDATA'] || join(home, 'AppData', 'Roaming')
      : env['XDG_CONFIG_HOME'] || join(home, '.config');
  return join(base, SETTINGS_DIR_NAME, SETTINGS_FILE_NAME);
}

export class SettingsStore {
  constructor(readonly path: string = settingsPath()) {}

  /** A missing file reads as empty settings. */
  async load(): Promise<Settings> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return {};
      throw new CallerError(`Cannot read settings file ${this.path}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new CallerError(`Settings file ${this.path} is not valid JSON`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const result = settingsSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new CallerError(`Invalid settings in ${this.path}: ${issues.join(', ')}`);
    }
    return result.data;
  }

  async save(settings: Settings): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(settings, null, 2)}\n`, 'utf8');
  }

  /** Merges `patch` into the stored settings, keeping keys it does not name. */
  async update(patch: Partial<Settings>): Promise<Settings> {
    const next = { ...(await this.load()), ...patch };
    await this.save(next);
    return next;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
