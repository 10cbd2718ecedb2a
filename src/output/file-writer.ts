import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export type FileWriter = (path: string, text: string) => Promise<void>;

/** Writes `text` verbatim as UTF-8, creating missing parent directories. */
export const writeOutputFile: FileWriter = async (path, text) => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, 'utf8');
};
