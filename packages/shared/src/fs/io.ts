import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir } from 'fs-extra';
import type { OutputFormat } from '../config/schema';

export function resultFilePath(dir: string, basename: string, format: OutputFormat): string {
  return join(dir, `${basename}.${format}`);
}

/**
 * Writes `<dir>/<basename>.<format>` through a hidden temporary sibling that is
 * renamed into place. A reader sees either the previous file or the complete
 * new one. Creates `dir` when it is missing and returns the written path.
 */
export async function writeResultFile(
  dir: string,
  basename: string,
  format: OutputFormat,
  content: string,
): Promise<string> {
  const target = resultFilePath(dir, basename, format);
  await ensureDir(dir);
  const tempPath = await tmpName({ dir, prefix: `.${basename}-`, postfix: `.${format}.tmp` });

  try {
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
  return target;
}
