import fs from 'node:fs/promises';
import { ConfigError, getErrorCode } from '@leakscan/shared';

/**
 * Splits an ignore source into rules. Lines are trimmed; blank lines and
 * `#` comments are dropped.
 */
export function parseIgnoreSource(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Reads ignore rules from a file. A missing file means no rules.
 */
export async function loadIgnoreRules(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return [];
    }
    throw new ConfigError(`Could not read ignore file: ${filePath}`, { cause: error });
  }
  return parseIgnoreSource(content);
}

/**
 * Exclusions applied on every run: version-control metadata, dotfiles,
 * editor backups and the scan's own result files.
 */
export function builtinExcludes(outputBasename: string): string[] {
  return ['.git/', '.*', '*~', '*.bak', '*.swp', `${outputBasename}.*`];
}

export interface IgnoreRuleSources {
  /** Rules read from the ignore source */
  sourceRules?: readonly string[];
  /** Rules from configuration and the command line */
  extraPatterns?: readonly string[];
  outputBasename: string;
}

export function buildIgnoreRules(sources: IgnoreRuleSources): string[] {
  return [
    ...(sources.sourceRules ?? []),
    ...(sources.extraPatterns ?? []),
    ...builtinExcludes(sources.outputBasename),
  ];
}
