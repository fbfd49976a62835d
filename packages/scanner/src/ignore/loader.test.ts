import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '@leakscan/shared';
import {
  parseIgnoreSource,
  loadIgnoreRules,
  builtinExcludes,
  buildIgnoreRules,
} from './loader';

describe('parseIgnoreSource', () => {
  it('drops blank lines and comments and trims rules', () => {
    const content = '# build output\n*.log\n\n  secret_folder/  \r\n#node_modules\ndist\n';
    expect(parseIgnoreSource(content)).toEqual(['*.log', 'secret_folder/', 'dist']);
  });

  it('returns no rules for empty content', () => {
    expect(parseIgnoreSource('')).toEqual([]);
  });
});

describe('loadIgnoreRules', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leakscan-ignore-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reads rules from the ignore file', async () => {
    const file = path.join(tmpDir, '.gitignore');
    await fs.writeFile(file, '*.log\nsecret_folder/\n', 'utf-8');
    expect(await loadIgnoreRules(file)).toEqual(['*.log', 'secret_folder/']);
  });

  it('treats a missing ignore file as no rules', async () => {
    expect(await loadIgnoreRules(path.join(tmpDir, '.gitignore'))).toEqual([]);
  });

  it('raises a ConfigError when the ignore source cannot be read', async () => {
    await expect(loadIgnoreRules(tmpDir)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('builtinExcludes', () => {
  it('covers VCS metadata, dotfiles, backups and result files', () => {
    expect(builtinExcludes('secrets')).toEqual(['.git/', '.*', '*~', '*.bak', '*.swp', 'secrets.*']);
  });
});

describe('buildIgnoreRules', () => {
  it('appends extra patterns and built-ins after the source rules', () => {
    expect(
      buildIgnoreRules({
        sourceRules: ['*.log'],
        extraPatterns: ['vendor/'],
        outputBasename: 'findings',
      }),
    ).toEqual(['*.log', 'vendor/', '.git/', '.*', '*~', '*.bak', '*.swp', 'findings.*']);
  });

  it('always includes the built-ins', () => {
    expect(buildIgnoreRules({ outputBasename: 'secrets' })).toEqual(builtinExcludes('secrets'));
  });
});
