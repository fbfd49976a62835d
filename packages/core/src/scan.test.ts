import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  ConfigSchema,
  ConsoleLogger,
  ResourceExhaustedError,
  UsageError,
  type ConfigInput,
} from '@leakscan/shared';
import type { FileScanner } from '@leakscan/scanner';
import { runScan } from './scan';

describe('runScan', () => {
  let tmpDir: string;
  let logger: ConsoleLogger;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leakscan-scan-test-'));
    logger = new ConsoleLogger();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  const configWith = (input: ConfigInput = {}) => ConfigSchema.parse(input);

  it('scans the tree while honoring the ignore source', async () => {
    await createFiles({
      '.gitignore': '*.log\nsecret_folder/\n',
      'test.py': 'API_KEY = "test-secret"\npassword = "hunter2"\n',
      'ignore.log': 'password = "ignored"',
      'secret_folder/hidden.py': 'HIDDEN_KEY = "test-secret"',
    });

    const report = await runScan({ root: tmpDir, config: configWith(), logger, runId: 'run-1' });

    expect(report.matches).toEqual([
      {
        secret: 'KEY = "test-secret',
        file: 'test.py',
        line: 1,
        lineContent: 'API_KEY = "test-secret"',
      },
      { secret: 'password = "hunter2', file: 'test.py', line: 2, lineContent: 'password = "hunter2"' },
      { secret: 'password = "hunter2', file: 'test.py', line: 2, lineContent: 'password = "hunter2"' },
    ]);
    expect(report.ignoreRules).toEqual([
      '*.log',
      'secret_folder/',
      '.git/',
      '.*',
      '*~',
      '*.bak',
      '*.swp',
      'secrets.*',
    ]);
    expect(report.runId).toBe('run-1');
    expect(report.root).toBe(path.resolve(tmpDir));
    expect(report.stats).toMatchObject({
      filesEnumerated: 1,
      filesScanned: 1,
      filesSkipped: 0,
      matchesFound: 3,
      retries: 0,
    });
  });

  it('logs the run lifecycle events', async () => {
    await createFiles({ 'a.txt': 'token: abc' });
    const logSpy = vi.spyOn(logger, 'log');

    await runScan({ root: tmpDir, config: configWith(), logger, runId: 'run-2' });

    const types = logSpy.mock.calls.map(([event]) => event.type);
    expect(types).toEqual(['ScanStarted', 'FilesEnumerated', 'BatchCompleted', 'ScanFinished']);
    expect(logSpy.mock.calls[0][0]).toMatchObject({
      runId: 'run-2',
      payload: { root: path.resolve(tmpDir), ignoreRuleCount: 6, ruleCount: 6, concurrency: 100 },
    });
  });

  it('applies configured patterns and the substring switch', async () => {
    await createFiles({ 'login.py': 'token: abc', 'app.py': 'token: def' });

    const broad = await runScan({
      root: tmpDir,
      config: configWith({ ignore: { patterns: ['log'] } }),
      logger,
    });
    expect(broad.matches.map((m) => m.file)).toEqual(['app.py']);

    const strict = await runScan({
      root: tmpDir,
      config: configWith({ ignore: { patterns: ['log'], substringMatch: false } }),
      logger,
    });
    expect(strict.matches.map((m) => m.file)).toEqual(['app.py', 'login.py']);
  });

  it('uses only custom rules when defaults are off', async () => {
    await createFiles({ 'a.txt': 'token: abc\nitk_42\n' });

    const report = await runScan({
      root: tmpDir,
      config: configWith({
        rules: { useDefaults: false, custom: [{ id: 'internal', pattern: 'itk_\\d+' }] },
      }),
      logger,
    });

    expect(report.matches).toEqual([
      { secret: 'itk_42', file: 'a.txt', line: 2, lineContent: 'itk_42' },
    ]);
  });

  it('reads the ignore source named in config', async () => {
    await createFiles({ '.scanignore': 'vendor/\n', 'vendor/lib.js': 'token: abc', 'main.js': 'x' });

    const report = await runScan({
      root: tmpDir,
      config: configWith({ ignore: { file: '.scanignore' } }),
      logger,
    });

    expect(report.stats.filesEnumerated).toBe(1);
    expect(report.matches).toEqual([]);
  });

  it('skips files that stay exhausted and reports the retries', async () => {
    await createFiles({ 'a.txt': 'token: abc' });
    const scanner: FileScanner = {
      scan: async (candidate) => {
        throw new ResourceExhaustedError(candidate.path, 'EMFILE');
      },
    };
    const sleep = vi.fn().mockResolvedValue(undefined);
    const logSpy = vi.spyOn(logger, 'log');

    const report = await runScan({ root: tmpDir, config: configWith(), logger, scanner, sleep });

    expect(sleep).toHaveBeenCalledWith(5000);
    expect(report.skipped).toEqual([
      {
        status: 'skipped',
        file: 'a.txt',
        reason: 'resource-exhausted',
        message: 'Resource exhausted while scanning a.txt (EMFILE)',
        attempts: 2,
      },
    ]);
    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'ScanFinished',
        payload: expect.objectContaining({ filesScanned: 0, filesSkipped: 1, retries: 1 }),
      }),
    );
  });

  it('aborts when the exhausted policy says so', async () => {
    await createFiles({ 'a.txt': 'token: abc' });
    const scanner: FileScanner = {
      scan: async (candidate) => {
        throw new ResourceExhaustedError(candidate.path, 'EMFILE');
      },
    };

    await expect(
      runScan({
        root: tmpDir,
        config: configWith({ retry: { onExhausted: 'abort', delayMs: 0 } }),
        logger,
        scanner,
      }),
    ).rejects.toBeInstanceOf(ResourceExhaustedError);
  });

  it('rejects a missing root', async () => {
    await expect(
      runScan({ root: path.join(tmpDir, 'missing'), config: configWith(), logger }),
    ).rejects.toThrow(UsageError);
  });

  it('rejects a root that is a file', async () => {
    await createFiles({ 'file.txt': 'x' });
    await expect(
      runScan({ root: path.join(tmpDir, 'file.txt'), config: configWith(), logger }),
    ).rejects.toThrow(/Not a directory/);
  });
});
