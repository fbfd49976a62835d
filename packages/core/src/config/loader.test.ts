import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import yaml from 'js-yaml';
import { ConfigError } from '@leakscan/shared';
import { ConfigLoader } from './loader';

describe('ConfigLoader', () => {
  let tmpDir: string;
  let homeDir: string;
  let cwd: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leakscan-config-test-'));
    homeDir = path.join(tmpDir, 'home');
    cwd = path.join(tmpDir, 'repo');
    await fs.mkdir(path.join(homeDir, '.leakscan'), { recursive: true });
    await fs.mkdir(cwd, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const writeUser = (content: unknown) =>
    fs.writeFile(path.join(homeDir, '.leakscan', 'config.yaml'), yaml.dump(content));
  const writeRepo = (content: unknown) =>
    fs.writeFile(path.join(cwd, '.leakscan.yaml'), yaml.dump(content));
  async function writeExplicit(content: string): Promise<string> {
    const filePath = path.join(tmpDir, 'explicit.yaml');
    await fs.writeFile(filePath, content);
    return filePath;
  }

  describe('load', () => {
    it('should load default config when no files exist', () => {
      const config = ConfigLoader.load({ cwd, homeDir });
      expect(config.scan).toEqual({
        concurrency: 100,
        encoding: 'utf-8',
        previewLength: 50,
        skipBinaryExtensions: false,
      });
      expect(config.retry).toEqual({ maxAttempts: 2, delayMs: 5000, onExhausted: 'skip' });
      expect(config.ignore).toEqual({ file: '.gitignore', patterns: [], substringMatch: true });
      expect(config.rules).toEqual({ useDefaults: true, custom: [] });
      expect(config.output).toEqual({ dir: '.', basename: 'secrets', formats: ['json', 'csv'] });
    });

    it('should load user config', async () => {
      await writeUser({ scan: { concurrency: 10 } });

      const config = ConfigLoader.load({ cwd, homeDir });
      expect(config.scan.concurrency).toBe(10);
      expect(config.scan.previewLength).toBe(50);
    });

    it('should respect precedence: flags > explicit > repo > user', async () => {
      await writeUser({ scan: { concurrency: 1, previewLength: 10 } });
      await writeRepo({ scan: { concurrency: 2 }, retry: { delayMs: 20 } });
      const configPath = await writeExplicit(yaml.dump({ scan: { concurrency: 3 } }));

      const config = ConfigLoader.load({
        cwd,
        homeDir,
        configPath,
        flags: { scan: { concurrency: 4 } },
      });

      expect(config.scan.concurrency).toBe(4);
      expect(config.scan.previewLength).toBe(10);
      expect(config.retry.delayMs).toBe(20);
    });

    it('should replace arrays instead of merging them', async () => {
      await writeRepo({ ignore: { patterns: ['*.log', 'tmp/'] } });

      const config = ConfigLoader.load({ cwd, homeDir, flags: { ignore: { patterns: ['dist/'] } } });
      expect(config.ignore.patterns).toEqual(['dist/']);
    });

    it('should treat an empty file as no config', async () => {
      await fs.writeFile(path.join(cwd, '.leakscan.yaml'), '');
      expect(ConfigLoader.load({ cwd, homeDir }).scan.concurrency).toBe(100);
    });

    it('should fail if explicit config file is missing', () => {
      expect(() =>
        ConfigLoader.load({ cwd, homeDir, configPath: path.join(tmpDir, 'missing.yaml') }),
      ).toThrow(/Config file not found/);
    });

    it('should fail on invalid YAML', async () => {
      const configPath = await writeExplicit('invalid: yaml: :');

      expect(() => ConfigLoader.load({ cwd, homeDir, configPath })).toThrow(
        /Error parsing YAML file/,
      );
    });

    it('should fail when a file is not a mapping', async () => {
      const configPath = await writeExplicit(yaml.dump(['a', 'b']));
      expect(() => ConfigLoader.load({ cwd, homeDir, configPath })).toThrow(
        /must contain a mapping/,
      );
    });

    it('should fail on schema validation', async () => {
      const configPath = await writeExplicit(yaml.dump({ scan: { concurrency: 0 } }));

      expect(() => ConfigLoader.load({ cwd, homeDir, configPath })).toThrow(
        /Configuration validation failed:\n- scan\.concurrency:/,
      );
    });

    it('should reject flags that would retry a file more than once', () => {
      expect(() =>
        ConfigLoader.load({ cwd, homeDir, flags: { retry: { maxAttempts: 5, delayMs: 0 } } }),
      ).toThrow(/- retry\.maxAttempts:/);
    });

    it('should reject an invalid custom rule pattern', async () => {
      const configPath = await writeExplicit(
        yaml.dump({ rules: { custom: [{ id: 'broken', pattern: '(' }] } }),
      );

      expect(() => ConfigLoader.load({ cwd, homeDir, configPath })).toThrow(ConfigError);
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested objects and skips undefined values', () => {
      const merged = ConfigLoader.mergeConfigs(
        { scan: { concurrency: 1, encoding: 'utf-8' }, output: { dir: 'out' } },
        { scan: { concurrency: 5 }, output: undefined },
      );
      expect(merged).toEqual({
        scan: { concurrency: 5, encoding: 'utf-8' },
        output: { dir: 'out' },
      });
    });
  });
});
