import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@leakscan/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Scanned root (for repo config)
  homeDir?: string; // User config location
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const USER_CONFIG_DIR = '.leakscan';
export const REPO_CONFIG_FILE = '.leakscan.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();

    // 1. User config: ~/.leakscan/config.yaml
    const homeDir = options.homeDir || os.homedir();
    const userConfigPath = path.join(homeDir, USER_CONFIG_DIR, 'config.yaml');
    const userConfig = this.loadYaml(userConfigPath);

    // 2. Repo config: <root>/.leakscan.yaml
    const repoConfigPath = path.join(cwd, REPO_CONFIG_FILE);
    const repoConfig = this.loadYaml(repoConfigPath);

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigRecord = options.flags ?? {};

    // Merge in order of precedence: flags > explicit > repo > user
    let mergedConfig = this.mergeConfigs({}, userConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, repoConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, flagConfig);

    // Defaults are filled in by the schema
    const result = ConfigSchema.safeParse(mergedConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
