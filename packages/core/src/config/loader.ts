import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@crucible/shared';

export interface ConfigOptions {
  configPath?: string; // explicit file, e.g. from a --config flag
  flags?: ConfigInput; // highest-precedence overrides
  cwd?: string; // directory holding the repo config
  env?: NodeJS.ProcessEnv; // source for api_key_env lookups
}

type ConfigRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static readonly USER_CONFIG_DIR = '.crucible';
  static readonly REPO_CONFIG_FILE = '.crucible.yaml';

  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping at the top level: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    // 1. User config: ~/.crucible/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), this.USER_CONFIG_DIR, 'config.yaml'));

    // 2. Repo config: <cwd>/.crucible.yaml
    const repoConfig = this.loadYaml(path.join(cwd, this.REPO_CONFIG_FILE));

    // 3. Explicit config file
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.length },
      });
    }

    const config = result.data;

    for (const providerConfig of Object.values(config.providers)) {
      if (providerConfig.api_key_env && !providerConfig.api_key) {
        const value = env[providerConfig.api_key_env];
        if (value) {
          providerConfig.api_key = value;
        }
      }
    }

    const { generator, reviewer } = config.defaults;
    for (const [role, id] of [
      ['generator', generator],
      ['reviewer', reviewer],
    ] as const) {
      if (id !== undefined && !(id in config.providers)) {
        throw new ConfigError(`defaults.${role} references unknown provider "${id}"`);
      }
    }

    return config;
  }
}
