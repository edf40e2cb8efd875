import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, PROJECT_CONFIG_FILENAME } from '@codepack/shared';
import type { Config, ConfigInput } from '@codepack/shared';

type ConfigRecord = Record<string, unknown>;

export interface ConfigOptions {
  configPath?: string; // --config override
  flags?: ConfigInput; // CLI flags
  rootPath?: string; // traversal root (for project config)
  homeDir?: string; // location of the user config directory
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static userConfigPath(homeDir: string = os.homedir()): string {
    return path.join(homeDir, '.codepack', 'config.yaml');
  }

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
      throw new ConfigError(`Could not read config file: ${filePath}`, { cause: error });
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
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
    const rootPath = options.rootPath ?? process.cwd();

    // 1. User config: ~/.codepack/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath(options.homeDir));

    // 2. Project config: <root>/.codepack.yaml
    const projectConfig = this.loadYaml(path.join(rootPath, PROJECT_CONFIG_FILENAME));

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

    // Later layers win: flags > explicit > project > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
