import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, isRecord, type Config, type ConfigInput } from '@adapterlab/shared';

export const USER_CONFIG_DIR = '.adapterlab';
export const REPO_CONFIG_FILE = '.adapterlab.yaml';

export interface ConfigOptions {
  configPath?: string; // --config override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Directory holding the repo config; relative runsDir resolves here
  homeDir?: string; // Directory holding the user config; defaults to os.homedir()
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
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
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a YAML mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      // Mappings merge; arrays and primitives replace
      output[key] =
        isRecord(sourceValue) && isRecord(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();

    // 1. User config: ~/.adapterlab/config.yaml
    const homeDir = options.homeDir || os.homedir();
    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_DIR, 'config.yaml'));

    // 2. Repo config: <cwd>/.adapterlab.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig = options.flags || {};

    // Precedence: flags > explicit > repo > user
    let mergedConfig = this.mergeConfigs({}, userConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, repoConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, flagConfig);

    const result = ConfigSchema.safeParse(mergedConfig);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        cause: result.error,
      });
    }

    return { ...result.data, runsDir: path.resolve(cwd, result.data.runsDir) };
  }
}
