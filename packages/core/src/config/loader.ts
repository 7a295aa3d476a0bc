import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { Config, ConfigError, ConfigInput, parseConfig } from '@patchloop/shared';
import { PROJECT_DIR } from '@patchloop/repo';

export interface ConfigOptions {
  /** Explicit `--config` file */
  configPath?: string;
  /** Values taken from CLI flags */
  flags?: ConfigInput;
  /** Project root holding `.patchloop/config.yaml` */
  cwd?: string;
  /** Directory holding the user's `.patchloop/config.yaml` */
  homeDir?: string;
}

export const CONFIG_FILE = 'config.yaml';

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
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
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${filePath}`);
    }
    return parsed;
  }

  /**
   * Deep-merges `source` into a copy of `target`. Arrays and primitives replace;
   * undefined values are skipped.
   */
  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isRecord(sourceValue) && isRecord(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static writeEffectiveConfig(config: Config, dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const filePath = path.join(dir, 'effective-config.json');
    fs.writeFileSync(filePath, JSON.stringify(config, null, 2), 'utf8');
  }

  /**
   * Loads and validates the configuration. Precedence, lowest first:
   * defaults, user file, project file, explicit `--config` file, flags.
   */
  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd ?? process.cwd();
    const homeDir = options.homeDir ?? os.homedir();

    // 1. User config: ~/.patchloop/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, PROJECT_DIR, CONFIG_FILE));

    // 2. Project config: <projectRoot>/.patchloop/config.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_DIR, CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      const explicitPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(explicitPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigRecord = { ...options.flags };

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    return parseConfig(merged, 'configuration');
  }
}
