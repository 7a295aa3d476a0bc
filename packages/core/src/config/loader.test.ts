import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '@patchloop/shared';
import { ConfigLoader } from './loader';

describe('ConfigLoader', () => {
  let home: string;
  let project: string;

  function writeYaml(file: string, value: unknown) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, yaml.dump(value));
  }

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'patchloop-home-'));
    project = fs.mkdtempSync(path.join(os.tmpdir(), 'patchloop-project-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
    fs.rmSync(project, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should load default config when no files exist', () => {
      const config = ConfigLoader.load({ cwd: project, homeDir: home });
      expect(config.configVersion).toBe(1);
      expect(config.agent.maxIterations).toBe(15);
      expect(config.tests.command).toBe('python -m pytest src/tests.py -v');
      expect(config.patch.protectedPaths).toEqual([]);
    });

    it('should load user config', () => {
      writeYaml(path.join(home, '.patchloop', 'config.yaml'), { agent: { model: 'user-model' } });

      const config = ConfigLoader.load({ cwd: project, homeDir: home });
      expect(config.agent.model).toBe('user-model');
    });

    it('should respect precedence: flags > explicit > project > user', () => {
      writeYaml(path.join(home, '.patchloop', 'config.yaml'), {
        agent: { maxIterations: 1, model: 'user-model' },
        tests: { timeoutMs: 5000 },
      });
      writeYaml(path.join(project, '.patchloop', 'config.yaml'), {
        agent: { maxIterations: 2 },
        tests: { command: 'npm test' },
      });
      writeYaml(path.join(project, 'ci.yaml'), { agent: { maxIterations: 3 } });

      const config = ConfigLoader.load({
        cwd: project,
        homeDir: home,
        configPath: 'ci.yaml',
        flags: { agent: { maxIterations: 4 } },
      });

      expect(config.agent.maxIterations).toBe(4);
      expect(config.agent.model).toBe('user-model');
      expect(config.tests.command).toBe('npm test');
      expect(config.tests.timeoutMs).toBe(5000);
    });

    it('replaces arrays instead of merging them', () => {
      writeYaml(path.join(home, '.patchloop', 'config.yaml'), {
        patch: { protectedPaths: ['tests/**'] },
      });
      writeYaml(path.join(project, '.patchloop', 'config.yaml'), {
        patch: { protectedPaths: ['src/tests.py'] },
      });

      const config = ConfigLoader.load({ cwd: project, homeDir: home });
      expect(config.patch.protectedPaths).toEqual(['src/tests.py']);
    });

    it('should throw ConfigError if explicit config file is missing', () => {
      expect(() =>
        ConfigLoader.load({ cwd: project, homeDir: home, configPath: 'missing.yaml' }),
      ).toThrow('Config file not found: missing.yaml');
    });

    it('should throw ConfigError for invalid YAML', () => {
      const file = path.join(project, '.patchloop', 'config.yaml');
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, 'agent: [unclosed');

      expect(() => ConfigLoader.load({ cwd: project, homeDir: home })).toThrow(ConfigError);
    });

    it('should throw ConfigError when validation fails', () => {
      expect(() =>
        ConfigLoader.load({ cwd: project, homeDir: home, flags: { agent: { maxIterations: 0 } } }),
      ).toThrow(ConfigError);
    });

    it('rejects a file whose top level is not a mapping', () => {
      const file = path.join(project, '.patchloop', 'config.yaml');
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, '- one\n- two\n');

      expect(() => ConfigLoader.load({ cwd: project, homeDir: home })).toThrow(
        `Expected a mapping at the top of ${file}`,
      );
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested objects and skips undefined values', () => {
      expect(
        ConfigLoader.mergeConfigs(
          { agent: { model: 'a', maxIterations: 2 }, keep: true },
          { agent: { model: 'b' }, keep: undefined },
        ),
      ).toEqual({ agent: { model: 'b', maxIterations: 2 }, keep: true });
    });
  });

  describe('writeEffectiveConfig', () => {
    it('writes the resolved configuration as JSON', () => {
      const config = ConfigLoader.load({ cwd: project, homeDir: home });
      const dir = path.join(project, 'out');
      ConfigLoader.writeEffectiveConfig(config, dir);

      const written: unknown = JSON.parse(
        fs.readFileSync(path.join(dir, 'effective-config.json'), 'utf8'),
      );
      expect(written).toEqual(config);
    });
  });
});
