import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigLoader } from '../../src/config/loader.js';
import { ConfigError } from '../../src/errors/index.js';
import { writeFile, rm, mkdir } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

describe('ConfigLoader', () => {
  let testDir: string;
  let loader: ConfigLoader;

  beforeEach(async () => {
    testDir = join(tmpdir(), `config-loader-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    loader = new ConfigLoader(testDir);
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('loadConfig', () => {
    it('should apply defaults without a config file', async () => {
      const config = await loader.loadConfig();

      expect(config.configDir).toBe(testDir);
      expect(config.stateDir).toBe(join(testDir, '.sessionctl'));
      expect(config.workDir).toBe(testDir);
      expect(config.logDirectory).toBe(join(testDir, '.sessionctl', 'logs'));
      expect(config.serverUrl).toBe('http://127.0.0.1:3000');
      expect(config.workerCommand).toBe('claude');
      expect(config.defaultMaxIterations).toBe(3);
      expect(config.launchRetries).toBe(2);
      expect(config.reconcileIntervalMs).toBe(30000);
    });

    it('should load YAML config', async () => {
      await writeFile(
        join(testDir, 'sessionctl.yaml'),
        ['stateDir: state', 'serverPort: 4100', 'model: sonnet', 'defaultMaxIterations: 5', ''].join('\n')
      );

      const config = await loader.loadConfig();

      expect(config.stateDir).toBe(join(testDir, 'state'));
      expect(config.serverUrl).toBe('http://127.0.0.1:4100');
      expect(config.model).toBe('sonnet');
      expect(config.defaultMaxIterations).toBe(5);
    });

    it('should load JSON config and keep absolute paths', async () => {
      await writeFile(
        join(testDir, 'sessionctl.json'),
        JSON.stringify({ workDir: '/srv/project', logDirectory: '/var/log/sessionctl' })
      );

      const config = await loader.loadConfig();

      expect(config.workDir).toBe('/srv/project');
      expect(config.logDirectory).toBe('/var/log/sessionctl');
    });

    it('should prefer sessionctl.yaml over sessionctl.json', async () => {
      await writeFile(join(testDir, 'sessionctl.yaml'), 'serverPort: 4001\n');
      await writeFile(join(testDir, 'sessionctl.json'), JSON.stringify({ serverPort: 4002 }));

      const config = await loader.loadConfig();
      expect(config.serverPort).toBe(4001);
    });

    it('should treat an empty file as defaults', async () => {
      await writeFile(join(testDir, 'sessionctl.yml'), '');

      const config = await loader.loadConfig();
      expect(config.serverPort).toBe(3000);
    });

    it('should cache loaded config', async () => {
      const config1 = await loader.loadConfig();
      const config2 = await loader.loadConfig();

      expect(config1).toBe(config2); // Same object reference
    });

    it('should reject invalid values', async () => {
      await writeFile(join(testDir, 'sessionctl.json'), JSON.stringify({ serverPort: 80 }));

      await expect(loader.loadConfig()).rejects.toThrow(ConfigError);
      await expect(loader.loadConfig()).rejects.toThrow(
        `Invalid config (${join(testDir, 'sessionctl.json')}): serverPort:`
      );
    });

    it('should reject unknown keys', async () => {
      await writeFile(join(testDir, 'sessionctl.yaml'), 'workerCount: 4\n');

      await expect(loader.loadConfig()).rejects.toThrow(/Unrecognized key/);
    });

    it('should reject malformed JSON', async () => {
      await writeFile(join(testDir, 'sessionctl.json'), '{ "serverPort": ');

      await expect(loader.loadConfig()).rejects.toThrow(
        `Invalid JSON in config file: ${join(testDir, 'sessionctl.json')}`
      );
    });
  });
});
