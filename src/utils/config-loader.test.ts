import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigSchema } from '../parser/config-schema.ts';
import { ConfigLoader } from './config-loader.ts';
import { SilentLogger } from './logger.ts';

describe('ConfigLoader', () => {
  const originalEnv = { ...process.env };
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'stepwright-config-'));
    process.env.XDG_CONFIG_HOME = join(tempDir, 'xdg');
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    ConfigLoader.clear();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.env = { ...originalEnv };
    ConfigLoader.clear();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when no file exists', () => {
    const config = ConfigLoader.load(new SilentLogger());
    expect(config.engine.max_loop_iterations).toBe(100);
    expect(config.retry.default_max_attempts).toBe(1);
    expect(config.env.prefixes).toEqual(['STEPWRIGHT_']);
  });

  it('should allow setting and clearing config', () => {
    const custom = ConfigSchema.parse({ engine: { max_loop_iterations: 5 } });
    ConfigLoader.setConfig(custom);
    expect(ConfigLoader.load().engine.max_loop_iterations).toBe(5);

    ConfigLoader.clear();
    expect(ConfigLoader.load(new SilentLogger()).engine.max_loop_iterations).toBe(100);
  });

  it('should interpolate environment variables in config', () => {
    process.env.TEST_ATTEMPTS_NAME = 'EXTRA_VAR';
    const configPath = join(tempDir, 'custom.yaml');
    writeFileSync(configPath, 'env:\n  allow: [${TEST_ATTEMPTS_NAME}, $TEST_ATTEMPTS_NAME]\n');
    process.env.STEPWRIGHT_CONFIG = configPath;

    const config = ConfigLoader.load(new SilentLogger());
    expect(config.env.allow).toEqual(['EXTRA_VAR', 'EXTRA_VAR']);
  });

  it('should warn and use defaults for an invalid config', () => {
    const configPath = join(tempDir, 'bad.yaml');
    writeFileSync(configPath, 'engine:\n  max_loop_iterations: 1000\n');
    process.env.STEPWRIGHT_CONFIG = configPath;
    const logger = new SilentLogger();
    const warn = vi.spyOn(logger, 'warn');

    const config = ConfigLoader.load(logger);
    expect(config.engine.max_loop_iterations).toBe(100);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should expose allow-listed and prefixed variables to templates', () => {
    ConfigLoader.setConfig(ConfigSchema.parse({ env: { allow: ['HOME_REGION'] } }));
    const env = ConfigLoader.templateEnv({
      HOME_REGION: 'eu',
      STEPWRIGHT_MODE: 'ci',
      PATH: '/usr/bin',
    });
    expect(env).toEqual({ HOME_REGION: 'eu', STEPWRIGHT_MODE: 'ci' });
  });
});
