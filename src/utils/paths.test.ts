import { homedir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PathResolver } from './paths.ts';

describe('PathResolver', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should return correct project directory', () => {
    expect(PathResolver.getProjectDir()).toBe(join(process.cwd(), '.stepwright'));
  });

  it('should respect XDG_CONFIG_HOME', () => {
    process.env.XDG_CONFIG_HOME = '/custom/config';
    expect(PathResolver.getUserConfigDir()).toBe('/custom/config/stepwright');
  });

  it('should fallback to ~/.config if XDG_CONFIG_HOME is not set', () => {
    delete process.env.XDG_CONFIG_HOME;
    expect(PathResolver.getUserConfigDir()).toBe(join(homedir(), '.config', 'stepwright'));
  });

  it('should put STEPWRIGHT_CONFIG first', () => {
    process.env.STEPWRIGHT_CONFIG = '/absolute/path/to/config.yaml';
    expect(PathResolver.getConfigPaths()[0]).toBe('/absolute/path/to/config.yaml');
  });

  describe('expand', () => {
    const roots = { outDir: '/work/out', tempDir: '/tmp/sw', cwd: '/work' };

    it('should expand $out and $temp', () => {
      expect(PathResolver.expand('$out/report.md', roots)).toBe('/work/out/report.md');
      expect(PathResolver.expand('$temp', roots)).toBe('/tmp/sw');
    });

    it('should resolve relative paths against cwd', () => {
      expect(PathResolver.expand('data/in.json', roots)).toBe('/work/data/in.json');
      expect(PathResolver.expand('/etc/hosts', roots)).toBe('/etc/hosts');
    });

    it('should expand the home directory', () => {
      expect(PathResolver.expand('~/notes.txt', roots)).toBe(join(homedir(), 'notes.txt'));
    });
  });
});
