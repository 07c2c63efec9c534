import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { type Config, ConfigSchema } from '../parser/config-schema.ts';
import { ConsoleLogger, type Logger } from './logger.ts';
import { PathResolver } from './paths.ts';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class ConfigLoader {
  private static instance: Config | undefined;
  private static logger: Logger = new ConsoleLogger();

  private static deepMerge(
    target: Record<string, unknown>,
    source: Record<string, unknown>
  ): Record<string, unknown> {
    const output = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = output[key];
      output[key] =
        isRecord(value) && isRecord(existing) ? ConfigLoader.deepMerge(existing, value) : value;
    }
    return output;
  }

  /**
   * Interpolate environment variables: ${VAR_NAME} or $VAR_NAME
   */
  static interpolateEnv(content: string, env: NodeJS.ProcessEnv = process.env): string {
    return content.replace(
      /\$\{([^}]+)\}|\$([a-zA-Z_][a-zA-Z0-9_]*)/g,
      (_match, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare ?? '';
        return env[name] ?? '';
      }
    );
  }

  static load(logger: Logger = ConfigLoader.logger): Config {
    if (ConfigLoader.instance) return ConfigLoader.instance;

    let merged: Record<string, unknown> = {};

    // Lowest precedence first so later files override earlier ones
    for (const path of [...PathResolver.getConfigPaths()].reverse()) {
      if (!existsSync(path)) continue;
      try {
        const content = ConfigLoader.interpolateEnv(readFileSync(path, 'utf-8'));
        const parsed = yaml.load(content);
        if (isRecord(parsed)) {
          merged = ConfigLoader.deepMerge(merged, parsed);
        }
      } catch (error) {
        logger.warn(`Warning: Failed to load config from ${path}: ${String(error)}`);
      }
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      logger.warn(`Warning: Invalid configuration, using defaults: ${result.error.message}`);
      ConfigLoader.instance = ConfigSchema.parse({});
    } else {
      ConfigLoader.instance = result.data;
    }

    return ConfigLoader.instance;
  }

  /**
   * For testing purposes, manually set the configuration
   */
  static setConfig(config: Config): void {
    ConfigLoader.instance = config;
  }

  static setLogger(logger: Logger): void {
    ConfigLoader.logger = logger;
  }

  /**
   * For testing purposes, clear the cached configuration
   */
  static clear(): void {
    ConfigLoader.instance = undefined;
  }

  /**
   * Environment variables visible to templates under `.env`.
   */
  static templateEnv(
    env: NodeJS.ProcessEnv = process.env,
    config: Config = ConfigLoader.load()
  ): Record<string, string> {
    const { allow, prefixes } = config.env;
    const visible: Record<string, string> = {};
    for (const [name, value] of Object.entries(env)) {
      if (value === undefined) continue;
      if (allow.includes(name) || prefixes.some((prefix) => name.startsWith(prefix))) {
        visible[name] = value;
      }
    }
    return visible;
  }
}
