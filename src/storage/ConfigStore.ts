/**
 * HarborGate ConfigStore
 * Loads harborgate.json, merges it over the defaults and validates it
 */

import fs from 'fs-extra';
import path from 'path';
import { HarborGateConfig } from '../types';
import { CONFIG_VERSION, DEFAULT_CONFIG } from '../config';
import { ConfigError, errorMessage } from '../core/errors';
import { HARBORGATE_DATA_DIR, logger } from '../core/Logger';
import { configSchema } from './configSchema';

export const CONFIG_FILE_NAME = 'harborgate.json';

const DATA_DIR_CONFIG = path.join(HARBORGATE_DATA_DIR, CONFIG_FILE_NAME);

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Objects merge key by key; arrays and scalars from `override` replace the
 * base value.
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? structuredClone(base) : structuredClone(override);
  }
  const merged: PlainObject = {};
  for (const key of new Set([...Object.keys(base), ...Object.keys(override)])) {
    merged[key] = deepMerge(base[key], override[key]);
  }
  return merged;
}

export class ConfigStore {
  /**
   * Where the config lives: the explicit path, else the first of
   * ./harborgate.json, ./configs/harborgate.json and the data directory.
   */
  static async resolvePath(explicit?: string): Promise<string | undefined> {
    if (explicit) {
      return path.resolve(explicit);
    }
    const candidates = [
      path.resolve(CONFIG_FILE_NAME),
      path.resolve('configs', CONFIG_FILE_NAME),
      DATA_DIR_CONFIG,
    ];
    for (const candidate of candidates) {
      if (await fs.pathExists(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  /**
   * Merge raw config over the defaults and validate. Relative workspace
   * roots are resolved against `baseDir`.
   */
  static parse(raw: unknown, baseDir: string = process.cwd()): HarborGateConfig {
    if (raw !== undefined && !isPlainObject(raw)) {
      throw new ConfigError('configuration must be a JSON object');
    }

    const result = configSchema.safeParse(deepMerge(DEFAULT_CONFIG, raw ?? {}));
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`invalid configuration: ${issues}`);
    }

    const config = result.data;
    const hostAccess = config.hostAccess;
    if (hostAccess.workspaceRoot) {
      hostAccess.workspaceRoot = path.resolve(baseDir, hostAccess.workspaceRoot);
    }
    const autoImport = config.security.blockedPaths.autoImport;
    autoImport.workspaceRoot = path.resolve(baseDir, autoImport.workspaceRoot || '.');
    return config;
  }

  /**
   * Load the configuration. Without any config file the defaults apply.
   */
  static async load(explicit?: string): Promise<HarborGateConfig> {
    const file = await this.resolvePath(explicit);

    if (!file) {
      logger.info('No configuration file found, using defaults');
      return this.parse({});
    }

    if (!(await fs.pathExists(file))) {
      throw new ConfigError(`configuration file not found: ${file}`);
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(file);
    } catch (error) {
      logger.error('Failed to read configuration', { path: file, error: errorMessage(error) });
      throw new ConfigError(`failed to read ${file}: ${errorMessage(error)}`);
    }

    const config = this.parse(raw, path.dirname(file));
    logger.info('Configuration loaded', { path: file, mode: config.security.mode });
    return config;
  }

  /**
   * Validate and write a configuration.
   */
  static async save(config: HarborGateConfig, file: string = DATA_DIR_CONFIG): Promise<void> {
    const result = configSchema.safeParse({ ...config, version: CONFIG_VERSION });
    if (!result.success) {
      throw new ConfigError(`refusing to save invalid configuration: ${result.error.issues[0]?.message}`);
    }
    try {
      await fs.ensureDir(path.dirname(file));
      await fs.writeJson(file, result.data, { spaces: 2 });
      logger.info('Configuration saved', { path: file });
    } catch (error) {
      logger.error('Failed to save configuration', { path: file, error: errorMessage(error) });
      throw new ConfigError(`failed to save ${file}: ${errorMessage(error)}`);
    }
  }

  /**
   * Write a fresh configuration unless one already exists.
   */
  static async init(config: HarborGateConfig, file: string = DATA_DIR_CONFIG, force = false): Promise<string> {
    if (!force && (await fs.pathExists(file))) {
      throw new ConfigError(`configuration already exists: ${file}`);
    }
    await this.save(config, file);
    return file;
  }

  static getPath(): string {
    return DATA_DIR_CONFIG;
  }
}
