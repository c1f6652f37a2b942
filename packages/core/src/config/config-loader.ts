/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from .codeprobe/config.json, merges it over the
 * defaults and applies CODEPROBE_* environment overrides. A missing file
 * yields the defaults.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { isLogLevel } from '../logging/logger.js';
import { assertValidConfig } from './config-validator.js';

import type { CodeprobeConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Directory holding the configuration file */
export const CONFIG_DIR = '.codeprobe';

const CONFIG_FILE = 'config.json';

const ENV_PREFIX = 'CODEPROBE_';

const ENV_VARS = {
  MAX_WORKERS: `${ENV_PREFIX}MAX_WORKERS`,
  RULE_TIMEOUT_MS: `${ENV_PREFIX}RULE_TIMEOUT_MS`,
  MAX_STEPS: `${ENV_PREFIX}MAX_STEPS`,
  MAX_DURATION_MS: `${ENV_PREFIX}MAX_DURATION_MS`,
  REGISTRY_URL: `${ENV_PREFIX}REGISTRY_URL`,
  LOG_LEVEL: `${ENV_PREFIX}LOG_LEVEL`,
} as const;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when the configuration file cannot be read
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
  }
}

/**
 * Error thrown when the configuration file is not a JSON object
 */
export class ConfigParseError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigParseError';
    this.filePath = filePath;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target values
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
  }

  return result;
}

/**
 * Parse a positive integer from an environment variable string
 */
function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const num = parseInt(value, 10);
  return num > 0 ? num : undefined;
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Root directory to search for .codeprobe/config.json */
  rootDir?: string;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean;
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigLoadResult {
  config: CodeprobeConfig;
  /** Path to the config file (if found) */
  configPath?: string;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

export class ConfigLoader {
  private readonly rootDir: string;
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;

  constructor(options: ConfigLoaderOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
    this.configPath = path.join(this.rootDir, CONFIG_DIR, CONFIG_FILE);
  }

  /**
   * Load configuration from file, apply env overrides and validate
   *
   * @throws ConfigLoadError, ConfigParseError or ConfigValidationFailedError
   */
  async load(): Promise<ConfigLoadResult> {
    let raw: Record<string, unknown> = {};
    let configFileFound = false;
    let envOverridesApplied = false;

    const fileConfig = await this.loadFromFile(this.configPath);
    if (fileConfig !== null) {
      raw = fileConfig;
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        raw = deepMerge(raw, envConfig);
        envOverridesApplied = true;
      }
    }

    const result: ConfigLoadResult = {
      config: assertValidConfig(raw),
      configFileFound,
      envOverridesApplied,
    };
    if (configFileFound) {
      result.configPath = this.configPath;
    }
    return result;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Read the configuration file; null when it does not exist
   */
  private async loadFromFile(filePath: string): Promise<Record<string, unknown> | null> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isPlainObject(error) && error['code'] === 'ENOENT') {
        return null;
      }
      throw new ConfigLoadError(
        `Failed to read configuration file: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigParseError(
        `Failed to parse configuration file: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        error
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigParseError('Configuration must be a JSON object', filePath);
    }
    return parsed;
  }

  /**
   * Configuration overrides from environment variables; invalid values are ignored
   */
  private getEnvOverrides(): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};
    const analysis: Record<string, unknown> = {};

    const numeric: Array<[string, string]> = [
      [ENV_VARS.MAX_WORKERS, 'maxWorkers'],
      [ENV_VARS.RULE_TIMEOUT_MS, 'ruleTimeoutMs'],
      [ENV_VARS.MAX_STEPS, 'maxSteps'],
      [ENV_VARS.MAX_DURATION_MS, 'maxDurationMs'],
    ];
    for (const [variable, field] of numeric) {
      const value = parseEnvInteger(this.env[variable]);
      if (value !== undefined) {
        analysis[field] = value;
      }
    }
    if (Object.keys(analysis).length > 0) {
      overrides['analysis'] = analysis;
    }

    const registryUrl = this.env[ENV_VARS.REGISTRY_URL];
    if (registryUrl) {
      overrides['registry'] = { url: registryUrl };
    }

    const logLevel = this.env[ENV_VARS.LOG_LEVEL]?.toLowerCase();
    if (isLogLevel(logLevel)) {
      overrides['logLevel'] = logLevel;
    }

    return overrides;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Load configuration with default options
 */
export async function loadConfig(rootDir?: string): Promise<CodeprobeConfig> {
  const loader = new ConfigLoader(rootDir !== undefined ? { rootDir } : {});
  const result = await loader.load();
  return result.config;
}
