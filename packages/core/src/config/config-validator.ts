/**
 * Config Validator - validation of raw configuration objects
 *
 * Checks every field that is present and builds a complete CodeprobeConfig
 * with defaults for the absent ones. Errors carry the field path, the
 * expected shape, the actual value and a suggestion.
 */

import { isLogLevel, LOG_LEVELS } from '../logging/logger.js';
import { DEFAULT_CONFIG } from './defaults.js';

import type { AnalysisSettings, CodeprobeConfig, RegistrySettings, SyntaxErrorPolicy } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const SYNTAX_ERROR_POLICIES: readonly SyntaxErrorPolicy[] = ['tolerate', 'reject'];

const TOP_LEVEL_KEYS = ['rulesets', 'include', 'ignore', 'disabledRules', 'analysis', 'registry', 'baseline', 'logLevel'];

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * A single configuration validation error
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g. 'analysis.maxSteps', 'ignore[2]') */
  path: string;
  message: string;
  expected?: string;
  actual?: unknown;
  suggestion?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  /** Complete configuration (only present if valid) */
  data?: CodeprobeConfig;
  /** Validation errors (only present if invalid) */
  errors?: ConfigValidationError[];
}

/**
 * Thrown when a configuration file does not validate
 */
export class ConfigValidationFailedError extends Error {
  constructor(
    message: string,
    public readonly errors: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigValidationFailedError';
  }

  /**
   * Format errors as a human-readable string with suggestions
   */
  formatErrors(): string {
    return formatConfigErrors(this.errors);
  }
}

// ============================================================================
// Helper Validation Functions
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function isOneOf<T extends string>(value: unknown, validValues: readonly T[]): value is T {
  return validValues.some((valid) => valid === value);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

// ============================================================================
// Field Validators
// ============================================================================

function validateStringList(
  value: unknown,
  path: string,
  fallback: readonly string[],
  errors: ConfigValidationError[]
): string[] {
  if (value === undefined) return [...fallback];

  if (!Array.isArray(value)) {
    errors.push({
      path,
      message: `${path} must be an array of strings`,
      expected: 'string[]',
      actual: describeType(value),
      suggestion: `Use an array like: ["${path === 'rulesets' ? 'rules/' : 'src/**'}"]`,
    });
    return [...fallback];
  }

  const result: string[] = [];
  value.forEach((item: unknown, index) => {
    if (typeof item !== 'string' || item.length === 0) {
      errors.push({
        path: `${path}[${index}]`,
        message: 'Each entry must be a non-empty string',
        expected: 'non-empty string',
        actual: item,
      });
    } else {
      result.push(item);
    }
  });
  return result;
}

function validatePositive(
  value: unknown,
  path: string,
  fallback: number,
  errors: ConfigValidationError[]
): number {
  if (value === undefined) return fallback;
  if (isPositiveInteger(value)) return value;
  errors.push({
    path,
    message: `${path} must be a positive integer`,
    expected: 'integer >= 1',
    actual: value,
  });
  return fallback;
}

function validateNullablePositive(
  value: unknown,
  path: string,
  fallback: number | null,
  errors: ConfigValidationError[]
): number | null {
  if (value === null) return null;
  if (value === undefined) return fallback;
  if (isPositiveInteger(value)) return value;
  errors.push({
    path,
    message: `${path} must be a positive integer or null`,
    expected: 'integer >= 1 | null',
    actual: value,
    suggestion: 'Use null to remove the limit',
  });
  return fallback;
}

function validateAnalysis(value: unknown, errors: ConfigValidationError[]): AnalysisSettings {
  const defaults = DEFAULT_CONFIG.analysis;
  if (value === undefined) return { ...defaults };

  if (!isObject(value)) {
    errors.push({
      path: 'analysis',
      message: 'Analysis settings must be an object',
      expected: '{ maxWorkers?, ruleTimeoutMs?, maxSteps?, maxDurationMs?, maxFileSizeBytes?, syntaxErrors? }',
      actual: describeType(value),
    });
    return { ...defaults };
  }

  let syntaxErrors = defaults.syntaxErrors;
  const policy = value['syntaxErrors'];
  if (isOneOf(policy, SYNTAX_ERROR_POLICIES)) {
    syntaxErrors = policy;
  } else if (policy !== undefined) {
    errors.push({
      path: 'analysis.syntaxErrors',
      message: `Invalid syntax error policy "${String(policy)}"`,
      expected: SYNTAX_ERROR_POLICIES.join(' | '),
      actual: policy,
      suggestion: '"tolerate" analyzes recovered trees, "reject" reports them as parse errors',
    });
  }

  return {
    maxWorkers: validateNullablePositive(value['maxWorkers'], 'analysis.maxWorkers', defaults.maxWorkers, errors),
    ruleTimeoutMs: validatePositive(value['ruleTimeoutMs'], 'analysis.ruleTimeoutMs', defaults.ruleTimeoutMs, errors),
    maxSteps: validatePositive(value['maxSteps'], 'analysis.maxSteps', defaults.maxSteps, errors),
    maxDurationMs: validateNullablePositive(value['maxDurationMs'], 'analysis.maxDurationMs', defaults.maxDurationMs, errors),
    maxFileSizeBytes: validatePositive(value['maxFileSizeBytes'], 'analysis.maxFileSizeBytes', defaults.maxFileSizeBytes, errors),
    syntaxErrors,
  };
}

function validateRegistry(value: unknown, errors: ConfigValidationError[]): RegistrySettings {
  const defaults = DEFAULT_CONFIG.registry;
  if (value === undefined) return { ...defaults };

  if (!isObject(value)) {
    errors.push({
      path: 'registry',
      message: 'Registry settings must be an object',
      expected: '{ url?: string | null, timeoutMs?: number }',
      actual: describeType(value),
    });
    return { ...defaults };
  }

  let url = defaults.url;
  const rawUrl = value['url'];
  if (rawUrl === null || (typeof rawUrl === 'string' && isHttpUrl(rawUrl))) {
    url = rawUrl;
  } else if (rawUrl !== undefined) {
    errors.push({
      path: 'registry.url',
      message: 'Registry URL must be an http(s) URL',
      expected: 'http(s) URL | null',
      actual: rawUrl,
      suggestion: 'Use a base URL like "https://rules.example.com/api/v2"',
    });
  }

  return { url, timeoutMs: validatePositive(value['timeoutMs'], 'registry.timeoutMs', defaults.timeoutMs, errors) };
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validate a raw configuration object and fill in defaults
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  if (!isObject(raw)) {
    errors.push({
      path: '',
      message: 'Configuration must be an object',
      expected: 'object',
      actual: describeType(raw),
    });
    return { valid: false, errors };
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      errors.push({
        path: key,
        message: `Unknown configuration key "${key}"`,
        expected: TOP_LEVEL_KEYS.join(' | '),
        actual: key,
        suggestion: 'Remove the key or check its spelling',
      });
    }
  }

  let baseline = DEFAULT_CONFIG.baseline;
  const rawBaseline = raw['baseline'];
  if (rawBaseline === null || (typeof rawBaseline === 'string' && rawBaseline.length > 0)) {
    baseline = rawBaseline;
  } else if (rawBaseline !== undefined) {
    errors.push({
      path: 'baseline',
      message: 'Baseline must be a file path or null',
      expected: 'non-empty string | null',
      actual: rawBaseline,
    });
  }

  let logLevel = DEFAULT_CONFIG.logLevel;
  const rawLevel = raw['logLevel'];
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else if (rawLevel !== undefined) {
    errors.push({
      path: 'logLevel',
      message: `Invalid log level "${String(rawLevel)}"`,
      expected: LOG_LEVELS.join(' | '),
      actual: rawLevel,
    });
  }

  const data: CodeprobeConfig = {
    rulesets: validateStringList(raw['rulesets'], 'rulesets', DEFAULT_CONFIG.rulesets, errors),
    include: validateStringList(raw['include'], 'include', DEFAULT_CONFIG.include, errors),
    ignore: validateStringList(raw['ignore'], 'ignore', DEFAULT_CONFIG.ignore, errors),
    disabledRules: validateStringList(raw['disabledRules'], 'disabledRules', DEFAULT_CONFIG.disabledRules, errors),
    analysis: validateAnalysis(raw['analysis'], errors),
    registry: validateRegistry(raw['registry'], errors),
    baseline,
    logLevel,
  };

  return errors.length > 0 ? { valid: false, errors } : { valid: true, data };
}

/**
 * Validate and return the configuration, throwing on errors
 *
 * @throws ConfigValidationFailedError
 */
export function assertValidConfig(raw: unknown): CodeprobeConfig {
  const result = validateConfig(raw);
  if (!result.valid || !result.data) {
    const errors = result.errors ?? [];
    throw new ConfigValidationFailedError(getErrorSummary(errors), errors);
  }
  return result.data;
}

// ============================================================================
// Formatting
// ============================================================================

export function formatConfigErrors(errors: readonly ConfigValidationError[]): string {
  if (errors.length === 0) return 'No errors';

  const header = `Configuration validation failed with ${errors.length} error(s):\n`;
  const body = errors
    .map((e, i) => {
      let msg = `\n${i + 1}. ${e.path || 'root'}: ${e.message}`;
      if (e.expected) msg += `\n   Expected: ${e.expected}`;
      if (e.actual !== undefined) msg += `\n   Got: ${JSON.stringify(e.actual)}`;
      if (e.suggestion) msg += `\n   Suggestion: ${e.suggestion}`;
      return msg;
    })
    .join('\n');

  return header + body;
}

export function getErrorSummary(errors: readonly ConfigValidationError[]): string {
  if (errors.length === 0) return 'Configuration is valid';
  const uniquePaths = [...new Set(errors.map((e) => e.path || 'root'))];
  return `${errors.length} error(s) in: ${uniquePaths.join(', ')}`;
}
