/**
 * Default configuration
 */

import { DEFAULT_MAX_FILE_SIZE_BYTES, DEFAULT_RULE_TIMEOUT_MS } from '../analysis/orchestrator.js';
import { DEFAULT_MAX_STEPS } from '../matcher/budget.js';
import { DEFAULT_REGISTRY_TIMEOUT_MS } from '../rules/registry-client.js';

import type { CodeprobeConfig } from './types.js';

const defaults: CodeprobeConfig = {
  rulesets: [],
  include: [],
  ignore: [],
  disabledRules: [],
  analysis: {
    maxWorkers: null,
    ruleTimeoutMs: DEFAULT_RULE_TIMEOUT_MS,
    maxSteps: DEFAULT_MAX_STEPS,
    maxDurationMs: null,
    maxFileSizeBytes: DEFAULT_MAX_FILE_SIZE_BYTES,
    syntaxErrors: 'tolerate',
  },
  registry: {
    url: null,
    timeoutMs: DEFAULT_REGISTRY_TIMEOUT_MS,
  },
  baseline: null,
  logLevel: 'info',
};

export const DEFAULT_CONFIG: Readonly<CodeprobeConfig> = Object.freeze(defaults);
