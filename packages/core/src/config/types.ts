/**
 * Configuration types for .codeprobe/config.json
 */

import type { LogLevel } from '../logging/logger.js';

export type SyntaxErrorPolicy = 'tolerate' | 'reject';

/**
 * Limits and concurrency of an analysis run
 */
export interface AnalysisSettings {
  /** Concurrent file units; null means one per CPU */
  maxWorkers: number | null;
  ruleTimeoutMs: number;
  maxSteps: number;
  /** Wall-clock budget of a run; null means unlimited */
  maxDurationMs: number | null;
  maxFileSizeBytes: number;
  syntaxErrors: SyntaxErrorPolicy;
}

export interface RegistrySettings {
  /** Base URL of the ruleset registry; null disables `registry:` sources */
  url: string | null;
  timeoutMs: number;
}

export interface CodeprobeConfig {
  /** Ruleset sources used when none are given on the command line */
  rulesets: string[];
  include: string[];
  ignore: string[];
  disabledRules: string[];
  analysis: AnalysisSettings;
  registry: RegistrySettings;
  /** Baseline file of fingerprints to suppress */
  baseline: string | null;
  logLevel: LogLevel;
}
