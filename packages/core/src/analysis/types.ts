/**
 * Analysis types - inputs, options and the report of one analysis run
 */

import type { CancellationReason } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { ParserRegistry } from '../parsers/parser-registry.js';
import type { Language } from '../parsers/types.js';
import type { RegistryOptions } from '../rules/registry-client.js';
import type { LoadError } from '../rules/ruleset-loader.js';
import type { Severity, Violation } from '../rules/types.js';

// ============================================
// Inputs
// ============================================

/**
 * A file as read by the orchestrator; frozen once read
 */
export interface SourceFile {
  /** Workspace-relative path with `/` separators */
  readonly path: string;
  readonly language: Language;
  readonly content: string;
  /** SHA-256 of the content */
  readonly hash: string;
}

/**
 * A file to analyze. Content is read from `absolutePath` (or `path`) when not given.
 */
export interface AnalysisInput {
  path: string;
  absolutePath?: string;
  /** Text, or raw bytes decoded as UTF-8 */
  content?: string | Uint8Array;
  language?: Language;
}

// ============================================
// Options
// ============================================

export type OrderingMode = 'deterministic' | 'arrival';

/**
 * Where work units run: on worker threads (one file per thread at a time,
 * hung evaluations are terminated) or on the calling thread
 */
export type ExecutionMode = 'worker-threads' | 'in-process';

export interface AnalysisOptions {
  /** Only run these rules */
  ruleIds?: string[];
  /** Never run these rules */
  excludeRuleIds?: string[];
  /** Time limit of one (file, rule) evaluation */
  ruleTimeoutMs?: number;
  /** Step limit of one (file, rule) evaluation */
  maxSteps?: number;
  /** Wall-clock budget of the whole run */
  maxDurationMs?: number;
  ordering?: OrderingMode;
  maxWorkers?: number;
  execution?: ExecutionMode;
  signal?: AbortSignal;
  syntaxErrors?: 'tolerate' | 'reject';
  maxFileSizeBytes?: number;
  /** Fingerprints of violations to suppress */
  baseline?: Iterable<string>;
  collectStatistics?: boolean;
  logger?: Logger;
}

export interface AnalyzeOptions extends AnalysisOptions {
  /** Adapters used to discover files and, in process, to parse them */
  parsers?: ParserRegistry;
  /** Globs of files to analyze when no file list is given */
  include?: string[];
  /** Globs of files to skip */
  ignore?: string[];
  registry?: RegistryOptions;
}

// ============================================
// Report
// ============================================

export type AnalysisErrorKind = 'read' | 'parse' | 'evaluation' | 'timeout';

/**
 * A failed unit: a file that could not be read or parsed, or a (file, rule) evaluation
 */
export interface AnalysisError {
  kind: AnalysisErrorKind;
  file: string;
  ruleId?: string;
  code: string;
  message: string;
}

export interface RuleStatistics {
  ruleId: string;
  /** Files the rule was evaluated on */
  files: number;
  violations: number;
  errors: number;
  timeouts: number;
  executionTimeMs: number;
  /** Slowest single evaluation */
  maxExecutionTimeMs: number;
}

export interface AnalysisSummary {
  filesAnalyzed: number;
  filesFailed: number;
  rulesLoaded: number;
  /** (file, rule) evaluations that completed */
  evaluations: number;
  violations: number;
  errors: number;
  bySeverity: Record<Severity, number>;
  /** Violations collapsed into an identical fingerprint */
  duplicatesCollapsed: number;
  /** Violations dropped by the baseline */
  suppressed: number;
  durationMs: number;
}

export interface AnalysisReport {
  violations: Violation[];
  errors: AnalysisError[];
  loadErrors: LoadError[];
  summary: AnalysisSummary;
  cancelled: boolean;
  cancellationReason?: CancellationReason;
  statistics?: RuleStatistics[];
}
