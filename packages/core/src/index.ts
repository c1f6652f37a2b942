/**
 * codeprobe-core - multi-language static analysis kernel
 *
 * Parses source files into language-agnostic syntax trees, evaluates
 * declarative rules against them and reports located violations.
 *
 * Usage:
 * ```typescript
 * import { analyze } from 'codeprobe-core';
 *
 * const report = await analyze(process.cwd(), undefined, ['rules/']);
 * for (const violation of report.violations) {
 *   console.log(`${violation.file}:${violation.location.line} ${violation.message}`);
 * }
 * ```
 */

export const VERSION = '0.1.0';

// Errors and logging
export * from './errors.js';
export * from './logging/logger.js';

// Syntax adapters
export * from './parsers/types.js';
export {
  LineIndex,
  walkTree,
  findNodesByKind,
  nodeText,
  spanContains,
  spansEqual,
  compareSpans,
} from './parsers/syntax-tree.js';
export { BaseParser } from './parsers/base-parser.js';
export { TypeScriptParser } from './parsers/typescript-parser.js';
export { TreeSitterParser } from './parsers/tree-sitter/tree-sitter-parser.js';
export { isTreeSitterAvailable, getTreeSitterLoadingError } from './parsers/tree-sitter/loader.js';
export { ParserRegistry, getParserRegistry, parse, type AdapterStatus } from './parsers/parser-registry.js';

// Rules
export * from './rules/types.js';
export { renderTemplate, templatePlaceholders, templateCaptures, MATCH_PLACEHOLDER } from './rules/template.js';
export {
  validateRule,
  validateRules,
  computeRuleChecksum,
  canonicalJson,
  type RuleValidationIssue,
  type RuleValidationFailure,
  type RulesValidationResult,
} from './rules/rule-validator.js';
export {
  RulesetLoader,
  loadRuleset,
  mergeRulesets,
  parseRulesetSource,
  describeSource,
  RULESET_EXTENSIONS,
  type RulesetSource,
  type LoadError,
  type RulesetLoadResult,
  type RuleOrigin,
  type RulesetLoaderOptions,
} from './rules/ruleset-loader.js';
export {
  RegistryClient,
  DEFAULT_REGISTRY_TIMEOUT_MS,
  type RegistryOptions,
  type FetchFunction,
} from './rules/registry-client.js';
export { renderFix, applyFix, spanToLocation } from './rules/quick-fix.js';
export { ViolationCollector, computeFingerprint, compareViolations, createViolation } from './rules/violation-collector.js';

// Matching
export * from './matcher/types.js';
export { parseQuery, tokenizeQuery } from './matcher/query-parser.js';
export { QueryMatcher } from './matcher/query-matcher.js';
export { PatternMatcher, evaluate } from './matcher/pattern-matcher.js';
export { BudgetTracker, DEFAULT_MAX_STEPS, type EvaluationBudget } from './matcher/budget.js';

// Analysis
export * from './analysis/types.js';
export { analyze } from './analysis/analyze.js';
export {
  AnalysisOrchestrator,
  selectRules,
  DEFAULT_RULE_TIMEOUT_MS,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  type OrchestratorOptions,
} from './analysis/orchestrator.js';
export { discoverFiles, createSourceFile, hashContent, DEFAULT_IGNORE_DIRECTORIES } from './analysis/source-files.js';
export * from './analysis/report.js';
export { WorkerPool, type TaskResult, type WorkerPoolOptions } from './scanner/worker-pool.js';
export { ThreadedWorkerPool, type ThreadedWorkerPoolOptions, type RunTaskOptions } from './scanner/threaded-worker-pool.js';

// Rule testing
export * from './testing/types.js';
export { testRule, testRuleset, diffViolations } from './testing/rule-tester.js';
export * from './testing/report.js';

// Configuration
export * from './config/types.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export {
  ConfigLoader,
  ConfigLoadError,
  ConfigParseError,
  CONFIG_DIR,
  loadConfig,
  type ConfigLoaderOptions,
  type ConfigLoadResult,
} from './config/config-loader.js';
export {
  validateConfig,
  assertValidConfig,
  ConfigValidationFailedError,
  formatConfigErrors,
  type ConfigValidationError,
  type ConfigValidationResult,
} from './config/config-validator.js';
